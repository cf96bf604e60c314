import type { SweepVariant } from "@/types/protocol";

/**
 * Chooses which parameter set a sweep plays.
 *
 * Only two variants exist in Axon protocols today; an N-way scheme would
 * widen SweepVariant and plug in here.
 */
export interface AlternationStrategy {
  selectVariant(sweepIndex: number): SweepVariant;
}

/** Even sweeps play the primary set, odd sweeps the alternate one */
export const parityAlternation: AlternationStrategy = {
  selectVariant: (sweepIndex) =>
    sweepIndex % 2 === 0 ? "primary" : "alternate",
};
