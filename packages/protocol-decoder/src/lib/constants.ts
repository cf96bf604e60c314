/**
 * Format constants for Axon stimulation protocols
 * Centralizes the numeric codes so ingest and synthesis agree on them
 */

// ============================================================================
// Epochs
// ============================================================================

export const MAX_EPOCH_NUMBER = 9;

export const EPOCH_TYPES = [
  "Step",
  "Ramp",
  "PulseTrain",
  "BiphasicTrain",
  "Triangle",
  "Cosine",
] as const;

export type EpochType = (typeof EPOCH_TYPES)[number];

/** Code 0 marks a disabled epoch; such epochs are dropped at ingest. */
export const EPOCH_TYPE_DISABLED = 0;

export const EPOCH_TYPE_CODES: Readonly<Partial<Record<number, EpochType>>> = {
  1: "Step",
  2: "Ramp",
  3: "PulseTrain",
  4: "Triangle",
  5: "Cosine",
  7: "BiphasicTrain",
};

export const TRAIN_EPOCH_TYPES: ReadonlySet<EpochType> = new Set<EpochType>([
  "PulseTrain",
  "BiphasicTrain",
]);

// ============================================================================
// Digital outputs
// ============================================================================

export const DIGITAL_LINE_COUNT = 8;
export const REGISTRY_WIDTH = 4;
export const MAX_DIGITAL_CODE = (1 << REGISTRY_WIDTH) - 1;

export const REGISTRIES = ["Low", "High"] as const;
export type Registry = (typeof REGISTRIES)[number];

/** First absolute line of each 4-bit group: "#3-0" and "#7-4". */
export const REGISTRY_BASE_LINE: Readonly<Record<Registry, number>> = {
  Low: 0,
  High: 4,
};

export const REGISTRY_LABELS: Readonly<Record<Registry, string>> = {
  Low: "#3-0",
  High: "#7-4",
};
