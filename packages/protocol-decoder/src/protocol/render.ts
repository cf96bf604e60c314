/**
 * Dense renderers and epoch tables for synthesized sweeps
 */

import type { EpochType } from "@/lib/constants";
import type {
  AnalogSegment,
  DigitalTransition,
  ResolvedSweep,
} from "@/types/protocol";
import { layoutEpochs } from "./epochs";

export interface EpochBoundary {
  dacNumber: number;
  epochNumber: number;
  type: EpochType;
  /** First sample of the epoch */
  start: number;
  /** First sample after the epoch */
  end: number;
  level: number;
}

function segmentValue(segment: AnalogSegment, i: number): number {
  switch (segment.kind) {
    case "flat":
      return segment.level;
    case "ramp":
      return segment.from + ((segment.to - segment.from) * i) / segment.length;
    case "cosine":
      return (
        segment.baseline +
        segment.amplitude * Math.cos((2 * Math.PI * i) / segment.period)
      );
  }
}

/**
 * Materialize analog segments into one value per sample
 *
 * Samples past the last segment stay at 0; samples a segment would place past
 * `sampleCount` are dropped.
 */
export function renderAnalog(
  segments: Iterable<AnalogSegment>,
  sampleCount: number,
): Float64Array {
  const out = new Float64Array(sampleCount);
  for (const segment of segments) {
    const stop = Math.min(segment.start + segment.length, sampleCount);
    for (let s = segment.start; s < stop; s++) {
      out[s] = segmentValue(segment, s - segment.start);
    }
  }
  return out;
}

export function renderDigital(
  transitions: Iterable<DigitalTransition>,
  sampleCount: number,
): Uint8Array {
  const out = new Uint8Array(sampleCount);
  let previous: DigitalTransition | undefined;
  for (const transition of transitions) {
    if (previous) {
      out.fill(previous.state, previous.offset, transition.offset);
    }
    previous = transition;
  }
  if (previous) {
    out.fill(previous.state, previous.offset, sampleCount);
  }
  return out;
}

/**
 * Epoch start/end samples on every DAC for one episode
 */
export function epochTable(
  resolved: ResolvedSweep,
  episode: number = resolved.episodeNumber,
): EpochBoundary[] {
  return resolved.analog.flatMap((channel) =>
    layoutEpochs(channel, episode).map((epoch) => ({
      dacNumber: channel.channelNumber,
      epochNumber: epoch.epochNumber,
      type: epoch.type,
      start: epoch.start,
      end: epoch.start + epoch.duration,
      level: epoch.level,
    })),
  );
}
