import type { EpochType, Registry } from "@/lib/constants";

// =============================================================================
// DESCRIPTOR
// =============================================================================

export interface EpochWaveform {
  readonly epochNumber: number;
  readonly dacNumber: number;
  readonly type: EpochType;
  readonly levelInit: number;
  readonly levelIncrementPerEpisode: number;
  /** Samples */
  readonly durationInit: number;
  readonly durationIncrementPerEpisode: number;
  readonly pulsePeriod: number;
  readonly pulseWidth: number;
}

export type EpochSet = ReadonlyMap<number, EpochWaveform>;

export interface DACChannel {
  readonly channelNumber: number;
  readonly holdingLevel: number;
  /** Ascending by epoch number; gaps allowed */
  readonly epochs: EpochSet;
  /** Second waveform set played on alternate sweeps */
  readonly alternateEpochs?: EpochSet;
}

export interface EpochDigitalInfo {
  readonly epochNumber: number;
  readonly registry: Registry;
  readonly alternateRegistry: Registry;
  readonly digitalValue: number;
  readonly alternateDigitalValue: number;
  readonly digitalTrainValue: number;
  readonly alternateDigitalTrainValue: number;
}

export interface ProtocolDescriptor {
  readonly runsPerTrial: number;
  readonly episodesPerRun: number;
  readonly sweepCount: number;
  readonly averagedRuns: boolean;
  readonly alternateAnalogOutputs: boolean;
  readonly alternateDigitalOutputs: boolean;
  readonly digitalDACChannel: number;
  readonly trainActiveLogic: boolean;
  /** Hz */
  readonly samplingRate?: number;
  readonly channels: ReadonlyMap<number, DACChannel>;
  readonly digitalEpochs: ReadonlyMap<number, EpochDigitalInfo>;
}

// =============================================================================
// RESOLUTION
// =============================================================================

export type SweepVariant = "primary" | "alternate";

export interface ResolvedChannel {
  readonly channelNumber: number;
  readonly holdingLevel: number;
  readonly epochs: readonly EpochWaveform[];
}

export interface ResolvedDigitalEpoch {
  readonly epochNumber: number;
  readonly registry: Registry;
  readonly value: number;
  readonly trainValue: number;
}

export interface ResolvedSweep {
  readonly sweepIndex: number;
  readonly runNumber: number;
  readonly episodeNumber: number;
  readonly analogVariant: SweepVariant;
  readonly digitalVariant: SweepVariant;
  readonly episodesPerRun: number;
  readonly digitalDACChannel: number;
  readonly trainActiveLogic: boolean;
  readonly samplingRate?: number;
  readonly analog: readonly ResolvedChannel[];
  readonly digital: readonly ResolvedDigitalEpoch[];
}

// =============================================================================
// SYNTHESIS
// =============================================================================

export interface FlatSegment {
  readonly kind: "flat";
  readonly start: number;
  readonly length: number;
  readonly level: number;
}

export interface RampSegment {
  readonly kind: "ramp";
  readonly start: number;
  readonly length: number;
  readonly from: number;
  readonly to: number;
}

export interface CosineSegment {
  readonly kind: "cosine";
  readonly start: number;
  readonly length: number;
  readonly baseline: number;
  readonly amplitude: number;
  readonly period: number;
}

export type AnalogSegment = FlatSegment | RampSegment | CosineSegment;

export type LineState = 0 | 1;

export interface DigitalTransition {
  readonly offset: number;
  readonly state: LineState;
}

export interface AnalogTrace {
  readonly channelNumber: number;
  readonly holdingLevel: number;
  /** First sample after the channel's last epoch */
  readonly epochsEnd: number;
  readonly segments: Iterable<AnalogSegment>;
}

export interface DigitalTrace {
  readonly line: number;
  readonly transitions: Iterable<DigitalTransition>;
}

export interface SweepWaveform {
  readonly sweepIndex: number;
  readonly episodeNumber: number;
  readonly sampleCount: number;
  readonly samplingRate?: number;
  readonly analog: ReadonlyMap<number, AnalogTrace>;
  readonly digital: readonly DigitalTrace[];
}

export interface SynthesisOptions {
  /** Fail when a channel's active epochs skip a number below its highest one */
  requireContiguous?: boolean;
}
