/**
 * Zod schemas for runtime validation of raw protocol annotations
 * These schemas validate the structures handed over by the file reader
 * before any of them reach the typed model
 */

import { z } from "zod";
import { MAX_DIGITAL_CODE, MAX_EPOCH_NUMBER } from "./constants";

// ============================================================================
// Primitives
// ============================================================================

/** Annotation flags arrive as 0/1 integers or as booleans. */
export const FlagSchema = z
  .union([z.boolean(), z.literal(0), z.literal(1)])
  .transform((value) => value === true || value === 1);

export const EpochNumberSchema = z.number().int().min(0).max(MAX_EPOCH_NUMBER);

export const DigitalCodeSchema = z.number().int().min(0).max(MAX_DIGITAL_CODE);

export const RegistryCodeSchema = z
  .union([z.literal(0), z.literal(1), z.enum(["Low", "High"])])
  .transform((value) => (value === 1 || value === "High" ? "High" : "Low"));

const SampleCountSchema = z.number().int().min(0);

// ============================================================================
// Protocol-level flags
// ============================================================================

export const RawProtocolFlagsSchema = z.object({
  runsPerTrial: z.number().int().min(1),
  episodesPerRun: z.number().int().min(1),
  alternateAnalogOutputs: FlagSchema,
  alternateDigitalOutputs: FlagSchema,
  digitalDACChannel: z.number().int(),
  trainActiveLogic: FlagSchema,
  samplingRate: z.number().positive().optional(),
  holdingLevels: z.record(z.string(), z.number()).optional(),
});

// ============================================================================
// Epoch records
// ============================================================================

export const RawEpochDigitalInfoSchema = z.object({
  epochNumber: EpochNumberSchema,
  registry: RegistryCodeSchema.optional(),
  alternateRegistry: RegistryCodeSchema.optional(),
  digitalValue: DigitalCodeSchema,
  alternateDigitalValue: DigitalCodeSchema.default(0),
  digitalTrainValue: DigitalCodeSchema.default(0),
  alternateDigitalTrainValue: DigitalCodeSchema.default(0),
});

export const RawEpochWaveformSchema = z.object({
  epochNumber: EpochNumberSchema,
  dacNumber: z.number().int(),
  type: z.number().int(),
  levelInit: z.number(),
  levelIncrementPerEpisode: z.number().default(0),
  durationInit: SampleCountSchema,
  durationIncrementPerEpisode: z.number().int().default(0),
  pulsePeriod: SampleCountSchema.default(0),
  pulseWidth: SampleCountSchema.default(0),
});

/** DAC number → epoch number → epoch record; keys are decimal strings. */
export const RawEpochInfoPerDACSchema = z.record(
  z.string(),
  z.record(z.string(), RawEpochWaveformSchema),
);

export const RawProtocolAnnotationsSchema = z.object({
  protocol: RawProtocolFlagsSchema,
  epochInfo: z.array(RawEpochDigitalInfoSchema),
  epochInfoPerDAC: RawEpochInfoPerDACSchema,
  alternateEpochInfoPerDAC: RawEpochInfoPerDACSchema.optional(),
});

// ============================================================================
// Type exports (inferred from schemas)
// ============================================================================

export type RawProtocolFlags = z.input<typeof RawProtocolFlagsSchema>;
export type RawEpochDigitalInfo = z.input<typeof RawEpochDigitalInfoSchema>;
export type RawEpochWaveform = z.input<typeof RawEpochWaveformSchema>;
export type RawEpochInfoPerDAC = z.input<typeof RawEpochInfoPerDACSchema>;
export type RawProtocolAnnotations = z.input<
  typeof RawProtocolAnnotationsSchema
>;

export type ParsedProtocolAnnotations = z.output<
  typeof RawProtocolAnnotationsSchema
>;
export type ParsedEpochWaveform = z.output<typeof RawEpochWaveformSchema>;
export type ParsedEpochDigitalInfo = z.output<
  typeof RawEpochDigitalInfoSchema
>;
