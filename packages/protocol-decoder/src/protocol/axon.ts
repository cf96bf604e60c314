/**
 * Adapter from the annotation names an ABF reader emits to the canonical
 * raw input accepted by ingestProtocol
 */

import { z } from "zod";
import { MalformedProtocolError } from "@/lib/errors";
import type {
  RawEpochInfoPerDAC,
  RawEpochWaveform,
  RawProtocolAnnotations,
} from "@/lib/schemas";

const AxonFlagSchema = z.union([z.boolean(), z.number().int()]).optional();

export const AxonProtocolSectionSchema = z.object({
  lRunsPerTrial: z.number().int().default(1),
  lEpisodesPerRun: z.number().int().default(1),
  nAlternateDACOutputState: AxonFlagSchema,
  nAlternateDigitalOutputState: AxonFlagSchema,
  // older readers spell the alternation flags this way
  nAlternativeDACOutputState: AxonFlagSchema,
  nAlternativeDigitalOutputState: AxonFlagSchema,
  nDigitalDACChannel: z.number().int().default(0),
  nDigitalTrainActiveLogic: AxonFlagSchema,
  /** Microseconds per sample */
  fADCSequenceInterval: z.number().positive().optional(),
  fDACHoldingLevel: z.array(z.number()).optional(),
});

export const AxonEpochInfoSchema = z.object({
  nEpochNum: z.number().int(),
  nDigitalValue: z.number().int().default(0),
  nDigitalTrainValue: z.number().int().default(0),
  nAlternateDigitalValue: z.number().int().default(0),
  nAlternateDigitalTrainValue: z.number().int().default(0),
});

export const AxonEpochPerDACSchema = z.object({
  nEpochNum: z.number().int(),
  nDACNum: z.number().int(),
  nEpochType: z.number().int(),
  fEpochInitLevel: z.number(),
  fEpochLevelInc: z.number().default(0),
  lEpochInitDuration: z.number().int(),
  lEpochDurationInc: z.number().int().default(0),
  lEpochPulsePeriod: z.number().int().default(0),
  lEpochPulseWidth: z.number().int().default(0),
});

export const AxonAnnotationsSchema = z.object({
  protocol: AxonProtocolSectionSchema,
  EpochInfo: z.array(AxonEpochInfoSchema).default([]),
  dictEpochInfoPerDAC: z
    .record(z.string(), z.record(z.string(), AxonEpochPerDACSchema))
    .default({}),
});

export type AxonAnnotations = z.input<typeof AxonAnnotationsSchema>;

function flagOn(...values: (boolean | number | undefined)[]): boolean {
  const value = values.find((candidate) => candidate !== undefined);
  return value === true || value === 1;
}

/**
 * Translate Axon annotations (`lRunsPerTrial`, `nEpochType`, ...) into the
 * canonical raw protocol structures
 *
 * @throws MalformedProtocolError when the annotations do not have the Axon shape
 */
export function fromAxonAnnotations(
  annotations: AxonAnnotations,
): RawProtocolAnnotations {
  const parsed = AxonAnnotationsSchema.safeParse(annotations);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedProtocolError(
      `Invalid Axon annotations${issue ? ` at ${issue.path.join(".")}: ${issue.message}` : ""}`,
      { issues: parsed.error.issues },
    );
  }
  const { protocol, EpochInfo, dictEpochInfoPerDAC } = parsed.data;

  const holdingLevels: Record<string, number> = {};
  protocol.fDACHoldingLevel?.forEach((level, dac) => {
    holdingLevels[String(dac)] = level;
  });

  const epochInfoPerDAC: RawEpochInfoPerDAC = {};
  for (const [dacKey, epochs] of Object.entries(dictEpochInfoPerDAC)) {
    const table: Record<string, RawEpochWaveform> = {};
    for (const [epochKey, epoch] of Object.entries(epochs)) {
      table[epochKey] = {
        epochNumber: epoch.nEpochNum,
        dacNumber: epoch.nDACNum,
        type: epoch.nEpochType,
        levelInit: epoch.fEpochInitLevel,
        levelIncrementPerEpisode: epoch.fEpochLevelInc,
        durationInit: epoch.lEpochInitDuration,
        durationIncrementPerEpisode: epoch.lEpochDurationInc,
        pulsePeriod: epoch.lEpochPulsePeriod,
        pulseWidth: epoch.lEpochPulseWidth,
      };
    }
    epochInfoPerDAC[dacKey] = table;
  }

  return {
    protocol: {
      runsPerTrial: protocol.lRunsPerTrial,
      episodesPerRun: protocol.lEpisodesPerRun,
      alternateAnalogOutputs: flagOn(
        protocol.nAlternateDACOutputState,
        protocol.nAlternativeDACOutputState,
      ),
      alternateDigitalOutputs: flagOn(
        protocol.nAlternateDigitalOutputState,
        protocol.nAlternativeDigitalOutputState,
      ),
      digitalDACChannel: protocol.nDigitalDACChannel,
      trainActiveLogic: flagOn(protocol.nDigitalTrainActiveLogic),
      ...(protocol.fADCSequenceInterval !== undefined
        ? { samplingRate: 1e6 / protocol.fADCSequenceInterval }
        : {}),
      ...(protocol.fDACHoldingLevel ? { holdingLevels } : {}),
    },
    epochInfo: EpochInfo.map((info) => ({
      epochNumber: info.nEpochNum,
      digitalValue: info.nDigitalValue,
      digitalTrainValue: info.nDigitalTrainValue,
      alternateDigitalValue: info.nAlternateDigitalValue,
      alternateDigitalTrainValue: info.nAlternateDigitalTrainValue,
    })),
    epochInfoPerDAC,
  };
}
