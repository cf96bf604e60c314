/**
 * Protocol ingest
 *
 * Validates the raw annotation structures handed over by the file reader and
 * builds the immutable ProtocolDescriptor the resolver and synthesizer read.
 */

import type { ZodError } from "zod";
import {
  EPOCH_TYPE_CODES,
  EPOCH_TYPE_DISABLED,
  TRAIN_EPOCH_TYPES,
} from "@/lib/constants";
import {
  MalformedProtocolError,
  UnrecognizedEpochTypeError,
  describeError,
} from "@/lib/errors";
import { loggers } from "@/lib/logger";
import {
  RawProtocolAnnotationsSchema,
  type ParsedEpochDigitalInfo,
  type ParsedEpochWaveform,
  type RawProtocolAnnotations,
} from "@/lib/schemas";
import type {
  DACChannel,
  EpochDigitalInfo,
  EpochSet,
  EpochWaveform,
  ProtocolDescriptor,
} from "@/types/protocol";

const logger = loggers.ingest;

type ParsedEpochTable = Record<string, Record<string, ParsedEpochWaveform>>;

function formatZodError(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid protocol annotations";
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `Invalid protocol annotations at ${path}: ${issue.message}`;
}

function parseIntegerKey(key: string, what: string): number {
  if (!/^-?\d+$/.test(key)) {
    throw new MalformedProtocolError(`${what} key "${key}" is not an integer`, {
      key,
    });
  }
  return Number.parseInt(key, 10);
}

function buildDigitalEpochs(
  records: ParsedEpochDigitalInfo[],
): Map<number, EpochDigitalInfo> {
  const digitalEpochs = new Map<number, EpochDigitalInfo>();
  for (const record of records) {
    if (digitalEpochs.has(record.epochNumber)) {
      throw new MalformedProtocolError(
        `Epoch ${record.epochNumber} is listed more than once`,
        { epochNumber: record.epochNumber },
      );
    }
    const registry = record.registry ?? "Low";
    digitalEpochs.set(
      record.epochNumber,
      Object.freeze({
        epochNumber: record.epochNumber,
        registry,
        alternateRegistry: record.alternateRegistry ?? registry,
        digitalValue: record.digitalValue,
        alternateDigitalValue: record.alternateDigitalValue,
        digitalTrainValue: record.digitalTrainValue,
        alternateDigitalTrainValue: record.alternateDigitalTrainValue,
      }),
    );
  }
  return new Map([...digitalEpochs].sort(([a], [b]) => a - b));
}

function buildEpochWaveform(
  raw: ParsedEpochWaveform,
  channelNumber: number,
): EpochWaveform | null {
  if (raw.dacNumber !== channelNumber) {
    throw new MalformedProtocolError(
      `Epoch ${raw.epochNumber} declares DAC ${raw.dacNumber} but is listed under DAC ${channelNumber}`,
      { epochNumber: raw.epochNumber, dacNumber: raw.dacNumber, channelNumber },
    );
  }
  if (raw.type === EPOCH_TYPE_DISABLED) {
    return null;
  }
  const type = EPOCH_TYPE_CODES[raw.type];
  if (type === undefined) {
    throw new UnrecognizedEpochTypeError(raw.type, {
      epochNumber: raw.epochNumber,
      dacNumber: channelNumber,
    });
  }
  if (
    TRAIN_EPOCH_TYPES.has(type) &&
    raw.pulsePeriod > 0 &&
    raw.pulseWidth > 0 &&
    raw.pulseWidth > raw.pulsePeriod
  ) {
    throw new MalformedProtocolError(
      `Epoch ${raw.epochNumber} on DAC ${channelNumber} has pulse width ${raw.pulseWidth} longer than its period ${raw.pulsePeriod}`,
      { epochNumber: raw.epochNumber, dacNumber: channelNumber },
    );
  }
  return Object.freeze({
    epochNumber: raw.epochNumber,
    dacNumber: raw.dacNumber,
    type,
    levelInit: raw.levelInit,
    levelIncrementPerEpisode: raw.levelIncrementPerEpisode,
    durationInit: raw.durationInit,
    durationIncrementPerEpisode: raw.durationIncrementPerEpisode,
    pulsePeriod: raw.pulsePeriod,
    pulseWidth: raw.pulseWidth,
  });
}

function buildEpochTables(
  table: ParsedEpochTable,
  activeEpochs: ReadonlyMap<number, EpochDigitalInfo>,
): Map<number, EpochSet> {
  const channels = new Map<number, EpochSet>();

  for (const [dacKey, rawEpochs] of Object.entries(table)) {
    const channelNumber = parseIntegerKey(dacKey, "DAC");
    const dacLogger = logger.child(`DAC${channelNumber}`);
    const epochs: EpochWaveform[] = [];

    for (const [epochKey, raw] of Object.entries(rawEpochs)) {
      const epochNumber = parseIntegerKey(epochKey, "Epoch");
      if (epochNumber !== raw.epochNumber) {
        throw new MalformedProtocolError(
          `Epoch listed under key ${epochNumber} declares number ${raw.epochNumber}`,
          { channelNumber, epochNumber },
        );
      }
      const epoch = buildEpochWaveform(raw, channelNumber);
      if (epoch === null) {
        dacLogger.debug("Disabled epoch dropped", { epochNumber });
        continue;
      }
      if (!activeEpochs.has(epochNumber)) {
        throw new MalformedProtocolError(
          `DAC ${channelNumber} epoch ${epochNumber} is not in the active epoch list`,
          { channelNumber, epochNumber },
        );
      }
      epochs.push(epoch);
    }

    epochs.sort((a, b) => a.epochNumber - b.epochNumber);
    channels.set(
      channelNumber,
      new Map(epochs.map((epoch) => [epoch.epochNumber, epoch])),
    );
  }

  return channels;
}

function buildChannels(
  primary: Map<number, EpochSet>,
  alternate: Map<number, EpochSet> | undefined,
  holdingLevels: Record<string, number> | undefined,
): Map<number, DACChannel> {
  const holding = new Map<number, number>();
  for (const [key, level] of Object.entries(holdingLevels ?? {})) {
    holding.set(parseIntegerKey(key, "Holding level"), level);
  }

  const numbers = new Set([...primary.keys(), ...(alternate?.keys() ?? [])]);
  const channels = new Map<number, DACChannel>();

  for (const channelNumber of [...numbers].sort((a, b) => a - b)) {
    const epochs = primary.get(channelNumber) ?? new Map<number, EpochWaveform>();
    const alternateEpochs = alternate?.get(channelNumber);
    if (epochs.size === 0 && (alternateEpochs?.size ?? 0) === 0) {
      continue;
    }
    channels.set(
      channelNumber,
      Object.freeze({
        channelNumber,
        holdingLevel: holding.get(channelNumber) ?? 0,
        epochs,
        ...(alternateEpochs ? { alternateEpochs } : {}),
      }),
    );
  }

  return channels;
}

/**
 * Validate raw annotations and build the immutable protocol descriptor
 *
 * @throws MalformedProtocolError on any structural or range violation
 *
 * @example
 * const descriptor = ingestProtocol({
 *   protocol: { runsPerTrial: 1, episodesPerRun: 4, ... },
 *   epochInfo: [{ epochNumber: 0, digitalValue: 1 }],
 *   epochInfoPerDAC: { "0": { "0": { epochNumber: 0, dacNumber: 0, type: 1, ... } } },
 * });
 */
export function ingestProtocol(
  annotations: RawProtocolAnnotations,
): ProtocolDescriptor {
  try {
    const parsed = RawProtocolAnnotationsSchema.safeParse(annotations);
    if (!parsed.success) {
      throw new MalformedProtocolError(formatZodError(parsed.error), {
        issues: parsed.error.issues,
      });
    }
    const { protocol, epochInfo, epochInfoPerDAC, alternateEpochInfoPerDAC } =
      parsed.data;

    const digitalEpochs = buildDigitalEpochs(epochInfo);
    const primary = buildEpochTables(epochInfoPerDAC, digitalEpochs);
    const alternate = alternateEpochInfoPerDAC
      ? buildEpochTables(alternateEpochInfoPerDAC, digitalEpochs)
      : undefined;
    const channels = buildChannels(primary, alternate, protocol.holdingLevels);

    const descriptor: ProtocolDescriptor = Object.freeze({
      runsPerTrial: protocol.runsPerTrial,
      episodesPerRun: protocol.episodesPerRun,
      sweepCount: protocol.runsPerTrial * protocol.episodesPerRun,
      averagedRuns: protocol.runsPerTrial > 1,
      alternateAnalogOutputs: protocol.alternateAnalogOutputs,
      alternateDigitalOutputs: protocol.alternateDigitalOutputs,
      digitalDACChannel: protocol.digitalDACChannel,
      trainActiveLogic: protocol.trainActiveLogic,
      ...(protocol.samplingRate !== undefined
        ? { samplingRate: protocol.samplingRate }
        : {}),
      channels,
      digitalEpochs,
    });

    logger.debug("Protocol ingested", {
      channels: channels.size,
      epochs: digitalEpochs.size,
      sweeps: descriptor.sweepCount,
    });
    return descriptor;
  } catch (error) {
    logger.warn("Protocol ingest failed", { error: describeError(error) });
    throw error;
  }
}
