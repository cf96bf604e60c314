/**
 * Alternation resolver
 *
 * Projects the descriptor onto one sweep: picks the analog waveform set and the
 * digital registry/values that sweep plays. Pure; never touches the descriptor.
 */

import { OutOfRangeSweepError, describeError } from "@/lib/errors";
import { loggers } from "@/lib/logger";
import type {
  DACChannel,
  EpochDigitalInfo,
  ProtocolDescriptor,
  ResolvedChannel,
  ResolvedDigitalEpoch,
  ResolvedSweep,
  SweepVariant,
} from "@/types/protocol";
import { parityAlternation, type AlternationStrategy } from "./alternation";

const logger = loggers.resolver;

function resolveChannel(
  channel: DACChannel,
  variant: SweepVariant,
): ResolvedChannel {
  const epochs =
    variant === "alternate" && channel.alternateEpochs
      ? channel.alternateEpochs
      : channel.epochs;
  return {
    channelNumber: channel.channelNumber,
    holdingLevel: channel.holdingLevel,
    epochs: [...epochs.values()],
  };
}

function resolveDigitalEpoch(
  info: EpochDigitalInfo,
  variant: SweepVariant,
): ResolvedDigitalEpoch {
  if (variant === "alternate") {
    return {
      epochNumber: info.epochNumber,
      registry: info.alternateRegistry,
      value: info.alternateDigitalValue,
      trainValue: info.alternateDigitalTrainValue,
    };
  }
  return {
    epochNumber: info.epochNumber,
    registry: info.registry,
    value: info.digitalValue,
    trainValue: info.digitalTrainValue,
  };
}

/**
 * Select the parameter sets played on one sweep
 *
 * @param sweepIndex - 0-based across the trial, below runsPerTrial × episodesPerRun
 * @throws OutOfRangeSweepError when the index is not a valid sweep
 */
export function resolve(
  descriptor: ProtocolDescriptor,
  sweepIndex: number,
  strategy: AlternationStrategy = parityAlternation,
): ResolvedSweep {
  if (
    !Number.isInteger(sweepIndex) ||
    sweepIndex < 0 ||
    sweepIndex >= descriptor.sweepCount
  ) {
    const error = new OutOfRangeSweepError(sweepIndex, descriptor.sweepCount);
    logger.warn("Sweep resolution failed", { error: describeError(error) });
    throw error;
  }

  const episodeNumber = sweepIndex % descriptor.episodesPerRun;
  const selected = strategy.selectVariant(sweepIndex);
  const analogVariant: SweepVariant = descriptor.alternateAnalogOutputs
    ? selected
    : "primary";
  const digitalVariant: SweepVariant = descriptor.alternateDigitalOutputs
    ? selected
    : "primary";

  const resolved: ResolvedSweep = {
    sweepIndex,
    runNumber: Math.floor(sweepIndex / descriptor.episodesPerRun),
    episodeNumber,
    analogVariant,
    digitalVariant,
    episodesPerRun: descriptor.episodesPerRun,
    digitalDACChannel: descriptor.digitalDACChannel,
    trainActiveLogic: descriptor.trainActiveLogic,
    ...(descriptor.samplingRate !== undefined
      ? { samplingRate: descriptor.samplingRate }
      : {}),
    analog: [...descriptor.channels.values()].map((channel) =>
      resolveChannel(channel, analogVariant),
    ),
    digital: [...descriptor.digitalEpochs.values()].map((info) =>
      resolveDigitalEpoch(info, digitalVariant),
    ),
  };

  logger.debug("Sweep resolved", { sweepIndex, analogVariant, digitalVariant });
  return resolved;
}
