import type { EpochType } from "@/lib/constants";
import { EpochOrderingGapError, MalformedProtocolError } from "@/lib/errors";
import type { EpochWaveform, ResolvedChannel } from "@/types/protocol";

/** One epoch placed on a channel's time axis for a given episode */
export interface PlacedEpoch {
  readonly epochNumber: number;
  readonly dacNumber: number;
  readonly type: EpochType;
  readonly start: number;
  readonly duration: number;
  readonly level: number;
  readonly pulsePeriod: number;
  readonly pulseWidth: number;
}

export function effectiveLevel(epoch: EpochWaveform, episode: number): number {
  return epoch.levelInit + episode * epoch.levelIncrementPerEpisode;
}

/**
 * Duration of an epoch on a given episode, in samples
 * @throws MalformedProtocolError when the increment drives it below zero
 */
export function effectiveDuration(
  epoch: EpochWaveform,
  episode: number,
): number {
  const duration =
    epoch.durationInit + episode * epoch.durationIncrementPerEpisode;
  if (duration < 0) {
    throw new MalformedProtocolError(
      `Epoch ${epoch.epochNumber} on DAC ${epoch.dacNumber} has negative duration ${duration} at episode ${episode}`,
      { epochNumber: epoch.epochNumber, dacNumber: epoch.dacNumber, episode },
    );
  }
  return duration;
}

export function assertContiguous(channel: ResolvedChannel): void {
  const present = new Set(channel.epochs.map((epoch) => epoch.epochNumber));
  const highest = Math.max(-1, ...present);
  for (let n = 0; n <= highest; n++) {
    if (!present.has(n)) {
      throw new EpochOrderingGapError(channel.channelNumber, n);
    }
  }
}

/**
 * Concatenate a channel's epochs in ascending epoch order from sample 0
 */
export function layoutEpochs(
  channel: ResolvedChannel,
  episode: number,
): PlacedEpoch[] {
  const ordered = [...channel.epochs].sort(
    (a, b) => a.epochNumber - b.epochNumber,
  );
  const placed: PlacedEpoch[] = [];
  let cursor = 0;
  for (const epoch of ordered) {
    const duration = effectiveDuration(epoch, episode);
    placed.push({
      epochNumber: epoch.epochNumber,
      dacNumber: epoch.dacNumber,
      type: epoch.type,
      start: cursor,
      duration,
      level: effectiveLevel(epoch, episode),
      pulsePeriod: epoch.pulsePeriod,
      pulseWidth: epoch.pulseWidth,
    });
    cursor += duration;
  }
  return placed;
}

export function layoutEnd(placed: readonly PlacedEpoch[]): number {
  const last = placed[placed.length - 1];
  return last ? last.start + last.duration : 0;
}

/** Pulse period in samples; zero means one period spanning the epoch */
export function cyclePeriod(epoch: PlacedEpoch): number {
  return epoch.pulsePeriod > 0 ? epoch.pulsePeriod : epoch.duration;
}
