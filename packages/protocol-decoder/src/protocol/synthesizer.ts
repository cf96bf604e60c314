/**
 * Waveform synthesizer
 *
 * Expands a resolved sweep into per-DAC analog segments and per-line digital
 * transitions. Epoch layout (and every failure) is computed up front; the
 * segment and transition sequences themselves are generated on iteration and
 * can be iterated any number of times.
 */

import { DIGITAL_LINE_COUNT, REGISTRY_BASE_LINE } from "@/lib/constants";
import { OutOfRangeSweepError, describeError } from "@/lib/errors";
import { loggers } from "@/lib/logger";
import type {
  AnalogSegment,
  AnalogTrace,
  DigitalTrace,
  DigitalTransition,
  LineState,
  ProtocolDescriptor,
  ResolvedDigitalEpoch,
  ResolvedSweep,
  SweepWaveform,
  SynthesisOptions,
} from "@/types/protocol";
import { decodeDigitalValue, registryLines } from "./digital";
import {
  assertContiguous,
  cyclePeriod,
  layoutEnd,
  layoutEpochs,
  type PlacedEpoch,
} from "./epochs";
import { resolve } from "./resolver";
import type { AlternationStrategy } from "./alternation";

const logger = loggers.synth;

function restartable<T>(factory: () => Generator<T>): Iterable<T> {
  return { [Symbol.iterator]: factory };
}

// ============================================================================
// Analog
// ============================================================================

function* trainSegments(
  epoch: PlacedEpoch,
  baseline: number,
  biphasic: boolean,
): Generator<AnalogSegment> {
  if (epoch.pulseWidth === 0) {
    yield {
      kind: "flat",
      start: epoch.start,
      length: epoch.duration,
      level: baseline,
    };
    return;
  }
  const period = cyclePeriod(epoch);
  for (let t = 0, n = 0; t < epoch.duration; t += period, n++) {
    const cycle = Math.min(period, epoch.duration - t);
    const high = Math.min(epoch.pulseWidth, cycle);
    const level = biphasic && n % 2 === 1 ? -epoch.level : epoch.level;
    yield { kind: "flat", start: epoch.start + t, length: high, level };
    if (cycle > high) {
      yield {
        kind: "flat",
        start: epoch.start + t + high,
        length: cycle - high,
        level: baseline,
      };
    }
  }
}

function* triangleSegments(
  epoch: PlacedEpoch,
  baseline: number,
): Generator<AnalogSegment> {
  const period = cyclePeriod(epoch);
  const rise = Math.floor(period / 2);
  const fall = period - rise;
  const span = epoch.level - baseline;
  for (let t = 0; t < epoch.duration; t += period) {
    const cycle = Math.min(period, epoch.duration - t);
    const up = Math.min(rise, cycle);
    if (up > 0) {
      yield {
        kind: "ramp",
        start: epoch.start + t,
        length: up,
        from: baseline,
        to: baseline + (span * up) / rise,
      };
    }
    const down = cycle - up;
    if (down > 0) {
      yield {
        kind: "ramp",
        start: epoch.start + t + up,
        length: down,
        from: epoch.level,
        to: epoch.level - (span * down) / fall,
      };
    }
  }
}

/**
 * Fold the placed epochs into segments, threading the running level
 * (holding level before the first epoch) through ramps and train baselines.
 */
function* analogSegments(
  placed: readonly PlacedEpoch[],
  holdingLevel: number,
  sampleCount: number,
): Generator<AnalogSegment> {
  let running = holdingLevel;

  for (const epoch of placed) {
    if (epoch.duration === 0) continue;

    switch (epoch.type) {
      case "Step":
        yield {
          kind: "flat",
          start: epoch.start,
          length: epoch.duration,
          level: epoch.level,
        };
        running = epoch.level;
        break;
      case "Ramp":
        yield {
          kind: "ramp",
          start: epoch.start,
          length: epoch.duration,
          from: running,
          to: epoch.level,
        };
        running = epoch.level;
        break;
      case "PulseTrain":
        yield* trainSegments(epoch, running, false);
        break;
      case "BiphasicTrain":
        yield* trainSegments(epoch, running, true);
        break;
      case "Triangle":
        yield* triangleSegments(epoch, running);
        break;
      case "Cosine":
        yield {
          kind: "cosine",
          start: epoch.start,
          length: epoch.duration,
          baseline: running,
          amplitude: epoch.level,
          period: cyclePeriod(epoch),
        };
        break;
    }
  }

  const end = layoutEnd(placed);
  if (end < sampleCount) {
    yield {
      kind: "flat",
      start: end,
      length: sampleCount - end,
      level: holdingLevel,
    };
  }
}

// ============================================================================
// Digital
// ============================================================================

interface TimedDigitalEpoch {
  readonly digital: ResolvedDigitalEpoch;
  readonly timing: PlacedEpoch;
}

function findTiming(
  epochNumber: number,
  layouts: ReadonlyMap<number, readonly PlacedEpoch[]>,
  digitalDACChannel: number,
): PlacedEpoch | undefined {
  const preferred = layouts
    .get(digitalDACChannel)
    ?.find((epoch) => epoch.epochNumber === epochNumber);
  if (preferred) return preferred;

  const fallbackChannels = [...layouts.keys()].sort((a, b) => a - b);
  for (const channelNumber of fallbackChannels) {
    const match = layouts
      .get(channelNumber)
      ?.find((epoch) => epoch.epochNumber === epochNumber);
    if (match) return match;
  }
  return undefined;
}

/** Raw state changes a line goes through during one epoch */
function* epochLineStates(
  line: number,
  entry: TimedDigitalEpoch,
  trainActiveLogic: boolean,
): Generator<DigitalTransition> {
  const { digital, timing } = entry;
  const lines = registryLines(digital.registry);
  if (!lines.includes(line)) {
    yield { offset: timing.start, state: 0 };
    return;
  }

  const bit = line - REGISTRY_BASE_LINE[digital.registry];
  const trainBit = decodeDigitalValue(digital.trainValue)[bit];
  const staticBit = decodeDigitalValue(digital.value)[bit];

  if (trainBit === 0) {
    yield { offset: timing.start, state: staticBit };
    return;
  }

  // Train codes pulse only under trainActiveLogic; otherwise the bit is a
  // single transition held for the epoch.
  if (!trainActiveLogic || timing.pulseWidth === 0) {
    yield { offset: timing.start, state: 1 };
    return;
  }

  const period = cyclePeriod(timing);
  for (let t = 0; t < timing.duration; t += period) {
    yield { offset: timing.start + t, state: 1 };
    const off = t + timing.pulseWidth;
    if (off < Math.min(t + period, timing.duration)) {
      yield { offset: timing.start + off, state: 0 };
    }
  }
}

/**
 * Collapse raw state changes into transitions: the last change at an offset
 * wins, and repeats of the current state are dropped.
 */
export function* compactTransitions(
  changes: Iterable<DigitalTransition>,
): Generator<DigitalTransition> {
  let pending: DigitalTransition | undefined;
  let emitted: LineState | undefined;

  for (const change of changes) {
    if (pending && change.offset > pending.offset) {
      if (pending.state !== emitted) {
        yield pending;
        emitted = pending.state;
      }
    }
    pending = change;
  }
  if (pending && pending.state !== emitted) {
    yield pending;
  }
}

function* lineChanges(
  line: number,
  timed: readonly TimedDigitalEpoch[],
  trainActiveLogic: boolean,
  sampleCount: number,
): Generator<DigitalTransition> {
  yield { offset: 0, state: 0 };
  let cursor = 0;
  for (const entry of timed) {
    const end = entry.timing.start + entry.timing.duration;
    if (end <= cursor) continue;

    // An epoch timed from another DAC may overlap the previous one; the
    // earlier epoch keeps the overlap.
    let carried: DigitalTransition | undefined;
    for (const change of epochLineStates(line, entry, trainActiveLogic)) {
      if (change.offset < cursor) {
        carried = { offset: cursor, state: change.state };
        continue;
      }
      if (carried) {
        yield carried;
        carried = undefined;
      }
      yield change;
    }
    if (carried) {
      yield carried;
    }
    if (end < sampleCount) {
      yield { offset: end, state: 0 };
    }
    cursor = end;
  }
}

// ============================================================================
// Entry points
// ============================================================================

/**
 * Expand one resolved sweep into analog segments and digital transitions
 *
 * @param episodeNumberWithinRun - selects the per-episode level and duration increments
 * @throws MalformedProtocolError when an epoch duration goes negative
 * @throws EpochOrderingGapError under `requireContiguous` when a channel skips an epoch
 */
export function synthesize(
  resolved: ResolvedSweep,
  episodeNumberWithinRun: number,
  options: SynthesisOptions = {},
): SweepWaveform {
  try {
    if (
      !Number.isInteger(episodeNumberWithinRun) ||
      episodeNumberWithinRun < 0 ||
      episodeNumberWithinRun >= resolved.episodesPerRun
    ) {
      throw new OutOfRangeSweepError(
        episodeNumberWithinRun,
        resolved.episodesPerRun,
        "Episode",
      );
    }

    const layouts = new Map<number, PlacedEpoch[]>();
    for (const channel of resolved.analog) {
      if (options.requireContiguous) {
        assertContiguous(channel);
      }
      layouts.set(
        channel.channelNumber,
        layoutEpochs(channel, episodeNumberWithinRun),
      );
    }

    const sampleCount = Math.max(
      0,
      ...[...layouts.values()].map((placed) => layoutEnd(placed)),
    );

    const analog = new Map<number, AnalogTrace>();
    for (const channel of resolved.analog) {
      const placed = layouts.get(channel.channelNumber) ?? [];
      analog.set(channel.channelNumber, {
        channelNumber: channel.channelNumber,
        holdingLevel: channel.holdingLevel,
        epochsEnd: layoutEnd(placed),
        segments: restartable(() =>
          analogSegments(placed, channel.holdingLevel, sampleCount),
        ),
      });
    }

    const timed: TimedDigitalEpoch[] = [];
    for (const digital of resolved.digital) {
      const timing = findTiming(
        digital.epochNumber,
        layouts,
        resolved.digitalDACChannel,
      );
      if (!timing) {
        logger.debug("Digital epoch has no timing on any DAC", {
          epochNumber: digital.epochNumber,
        });
        continue;
      }
      timed.push({ digital, timing });
    }
    timed.sort((a, b) => a.timing.start - b.timing.start);

    const digital: DigitalTrace[] = Array.from(
      { length: DIGITAL_LINE_COUNT },
      (_, line) => ({
        line,
        transitions: restartable(() =>
          compactTransitions(
            lineChanges(line, timed, resolved.trainActiveLogic, sampleCount),
          ),
        ),
      }),
    );

    return {
      sweepIndex: resolved.sweepIndex,
      episodeNumber: episodeNumberWithinRun,
      sampleCount,
      ...(resolved.samplingRate !== undefined
        ? { samplingRate: resolved.samplingRate }
        : {}),
      analog,
      digital,
    };
  } catch (error) {
    logger.warn("Sweep synthesis failed", {
      sweepIndex: resolved.sweepIndex,
      error: describeError(error),
    });
    throw error;
  }
}

/**
 * Resolve and synthesize one sweep of a descriptor
 */
export function synthesizeSweep(
  descriptor: ProtocolDescriptor,
  sweepIndex: number,
  options: SynthesisOptions = {},
  strategy?: AlternationStrategy,
): SweepWaveform {
  const resolved = resolve(descriptor, sweepIndex, strategy);
  return synthesize(resolved, resolved.episodeNumber, options);
}
