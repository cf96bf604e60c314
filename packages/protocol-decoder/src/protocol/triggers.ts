/**
 * Trigger extraction
 *
 * Turns digital-line rising edges of a synthesized sweep into timed trigger
 * events, and groups them into the trigger protocol of that sweep.
 */

import { MalformedProtocolError, describeError } from "@/lib/errors";
import { loggers } from "@/lib/logger";
import type { SweepWaveform } from "@/types/protocol";

const logger = loggers.triggers;

export const TriggerEventType = {
  presynaptic: 1,
  postsynaptic: 2,
  photostimulation: 4,
  imagingFrame: 8,
  imagingLine: 16,
  sweep: 32,
  user: 64,
  imaging: 24,
  acquisition: 56,
} as const;

export type TriggerEventKind = Exclude<
  keyof typeof TriggerEventType,
  "imaging" | "acquisition"
>;

const DEFAULT_LABELS: Record<TriggerEventKind, string> = {
  presynaptic: "epsp",
  postsynaptic: "ap",
  photostimulation: "photo",
  imagingFrame: "imaging",
  imagingLine: "imaging",
  sweep: "sweep",
  user: "user",
};

export interface TriggerEvent {
  kind: TriggerEventKind;
  /** TriggerEventType flag of `kind` */
  flag: number;
  lines: number[];
  /** Seconds from sweep start */
  times: number[];
  labels: string[];
}

export interface TriggerProtocol {
  presynaptic?: TriggerEvent;
  postsynaptic?: TriggerEvent;
  photostimulation?: TriggerEvent;
  /** Imaging frame, imaging line and sweep triggers */
  acquisition: TriggerEvent[];
  user: TriggerEvent[];
  segmentIndex: number[];
}

export interface TriggerExtractionOptions {
  /** Hz; defaults to the sweep's sampling rate */
  samplingRate?: number;
}

/**
 * Time every rising edge of the mapped digital lines
 *
 * @param lineMap - absolute digital line → what a pulse on that line triggers
 * @throws MalformedProtocolError when no sampling rate is known
 *
 * @example
 * const events = extractTriggerEvents(sweep, new Map([[0, "presynaptic"]]));
 * // [{ kind: "presynaptic", lines: [0], times: [0, 0.005], labels: ["epsp", "epsp"], ... }]
 */
export function extractTriggerEvents(
  sweep: SweepWaveform,
  lineMap: ReadonlyMap<number, TriggerEventKind>,
  options: TriggerExtractionOptions = {},
): TriggerEvent[] {
  const samplingRate = options.samplingRate ?? sweep.samplingRate;
  if (samplingRate === undefined || !(samplingRate > 0)) {
    const error = new MalformedProtocolError(
      "A positive sampling rate is required to time trigger events",
      { sweepIndex: sweep.sweepIndex, samplingRate },
    );
    logger.warn("Trigger extraction failed", { error: describeError(error) });
    throw error;
  }

  const events: TriggerEvent[] = [];
  const lines = [...lineMap.keys()].sort((a, b) => a - b);

  for (const line of lines) {
    const kind = lineMap.get(line);
    const trace = sweep.digital.find((candidate) => candidate.line === line);
    if (!kind || !trace) continue;

    const times: number[] = [];
    for (const transition of trace.transitions) {
      if (transition.state === 1) {
        times.push(transition.offset / samplingRate);
      }
    }
    if (times.length === 0) continue;

    events.push({
      kind,
      flag: TriggerEventType[kind],
      lines: [line],
      times,
      labels: times.map(() => DEFAULT_LABELS[kind]),
    });
  }

  logger.debug("Trigger events extracted", {
    sweepIndex: sweep.sweepIndex,
    events: events.length,
  });
  return events;
}

function mergeEvents(a: TriggerEvent, b: TriggerEvent): TriggerEvent {
  const pairs = [
    ...a.times.map((time, i) => ({ time, label: a.labels[i] })),
    ...b.times.map((time, i) => ({ time, label: b.labels[i] })),
  ].sort((x, y) => x.time - y.time);
  return {
    kind: a.kind,
    flag: a.flag,
    lines: [...a.lines, ...b.lines].sort((x, y) => x - y),
    times: pairs.map((pair) => pair.time),
    labels: pairs.map((pair) => pair.label),
  };
}

/**
 * Group trigger events into the protocol of one sweep
 *
 * Presynaptic, postsynaptic and photostimulation hold one event each; events
 * of the same kind are merged into it.
 */
export function buildTriggerProtocol(
  events: readonly TriggerEvent[],
  sweepIndex: number,
): TriggerProtocol {
  const protocol: TriggerProtocol = {
    acquisition: [],
    user: [],
    segmentIndex: [sweepIndex],
  };

  for (const event of events) {
    switch (event.kind) {
      case "presynaptic":
      case "postsynaptic":
      case "photostimulation": {
        const existing = protocol[event.kind];
        protocol[event.kind] = existing ? mergeEvents(existing, event) : event;
        break;
      }
      case "imagingFrame":
      case "imagingLine":
      case "sweep":
        protocol.acquisition.push(event);
        break;
      case "user":
        protocol.user.push(event);
        break;
    }
  }

  return protocol;
}
