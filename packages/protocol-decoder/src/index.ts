export { ingestProtocol } from "./protocol/ingest";
export { fromAxonAnnotations } from "./protocol/axon";
export type { AxonAnnotations } from "./protocol/axon";

export { resolve } from "./protocol/resolver";
export { parityAlternation } from "./protocol/alternation";
export type { AlternationStrategy } from "./protocol/alternation";

export {
  synthesize,
  synthesizeSweep,
  compactTransitions,
} from "./protocol/synthesizer";
export { renderAnalog, renderDigital, epochTable } from "./protocol/render";
export type { EpochBoundary } from "./protocol/render";
export { effectiveLevel, effectiveDuration } from "./protocol/epochs";

export {
  decodeDigitalValue,
  encodeDigitalBits,
  registryLines,
  decodeRegistryLines,
} from "./protocol/digital";
export type { DigitalBits } from "./protocol/digital";

export {
  TriggerEventType,
  extractTriggerEvents,
  buildTriggerProtocol,
} from "./protocol/triggers";
export type {
  TriggerEvent,
  TriggerEventKind,
  TriggerProtocol,
  TriggerExtractionOptions,
} from "./protocol/triggers";

export {
  ProtocolDecodeError,
  MalformedProtocolError,
  UnrecognizedEpochTypeError,
  OutOfRangeSweepError,
  EpochOrderingGapError,
  isProtocolDecodeError,
  describeError,
} from "./lib/errors";
export type { ProtocolErrorKind } from "./lib/errors";

export { createLogger, loggers } from "./lib/logger";
export type { Logger, LogLevel } from "./lib/logger";

export * from "./lib/constants";
export type {
  RawProtocolAnnotations,
  RawProtocolFlags,
  RawEpochDigitalInfo,
  RawEpochWaveform,
  RawEpochInfoPerDAC,
} from "./lib/schemas";
export type * from "./types/protocol";
