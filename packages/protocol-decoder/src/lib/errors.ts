/**
 * Typed failures raised by the decoder
 *
 * Every error carries a `kind` discriminant so callers can branch without
 * instanceof checks across package boundaries.
 */

export type ProtocolErrorKind =
  | "MalformedProtocol"
  | "OutOfRangeSweep"
  | "EpochOrderingGap";

export class ProtocolDecodeError extends Error {
  readonly kind: ProtocolErrorKind;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(
    kind: ProtocolErrorKind,
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "ProtocolDecodeError";
    this.kind = kind;
    this.details = details;
  }
}

export class MalformedProtocolError extends ProtocolDecodeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("MalformedProtocol", message, details);
    this.name = "MalformedProtocolError";
  }
}

export class UnrecognizedEpochTypeError extends MalformedProtocolError {
  readonly code: number;

  constructor(code: number, details: Record<string, unknown> = {}) {
    super(`Unrecognized epoch type code ${code}`, { ...details, code });
    this.name = "UnrecognizedEpochTypeError";
    this.code = code;
  }
}

export class OutOfRangeSweepError extends ProtocolDecodeError {
  readonly sweepIndex: number;
  readonly sweepCount: number;

  /**
   * @param subject - what the index counts, used in the message
   */
  constructor(
    sweepIndex: number,
    sweepCount: number,
    subject: "Sweep index" | "Episode" = "Sweep index",
  ) {
    super(
      "OutOfRangeSweep",
      `${subject} ${sweepIndex} is outside [0, ${sweepCount})`,
      { sweepIndex, sweepCount },
    );
    this.name = "OutOfRangeSweepError";
    this.sweepIndex = sweepIndex;
    this.sweepCount = sweepCount;
  }
}

export class EpochOrderingGapError extends ProtocolDecodeError {
  readonly dacNumber: number;
  readonly missingEpoch: number;

  constructor(dacNumber: number, missingEpoch: number) {
    super(
      "EpochOrderingGap",
      `DAC ${dacNumber} has no active epoch ${missingEpoch}`,
      { dacNumber, missingEpoch },
    );
    this.name = "EpochOrderingGapError";
    this.dacNumber = dacNumber;
    this.missingEpoch = missingEpoch;
  }
}

export function isProtocolDecodeError(
  error: unknown,
): error is ProtocolDecodeError {
  return error instanceof ProtocolDecodeError;
}

/**
 * Extract a readable message from various error types
 */
export function describeError(error: unknown): string {
  if (isProtocolDecodeError(error)) {
    return `${error.kind}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "An unexpected error occurred";
}
