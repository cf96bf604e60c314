import {
  MAX_DIGITAL_CODE,
  REGISTRY_BASE_LINE,
  REGISTRY_WIDTH,
  type Registry,
} from "@/lib/constants";
import { MalformedProtocolError } from "@/lib/errors";
import type { LineState } from "@/types/protocol";

export type DigitalBits = readonly [LineState, LineState, LineState, LineState];

function bitAt(value: number, k: number): LineState {
  return ((value >> k) & 1) === 1 ? 1 : 0;
}

/**
 * Decode a 4-bit decimal code into the states of its bit positions 0..3
 */
export function decodeDigitalValue(value: number): DigitalBits {
  if (!Number.isInteger(value) || value < 0 || value > MAX_DIGITAL_CODE) {
    throw new MalformedProtocolError(
      `Digital code ${value} is outside [0, ${MAX_DIGITAL_CODE}]`,
      { value },
    );
  }
  return [bitAt(value, 0), bitAt(value, 1), bitAt(value, 2), bitAt(value, 3)];
}

export function encodeDigitalBits(bits: DigitalBits): number {
  return bits.reduce<number>((acc, bit, k) => acc | (bit << k), 0);
}

/** Absolute digital lines addressed by a registry, in bit order */
export function registryLines(registry: Registry): number[] {
  const base = REGISTRY_BASE_LINE[registry];
  return Array.from({ length: REGISTRY_WIDTH }, (_, k) => base + k);
}

/**
 * Map a decimal code onto absolute line states for one registry
 *
 * @example
 * decodeRegistryLines(5, "Low"); // Map { 0 => 1, 1 => 0, 2 => 1, 3 => 0 }
 */
export function decodeRegistryLines(
  value: number,
  registry: Registry,
): Map<number, LineState> {
  const bits = decodeDigitalValue(value);
  const lines = registryLines(registry);
  return new Map(
    lines.map((line, k): [number, LineState] => [line, bits[k]]),
  );
}
