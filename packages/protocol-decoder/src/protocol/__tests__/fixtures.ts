import type {
  RawEpochDigitalInfo,
  RawEpochInfoPerDAC,
  RawEpochWaveform,
  RawProtocolAnnotations,
  RawProtocolFlags,
} from "@/lib/schemas";

export function flags(overrides: Partial<RawProtocolFlags> = {}): RawProtocolFlags {
  return {
    runsPerTrial: 1,
    episodesPerRun: 4,
    alternateAnalogOutputs: 0,
    alternateDigitalOutputs: 0,
    digitalDACChannel: 0,
    trainActiveLogic: 1,
    ...overrides,
  };
}

export function epoch(overrides: Partial<RawEpochWaveform> = {}): RawEpochWaveform {
  return {
    epochNumber: 0,
    dacNumber: 0,
    type: 1,
    levelInit: 10,
    levelIncrementPerEpisode: 0,
    durationInit: 100,
    durationIncrementPerEpisode: 0,
    pulsePeriod: 0,
    pulseWidth: 0,
    ...overrides,
  };
}

export function digital(
  overrides: Partial<RawEpochDigitalInfo> = {},
): RawEpochDigitalInfo {
  return { epochNumber: 0, digitalValue: 0, ...overrides };
}

export function perDAC(epochs: RawEpochWaveform[]): RawEpochInfoPerDAC {
  const table: RawEpochInfoPerDAC = {};
  for (const record of epochs) {
    const dac = String(record.dacNumber);
    table[dac] = { ...table[dac], [String(record.epochNumber)]: record };
  }
  return table;
}

interface ProtocolParts {
  protocol?: Partial<RawProtocolFlags>;
  epochs?: RawEpochWaveform[];
  digital?: RawEpochDigitalInfo[];
  alternateEpochs?: RawEpochWaveform[];
}

/**
 * Raw annotations with one digital record per epoch number used by `epochs`
 * unless `digital` is given
 */
export function annotations(parts: ProtocolParts = {}): RawProtocolAnnotations {
  const epochs = parts.epochs ?? [epoch()];
  const numbers = [...new Set(epochs.map((record) => record.epochNumber))];
  return {
    protocol: flags(parts.protocol),
    epochInfo:
      parts.digital ?? numbers.map((epochNumber) => digital({ epochNumber })),
    epochInfoPerDAC: perDAC(epochs),
    ...(parts.alternateEpochs
      ? { alternateEpochInfoPerDAC: perDAC(parts.alternateEpochs) }
      : {}),
  };
}
