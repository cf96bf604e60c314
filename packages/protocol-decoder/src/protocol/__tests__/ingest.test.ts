import { describe, it, expect } from "vitest";
import {
  MalformedProtocolError,
  UnrecognizedEpochTypeError,
} from "@/lib/errors";
import { ingestProtocol } from "../ingest";
import { annotations, digital, epoch } from "./fixtures";

describe("ingestProtocol", () => {
  it("builds a descriptor for a single step epoch", () => {
    const descriptor = ingestProtocol(annotations());

    expect(descriptor.runsPerTrial).toBe(1);
    expect(descriptor.episodesPerRun).toBe(4);
    expect(descriptor.sweepCount).toBe(4);
    expect(descriptor.averagedRuns).toBe(false);
    expect(descriptor.alternateAnalogOutputs).toBe(false);
    expect(descriptor.trainActiveLogic).toBe(true);
    expect([...descriptor.channels.keys()]).toEqual([0]);

    const step = descriptor.channels.get(0)?.epochs.get(0);
    expect(step).toEqual({
      epochNumber: 0,
      dacNumber: 0,
      type: "Step",
      levelInit: 10,
      levelIncrementPerEpisode: 0,
      durationInit: 100,
      durationIncrementPerEpisode: 0,
      pulsePeriod: 0,
      pulseWidth: 0,
    });
  });

  it("freezes the descriptor and its records", () => {
    const descriptor = ingestProtocol(annotations());
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.channels.get(0))).toBe(true);
    expect(Object.isFrozen(descriptor.digitalEpochs.get(0))).toBe(true);
    expect(Object.isFrozen(descriptor.channels.get(0)?.epochs.get(0))).toBe(
      true,
    );
  });

  it("accepts boolean flags as well as 0/1 codes", () => {
    const descriptor = ingestProtocol(
      annotations({
        protocol: { alternateDigitalOutputs: true, trainActiveLogic: false },
      }),
    );
    expect(descriptor.alternateDigitalOutputs).toBe(true);
    expect(descriptor.trainActiveLogic).toBe(false);
  });

  it("marks multi-run trials as averaged", () => {
    const descriptor = ingestProtocol(
      annotations({ protocol: { runsPerTrial: 3, episodesPerRun: 2 } }),
    );
    expect(descriptor.sweepCount).toBe(6);
    expect(descriptor.averagedRuns).toBe(true);
  });

  it("maps every known epoch type code", () => {
    const codes: [number, string][] = [
      [1, "Step"],
      [2, "Ramp"],
      [3, "PulseTrain"],
      [4, "Triangle"],
      [5, "Cosine"],
      [7, "BiphasicTrain"],
    ];
    const descriptor = ingestProtocol(
      annotations({
        epochs: codes.map(([type], i) => epoch({ epochNumber: i, type })),
      }),
    );
    const types = [...(descriptor.channels.get(0)?.epochs.values() ?? [])].map(
      (record) => record.type,
    );
    expect(types).toEqual(codes.map(([, name]) => name));
  });

  it("keeps non-contiguous epochs in ascending order", () => {
    const descriptor = ingestProtocol({
      protocol: annotations().protocol,
      epochInfo: [digital({ epochNumber: 3 }), digital({ epochNumber: 0 })],
      epochInfoPerDAC: {
        "0": {
          "3": epoch({ epochNumber: 3 }),
          "0": epoch({ epochNumber: 0 }),
        },
      },
    });
    expect([...(descriptor.channels.get(0)?.epochs.keys() ?? [])]).toEqual([
      0, 3,
    ]);
    expect([...descriptor.digitalEpochs.keys()]).toEqual([0, 3]);
  });

  it("drops disabled epochs and channels left without any", () => {
    const descriptor = ingestProtocol(
      annotations({
        epochs: [
          epoch({ dacNumber: 0, epochNumber: 0 }),
          epoch({ dacNumber: 0, epochNumber: 1, type: 0 }),
          epoch({ dacNumber: 1, epochNumber: 0, type: 0 }),
        ],
      }),
    );
    expect([...descriptor.channels.keys()]).toEqual([0]);
    expect([...(descriptor.channels.get(0)?.epochs.keys() ?? [])]).toEqual([0]);
  });

  it("reads registries and defaults the alternate to the primary", () => {
    const descriptor = ingestProtocol(
      annotations({
        digital: [digital({ epochNumber: 0, registry: 1, digitalValue: 3 })],
      }),
    );
    const info = descriptor.digitalEpochs.get(0);
    expect(info?.registry).toBe("High");
    expect(info?.alternateRegistry).toBe("High");
    expect(info?.alternateDigitalValue).toBe(0);
    expect(info?.digitalTrainValue).toBe(0);
  });

  it("applies holding levels per DAC", () => {
    const descriptor = ingestProtocol(
      annotations({ protocol: { holdingLevels: { "0": -70 } } }),
    );
    expect(descriptor.channels.get(0)?.holdingLevel).toBe(-70);
  });

  it("attaches an alternate waveform set", () => {
    const descriptor = ingestProtocol(
      annotations({
        protocol: { alternateAnalogOutputs: 1 },
        alternateEpochs: [epoch({ levelInit: -10 })],
      }),
    );
    const channel = descriptor.channels.get(0);
    expect(channel?.epochs.get(0)?.levelInit).toBe(10);
    expect(channel?.alternateEpochs?.get(0)?.levelInit).toBe(-10);
  });

  it("keeps the sampling rate when given", () => {
    const descriptor = ingestProtocol(
      annotations({ protocol: { samplingRate: 20000 } }),
    );
    expect(descriptor.samplingRate).toBe(20000);
  });

  describe("validation", () => {
    it("rejects epoch numbers outside 0-9", () => {
      expect(() =>
        ingestProtocol(annotations({ epochs: [epoch({ epochNumber: 10 })] })),
      ).toThrow(MalformedProtocolError);
    });

    it("rejects DAC epochs missing from the active epoch list", () => {
      expect(() =>
        ingestProtocol(
          annotations({
            epochs: [epoch({ epochNumber: 2 })],
            digital: [digital({ epochNumber: 0 })],
          }),
        ),
      ).toThrow(/epoch 2 is not in the active epoch list/);
    });

    it("rejects zero or negative run and episode counts", () => {
      expect(() =>
        ingestProtocol(annotations({ protocol: { runsPerTrial: 0 } })),
      ).toThrow(MalformedProtocolError);
      expect(() =>
        ingestProtocol(annotations({ protocol: { episodesPerRun: -1 } })),
      ).toThrow(MalformedProtocolError);
    });

    it("reports the path of a schema violation", () => {
      expect(() =>
        ingestProtocol(annotations({ protocol: { runsPerTrial: 0 } })),
      ).toThrow(/at protocol\.runsPerTrial/);
    });

    it("rejects unknown epoch type codes", () => {
      let caught: unknown;
      try {
        ingestProtocol(annotations({ epochs: [epoch({ type: 6 })] }));
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(UnrecognizedEpochTypeError);
      expect(caught).toBeInstanceOf(MalformedProtocolError);
      expect(caught).toMatchObject({ kind: "MalformedProtocol", code: 6 });
    });

    it("rejects train pulses wider than their period", () => {
      expect(() =>
        ingestProtocol(
          annotations({
            epochs: [epoch({ type: 3, pulsePeriod: 10, pulseWidth: 20 })],
          }),
        ),
      ).toThrow(/pulse width 20 longer than its period 10/);
    });

    it("rejects biphasic pulses wider than their period", () => {
      expect(() =>
        ingestProtocol(
          annotations({
            epochs: [epoch({ type: 7, pulsePeriod: 10, pulseWidth: 20 })],
          }),
        ),
      ).toThrow(MalformedProtocolError);
    });

    it("accepts triangle and cosine epochs with a leftover pulse width", () => {
      const descriptor = ingestProtocol(
        annotations({
          epochs: [
            epoch({ epochNumber: 0, type: 4, pulsePeriod: 10, pulseWidth: 20 }),
            epoch({ epochNumber: 1, type: 5, pulsePeriod: 10, pulseWidth: 20 }),
          ],
        }),
      );
      const epochs = descriptor.channels.get(0)?.epochs;
      expect(epochs?.get(0)?.type).toBe("Triangle");
      expect(epochs?.get(1)?.type).toBe("Cosine");
    });

    it("ignores pulse timing on non-train epochs", () => {
      const descriptor = ingestProtocol(
        annotations({
          epochs: [epoch({ type: 1, pulsePeriod: 10, pulseWidth: 20 })],
        }),
      );
      expect(descriptor.channels.get(0)?.epochs.get(0)?.pulseWidth).toBe(20);
    });

    it("rejects an epoch whose DAC number disagrees with its channel", () => {
      expect(() =>
        ingestProtocol({
          ...annotations(),
          epochInfoPerDAC: { "1": { "0": epoch({ dacNumber: 0 }) } },
        }),
      ).toThrow(/declares DAC 0 but is listed under DAC 1/);
    });

    it("rejects duplicate entries in the active epoch list", () => {
      expect(() =>
        ingestProtocol(
          annotations({ digital: [digital(), digital()] }),
        ),
      ).toThrow(/listed more than once/);
    });

    it("rejects digital codes above 15", () => {
      expect(() =>
        ingestProtocol(
          annotations({ digital: [digital({ digitalTrainValue: 16 })] }),
        ),
      ).toThrow(MalformedProtocolError);
    });

    it("rejects non-integer DAC keys", () => {
      expect(() =>
        ingestProtocol({
          ...annotations(),
          epochInfoPerDAC: { dac0: { "0": epoch() } },
        }),
      ).toThrow(/DAC key "dac0" is not an integer/);
    });
  });
});
