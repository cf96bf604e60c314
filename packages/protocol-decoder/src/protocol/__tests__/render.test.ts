import { describe, it, expect } from "vitest";
import { ingestProtocol } from "../ingest";
import { epochTable, renderAnalog, renderDigital } from "../render";
import { resolve } from "../resolver";
import { synthesizeSweep } from "../synthesizer";
import { annotations, digital, epoch } from "./fixtures";

describe("renderAnalog", () => {
  it("interpolates ramps from their start level", () => {
    const samples = renderAnalog(
      [
        { kind: "flat", start: 0, length: 50, level: 10 },
        { kind: "ramp", start: 50, length: 20, from: 10, to: 30 },
      ],
      70,
    );
    expect(samples[49]).toBe(10);
    expect(samples[50]).toBe(10);
    expect(samples[60]).toBe(20);
    expect(samples[69]).toBe(29);
  });

  it("evaluates cosine segments about their baseline", () => {
    const samples = renderAnalog(
      [
        {
          kind: "cosine",
          start: 0,
          length: 100,
          baseline: 1,
          amplitude: 2,
          period: 100,
        },
      ],
      100,
    );
    expect(samples[0]).toBe(3);
    expect(samples[25]).toBeCloseTo(1, 10);
    expect(samples[50]).toBeCloseTo(-1, 10);
  });

  it("drops samples past the requested length", () => {
    const samples = renderAnalog(
      [{ kind: "flat", start: 0, length: 10, level: 4 }],
      5,
    );
    expect(Array.from(samples)).toEqual([4, 4, 4, 4, 4]);
  });

  it("renders a synthesized pulse train", () => {
    const descriptor = ingestProtocol(
      annotations({
        epochs: [
          epoch({
            type: 3,
            levelInit: 5,
            pulsePeriod: 4,
            pulseWidth: 1,
            durationInit: 8,
          }),
        ],
      }),
    );
    const sweep = synthesizeSweep(descriptor, 0);
    const samples = renderAnalog(
      sweep.analog.get(0)?.segments ?? [],
      sweep.sampleCount,
    );
    expect(Array.from(samples)).toEqual([5, 0, 0, 0, 5, 0, 0, 0]);
  });
});

describe("renderDigital", () => {
  it("holds each state until the next transition", () => {
    const samples = renderDigital(
      [
        { offset: 0, state: 1 },
        { offset: 2, state: 0 },
        { offset: 5, state: 1 },
      ],
      7,
    );
    expect(Array.from(samples)).toEqual([1, 1, 0, 0, 0, 1, 1]);
  });

  it("is high only inside the train pulses", () => {
    const descriptor = ingestProtocol(
      annotations({
        epochs: [epoch({ pulsePeriod: 50, pulseWidth: 10, durationInit: 200 })],
        digital: [digital({ digitalTrainValue: 1 })],
      }),
    );
    const sweep = synthesizeSweep(descriptor, 0);
    const samples = renderDigital(
      sweep.digital[0]?.transitions ?? [],
      sweep.sampleCount,
    );

    const high: number[] = [];
    samples.forEach((state, i) => {
      if (state === 1) high.push(i);
    });
    const expected = [0, 50, 100, 150].flatMap((start) =>
      Array.from({ length: 10 }, (_, k) => start + k),
    );
    expect(high).toEqual(expected);
  });
});

describe("epochTable", () => {
  it("lists cumulative epoch boundaries per DAC", () => {
    const descriptor = ingestProtocol(
      annotations({
        epochs: [
          epoch({ dacNumber: 0, epochNumber: 0, durationInit: 100 }),
          epoch({
            dacNumber: 0,
            epochNumber: 2,
            type: 2,
            levelInit: 20,
            durationInit: 50,
          }),
          epoch({ dacNumber: 1, epochNumber: 0, levelInit: -5, durationInit: 30 }),
        ],
      }),
    );
    expect(epochTable(resolve(descriptor, 0))).toEqual([
      { dacNumber: 0, epochNumber: 0, type: "Step", start: 0, end: 100, level: 10 },
      { dacNumber: 0, epochNumber: 2, type: "Ramp", start: 100, end: 150, level: 20 },
      { dacNumber: 1, epochNumber: 0, type: "Step", start: 0, end: 30, level: -5 },
    ]);
  });

  it("applies the episode's increments", () => {
    const descriptor = ingestProtocol(
      annotations({
        epochs: [
          epoch({ levelIncrementPerEpisode: 2, durationIncrementPerEpisode: 10 }),
        ],
      }),
    );
    const resolved = resolve(descriptor, 3);
    expect(epochTable(resolved)).toEqual([
      { dacNumber: 0, epochNumber: 0, type: "Step", start: 0, end: 130, level: 16 },
    ]);
  });
});
