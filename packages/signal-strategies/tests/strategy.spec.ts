import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import {
  createConfiguredMaTrendStrategy,
  createConfiguredSmaCrossStrategy,
  createMaTrendStrategy,
  createSmaCrossStrategy,
  MA_TREND_KEY,
  SMA_CROSS_KEY,
} from "../src";
import { barsFromCloses, ramp } from "./helpers";

const shortTrend = { p1: 3, p2: 5, p3: 10 };

describe("MA trend strategy", () => {
  it("exposes its key and default parameters", () => {
    const { config, strategy } = createConfiguredMaTrendStrategy();

    expect(strategy.key).toBe(MA_TREND_KEY);
    expect(config).toEqual({ p1: 13, p2: 21, p3: 55 });
  });

  it("stays flat for the first two bars, then goes long in an uptrend", () => {
    const bars = barsFromCloses(ramp(30, 100, 1));
    const signals = createMaTrendStrategy(shortTrend).calculate(bars);

    expect(signals).toHaveLength(30);
    expect(signals.slice(0, 2)).toEqual([0, 0]);
    expect(signals.slice(2).every((signal) => signal === 1)).toBe(true);
  });

  it("goes short in a downtrend", () => {
    const bars = barsFromCloses(ramp(30, 200, -1));
    const signals = createMaTrendStrategy(shortTrend).calculate(bars);

    expect(signals.slice(0, 2)).toEqual([0, 0]);
    expect(signals.slice(2).every((signal) => signal === -1)).toBe(true);
  });

  it("holds its side through a plateau", () => {
    const closes = [...ramp(15, 100, 1), ...new Array<number>(15).fill(114)];
    const signals = createMaTrendStrategy(shortTrend).calculate(barsFromCloses(closes));

    expect(signals.slice(2).every((signal) => signal === 1)).toBe(true);
  });

  it("flips from long to short once the trend reverses", () => {
    const closes = [...ramp(20, 100, 1), ...ramp(20, 114, -5)];
    const signals = createMaTrendStrategy(shortTrend).calculate(barsFromCloses(closes));

    expect(signals[19]).toBe(1);
    expect(signals[signals.length - 1]).toBe(-1);
    expect(signals.includes(0, 2)).toBe(false);
  });

  it("returns no signals for no bars", () => {
    expect(createMaTrendStrategy().calculate([])).toEqual([]);
  });

  it("rejects non-positive periods", () => {
    expect(() => createMaTrendStrategy({ p1: 0 })).toThrow(ZodError);
  });
});

describe("SMA cross strategy", () => {
  it("exposes its key and default parameters", () => {
    const { config, strategy } = createConfiguredSmaCrossStrategy();

    expect(strategy.key).toBe(SMA_CROSS_KEY);
    expect(config).toEqual({ fast: 10, slow: 30 });
  });

  it("follows the side of the fast average once both are available", () => {
    const bars = barsFromCloses([1, 2, 3, 2, 1]);
    const signals = createSmaCrossStrategy({ fast: 2, slow: 3 }).calculate(bars);

    expect(signals).toEqual([0, 0, 1, 1, -1]);
  });

  it("is flat when the averages coincide", () => {
    const bars = barsFromCloses(new Array<number>(6).fill(50));
    expect(createSmaCrossStrategy({ fast: 2, slow: 3 }).calculate(bars)).toEqual([
      0, 0, 0, 0, 0, 0,
    ]);
  });

  it("requires the fast period to be shorter than the slow one", () => {
    expect(() => createSmaCrossStrategy({ fast: 30, slow: 10 })).toThrow(ZodError);
  });
});
