import { describe, expect, it } from "vitest";
import {
  assertSignalSeries,
  BarSchema,
  createStaticSignalProvider,
  daysBetween,
  parseBars,
  SignalSchema,
  toEpochMs,
  type Bar,
} from "../src/contracts";

function bar(timeKey: string | number, close = 10): Bar {
  return { timeKey, open: close, high: close, low: close, close, volume: 100 };
}

describe("trading-core contracts", () => {
  it("accepts bars keyed by ISO date or epoch milliseconds", () => {
    const parsed = parseBars([bar("2024-01-02"), bar("2024-01-03")]);
    expect(parsed).toHaveLength(2);
    expect(BarSchema.parse(bar(1704153600000)).timeKey).toBe(1704153600000);
  });

  it("rejects negative volume", () => {
    expect(() =>
      BarSchema.parse({ ...bar("2024-01-02"), volume: -1 }),
    ).toThrow();
  });

  it("rejects bars that are not strictly increasing in time", () => {
    expect(() => parseBars([bar("2024-01-03"), bar("2024-01-03")])).toThrow(
      /strictly increasing/,
    );
    expect(() => parseBars([bar("2024-01-03"), bar("2024-01-02")])).toThrow(
      /bar 1/,
    );
  });

  it("rejects unparseable time keys", () => {
    expect(() => toEpochMs("not a date")).toThrow(/Unparseable/);
  });

  it("measures calendar days between keys", () => {
    expect(daysBetween("2024-01-01", "2024-01-31")).toBe(30);
    expect(daysBetween(0, 12 * 60 * 60 * 1000)).toBe(0.5);
  });

  it("only allows -1, 0 and 1 as signals", () => {
    expect(SignalSchema.parse(-1)).toBe(-1);
    expect(() => SignalSchema.parse(2)).toThrow();
  });

  it("rejects signal series whose length differs from the bars", () => {
    const bars = [bar("2024-01-01"), bar("2024-01-02"), bar("2024-01-03")];
    expect(() => assertSignalSeries(bars, [0, 1])).toThrow(
      "Signal series length 2 does not match bar series length 3",
    );
    expect(() => assertSignalSeries(bars, [0, 1, 0.5])).toThrow(
      "Signal at index 2 must be -1, 0 or 1, received 0.5",
    );
  });

  it("replays a static signal series as a copy", () => {
    const signals = [0, 1, 1] as const;
    const provider = createStaticSignalProvider("static", signals);
    const bars = [bar("2024-01-01"), bar("2024-01-02"), bar("2024-01-03")];

    const first = provider.calculate(bars);
    first[0] = -1;

    expect(provider.key).toBe("static");
    expect(provider.calculate(bars)).toEqual([0, 1, 1]);
  });
});
