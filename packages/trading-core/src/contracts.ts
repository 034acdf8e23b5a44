import { z } from "zod";

/**
 * Bar time key as delivered by data-source adapters: either an ISO-8601 date
 * string (`"2024-01-02"`, `"2024-01-02T09:30:00Z"`) or epoch milliseconds.
 */
export const TimeKeySchema = z.union([z.string().min(1), z.number().int()]);
export type TimeKey = z.infer<typeof TimeKeySchema>;

/**
 * Immutable OHLCV bar shape consumed by every package in the repository.
 *
 * Bars are expected in strictly increasing `timeKey` order. All index-based
 * lookbacks assume array position equals chronological position.
 */
export const BarSchema = z.object({
  timeKey: TimeKeySchema,
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nonnegative(),
});
export type Bar = z.infer<typeof BarSchema>;

/**
 * Per-bar strategy position: short, flat or long.
 */
export const SignalSchema = z.union([z.literal(-1), z.literal(0), z.literal(1)]);
export type Signal = z.infer<typeof SignalSchema>;

/** Direction of an open position. */
export type Direction = -1 | 1;

/**
 * External strategy collaborator. `calculate` must return exactly one signal
 * per bar and must not depend on anything but the bars it is given, so replay
 * and backtesting remain deterministic.
 */
export interface SignalProvider {
  /** Stable identifier, used as the evaluation key. */
  key: string;
  calculate(bars: Bar[]): Signal[];
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Resolves a bar time key to epoch milliseconds. Throws when a string key
 * cannot be parsed as a date.
 */
export function toEpochMs(timeKey: TimeKey): number {
  if (typeof timeKey === "number") return timeKey;

  const parsed = Date.parse(timeKey);
  if (Number.isNaN(parsed)) {
    throw new Error(`Unparseable bar timeKey: ${timeKey}`);
  }
  return parsed;
}

/** Calendar days between two time keys, fractional. */
export function daysBetween(from: TimeKey, to: TimeKey): number {
  return (toEpochMs(to) - toEpochMs(from)) / DAY_MS;
}

/**
 * Validates bar shape and ordering. Returns the parsed bars unchanged in
 * order; throws on the first malformed bar or ordering violation.
 */
export function parseBars(input: unknown): Bar[] {
  const bars = z.array(BarSchema).parse(input);
  assertChronological(bars);
  return bars;
}

export function assertChronological(bars: Bar[]): void {
  let previous = Number.NEGATIVE_INFINITY;

  for (let index = 0; index < bars.length; index += 1) {
    const bar = bars[index];
    if (!bar) continue;

    const time = toEpochMs(bar.timeKey);
    if (time <= previous) {
      throw new Error(
        `Bars must be strictly increasing in time: bar ${index} (${String(bar.timeKey)}) does not follow its predecessor`,
      );
    }
    previous = time;
  }
}

/**
 * Checks a strategy's signal series against the bars it was computed from.
 * A length mismatch or a value outside `{-1, 0, 1}` is a configuration error.
 */
export function assertSignalSeries(
  bars: Bar[],
  signals: readonly number[],
): asserts signals is Signal[] {
  if (signals.length !== bars.length) {
    throw new Error(
      `Signal series length ${signals.length} does not match bar series length ${bars.length}`,
    );
  }

  const invalidIndex = signals.findIndex(
    (value) => !SignalSchema.safeParse(value).success,
  );
  if (invalidIndex >= 0) {
    throw new Error(
      `Signal at index ${invalidIndex} must be -1, 0 or 1, received ${String(signals[invalidIndex])}`,
    );
  }
}

/**
 * Wraps an already computed signal series in the provider contract, for
 * callers that receive signals from elsewhere.
 */
export function createStaticSignalProvider(
  key: string,
  signals: readonly Signal[],
): SignalProvider {
  return {
    key,
    calculate: (bars) => {
      assertSignalSeries(bars, signals);
      return [...signals];
    },
  };
}
