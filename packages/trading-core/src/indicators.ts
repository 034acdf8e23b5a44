/**
 * Exponential moving average with the `2 / (period + 1)` smoothing factor.
 * The first value seeds the series, so every index has a value.
 */
export function ema(values: readonly number[], period: number): number[] {
  if (!Number.isInteger(period) || period <= 0) {
    throw new Error(`EMA period must be a positive integer, received ${period}`);
  }
  if (values.length === 0) return [];

  const alpha = 2 / (period + 1);
  let previous = values[0] ?? 0;
  const out = [previous];

  for (let index = 1; index < values.length; index += 1) {
    const value = values[index] ?? previous;
    previous = alpha * value + (1 - alpha) * previous;
    out.push(previous);
  }

  return out;
}

/** Bar-over-bar fractional change; `null` for the first bar and after a zero. */
export function pctChange(values: readonly number[]): (number | null)[] {
  return values.map((value, index) => {
    const previous = values[index - 1];
    if (previous === undefined || previous === 0) return null;
    return value / previous - 1;
  });
}
