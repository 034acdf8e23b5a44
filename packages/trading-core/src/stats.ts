export function sum(values: readonly number[]): number {
  return values.reduce((acc, value) => acc + value, 0);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return sum(values) / values.length;
}

/** Population standard deviation; 0 for an empty series. */
export function stdev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  const variance =
    values.reduce((acc, value) => acc + (value - avg) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Returns `numerator / denominator`, or `fallback` when the quotient would
 * not be a finite number.
 */
export function safeDivide(
  numerator: number,
  denominator: number,
  fallback = 0,
): number {
  if (denominator === 0) return fallback;
  const quotient = numerator / denominator;
  return Number.isFinite(quotient) ? quotient : fallback;
}
