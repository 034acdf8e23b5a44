import type { Bar } from "@strategy-lab/trading-core";

export const DAY_MS = 24 * 60 * 60 * 1000;
export const START_MS = Date.UTC(2024, 0, 1);

export function barsFrom(closes: number[], volumes: number[]): Bar[] {
  return closes.map((close, index) => {
    const open = closes[index - 1] ?? close;
    return {
      timeKey: START_MS + index * DAY_MS,
      open,
      high: Math.max(open, close),
      low: Math.min(open, close),
      close,
      volume: volumes[index] ?? 0,
    };
  });
}

export function series(length: number, at: (index: number, previous: number) => number, start: number): number[] {
  const out: number[] = [];
  for (let index = 0; index < length; index += 1) {
    out.push(index === 0 ? start : at(index, out[index - 1] ?? start));
  }
  return out;
}
