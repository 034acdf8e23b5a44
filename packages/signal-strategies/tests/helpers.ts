import type { Bar } from "@strategy-lab/trading-core";

const DAY_MS = 24 * 60 * 60 * 1000;

export function barsFromCloses(closes: number[]): Bar[] {
  return closes.map((close, index) => ({
    timeKey: Date.UTC(2024, 0, 1) + index * DAY_MS,
    open: close,
    high: close,
    low: close,
    close,
    volume: 1_000,
  }));
}

export function ramp(length: number, start: number, step: number): number[] {
  return Array.from({ length }, (_, index) => start + index * step);
}
