import type { EquityPoint } from "@strategy-lab/backtest-engine";
import type { Bar, Logger } from "@strategy-lab/trading-core";
import { vi } from "vitest";

export const DAY_MS = 24 * 60 * 60 * 1000;
export const START_MS = Date.UTC(2024, 0, 1);

export function barsFromCloses(closes: number[]): Bar[] {
  return closes.map((close, index) => {
    const open = closes[index - 1] ?? close;
    return {
      timeKey: START_MS + index * DAY_MS,
      open,
      high: Math.max(open, close),
      low: Math.min(open, close),
      close,
      volume: 1_000,
    };
  });
}

export function point(date: string, totalValue: number): EquityPoint {
  return {
    date,
    capital: totalValue,
    holdings: 0,
    holdingValue: 0,
    totalValue,
    pyramidLevel: 0,
  };
}

export function createSilentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
