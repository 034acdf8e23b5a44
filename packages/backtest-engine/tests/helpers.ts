import type { Bar, Logger } from "@strategy-lab/trading-core";
import { vi } from "vitest";

export const DAY_MS = 24 * 60 * 60 * 1000;
export const START_MS = Date.UTC(2024, 0, 1);

export function bar(index: number, close: number, overrides: Partial<Bar> = {}): Bar {
  const open = overrides.open ?? close;
  return {
    timeKey: START_MS + index * DAY_MS,
    open,
    high: Math.max(open, close),
    low: Math.min(open, close),
    close,
    volume: 1_000,
    ...overrides,
  };
}

/** Bars whose open equals the previous close. */
export function barsFromCloses(closes: number[]): Bar[] {
  return closes.map((close, index) =>
    bar(index, close, { open: closes[index - 1] ?? close }),
  );
}

export function flatBars(count: number, price = 100): Bar[] {
  return Array.from({ length: count }, (_, index) => bar(index, price));
}

export function createSilentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export const noCosts = { slippagePct: 0, commissionPct: 0 };

/** Stops that never fire. */
export const noStops = {
  policy: "FIXED",
  stopLossPct: null,
  trailingStopPct: null,
  atrMultiple: null,
  timeStopBars: null,
} as const;
