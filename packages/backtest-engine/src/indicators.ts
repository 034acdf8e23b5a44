import { rollingMean, type Bar } from "@strategy-lab/trading-core";

/** True range per bar; the first bar has no previous close and uses high - low. */
export function trueRange(bars: Bar[]): number[] {
  return bars.map((bar, index) => {
    const previous = bars[index - 1];
    if (!previous) return bar.high - bar.low;
    return Math.max(
      bar.high - bar.low,
      Math.abs(bar.high - previous.close),
      Math.abs(bar.low - previous.close),
    );
  });
}

/**
 * Simple moving average of the true range. Bars before the lookback is filled
 * report 0, which the sizing and stop policies read as "no ATR yet".
 */
export function computeAtr(bars: Bar[], period: number): number[] {
  return rollingMean(trueRange(bars), period).map((value) => value ?? 0);
}
