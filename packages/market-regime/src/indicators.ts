import {
  ema,
  pctChange,
  rollingMean,
  rollingStdev,
  type Bar,
} from "@strategy-lab/trading-core";
import type { RegimeConfig } from "./config";
import type { RegimeIndicatorPoint } from "./types";

const STRENGTH_WEIGHTS = {
  trend: 0.3,
  volume: 0.2,
  rsi: 0.2,
  macd: 0.2,
  volatility: 0.1,
} as const;

/**
 * RSI from simple rolling means of gains and losses. A window with gains and
 * no losses reads 100; a window with neither reads a neutral 50.
 */
export function rollingRsi(closes: readonly number[], period: number): (number | null)[] {
  const deltas = closes.map((close, index) => close - (closes[index - 1] ?? close));
  const avgGain = rollingMean(deltas.map((delta) => Math.max(delta, 0)), period);
  const avgLoss = rollingMean(deltas.map((delta) => Math.max(-delta, 0)), period);

  return closes.map((_, index) => {
    const gain = avgGain[index] ?? null;
    const loss = avgLoss[index] ?? null;
    if (gain === null || loss === null) return null;
    if (loss === 0) return gain > 0 ? 100 : 50;
    return 100 - 100 / (1 + gain / loss);
  });
}

export function macdHistogram(
  closes: readonly number[],
  fast: number,
  slow: number,
  signal: number,
): number[] {
  const fastEma = ema(closes, fast);
  const slowEma = ema(closes, slow);
  const macd = closes.map((_, index) => (fastEma[index] ?? 0) - (slowEma[index] ?? 0));
  const signalLine = ema(macd, signal);
  return macd.map((value, index) => value - (signalLine[index] ?? 0));
}

/**
 * Scales a series by its own maximum. Warm-up gaps stay `null`; a series whose
 * maximum is not positive scales to 0.
 */
function normalizeByMax(values: readonly (number | null)[]): (number | null)[] {
  const max = values.reduce<number>(
    (acc, value) => (value === null ? acc : Math.max(acc, value)),
    Number.NEGATIVE_INFINITY,
  );
  return values.map((value) => {
    if (value === null) return null;
    return max > 0 ? value / max : 0;
  });
}

/**
 * Per-bar regime inputs. Component maxima are taken over the whole series, so
 * a bar's strength is relative to the strongest bar in the same input.
 */
export function computeRegimeIndicators(
  bars: Bar[],
  config: RegimeConfig,
): RegimeIndicatorPoint[] {
  const closes = bars.map((bar) => bar.close);
  const volumes = bars.map((bar) => bar.volume);

  const sma = rollingMean(closes, config.smaPeriod);
  const priceToSma = closes.map((close, index) => {
    const average = sma[index] ?? null;
    return average === null || average === 0 ? null : close / average - 1;
  });
  const volatility = rollingStdev(pctChange(closes), config.volatilityPeriod);
  const rsi = rollingRsi(closes, config.rsiPeriod);
  const volumeMa = rollingMean(volumes, config.volumeMaPeriod);
  const volumeRatio = volumes.map((volume, index) => {
    const average = volumeMa[index] ?? null;
    return average === null || average === 0 ? null : volume / average;
  });
  const histogram = macdHistogram(
    closes,
    config.macdFast,
    config.macdSlow,
    config.macdSignal,
  );

  const trendScore = normalizeByMax(
    priceToSma.map((value) => (value === null ? null : Math.abs(value))),
  );
  const volumeScore = normalizeByMax(volumeRatio);
  const macdScore = normalizeByMax(histogram.map((value) => Math.abs(value)));
  const volatilityScore = normalizeByMax(volatility);

  return bars.map((bar, index) => {
    const trend = trendScore[index] ?? null;
    const volume = volumeScore[index] ?? null;
    const momentum = rsi[index] ?? null;
    const macd = macdScore[index] ?? 0;
    const vol = volatilityScore[index] ?? null;

    const marketStrength =
      trend === null || volume === null || momentum === null || vol === null
        ? null
        : trend * STRENGTH_WEIGHTS.trend +
          volume * STRENGTH_WEIGHTS.volume +
          (momentum / 100) * STRENGTH_WEIGHTS.rsi +
          macd * STRENGTH_WEIGHTS.macd +
          vol * STRENGTH_WEIGHTS.volatility;

    return {
      timeKey: bar.timeKey,
      sma: sma[index] ?? null,
      priceToSma: priceToSma[index] ?? null,
      volatility: volatility[index] ?? null,
      rsi: momentum,
      volumeRatio: volumeRatio[index] ?? null,
      macdHistogram: histogram[index] ?? 0,
      marketStrength,
    };
  });
}
