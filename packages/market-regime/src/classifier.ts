import type { Bar, DeepPartial } from "@strategy-lab/trading-core";
import { analyzeTradesByRegime } from "./analysis";
import { createRegimeConfig, regimeLookback, type RegimeConfig } from "./config";
import { computeRegimeIndicators } from "./indicators";
import type {
  MarketRegime,
  RegimeAnalysis,
  RegimeIndicatorPoint,
  RegimeTrade,
} from "./types";

const STRONG_STRENGTH = 0.8;
const WEAK_STRENGTH = 0.2;
const OVERBOUGHT_RSI = 70;
const OVERSOLD_RSI = 30;
const HIGH_VOLUME_RATIO = 1.5;

function labelPoint(point: RegimeIndicatorPoint, config: RegimeConfig): MarketRegime {
  const { priceToSma, marketStrength, rsi, volumeRatio } = point;
  if (priceToSma === null) return "RANGE";

  const heavyVolume = volumeRatio !== null && volumeRatio > HIGH_VOLUME_RATIO;

  if (priceToSma > config.bullThreshold) {
    const strong =
      marketStrength !== null &&
      marketStrength > STRONG_STRENGTH &&
      rsi !== null &&
      rsi > OVERBOUGHT_RSI &&
      heavyVolume;
    return strong ? "STRONG_BULL" : "BULL";
  }

  if (priceToSma < config.bearThreshold) {
    const strong =
      marketStrength !== null &&
      marketStrength < WEAK_STRENGTH &&
      rsi !== null &&
      rsi < OVERSOLD_RSI &&
      heavyVolume;
    return strong ? "STRONG_BEAR" : "BEAR";
  }

  return "RANGE";
}

/** One label per bar. Bars inside the warm-up window are RANGE. */
export function classifyRegimes(bars: Bar[], config: RegimeConfig): MarketRegime[] {
  const lookback = regimeLookback(config);
  return computeRegimeIndicators(bars, config).map((point, index) =>
    index < lookback ? "RANGE" : labelPoint(point, config),
  );
}

export interface RegimeClassifier {
  readonly config: RegimeConfig;
  indicators(bars: Bar[]): RegimeIndicatorPoint[];
  classify(bars: Bar[]): MarketRegime[];
  analyzeTrades<TTrade extends RegimeTrade>(
    trades: readonly TTrade[],
    bars: Bar[],
  ): RegimeAnalysis<TTrade>;
}

export function createRegimeClassifier(
  overrides?: DeepPartial<RegimeConfig>,
): RegimeClassifier {
  const config = Object.freeze(createRegimeConfig(overrides));

  return {
    config,
    indicators: (bars) => computeRegimeIndicators(bars, config),
    classify: (bars) => classifyRegimes(bars, config),
    analyzeTrades: (trades, bars) =>
      analyzeTradesByRegime(trades, bars, classifyRegimes(bars, config)),
  };
}
