import { z } from "zod";
import type { TimeKey } from "@strategy-lab/trading-core";

/**
 * Market condition label for a single bar. Labels are computed from bar data
 * alone, independently of any strategy.
 */
export const MarketRegimeSchema = z.enum([
  "STRONG_BULL",
  "BULL",
  "RANGE",
  "BEAR",
  "STRONG_BEAR",
]);
export type MarketRegime = z.infer<typeof MarketRegimeSchema>;

export const MARKET_REGIMES: readonly MarketRegime[] = MarketRegimeSchema.options;

/**
 * Per-bar indicator values behind a regime label. Every field is `null` while
 * its own lookback is unsatisfied; the MACD histogram is seeded from the first
 * close and always has a value.
 */
export interface RegimeIndicatorPoint {
  timeKey: TimeKey;
  sma: number | null;
  priceToSma: number | null;
  volatility: number | null;
  rsi: number | null;
  volumeRatio: number | null;
  macdHistogram: number;
  /** Weighted blend of the normalized components, in [0, 1]. */
  marketStrength: number | null;
}

/** Minimal trade shape the regime analysis reads. */
export interface RegimeTrade {
  entryDate: TimeKey;
  exitDate: TimeKey;
  profit: number;
}

export interface RegimeTradeStats<TTrade extends RegimeTrade = RegimeTrade> {
  regime: MarketRegime;
  tradeCount: number;
  winCount: number;
  winRate: number;
  totalProfit: number;
  avgProfit: number;
  maxProfit: number;
  maxLoss: number;
  /** Population standard deviation of trade profits. */
  profitStd: number;
  avgHoldingDays: number;
  trades: TTrade[];
}

export interface RegimeAnalysis<TTrade extends RegimeTrade = RegimeTrade> {
  /** Only regimes that received at least one trade appear here. */
  byRegime: Partial<Record<MarketRegime, RegimeTradeStats<TTrade>>>;
  /** Number of bars carrying each label. */
  regimeStats: Record<MarketRegime, number>;
}
