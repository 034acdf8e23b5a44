import {
  daysBetween,
  mean,
  safeDivide,
  stdev,
  sum,
  toEpochMs,
  type Bar,
  type TimeKey,
} from "@strategy-lab/trading-core";
import {
  MARKET_REGIMES,
  type MarketRegime,
  type RegimeAnalysis,
  type RegimeTrade,
  type RegimeTradeStats,
} from "./types";

/**
 * Index of the bar closest in time to `time`; ties go to the earlier bar.
 * `times` must be ascending and non-empty.
 */
export function nearestBarIndex(times: readonly number[], time: number): number {
  let low = 0;
  let high = times.length - 1;

  while (low < high) {
    const middle = Math.floor((low + high) / 2);
    if ((times[middle] ?? 0) < time) low = middle + 1;
    else high = middle;
  }

  const previous = times[low - 1];
  const current = times[low] ?? 0;
  if (previous !== undefined && time - previous <= current - time) return low - 1;
  return low;
}

function summarize<TTrade extends RegimeTrade>(
  regime: MarketRegime,
  trades: TTrade[],
): RegimeTradeStats<TTrade> {
  const profits = trades.map((trade) => trade.profit);
  const winCount = profits.filter((profit) => profit > 0).length;
  const totalProfit = sum(profits);

  return {
    regime,
    tradeCount: trades.length,
    winCount,
    winRate: safeDivide(winCount, trades.length),
    totalProfit,
    avgProfit: safeDivide(totalProfit, trades.length),
    maxProfit: Math.max(...profits),
    maxLoss: Math.min(...profits),
    profitStd: stdev(profits),
    avgHoldingDays: mean(
      trades.map((trade) => daysBetween(trade.entryDate, trade.exitDate)),
    ),
    trades,
  };
}

/**
 * Buckets trades by the regime of the bar nearest their entry and summarizes
 * each bucket. `regimes` must be aligned with `bars`.
 */
export function analyzeTradesByRegime<TTrade extends RegimeTrade>(
  trades: readonly TTrade[],
  bars: Bar[],
  regimes: readonly MarketRegime[],
): RegimeAnalysis<TTrade> {
  if (regimes.length !== bars.length) {
    throw new Error(
      `Regime series length ${regimes.length} does not match bar series length ${bars.length}`,
    );
  }

  const regimeStats: Record<MarketRegime, number> = {
    STRONG_BULL: 0,
    BULL: 0,
    RANGE: 0,
    BEAR: 0,
    STRONG_BEAR: 0,
  };
  for (const regime of regimes) regimeStats[regime] += 1;

  const byRegime: RegimeAnalysis<TTrade>["byRegime"] = {};
  if (bars.length === 0) return { byRegime, regimeStats };

  const times = bars.map((bar) => toEpochMs(bar.timeKey));
  const buckets = new Map<MarketRegime, TTrade[]>();

  for (const trade of trades) {
    const regime = regimeAt(times, regimes, trade.entryDate);
    const bucket = buckets.get(regime) ?? [];
    bucket.push(trade);
    buckets.set(regime, bucket);
  }

  for (const regime of MARKET_REGIMES) {
    const bucket = buckets.get(regime);
    if (bucket) byRegime[regime] = summarize(regime, bucket);
  }

  return { byRegime, regimeStats };
}

function regimeAt(
  times: readonly number[],
  regimes: readonly MarketRegime[],
  date: TimeKey,
): MarketRegime {
  return regimes[nearestBarIndex(times, toEpochMs(date))] ?? "RANGE";
}
