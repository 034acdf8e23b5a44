import {
  clamp,
  daysBetween,
  mean,
  safeDivide,
  stdev,
  sum,
} from "@strategy-lab/trading-core";
import type { EquityPoint, PerformanceMetrics, Trade } from "./types";

export const TRADING_DAYS_PER_YEAR = 252;

/** Simple bar-over-bar returns of a value series; bars after a non-positive value are skipped. */
export function periodReturns(values: readonly number[]): number[] {
  const returns: number[] = [];
  for (let index = 1; index < values.length; index += 1) {
    const previous = values[index - 1] ?? 0;
    const current = values[index] ?? 0;
    if (previous <= 0) continue;
    returns.push(current / previous - 1);
  }
  return returns;
}

export function dailyReturns(equityCurve: readonly EquityPoint[]): number[] {
  return periodReturns(equityCurve.map((point) => point.totalValue));
}

export interface DrawdownStats {
  /** Deepest peak-to-trough decline as a fraction in [0, 1]. */
  maxDrawdown: number;
  /** Mean of the deepest point of each underwater episode. */
  avgDrawdown: number;
  /** Longest run of bars spent strictly below the running peak. */
  maxDrawdownDuration: number;
}

export function drawdownStats(values: readonly number[]): DrawdownStats {
  let peak = Number.NEGATIVE_INFINITY;
  let maxDrawdown = 0;
  let maxDrawdownDuration = 0;
  let underwaterBars = 0;
  let episodeDepth = 0;
  const episodes: number[] = [];

  for (const value of values) {
    if (value >= peak) {
      peak = value;
      if (underwaterBars > 0) episodes.push(episodeDepth);
      underwaterBars = 0;
      episodeDepth = 0;
      continue;
    }

    if (peak <= 0) continue;
    const drawdown = clamp((peak - value) / peak, 0, 1);
    underwaterBars += 1;
    episodeDepth = Math.max(episodeDepth, drawdown);
    maxDrawdown = Math.max(maxDrawdown, drawdown);
    maxDrawdownDuration = Math.max(maxDrawdownDuration, underwaterBars);
  }

  if (underwaterBars > 0) episodes.push(episodeDepth);

  return {
    maxDrawdown,
    avgDrawdown: mean(episodes),
    maxDrawdownDuration,
  };
}

export function annualizedVolatility(returns: readonly number[]): number {
  return stdev(returns) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

/** `riskFreePerPeriod` is the per-bar rate (an annual rate divided by 252). */
export function sharpeRatio(returns: readonly number[], riskFreePerPeriod = 0): number {
  const deviation = stdev(returns);
  if (returns.length === 0 || deviation === 0) return 0;
  const excess = mean(returns) - riskFreePerPeriod;
  return Math.sqrt(TRADING_DAYS_PER_YEAR) * safeDivide(excess, deviation);
}

/** Like {@link sharpeRatio} but penalizes only the spread of losing bars. */
export function sortinoRatio(returns: readonly number[], riskFreePerPeriod = 0): number {
  const excess = returns.map((value) => value - riskFreePerPeriod);
  const downside = stdev(excess.filter((value) => value < 0));
  if (downside === 0) return 0;
  return Math.sqrt(TRADING_DAYS_PER_YEAR) * safeDivide(mean(excess), downside);
}

/** Annualized downside deviation of the losing bars. */
export function downsideRisk(returns: readonly number[]): number {
  return stdev(returns.filter((value) => value < 0)) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

/**
 * Compounds `totalReturn` over `elapsedDays` calendar days to a yearly rate.
 * Zero elapsed time yields 0; a total loss or worse yields -1.
 */
export function annualizedReturn(totalReturn: number, elapsedDays: number): number {
  if (!(elapsedDays > 0)) return 0;
  if (1 + totalReturn <= 0) return -1;
  const annual = (1 + totalReturn) ** (365 / elapsedDays) - 1;
  return Number.isFinite(annual) ? annual : 0;
}

export function elapsedDays(equityCurve: readonly EquityPoint[]): number {
  const first = equityCurve[0];
  const last = equityCurve[equityCurve.length - 1];
  if (!first || !last) return 0;
  return daysBetween(first.date, last.date);
}

export function computePerformanceMetrics(
  trades: readonly Trade[],
  equityCurve: readonly EquityPoint[],
  initialCapital: number,
): PerformanceMetrics {
  const profits = trades.map((trade) => trade.profit);
  const wins = profits.filter((profit) => profit > 0);
  const losses = profits.filter((profit) => profit < 0);

  const totalTrades = trades.length;
  const totalProfit = sum(profits);
  const grossProfit = sum(wins);
  const grossLoss = Math.abs(sum(losses));
  const avgWin = mean(wins);
  const avgLoss = mean(losses);
  const profitPct = safeDivide(totalProfit, initialCapital);

  const values = equityCurve.map((point) => point.totalValue);
  const returns = periodReturns(values);
  const drawdown = drawdownStats(values);

  return {
    summary: {
      totalTrades,
      winningTrades: wins.length,
      losingTrades: losses.length,
      winRate: safeDivide(wins.length, totalTrades),
      avgTradeDuration: mean(
        trades.map((trade) => daysBetween(trade.entryDate, trade.exitDate)),
      ),
      profitLossRatio: safeDivide(avgWin, Math.abs(avgLoss)),
    },
    returns: {
      totalProfit,
      profitPct,
      grossProfit,
      grossLoss,
      profitFactor: safeDivide(grossProfit, grossLoss),
      annualReturn: annualizedReturn(profitPct, elapsedDays(equityCurve)),
    },
    risk: {
      ...drawdown,
      volatility: annualizedVolatility(returns),
      sharpeRatio: sharpeRatio(returns),
      sortinoRatio: sortinoRatio(returns),
    },
    efficiency: {
      profitPerTrade: safeDivide(totalProfit, totalTrades),
      avgWin,
      avgLoss,
      largestWin: wins.length > 0 ? Math.max(...wins) : 0,
      largestLoss: losses.length > 0 ? Math.min(...losses) : 0,
    },
  };
}
