import {
  annualizedVolatility,
  dailyReturns,
  downsideRisk,
  drawdownStats,
  sharpeRatio,
  sortinoRatio,
  TRADING_DAYS_PER_YEAR,
  type EquityPoint,
} from "@strategy-lab/backtest-engine";
import type { RiskMetrics } from "./types";

/**
 * Risk profile of an equity curve. `riskFreeRate` is annual; Sharpe subtracts
 * its per-day share from each daily return, Sortino does not.
 */
export function calculateRiskMetrics(
  equityCurve: readonly EquityPoint[],
  riskFreeRate: number,
): RiskMetrics {
  const returns = dailyReturns(equityCurve);
  const { maxDrawdown, maxDrawdownDuration } = drawdownStats(
    equityCurve.map((point) => point.totalValue),
  );

  return {
    volatility: annualizedVolatility(returns),
    maxDrawdown,
    maxDrawdownDuration,
    downsideRisk: downsideRisk(returns),
    sharpeRatio: sharpeRatio(returns, riskFreeRate / TRADING_DAYS_PER_YEAR),
    sortinoRatio: sortinoRatio(returns),
  };
}
