import type { EquityPoint } from "@strategy-lab/backtest-engine";
import { toEpochMs } from "@strategy-lab/trading-core";
import type { PeriodPerformance } from "./types";

type PeriodKey = (date: Date) => string;

const monthKey: PeriodKey = (date) =>
  `${date.getUTCFullYear()}-${String(date.getUTCMonth() + 1).padStart(2, "0")}`;

const quarterKey: PeriodKey = (date) =>
  `${date.getUTCFullYear()}-Q${Math.floor(date.getUTCMonth() / 3) + 1}`;

const yearKey: PeriodKey = (date) => String(date.getUTCFullYear());

/**
 * Compounded return per calendar period. Each period runs from the last value
 * of the previous period (the first value for the earliest period) to its own
 * last value.
 */
export function periodReturnsBy(
  equityCurve: readonly EquityPoint[],
  keyOf: PeriodKey,
): Record<string, number> {
  const closing = new Map<string, number>();
  for (const point of equityCurve) {
    closing.set(keyOf(new Date(toEpochMs(point.date))), point.totalValue);
  }

  const returns: Record<string, number> = {};
  let previous = equityCurve[0]?.totalValue ?? 0;

  for (const [key, value] of closing) {
    returns[key] = previous > 0 ? value / previous - 1 : 0;
    previous = value;
  }

  return returns;
}

function best(returns: Record<string, number>): number {
  const values = Object.values(returns);
  return values.length > 0 ? Math.max(...values) : 0;
}

function worst(returns: Record<string, number>): number {
  const values = Object.values(returns);
  return values.length > 0 ? Math.min(...values) : 0;
}

export function calculatePeriodPerformance(
  equityCurve: readonly EquityPoint[],
): PeriodPerformance {
  const monthlyReturns = periodReturnsBy(equityCurve, monthKey);
  const quarterlyReturns = periodReturnsBy(equityCurve, quarterKey);
  const yearlyReturns = periodReturnsBy(equityCurve, yearKey);

  return {
    monthlyReturns,
    quarterlyReturns,
    yearlyReturns,
    bestMonth: best(monthlyReturns),
    worstMonth: worst(monthlyReturns),
    bestQuarter: best(quarterlyReturns),
    worstQuarter: worst(quarterlyReturns),
    bestYear: best(yearlyReturns),
    worstYear: worst(yearlyReturns),
  };
}
