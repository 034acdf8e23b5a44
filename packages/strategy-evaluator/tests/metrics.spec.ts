import type { Trade } from "@strategy-lab/backtest-engine";
import type { RegimeAnalysis, RegimeTradeStats } from "@strategy-lab/market-regime";
import { describe, expect, it } from "vitest";
import {
  calculatePeriodPerformance,
  calculateRating,
  calculateRiskMetrics,
  scoreToGrade,
  stabilityFactors,
  type RatingInput,
} from "../src/index";
import { point } from "./helpers";

function stats(
  regime: RegimeTradeStats<Trade>["regime"],
  tradeCount: number,
  winCount: number,
): RegimeTradeStats<Trade> {
  return {
    regime,
    tradeCount,
    winCount,
    winRate: winCount / tradeCount,
    totalProfit: 0,
    avgProfit: 0,
    maxProfit: 0,
    maxLoss: 0,
    profitStd: 0,
    avgHoldingDays: 0,
    trades: [],
  };
}

const noRegimes: RegimeAnalysis<Trade> = {
  byRegime: {},
  regimeStats: { STRONG_BULL: 0, BULL: 0, RANGE: 0, BEAR: 0, STRONG_BEAR: 0 },
};

describe("period performance", () => {
  const curve = [
    point("2024-01-30", 100),
    point("2024-01-31", 110),
    point("2024-02-01", 99),
    point("2024-04-01", 108.9),
  ];

  it("compounds returns per calendar month, quarter and year", () => {
    const performance = calculatePeriodPerformance(curve);

    expect(Object.keys(performance.monthlyReturns)).toEqual(["2024-01", "2024-02", "2024-04"]);
    expect(performance.monthlyReturns["2024-01"]).toBeCloseTo(0.1, 10);
    expect(performance.monthlyReturns["2024-02"]).toBeCloseTo(-0.1, 10);
    expect(performance.monthlyReturns["2024-04"]).toBeCloseTo(0.1, 10);
    expect(performance.quarterlyReturns["2024-Q1"]).toBeCloseTo(-0.01, 10);
    expect(performance.quarterlyReturns["2024-Q2"]).toBeCloseTo(0.1, 10);
    expect(performance.yearlyReturns["2024"]).toBeCloseTo(0.089, 10);
  });

  it("reports the best and worst periods", () => {
    const performance = calculatePeriodPerformance(curve);

    expect(performance.bestMonth).toBeCloseTo(0.1, 10);
    expect(performance.worstMonth).toBeCloseTo(-0.1, 10);
    expect(performance.worstQuarter).toBeCloseTo(-0.01, 10);
    expect(performance.bestYear).toBeCloseTo(0.089, 10);
  });

  it("is empty with zero extremes for an empty curve", () => {
    const performance = calculatePeriodPerformance([]);

    expect(performance.monthlyReturns).toEqual({});
    expect(performance.bestMonth).toBe(0);
    expect(performance.worstYear).toBe(0);
  });
});

describe("risk metrics", () => {
  const curve = [point("2024-01-01", 100), point("2024-01-02", 110), point("2024-01-03", 99)];

  it("derives volatility and drawdown from daily returns", () => {
    const risk = calculateRiskMetrics(curve, 0);

    expect(risk.volatility).toBeCloseTo(0.1 * Math.sqrt(252), 10);
    expect(risk.maxDrawdown).toBeCloseTo(0.1, 10);
    expect(risk.maxDrawdownDuration).toBe(1);
    expect(risk.downsideRisk).toBe(0);
    expect(risk.sortinoRatio).toBe(0);
    expect(risk.sharpeRatio).toBeCloseTo(0, 10);
  });

  it("subtracts the daily share of the risk-free rate in Sharpe", () => {
    const risk = calculateRiskMetrics(curve, 0.03);
    expect(risk.sharpeRatio).toBeCloseTo((Math.sqrt(252) * (-0.03 / 252)) / 0.1, 8);
  });

  it("is zero everywhere for a flat curve", () => {
    const risk = calculateRiskMetrics([point("2024-01-01", 100), point("2024-01-02", 100)], 0.03);

    expect(risk).toEqual({
      volatility: 0,
      maxDrawdown: 0,
      maxDrawdownDuration: 0,
      downsideRisk: 0,
      sharpeRatio: 0,
      sortinoRatio: 0,
    });
  });
});

describe("rating", () => {
  it("maps scores to letter grades at each floor", () => {
    expect(scoreToGrade(95)).toBe("A+");
    expect(scoreToGrade(90)).toBe("A+");
    expect(scoreToGrade(89.99)).toBe("A");
    expect(scoreToGrade(70)).toBe("B+");
    expect(scoreToGrade(65)).toBe("B");
    expect(scoreToGrade(50)).toBe("C+");
    expect(scoreToGrade(40)).toBe("C");
    expect(scoreToGrade(39.9)).toBe("D");
  });

  const input: RatingInput = {
    annualReturn: 0.5,
    maxDrawdown: 0.2,
    winRate: 2 / 3,
    totalTrades: 3,
    elapsedDays: 365,
    regimeAnalysis: {
      byRegime: { BULL: stats("BULL", 2, 1), STRONG_BEAR: stats("STRONG_BEAR", 1, 1) },
      regimeStats: { STRONG_BULL: 0, BULL: 10, RANGE: 0, BEAR: 0, STRONG_BEAR: 5 },
    },
  };

  it("includes bull/bear consistency only when both sides traded", () => {
    const factors = stabilityFactors(input);
    expect(factors).toHaveLength(3);
    expect(factors[0]).toBeCloseTo(0.5, 10);
    expect(factors[1]).toBeCloseTo(0.012, 10);
    expect(factors[2]).toBeCloseTo(2 / 3, 10);

    expect(stabilityFactors({ ...input, regimeAnalysis: noRegimes })).toHaveLength(2);
  });

  it("falls back to the raw trade count when no time elapsed", () => {
    const factors = stabilityFactors({ ...input, elapsedDays: 0, regimeAnalysis: noRegimes });
    expect(factors[0]).toBeCloseTo(3 / 250, 10);
  });

  it("blends 40/30/30 into the total score", () => {
    const rating = calculateRating(input);

    expect(rating.performanceScore).toBeCloseTo(5, 10);
    expect(rating.riskScore).toBeCloseTo(8, 10);
    expect(rating.stabilityScore).toBeCloseTo((10 * (0.5 + 0.012 + 2 / 3)) / 3, 10);
    expect(rating.totalScore).toBeCloseTo(
      10 * (0.4 * 5 + 0.3 * 8 + 0.3 * rating.stabilityScore),
      10,
    );
    expect(rating.grade).toBe("C+");
  });

  it("caps the performance score at 10", () => {
    expect(calculateRating({ ...input, annualReturn: 3 }).performanceScore).toBe(10);
  });

  it("scores a losing strategy below a break-even one", () => {
    const losing = calculateRating({ ...input, annualReturn: -0.5 });
    const breakEven = calculateRating({ ...input, annualReturn: 0 });

    expect(losing.performanceScore).toBeCloseTo(-5, 10);
    expect(breakEven.performanceScore).toBe(0);
    expect(breakEven.totalScore - losing.totalScore).toBeCloseTo(20, 10);
  });

  it("grades a strategy without trades D with zero scores", () => {
    expect(calculateRating({ ...input, totalTrades: 0 })).toEqual({
      performanceScore: 0,
      riskScore: 0,
      stabilityScore: 0,
      totalScore: 0,
      grade: "D",
    });
  });
});
