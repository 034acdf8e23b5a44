import type { Trade } from "@strategy-lab/backtest-engine";
import { clamp, mean, safeDivide } from "@strategy-lab/trading-core";
import type { MarketRegime, RegimeAnalysis } from "@strategy-lab/market-regime";
import type { LetterGrade, StrategyRating } from "./types";

const WEIGHTS = { performance: 0.4, risk: 0.3, stability: 0.3 } as const;
/** Trades per year at which trade frequency stops adding to stability. */
const ADEQUATE_TRADES_PER_YEAR = 250;

const GRADE_FLOORS: ReadonlyArray<readonly [number, LetterGrade]> = [
  [90, "A+"],
  [80, "A"],
  [70, "B+"],
  [60, "B"],
  [50, "C+"],
  [40, "C"],
];

export function scoreToGrade(score: number): LetterGrade {
  for (const [floor, grade] of GRADE_FLOORS) {
    if (score >= floor) return grade;
  }
  return "D";
}

export interface RatingInput {
  annualReturn: number;
  maxDrawdown: number;
  winRate: number;
  totalTrades: number;
  elapsedDays: number;
  regimeAnalysis: RegimeAnalysis<Trade>;
}

function sideWinRate(
  analysis: RegimeAnalysis<Trade>,
  regimes: readonly MarketRegime[],
): { trades: number; winRate: number } {
  let trades = 0;
  let wins = 0;
  for (const regime of regimes) {
    const stats = analysis.byRegime[regime];
    if (!stats) continue;
    trades += stats.tradeCount;
    wins += stats.winCount;
  }
  return { trades, winRate: safeDivide(wins, trades) };
}

/**
 * Stability factors: bull/bear win-rate consistency (only when both sides
 * traded), trade frequency relative to {@link ADEQUATE_TRADES_PER_YEAR}, and
 * the raw win rate.
 */
export function stabilityFactors(input: RatingInput): number[] {
  const factors: number[] = [];

  const bull = sideWinRate(input.regimeAnalysis, ["STRONG_BULL", "BULL"]);
  const bear = sideWinRate(input.regimeAnalysis, ["STRONG_BEAR", "BEAR"]);
  if (bull.trades > 0 && bear.trades > 0) {
    factors.push(
      safeDivide(
        Math.min(bull.winRate, bear.winRate),
        Math.max(bull.winRate, bear.winRate),
      ),
    );
  }

  const tradesPerYear =
    input.elapsedDays > 0
      ? input.totalTrades / (input.elapsedDays / 365)
      : input.totalTrades;
  factors.push(Math.min(1, tradesPerYear / ADEQUATE_TRADES_PER_YEAR));

  factors.push(input.winRate);
  return factors;
}

/**
 * Component scores up to 10, blended 40/30/30 into a total of at most 100.
 * Performance is not floored, so a losing strategy ranks below a flat one.
 * A strategy that never traded scores 0 everywhere.
 */
export function calculateRating(input: RatingInput): StrategyRating {
  if (input.totalTrades === 0) {
    return {
      performanceScore: 0,
      riskScore: 0,
      stabilityScore: 0,
      totalScore: 0,
      grade: "D",
    };
  }

  const performanceScore = Math.min(10, 10 * input.annualReturn);
  const riskScore = 10 * (1 - clamp(input.maxDrawdown, 0, 1));
  const stabilityScore = 10 * mean(stabilityFactors(input));
  const totalScore =
    10 *
    (WEIGHTS.performance * performanceScore +
      WEIGHTS.risk * riskScore +
      WEIGHTS.stability * stabilityScore);

  return {
    performanceScore,
    riskScore,
    stabilityScore,
    totalScore,
    grade: scoreToGrade(totalScore),
  };
}
