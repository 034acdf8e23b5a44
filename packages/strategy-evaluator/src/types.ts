import type { BacktestResult, Trade } from "@strategy-lab/backtest-engine";
import type { RegimeAnalysis } from "@strategy-lab/market-regime";

export type LetterGrade = "A+" | "A" | "B+" | "B" | "C+" | "C" | "D";

export interface PeriodPerformance {
  /** Keyed `YYYY-MM` (UTC). */
  monthlyReturns: Record<string, number>;
  /** Keyed `YYYY-Qn` (UTC). */
  quarterlyReturns: Record<string, number>;
  /** Keyed `YYYY` (UTC). */
  yearlyReturns: Record<string, number>;
  bestMonth: number;
  worstMonth: number;
  bestQuarter: number;
  worstQuarter: number;
  bestYear: number;
  worstYear: number;
}

export interface RiskMetrics {
  volatility: number;
  maxDrawdown: number;
  maxDrawdownDuration: number;
  downsideRisk: number;
  sharpeRatio: number;
  sortinoRatio: number;
}

export interface StrategyRating {
  /** At most 10; negative when the annual return is. */
  performanceScore: number;
  /** 0 to 10. */
  riskScore: number;
  /** 0 to 10. */
  stabilityScore: number;
  /** At most 100. */
  totalScore: number;
  grade: LetterGrade;
}

export interface StrategyEvaluation {
  strategyName: string;
  backtestResult: BacktestResult;
  regimeAnalysis: RegimeAnalysis<Trade>;
  periodPerformance: PeriodPerformance;
  riskMetrics: RiskMetrics;
  rating: StrategyRating;
}

export interface RankingEntry {
  key: string;
  strategyName: string;
  totalScore: number;
  grade: LetterGrade;
}

export interface EvaluationReport {
  evaluations: Record<string, StrategyEvaluation>;
  /** Highest total score first; ties keep input order. */
  ranking: RankingEntry[];
}
