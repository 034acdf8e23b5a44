import {
  BacktestEngine,
  createBacktestConfig,
  elapsedDays,
  type BacktestConfig,
} from "@strategy-lab/backtest-engine";
import {
  createRegimeClassifier,
  type RegimeClassifier,
  type RegimeConfig,
} from "@strategy-lab/market-regime";
import {
  consoleLogger,
  type Bar,
  type DeepPartial,
  type Logger,
  type SignalProvider,
} from "@strategy-lab/trading-core";
import { z } from "zod";
import { calculatePeriodPerformance } from "./periods";
import { calculateRating } from "./rating";
import { calculateRiskMetrics } from "./risk";
import type { EvaluationReport, RankingEntry, StrategyEvaluation } from "./types";

export const DEFAULT_RISK_FREE_RATE = 0.03;

const riskFreeRateSchema = z.number().min(0).max(1);

export type StrategyEvaluatorOptions = {
  engine?: DeepPartial<BacktestConfig>;
  regime?: DeepPartial<RegimeConfig>;
  /** Annual rate used by the Sharpe ratio. */
  riskFreeRate?: number;
  logger?: Logger;
};

/**
 * Runs strategies through the backtest engine, breaks their trades down by
 * market regime and scores the outcome.
 *
 * Configuration is validated once, up front. Every evaluation gets its own
 * engine, so nothing accumulated by one strategy's run leaks into another's.
 */
export class StrategyEvaluator {
  readonly engineConfig: BacktestConfig;
  readonly riskFreeRate: number;
  private readonly classifier: RegimeClassifier;
  private readonly logger: Logger;

  constructor(options: StrategyEvaluatorOptions = {}) {
    this.engineConfig = createBacktestConfig(options.engine);
    this.classifier = createRegimeClassifier(options.regime);
    this.riskFreeRate = riskFreeRateSchema.parse(
      options.riskFreeRate ?? DEFAULT_RISK_FREE_RATE,
    );
    this.logger = options.logger ?? consoleLogger;
  }

  evaluateStrategy(
    strategy: SignalProvider,
    bars: Bar[],
    name?: string,
  ): StrategyEvaluation {
    const strategyName = name ?? strategy.key;
    const engine = new BacktestEngine(this.engineConfig, { logger: this.logger });

    const backtestResult = engine.run(strategy, bars);
    const { equityCurve, trades, metrics } = backtestResult;

    const regimeAnalysis = this.classifier.analyzeTrades(trades, bars);
    const periodPerformance = calculatePeriodPerformance(equityCurve);
    const riskMetrics = calculateRiskMetrics(equityCurve, this.riskFreeRate);
    const rating = calculateRating({
      annualReturn: metrics.returns.annualReturn,
      maxDrawdown: riskMetrics.maxDrawdown,
      winRate: metrics.summary.winRate,
      totalTrades: metrics.summary.totalTrades,
      elapsedDays: elapsedDays(equityCurve),
      regimeAnalysis,
    });

    if (trades.length === 0) {
      this.logger.warn("Strategy produced no trades", { strategy: strategyName });
    }
    this.logger.info("Strategy evaluated", {
      strategy: strategyName,
      trades: trades.length,
      totalScore: rating.totalScore,
      grade: rating.grade,
    });

    return {
      strategyName,
      backtestResult,
      regimeAnalysis,
      periodPerformance,
      riskMetrics,
      rating,
    };
  }

  /**
   * Evaluates every strategy against the same bars, in order. A failing
   * strategy aborts the batch; later strategies are not started.
   */
  evaluateStrategies(
    strategies: readonly SignalProvider[],
    bars: Bar[],
  ): EvaluationReport {
    const seen = new Set<string>();
    for (const strategy of strategies) {
      if (seen.has(strategy.key)) {
        throw new Error(`Duplicate strategy key: ${strategy.key}`);
      }
      seen.add(strategy.key);
    }

    const evaluations: Record<string, StrategyEvaluation> = {};
    const ranking: RankingEntry[] = [];

    for (const strategy of strategies) {
      const evaluation = this.evaluateStrategy(strategy, bars, strategy.key);
      evaluations[strategy.key] = evaluation;
      ranking.push({
        key: strategy.key,
        strategyName: evaluation.strategyName,
        totalScore: evaluation.rating.totalScore,
        grade: evaluation.rating.grade,
      });
    }

    // stable: equal scores keep input order
    ranking.sort((left, right) => right.totalScore - left.totalScore);

    return { evaluations, ranking };
  }
}
