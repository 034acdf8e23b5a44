import {
  assertChronological,
  assertSignalSeries,
  consoleLogger,
  type Bar,
  type DeepPartial,
  type Logger,
  type SignalProvider,
} from "@strategy-lab/trading-core";
import {
  backtestConfigSchema,
  createBacktestConfig,
  type BacktestConfig,
  type BacktestMode,
} from "./config";
import { createFullSimulator } from "./backtest";
import { computePerformanceMetrics } from "./metrics";
import { createSimpleSimulator } from "./simple";
import type { BacktestResult, Simulator } from "./types";

export type BacktestEngineOptions = {
  logger?: Logger;
};

const simulators: Record<BacktestMode, (config: BacktestConfig) => Simulator> = {
  full: createFullSimulator,
  simple: createSimpleSimulator,
};

/**
 * Replays a signal series against bars. The configuration is fixed for the
 * engine's lifetime; every run owns fresh state, so one engine can serve any
 * number of sequential runs.
 */
export class BacktestEngine {
  readonly config: BacktestConfig;
  private readonly simulator: Simulator;
  private readonly logger: Logger;

  constructor(config: BacktestConfig, options: BacktestEngineOptions = {}) {
    this.config = Object.freeze(backtestConfigSchema.parse(config));
    this.simulator = simulators[this.config.mode](this.config);
    this.logger = options.logger ?? consoleLogger;
  }

  get mode(): BacktestMode {
    return this.simulator.mode;
  }

  run(strategy: SignalProvider, bars: Bar[]): BacktestResult {
    return this.runSignals(bars, strategy.calculate(bars));
  }

  runSignals(bars: Bar[], signals: readonly number[]): BacktestResult {
    assertChronological(bars);
    assertSignalSeries(bars, signals);

    const { equityCurve, trades, ledger } = this.simulator.run(bars, signals);
    const metrics = computePerformanceMetrics(
      trades,
      equityCurve,
      this.config.initialCapital,
    );
    const finalValue =
      equityCurve[equityCurve.length - 1]?.totalValue ?? this.config.initialCapital;

    this.logger.info("Backtest completed", {
      mode: this.mode,
      bars: bars.length,
      trades: trades.length,
      finalValue,
    });

    return {
      mode: this.mode,
      equityCurve,
      trades,
      posData: [...signals],
      metrics,
      costs: {
        totalCommission: ledger.totalCommission,
        totalSlippage: ledger.totalSlippage,
        costAnalysis: ledger.analyze(),
        transactions: [...ledger.transactions()],
      },
    };
  }
}

export function createBacktestEngine(
  overrides?: DeepPartial<BacktestConfig>,
  options: BacktestEngineOptions = {},
): BacktestEngine {
  return new BacktestEngine(createBacktestConfig(overrides), options);
}
