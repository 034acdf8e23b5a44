import type {
  Bar,
  Direction,
  Signal,
  TimeKey,
} from "@strategy-lab/trading-core";
import type { BacktestMode } from "./config";

export type { Bar, Direction, Signal, TimeKey } from "@strategy-lab/trading-core";

export type CloseType = "signal" | "stop_loss" | "time_stop" | "end_of_data";

export interface PositionLeg {
  date: TimeKey;
  /** Quoted price before slippage. */
  price: number;
  /** Executed price after slippage. */
  fillPrice: number;
  size: number;
  commission: number;
  slippage: number;
}

/**
 * Open position owned by a single simulation run. Mutated in place while the
 * run lasts and discarded once closed into a {@link Trade}.
 */
export interface Position {
  entryDate: TimeKey;
  entryIndex: number;
  /** Size-weighted average fill price across legs. */
  entryPrice: number;
  direction: Direction;
  size: number;
  /** Capital committed to the first leg; pyramid adds scale from it. */
  baseAllocation: number;
  stopLossPrice: number | null;
  commissionPaid: number;
  slippagePaid: number;
  pyramidLevel: number;
  legs: PositionLeg[];
  /** Most favourable price seen since entry (high for longs, low for shorts). */
  watermark: number;
}

export interface Trade {
  readonly entryDate: TimeKey;
  readonly entryPrice: number;
  readonly exitDate: TimeKey;
  readonly exitPrice: number;
  readonly direction: Direction;
  readonly size: number;
  /** Net of both legs' commission and slippage. */
  readonly profit: number;
  readonly profitPct: number;
  /** Entry plus exit commission. */
  readonly commission: number;
  /** Entry plus exit slippage cost. */
  readonly slippage: number;
  readonly closeType: CloseType;
  readonly pyramidLevel: number;
  readonly barsHeld: number;
}

export interface EquityPoint {
  date: TimeKey;
  capital: number;
  /** Signed position size: positive long, negative short. */
  holdings: number;
  holdingValue: number;
  totalValue: number;
  pyramidLevel: number;
}

export type TransactionType = "open" | "pyramid" | "close";

export interface CostTransaction {
  readonly date: TimeKey;
  readonly type: TransactionType;
  readonly price: number;
  readonly size: number;
  readonly commission: number;
  readonly slippage: number;
}

export interface CostTotals {
  commission: number;
  slippage: number;
  count: number;
}

export interface CostAnalysis {
  costSummary: {
    totalCommission: number;
    totalSlippage: number;
    totalCost: number;
    avgCommissionPerTransaction: number;
    avgSlippagePerTransaction: number;
  };
  costByType: Record<TransactionType, CostTotals>;
  costDistribution: {
    commissionPct: number;
    slippagePct: number;
  };
}

export interface BacktestCosts {
  totalCommission: number;
  totalSlippage: number;
  costAnalysis: CostAnalysis;
  transactions: CostTransaction[];
}

export interface PerformanceMetrics {
  summary: {
    totalTrades: number;
    winningTrades: number;
    losingTrades: number;
    winRate: number;
    /** Mean calendar days between entry and exit. */
    avgTradeDuration: number;
    profitLossRatio: number;
  };
  returns: {
    totalProfit: number;
    profitPct: number;
    grossProfit: number;
    grossLoss: number;
    profitFactor: number;
    annualReturn: number;
  };
  risk: {
    maxDrawdown: number;
    avgDrawdown: number;
    maxDrawdownDuration: number;
    volatility: number;
    sharpeRatio: number;
    sortinoRatio: number;
  };
  efficiency: {
    profitPerTrade: number;
    avgWin: number;
    avgLoss: number;
    largestWin: number;
    largestLoss: number;
  };
}

export interface BacktestResult {
  mode: BacktestMode;
  equityCurve: EquityPoint[];
  trades: Trade[];
  /** Echo of the strategy's signal series. */
  posData: Signal[];
  metrics: PerformanceMetrics;
  costs: BacktestCosts;
}

export interface CostLedger {
  record(transaction: CostTransaction): void;
  readonly totalCommission: number;
  readonly totalSlippage: number;
  transactions(): readonly CostTransaction[];
  analyze(): CostAnalysis;
}

export interface SimulationOutput {
  equityCurve: EquityPoint[];
  trades: Trade[];
  ledger: CostLedger;
}

/**
 * One fidelity level of the bar-by-bar replay. Implementations share the
 * input and output contract and differ only in how they fill, size and stop.
 */
export interface Simulator {
  readonly mode: BacktestMode;
  run(bars: Bar[], signals: readonly Signal[]): SimulationOutput;
}
