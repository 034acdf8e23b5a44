import type { Bar, Direction, TimeKey } from "@strategy-lab/trading-core";
import type { CostConfig } from "./config";
import {
  applySlippage,
  commissionFor,
  createCostLedger,
  slippageCost,
} from "./costs";
import type {
  CloseType,
  CostLedger,
  EquityPoint,
  Position,
  PositionLeg,
  Trade,
} from "./types";

/**
 * Everything a single run mutates. One instance per run, never shared.
 */
export interface SimulationState {
  cash: number;
  position: Position | null;
  equityCurve: EquityPoint[];
  trades: Trade[];
  ledger: CostLedger;
}

export function createSimulationState(initialCapital: number): SimulationState {
  return {
    cash: initialCapital,
    position: null,
    equityCurve: [],
    trades: [],
    ledger: createCostLedger(),
  };
}

interface Fill {
  date: TimeKey;
  /** Quoted price before slippage. */
  price: number;
  size: number;
}

function executeLeg(fill: Fill, orderSign: 1 | -1, costs: CostConfig): PositionLeg {
  const fillPrice = applySlippage(fill.price, orderSign, costs.slippagePct);
  return {
    date: fill.date,
    price: fill.price,
    fillPrice,
    size: fill.size,
    commission: commissionFor(fillPrice, fill.size, costs.commissionPct),
    slippage: slippageCost(fill.price, fillPrice, fill.size),
  };
}

/**
 * Longs pay for the shares up front. Shorts are margin-style: only the
 * commission leaves cash on entry and the P&L settles on exit.
 */
function debitEntry(state: SimulationState, direction: Direction, leg: PositionLeg) {
  const notional = direction === 1 ? leg.fillPrice * leg.size : 0;
  state.cash -= notional + leg.commission;
}

export function openPosition(
  state: SimulationState,
  entry: Fill & { index: number; direction: Direction; baseAllocation: number },
  costs: CostConfig,
): Position {
  if (state.position) {
    throw new Error(`Cannot open a position at ${String(entry.date)}: one is already open`);
  }

  const leg = executeLeg(entry, entry.direction, costs);
  debitEntry(state, entry.direction, leg);

  const position: Position = {
    entryDate: entry.date,
    entryIndex: entry.index,
    entryPrice: leg.fillPrice,
    direction: entry.direction,
    size: leg.size,
    baseAllocation: entry.baseAllocation,
    stopLossPrice: null,
    commissionPaid: leg.commission,
    slippagePaid: leg.slippage,
    pyramidLevel: 1,
    legs: [leg],
    watermark: entry.price,
  };

  state.position = position;
  state.ledger.record({
    date: leg.date,
    type: "open",
    price: leg.fillPrice,
    size: leg.size,
    commission: leg.commission,
    slippage: leg.slippage,
  });

  return position;
}

/** Adds a pyramid leg; the entry price becomes the size-weighted average fill. */
export function addLeg(state: SimulationState, add: Fill, costs: CostConfig): Position {
  const position = state.position;
  if (!position) {
    throw new Error(`Cannot add to a position at ${String(add.date)}: none is open`);
  }

  const leg = executeLeg(add, position.direction, costs);
  debitEntry(state, position.direction, leg);

  const size = position.size + leg.size;
  position.entryPrice =
    (position.entryPrice * position.size + leg.fillPrice * leg.size) / size;
  position.size = size;
  position.commissionPaid += leg.commission;
  position.slippagePaid += leg.slippage;
  position.pyramidLevel += 1;
  position.legs.push(leg);

  state.ledger.record({
    date: leg.date,
    type: "pyramid",
    price: leg.fillPrice,
    size: leg.size,
    commission: leg.commission,
    slippage: leg.slippage,
  });

  return position;
}

export function closePosition(
  state: SimulationState,
  exit: { date: TimeKey; index: number; price: number; closeType: CloseType },
  costs: CostConfig,
): Trade {
  const position = state.position;
  if (!position) {
    throw new Error(`Cannot close a position at ${String(exit.date)}: none is open`);
  }

  const { direction, size, entryPrice } = position;
  const leg = executeLeg(
    { date: exit.date, price: exit.price, size },
    direction === 1 ? -1 : 1,
    costs,
  );

  state.cash +=
    direction === 1
      ? leg.fillPrice * size - leg.commission
      : (entryPrice - leg.fillPrice) * size - leg.commission;

  // Fills already carry the slippage, so only commissions are subtracted here.
  const commission = position.commissionPaid + leg.commission;
  const profit = direction * (leg.fillPrice - entryPrice) * size - commission;

  const trade: Trade = {
    entryDate: position.entryDate,
    entryPrice,
    exitDate: exit.date,
    exitPrice: leg.fillPrice,
    direction,
    size,
    profit,
    profitPct: entryPrice * size === 0 ? 0 : profit / (entryPrice * size),
    commission,
    slippage: position.slippagePaid + leg.slippage,
    closeType: exit.closeType,
    pyramidLevel: position.pyramidLevel,
    barsHeld: exit.index - position.entryIndex,
  };

  state.position = null;
  state.trades.push(trade);
  state.ledger.record({
    date: leg.date,
    type: "close",
    price: leg.fillPrice,
    size,
    commission: leg.commission,
    slippage: leg.slippage,
  });

  return trade;
}

/** Marks the state to the bar's close. Shorts carry no holding value. */
export function markToMarket(state: SimulationState, bar: Bar): EquityPoint {
  const position = state.position;
  const holdings = position ? position.size * position.direction : 0;
  const holdingValue = position?.direction === 1 ? bar.close * position.size : 0;

  return {
    date: bar.timeKey,
    capital: state.cash,
    holdings,
    holdingValue,
    totalValue: state.cash + holdingValue,
    pyramidLevel: position?.pyramidLevel ?? 0,
  };
}

export function recordEquity(state: SimulationState, bar: Bar): void {
  state.equityCurve.push(markToMarket(state, bar));
}

/**
 * Closes whatever is still open at the final close and rewrites the last
 * equity point so the curve ends flat.
 */
export function closeAtEndOfData(
  state: SimulationState,
  bars: Bar[],
  costs: CostConfig,
): void {
  const lastIndex = bars.length - 1;
  const lastBar = bars[lastIndex];
  if (!state.position || !lastBar) return;

  closePosition(
    state,
    {
      date: lastBar.timeKey,
      index: lastIndex,
      price: lastBar.close,
      closeType: "end_of_data",
    },
    costs,
  );

  if (state.equityCurve.length > 0) {
    state.equityCurve[state.equityCurve.length - 1] = markToMarket(state, lastBar);
  }
}
