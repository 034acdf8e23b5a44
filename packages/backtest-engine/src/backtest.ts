import type { Bar, Direction, Signal } from "@strategy-lab/trading-core";
import type { BacktestConfig } from "./config";
import { applySlippage } from "./costs";
import { computeAtr } from "./indicators";
import {
  addLeg,
  closeAtEndOfData,
  closePosition,
  createSimulationState,
  openPosition,
  recordEquity,
  type SimulationState,
} from "./position";
import { createSizingPolicy, sharesForAllocation, type SizingPolicy } from "./sizing";
import { advanceWatermark, createStopPolicy, stopTouched } from "./stops";
import type { Simulator } from "./types";

/** Favourable move of at least one ATR from the first fill. */
function pyramidTriggered(direction: Direction, close: number, entryFill: number, atr: number): boolean {
  return direction === 1 ? close >= entryFill + atr : close <= entryFill - atr;
}

/**
 * Full-fidelity replay: slippage and commission on every leg, policy sizing,
 * stop-loss and time-stop protection, and pyramiding.
 *
 * Each bar is processed in a fixed order and at most one of the steps below
 * changes the position, except that a signal flip closes and reopens on the
 * same bar:
 *
 * 1. time stop, at the open
 * 2. signal change: close, then open the new direction if non-zero
 * 3. pyramid add on an unchanged signal, at the close
 * 4. stop-loss, only when nothing above acted
 */
export function createFullSimulator(config: BacktestConfig): Simulator {
  const sizing: SizingPolicy = createSizingPolicy(config.sizing);
  const stopPolicy = createStopPolicy(config.stops);
  const { costs } = config;
  const { timeStopBars } = config.stops;

  const affordable = (state: SimulationState, direction: Direction, allocation: number) =>
    direction === 1 ? Math.min(allocation, state.cash) : allocation;

  return {
    mode: "full",

    run(bars: Bar[], signals: readonly Signal[]) {
      const state = createSimulationState(config.initialCapital);
      const atrSeries = computeAtr(bars, config.atrPeriod);

      for (let index = 0; index < bars.length; index += 1) {
        const bar = bars[index];
        const signal = signals[index];
        if (!bar || signal === undefined) continue;

        const previousSignal = signals[index - 1] ?? 0;
        const atr = atrSeries[index] ?? 0;
        let acted = false;

        if (
          state.position &&
          timeStopBars !== null &&
          index - state.position.entryIndex >= timeStopBars
        ) {
          closePosition(
            state,
            { date: bar.timeKey, index, price: bar.open, closeType: "time_stop" },
            costs,
          );
          acted = true;
        }

        if (signal !== previousSignal) {
          if (state.position) {
            closePosition(
              state,
              { date: bar.timeKey, index, price: bar.open, closeType: "signal" },
              costs,
            );
            acted = true;
          }

          if (!state.position && signal !== 0) {
            const allocation = affordable(
              state,
              signal,
              sizing.allocate({
                capital: state.cash,
                initialCapital: config.initialCapital,
                price: bar.open,
                atr,
              }),
            );
            const fillPrice = applySlippage(bar.open, signal, costs.slippagePct);
            const size = sharesForAllocation(allocation, fillPrice, config.sizing.sharesPerLot);

            if (size > 0) {
              openPosition(
                state,
                {
                  date: bar.timeKey,
                  index,
                  direction: signal,
                  price: bar.open,
                  size,
                  baseAllocation: allocation,
                },
                costs,
              );
              acted = true;
            }
          }
        } else if (
          sizing.pyramidAllocation &&
          state.position &&
          state.position.direction === signal &&
          state.position.pyramidLevel < config.sizing.maxPyramidLevels &&
          atr > 0
        ) {
          const position = state.position;
          const firstLeg = position.legs[0];

          if (firstLeg && pyramidTriggered(position.direction, bar.close, firstLeg.fillPrice, atr)) {
            const allocation = affordable(
              state,
              position.direction,
              sizing.pyramidAllocation(position.baseAllocation, position.pyramidLevel),
            );
            const fillPrice = applySlippage(bar.close, position.direction, costs.slippagePct);
            const size = sharesForAllocation(allocation, fillPrice, config.sizing.sharesPerLot);

            if (size > 0) {
              addLeg(state, { date: bar.timeKey, price: bar.close, size }, costs);
              acted = true;
            }
          }
        }

        const position = state.position;
        if (!acted && position) {
          const stopPrice = stopPolicy.stopPrice({
            direction: position.direction,
            entryPrice: position.entryPrice,
            watermark: position.watermark,
            atr,
          });
          position.stopLossPrice = stopPrice;

          if (stopPrice !== null && stopTouched(position.direction, bar, stopPrice)) {
            closePosition(
              state,
              { date: bar.timeKey, index, price: stopPrice, closeType: "stop_loss" },
              costs,
            );
          }
        }

        if (state.position) {
          state.position.watermark = advanceWatermark(
            state.position.direction,
            state.position.watermark,
            bar,
          );
        }

        recordEquity(state, bar);
      }

      closeAtEndOfData(state, bars, costs);

      return {
        equityCurve: state.equityCurve,
        trades: state.trades,
        ledger: state.ledger,
      };
    },
  };
}
