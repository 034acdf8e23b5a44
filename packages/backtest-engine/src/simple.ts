import type { Bar, Signal } from "@strategy-lab/trading-core";
import type { BacktestConfig, CostConfig } from "./config";
import {
  closeAtEndOfData,
  closePosition,
  createSimulationState,
  openPosition,
  recordEquity,
} from "./position";
import { sharesForAllocation } from "./sizing";
import type { Simulator } from "./types";

const NO_COSTS: CostConfig = { slippagePct: 0, commissionPct: 0 };

/**
 * Frictionless replay for quick comparisons: positions follow the signal
 * only, sized in whole lots from the initial capital at the bar's open. No
 * stops, no pyramiding, no costs.
 *
 * Every entry is sized from the full initial capital, whatever earlier trades
 * did to cash, so after a loss cash can go negative and the curve shows
 * leverage the full simulator never takes.
 */
export function createSimpleSimulator(config: BacktestConfig): Simulator {
  const { initialCapital } = config;
  const { sharesPerLot } = config.sizing;

  return {
    mode: "simple",

    run(bars: Bar[], signals: readonly Signal[]) {
      const state = createSimulationState(initialCapital);

      for (let index = 0; index < bars.length; index += 1) {
        const bar = bars[index];
        const signal = signals[index];
        if (!bar || signal === undefined) continue;

        if (signal !== (signals[index - 1] ?? 0)) {
          if (state.position) {
            closePosition(
              state,
              { date: bar.timeKey, index, price: bar.open, closeType: "signal" },
              NO_COSTS,
            );
          }

          // initial capital, not current cash
          const size = sharesForAllocation(initialCapital, bar.open, sharesPerLot);
          if (signal !== 0 && size > 0) {
            openPosition(
              state,
              {
                date: bar.timeKey,
                index,
                direction: signal,
                price: bar.open,
                size,
                baseAllocation: initialCapital,
              },
              NO_COSTS,
            );
          }
        }

        recordEquity(state, bar);
      }

      closeAtEndOfData(state, bars, NO_COSTS);

      return {
        equityCurve: state.equityCurve,
        trades: state.trades,
        ledger: state.ledger,
      };
    },
  };
}
