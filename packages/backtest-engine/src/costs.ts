import { safeDivide } from "@strategy-lab/trading-core";
import type {
  CostAnalysis,
  CostLedger,
  CostTotals,
  CostTransaction,
  TransactionType,
} from "./types";

/**
 * Fill price for an order of the given sign: buys (+1) pay up, sells (-1)
 * receive less.
 */
export function applySlippage(
  price: number,
  orderSign: 1 | -1,
  slippagePct: number,
): number {
  if (!Number.isFinite(slippagePct) || slippagePct <= 0) return price;
  return price * (1 + slippagePct * orderSign);
}

export function commissionFor(
  fillPrice: number,
  size: number,
  commissionPct: number,
): number {
  return Math.abs(fillPrice * size) * commissionPct;
}

export function slippageCost(quotedPrice: number, fillPrice: number, size: number): number {
  return Math.abs(fillPrice - quotedPrice) * size;
}

function emptyTotals(): CostTotals {
  return { commission: 0, slippage: 0, count: 0 };
}

/**
 * Running commission and slippage totals plus the per-transaction log for a
 * single run. Totals only ever grow and always equal the sum of the log.
 */
export function createCostLedger(): CostLedger {
  const entries: CostTransaction[] = [];
  let totalCommission = 0;
  let totalSlippage = 0;

  return {
    record(transaction) {
      entries.push(transaction);
      totalCommission += transaction.commission;
      totalSlippage += transaction.slippage;
    },

    get totalCommission() {
      return totalCommission;
    },

    get totalSlippage() {
      return totalSlippage;
    },

    transactions: () => entries,

    analyze(): CostAnalysis {
      const costByType: Record<TransactionType, CostTotals> = {
        open: emptyTotals(),
        pyramid: emptyTotals(),
        close: emptyTotals(),
      };

      for (const entry of entries) {
        const bucket = costByType[entry.type];
        bucket.commission += entry.commission;
        bucket.slippage += entry.slippage;
        bucket.count += 1;
      }

      const totalCost = totalCommission + totalSlippage;

      return {
        costSummary: {
          totalCommission,
          totalSlippage,
          totalCost,
          avgCommissionPerTransaction: safeDivide(totalCommission, entries.length),
          avgSlippagePerTransaction: safeDivide(totalSlippage, entries.length),
        },
        costByType,
        costDistribution: {
          commissionPct: safeDivide(totalCommission, totalCost),
          slippagePct: safeDivide(totalSlippage, totalCost),
        },
      };
    },
  };
}
