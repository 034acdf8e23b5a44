import { describe, expect, it } from "vitest";
import { applySlippage, commissionFor, createCostLedger, slippageCost } from "../src/index";

describe("cost model", () => {
  it("moves fills against the order", () => {
    expect(applySlippage(100, 1, 0.001)).toBeCloseTo(100.1, 10);
    expect(applySlippage(100, -1, 0.001)).toBeCloseTo(99.9, 10);
    expect(applySlippage(100, 1, 0)).toBe(100);
  });

  it("charges commission on the filled notional", () => {
    expect(commissionFor(100.1, 10, 0.0003)).toBeCloseTo(0.3003, 10);
    expect(slippageCost(100, 100.1, 10)).toBeCloseTo(1, 10);
  });
});

describe("cost ledger", () => {
  it("reports zeros before any transaction", () => {
    const analysis = createCostLedger().analyze();

    expect(analysis.costSummary).toEqual({
      totalCommission: 0,
      totalSlippage: 0,
      totalCost: 0,
      avgCommissionPerTransaction: 0,
      avgSlippagePerTransaction: 0,
    });
    expect(analysis.costByType.pyramid).toEqual({ commission: 0, slippage: 0, count: 0 });
    expect(analysis.costDistribution).toEqual({ commissionPct: 0, slippagePct: 0 });
  });

  it("aggregates by transaction type", () => {
    const ledger = createCostLedger();
    ledger.record({ date: 1, type: "open", price: 100, size: 10, commission: 3, slippage: 1 });
    ledger.record({ date: 2, type: "close", price: 110, size: 10, commission: 1, slippage: 3 });

    expect(ledger.totalCommission).toBe(4);
    expect(ledger.totalSlippage).toBe(4);
    expect(ledger.transactions()).toHaveLength(2);

    const analysis = ledger.analyze();
    expect(analysis.costSummary.totalCost).toBe(8);
    expect(analysis.costSummary.avgCommissionPerTransaction).toBe(2);
    expect(analysis.costByType.open).toEqual({ commission: 3, slippage: 1, count: 1 });
    expect(analysis.costByType.close).toEqual({ commission: 1, slippage: 3, count: 1 });
    expect(analysis.costDistribution).toEqual({ commissionPct: 0.5, slippagePct: 0.5 });
  });

  it("keeps each run's ledger separate", () => {
    const first = createCostLedger();
    const second = createCostLedger();
    first.record({ date: 1, type: "open", price: 100, size: 1, commission: 1, slippage: 1 });

    expect(second.totalCommission).toBe(0);
    expect(second.transactions()).toHaveLength(0);
  });
});
