import { clamp } from "@strategy-lab/trading-core";
import type { PositionSizingPolicyName, SizingConfig } from "./config";

export interface SizingContext {
  /** Cash available at decision time. */
  capital: number;
  initialCapital: number;
  price: number;
  /** Current ATR, 0 while its lookback is unsatisfied. */
  atr: number;
}

/**
 * Position-sizing policy. Policies return the capital to commit; turning that
 * into a whole-lot share count is done by {@link sharesForAllocation}.
 */
export interface SizingPolicy {
  readonly name: PositionSizingPolicyName;
  allocate(context: SizingContext): number;
  /**
   * Capital for the pyramid add made at `level` (the number of legs already
   * open). Only PYRAMID implements it.
   */
  pyramidAllocation?(baseAllocation: number, level: number): number;
}

type SizingPolicyFactory = (config: SizingConfig) => SizingPolicy;

const sizingPolicies: Record<PositionSizingPolicyName, SizingPolicyFactory> = {
  FIXED: (config) => ({
    name: "FIXED",
    allocate: ({ capital, initialCapital }) =>
      Math.min(capital, initialCapital * config.maxPositionPct),
  }),

  PERCENT_OF_EQUITY: (config) => ({
    name: "PERCENT_OF_EQUITY",
    allocate: ({ capital }) => capital * config.maxPositionPct,
  }),

  KELLY_APPROX: (config) => {
    const { winRate, payoffRatio } = config.kelly;
    const fraction = clamp(
      winRate - (1 - winRate) / payoffRatio,
      0,
      config.maxPositionPct,
    );
    return {
      name: "KELLY_APPROX",
      allocate: ({ capital }) => capital * fraction,
    };
  },

  VOLATILITY_ADJUSTED: (config) => ({
    name: "VOLATILITY_ADJUSTED",
    allocate: ({ capital, price, atr }) => {
      if (atr <= 0) return capital * config.maxPositionPct;
      const fraction = Math.min(
        config.maxPositionPct * (price / atr),
        config.maxPositionPct,
      );
      return capital * fraction;
    },
  }),

  PYRAMID: (config) => ({
    name: "PYRAMID",
    allocate: ({ capital }) => capital * config.maxPositionPct,
    pyramidAllocation: (baseAllocation, level) =>
      baseAllocation * config.pyramidFactor ** level,
  }),
};

export function createSizingPolicy(config: SizingConfig): SizingPolicy {
  const factory = sizingPolicies[config.policy];
  if (!factory) {
    throw new Error(`Unknown position sizing policy: ${String(config.policy)}`);
  }
  return factory(config);
}

/**
 * Whole-lot share count affordable with `allocation` at `price`. Zero means
 * "no trade".
 */
export function sharesForAllocation(
  allocation: number,
  price: number,
  sharesPerLot: number,
): number {
  if (!Number.isFinite(allocation) || allocation <= 0 || price <= 0) return 0;
  const lots = Math.floor(allocation / price / sharesPerLot);
  return Math.max(0, lots * sharesPerLot);
}
