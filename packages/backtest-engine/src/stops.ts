import type { Bar, Direction } from "@strategy-lab/trading-core";
import type { StopConfig, StopLossPolicyName } from "./config";

export interface StopContext {
  direction: Direction;
  entryPrice: number;
  /** Most favourable price since entry, up to the previous bar. */
  watermark: number;
  /** Current ATR, 0 while its lookback is unsatisfied. */
  atr: number;
}

/**
 * Stop-loss policy. `null` means the policy has nothing to protect with
 * (disabled by config, or no ATR yet).
 */
export interface StopPolicy {
  readonly name: StopLossPolicyName;
  stopPrice(context: StopContext): number | null;
}

function fixedStop(config: StopConfig, context: StopContext): number | null {
  if (config.stopLossPct === null) return null;
  return context.entryPrice * (1 - config.stopLossPct * context.direction);
}

function trailingStop(config: StopConfig, context: StopContext): number | null {
  if (config.trailingStopPct === null) return fixedStop(config, context);
  return context.direction === 1
    ? context.watermark * (1 - config.trailingStopPct)
    : context.watermark * (1 + config.trailingStopPct);
}

function atrStop(config: StopConfig, context: StopContext): number | null {
  if (config.atrMultiple === null || context.atr <= 0) return null;
  return context.entryPrice - context.atr * config.atrMultiple * context.direction;
}

type StopPolicyFactory = (config: StopConfig) => StopPolicy;

const stopPolicies: Record<StopLossPolicyName, StopPolicyFactory> = {
  FIXED: (config) => ({
    name: "FIXED",
    stopPrice: (context) => fixedStop(config, context),
  }),

  TRAILING: (config) => ({
    name: "TRAILING",
    stopPrice: (context) => trailingStop(config, context),
  }),

  ATR: (config) => ({
    name: "ATR",
    stopPrice: (context) => atrStop(config, context),
  }),

  // Any single protection firing stops the trade: longs take the highest
  // candidate, shorts the lowest.
  COMPOSITE: (config) => ({
    name: "COMPOSITE",
    stopPrice: (context) => {
      const candidates = [
        fixedStop(config, context),
        trailingStop(config, context),
        atrStop(config, context),
      ].filter((price): price is number => price !== null);

      if (candidates.length === 0) return null;
      return context.direction === 1
        ? Math.max(...candidates)
        : Math.min(...candidates);
    },
  }),
};

export function createStopPolicy(config: StopConfig): StopPolicy {
  const factory = stopPolicies[config.policy];
  if (!factory) {
    throw new Error(`Unknown stop-loss policy: ${String(config.policy)}`);
  }
  return factory(config);
}

export function stopTouched(direction: Direction, bar: Bar, stopPrice: number): boolean {
  return direction === 1 ? bar.low <= stopPrice : bar.high >= stopPrice;
}

export function advanceWatermark(direction: Direction, watermark: number, bar: Bar): number {
  return direction === 1
    ? Math.max(watermark, bar.high)
    : Math.min(watermark, bar.low);
}
