import { deepMerge, type DeepPartial } from "@strategy-lab/trading-core";
import { z } from "zod";

export const PositionSizingPolicySchema = z.enum([
  "FIXED",
  "PERCENT_OF_EQUITY",
  "KELLY_APPROX",
  "VOLATILITY_ADJUSTED",
  "PYRAMID",
]);
export type PositionSizingPolicyName = z.infer<typeof PositionSizingPolicySchema>;

export const StopLossPolicySchema = z.enum([
  "FIXED",
  "TRAILING",
  "ATR",
  "COMPOSITE",
]);
export type StopLossPolicyName = z.infer<typeof StopLossPolicySchema>;

export const BacktestModeSchema = z.enum(["full", "simple"]);
export type BacktestMode = z.infer<typeof BacktestModeSchema>;

export const sizingConfigSchema = z.object({
  policy: PositionSizingPolicySchema,
  maxPositionPct: z.number().gt(0).max(1),
  sharesPerLot: z.number().int().min(1),
  pyramidFactor: z.number().gt(0).max(1),
  maxPyramidLevels: z.number().int().min(1),
  /**
   * Illustrative constants for KELLY_APPROX. They are not fitted from trade
   * history; the policy is an approximation, not a Kelly estimator.
   */
  kelly: z.object({
    winRate: z.number().min(0).max(1),
    payoffRatio: z.number().positive(),
  }),
});
export type SizingConfig = z.infer<typeof sizingConfigSchema>;

export const stopConfigSchema = z.object({
  policy: StopLossPolicySchema,
  stopLossPct: z.number().gt(0).lt(1).nullable(),
  trailingStopPct: z.number().gt(0).lt(1).nullable(),
  atrMultiple: z.number().positive().nullable(),
  timeStopBars: z.number().int().min(1).nullable(),
});
export type StopConfig = z.infer<typeof stopConfigSchema>;

export const costConfigSchema = z.object({
  slippagePct: z.number().min(0).max(0.1),
  commissionPct: z.number().min(0).max(0.1),
});
export type CostConfig = z.infer<typeof costConfigSchema>;

export const backtestConfigSchema = z.object({
  initialCapital: z.number().positive(),
  mode: BacktestModeSchema,
  atrPeriod: z.number().int().min(1),
  sizing: sizingConfigSchema,
  stops: stopConfigSchema,
  costs: costConfigSchema,
});
export type BacktestConfig = z.infer<typeof backtestConfigSchema>;

export const defaultBacktestConfig: BacktestConfig = {
  initialCapital: 100_000,
  mode: "full",
  atrPeriod: 14,
  sizing: {
    policy: "FIXED",
    maxPositionPct: 0.2,
    sharesPerLot: 1,
    pyramidFactor: 0.5,
    maxPyramidLevels: 3,
    kelly: {
      winRate: 0.55,
      payoffRatio: 1.5,
    },
  },
  stops: {
    policy: "COMPOSITE",
    stopLossPct: 0.05,
    trailingStopPct: null,
    atrMultiple: 2,
    timeStopBars: 10,
  },
  costs: {
    slippagePct: 0.001,
    commissionPct: 0.0003,
  },
};

export const backtestConfigJsonSchema = z.toJSONSchema(backtestConfigSchema);

export function createBacktestConfig(
  overrides?: DeepPartial<BacktestConfig>,
): BacktestConfig {
  return backtestConfigSchema.parse(deepMerge(defaultBacktestConfig, overrides));
}

/**
 * Validates a complete config received from outside the type system, such as
 * a JSON request body. Unknown policy identifiers throw.
 */
export function parseBacktestConfig(input: unknown): BacktestConfig {
  return backtestConfigSchema.parse(input);
}
