import { deepMerge, type DeepPartial } from "@strategy-lab/trading-core";
import { z } from "zod";

export const regimeConfigSchema = z
  .object({
    smaPeriod: z.number().int().min(1),
    volatilityPeriod: z.number().int().min(2),
    bullThreshold: z.number(),
    bearThreshold: z.number(),
    rsiPeriod: z.number().int().min(1),
    volumeMaPeriod: z.number().int().min(1),
    macdFast: z.number().int().min(1),
    macdSlow: z.number().int().min(1),
    macdSignal: z.number().int().min(1),
  })
  .refine((config) => config.bearThreshold <= config.bullThreshold, {
    message: "bearThreshold must not exceed bullThreshold",
    path: ["bearThreshold"],
  })
  .refine((config) => config.macdFast < config.macdSlow, {
    message: "macdFast must be shorter than macdSlow",
    path: ["macdFast"],
  });
export type RegimeConfig = z.infer<typeof regimeConfigSchema>;

export const defaultRegimeConfig: RegimeConfig = {
  smaPeriod: 200,
  volatilityPeriod: 20,
  bullThreshold: 0.05,
  bearThreshold: -0.05,
  rsiPeriod: 14,
  volumeMaPeriod: 20,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
};

export const regimeConfigJsonSchema = z.toJSONSchema(regimeConfigSchema);

export function createRegimeConfig(overrides?: DeepPartial<RegimeConfig>): RegimeConfig {
  return regimeConfigSchema.parse(deepMerge(defaultRegimeConfig, overrides));
}

export function parseRegimeConfig(input: unknown): RegimeConfig {
  return regimeConfigSchema.parse(input);
}

/** Bars before this index are labelled RANGE: some indicator is still warming up. */
export function regimeLookback(config: RegimeConfig): number {
  return Math.max(
    config.smaPeriod,
    config.volatilityPeriod,
    config.rsiPeriod,
    config.volumeMaPeriod,
  );
}
