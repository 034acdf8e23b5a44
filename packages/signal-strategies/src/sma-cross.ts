import {
  rollingMean,
  type Bar,
  type Signal,
  type SignalProvider,
} from "@strategy-lab/trading-core";
import { smaCrossParamsSchema, type SmaCrossParams } from "./types";

export const SMA_CROSS_KEY = "sma-cross";

export function calculateSmaCrossSignals(bars: Bar[], params: SmaCrossParams): Signal[] {
  const closes = bars.map((bar) => bar.close);
  const fast = rollingMean(closes, params.fast);
  const slow = rollingMean(closes, params.slow);

  return closes.map((_, index): Signal => {
    const fastValue = fast[index] ?? null;
    const slowValue = slow[index] ?? null;
    if (fastValue === null || slowValue === null) return 0;
    if (fastValue > slowValue) return 1;
    if (fastValue < slowValue) return -1;
    return 0;
  });
}

export function createConfiguredSmaCrossStrategy(params?: Partial<SmaCrossParams>) {
  const config = smaCrossParamsSchema.parse(params ?? {});
  const strategy: SignalProvider = {
    key: SMA_CROSS_KEY,
    calculate: (bars) => calculateSmaCrossSignals(bars, config),
  };

  return { config, strategy };
}

/** Long while the fast SMA is above the slow one, short while below. */
export function createSmaCrossStrategy(params?: Partial<SmaCrossParams>): SignalProvider {
  return createConfiguredSmaCrossStrategy(params).strategy;
}
