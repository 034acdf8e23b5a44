import { ema, type Bar, type Signal, type SignalProvider } from "@strategy-lab/trading-core";
import { maTrendParamsSchema, type MaTrendParams } from "./types";

export const MA_TREND_KEY = "ma-trend";

/** Relative one-bar move of the long EMA treated as flat. */
const FLAT_SLOPE = 0.001;

export function calculateMaTrendSignals(bars: Bar[], params: MaTrendParams): Signal[] {
  const closes = bars.map((bar) => bar.close);
  const medium = ema(closes, params.p2);
  const long = ema(closes, params.p3);

  const signals: Signal[] = [];
  let state: Signal = 0;

  for (let index = 0; index < closes.length; index += 1) {
    if (index < 2) {
      signals.push(0);
      continue;
    }

    const close = closes[index] ?? 0;
    const base =
      index - params.p1 > 0 ? (closes[index - params.p1] ?? 0) : (closes[0] ?? 0);

    const longNow = long[index] ?? 0;
    const longBefore = long[index - 1] ?? 0;
    const slope = longNow > 0 ? (longNow - longBefore) / longNow : 0;

    const mediumNow = medium[index] ?? 0;
    const mediumBefore = medium[index - 1] ?? 0;

    if (slope > -FLAT_SLOPE && mediumBefore < mediumNow && close > base) {
      state = 1;
    }
    if (slope < FLAT_SLOPE && mediumBefore > mediumNow && close <= base) {
      state = -1;
    }
    signals.push(state);
  }

  return signals;
}

/**
 * Trend follower on two EMAs and a momentum check against the close `p1` bars
 * back. The position is sticky: it holds until the opposite setup appears,
 * and there is no return to flat once a side has been taken.
 */
export function createConfiguredMaTrendStrategy(params?: Partial<MaTrendParams>) {
  const config = maTrendParamsSchema.parse(params ?? {});
  const strategy: SignalProvider = {
    key: MA_TREND_KEY,
    calculate: (bars) => calculateMaTrendSignals(bars, config),
  };

  return { config, strategy };
}

export function createMaTrendStrategy(params?: Partial<MaTrendParams>): SignalProvider {
  return createConfiguredMaTrendStrategy(params).strategy;
}
