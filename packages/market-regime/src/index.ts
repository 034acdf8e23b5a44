/**
 * `@strategy-lab/market-regime` labels bars with market conditions from price,
 * volume and momentum, and breaks a trade log down by those labels. It reads
 * bars only and knows nothing about strategies or the engine.
 */
export * from "./types";
export * from "./config";
export * from "./indicators";
export * from "./classifier";
export * from "./analysis";
