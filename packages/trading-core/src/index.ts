/**
 * `@strategy-lab/trading-core` holds the shared contracts every other package
 * builds on: bar and signal schemas, the signal-provider contract, logging,
 * config merging, rolling windows and the basic series math. Nothing here
 * depends on simulation code.
 */
export * from "./contracts";
export * from "./config";
export * from "./logger";
export * from "./stats";
export * from "./window";
export * from "./indicators";
