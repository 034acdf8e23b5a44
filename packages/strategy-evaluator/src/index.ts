/**
 * `@strategy-lab/strategy-evaluator` turns backtests into comparable reports:
 * regime breakdown, calendar-period returns, risk ratios and a letter-graded
 * composite score per strategy.
 */
export * from "./types";
export * from "./periods";
export * from "./risk";
export * from "./rating";
export * from "./evaluator";
