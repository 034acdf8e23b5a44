export * from "./types";
export * from "./config";
export * from "./costs";
export * from "./sizing";
export * from "./stops";
export * from "./indicators";
export * from "./metrics";
export * from "./position";
export * from "./backtest";
export * from "./simple";
export * from "./engine";
