export * from "./types";
export * from "./ma-trend";
export * from "./sma-cross";
