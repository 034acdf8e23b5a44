export type Logger = {
  info: (msg: string, meta?: Record<string, unknown>) => void;
  warn: (msg: string, meta?: Record<string, unknown>) => void;
  error: (msg: string, meta?: Record<string, unknown>) => void;
};

export const consoleLogger: Logger = {
  info: (msg, meta) => console.log("[INFO]", msg, meta ?? ""),
  warn: (msg, meta) => console.warn("[WARN]", msg, meta ?? ""),
  error: (msg, meta) => console.error("[ERROR]", msg, meta ?? ""),
};
