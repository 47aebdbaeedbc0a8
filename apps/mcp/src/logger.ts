// stdout carries the MCP protocol, so every log line goes to stderr.

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
};

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function createLogger(level: LogLevel, sink: (line: string) => void = (line) => console.error(line)): Logger {
  function log(at: Exclude<LogLevel, "silent">, message: string, meta?: Record<string, unknown>) {
    if (RANK[at] < RANK[level]) return;
    const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    sink(`[scoreline] ${at} ${message}${suffix}`);
  }

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
  };
}
