/**
 * Structured JSON-line logger.
 *
 * Lines go to stderr: in stdio mode stdout carries the MCP protocol.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function createLogger(
  threshold: LogLevel = "info",
  write: (line: string) => void = (line) => console.error(line),
): Logger {
  const emit =
    (level: LogLevel) =>
    (message: string, fields: Record<string, unknown> = {}) => {
      if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
      write(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          level,
          message,
          ...fields,
        }),
      );
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
