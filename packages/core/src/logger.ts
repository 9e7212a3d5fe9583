/**
 * Scoped stderr logging.
 * stdout is reserved for the MCP stdio transport and for CLI reports.
 */

export type LogLevel = "info" | "warn" | "error" | "silent";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, cause?: unknown): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case "warn":
      return "warn";
    case "error":
      return "error";
    case "silent":
      return "silent";
    default:
      return "info";
  }
}

/**
 * Create a logger that prefixes every line with `[scope]`.
 *
 * @example
 * ```typescript
 * const log = createLogger("analyzer");
 * log.warn("Could not analyze src/broken.py: Syntax error at line 3");
 * // [analyzer] Warning: Could not analyze src/broken.py: Syntax error at line 3
 * ```
 */
export function createLogger(
  scope: string,
  level: LogLevel = parseLogLevel(process.env.STRUCTMAP_LOG_LEVEL),
  write: (line: string) => void = (line) => console.error(line)
): Logger {
  const enabled = (wanted: LogLevel): boolean => LEVEL_RANK[wanted] >= LEVEL_RANK[level];

  return {
    info(message) {
      if (enabled("info")) write(`[${scope}] ${message}`);
    },
    warn(message) {
      if (enabled("warn")) write(`[${scope}] Warning: ${message}`);
    },
    error(message, cause) {
      if (!enabled("error")) return;
      const detail = cause instanceof Error ? `: ${cause.message}` : cause !== undefined ? `: ${String(cause)}` : "";
      write(`[${scope}] Error: ${message}${detail}`);
    },
  };
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};
