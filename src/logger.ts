export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

export type LogContext = Record<string, string | number | boolean | undefined>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

function format(message: string, context?: LogContext): string {
  if (!context) return message;
  const pairs = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${value}`);
  return pairs.length > 0 ? `${message} (${pairs.join(", ")})` : message;
}

/**
 * Diagnostics go to stderr so they never mix with command output on stdout.
 */
export function createLogger(level: LogLevel = "warn"): Logger {
  const enabled = (l: LogLevel) => rank(l) >= rank(level);
  return {
    debug(message, context) {
      if (enabled("debug")) console.error(`[debug] ${format(message, context)}`);
    },
    info(message, context) {
      if (enabled("info")) console.error(`[info] ${format(message, context)}`);
    },
    warn(message, context) {
      if (enabled("warn")) console.error(`[warn] ${format(message, context)}`);
    },
    error(message, context) {
      if (enabled("error")) console.error(`[error] ${format(message, context)}`);
    },
  };
}

export const silentLogger: Logger = createLogger("silent");

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
