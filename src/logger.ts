type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

const envLevel = process.env.LOG_LEVEL;
const currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "warn";

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatLog(level: LogLevel, message: string, data?: Record<string, unknown>): string {
  const suffix = data ? ` ${JSON.stringify(data)}` : "";
  return `[${level}] ${message}${suffix}`;
}

// Everything goes to stderr; stdout carries the rendered changes.
export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    if (shouldLog("debug")) console.error(formatLog("debug", message, data));
  },
  info(message: string, data?: Record<string, unknown>): void {
    if (shouldLog("info")) console.error(formatLog("info", message, data));
  },
  warn(message: string, data?: Record<string, unknown>): void {
    if (shouldLog("warn")) console.error(formatLog("warn", message, data));
  },
  error(message: string, data?: Record<string, unknown>): void {
    if (shouldLog("error")) console.error(formatLog("error", message, data));
  },
};
