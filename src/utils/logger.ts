export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

let currentLevel: LogLevel = "info";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatMessage(
  level: LogLevel,
  scope: string | undefined,
  message: string,
  data?: unknown,
): string {
  const timestamp = new Date().toISOString();
  const color = LEVEL_COLORS[level];
  const levelStr = level.toUpperCase().padEnd(5);
  const scopeStr = scope ? ` [${scope}]` : "";

  let formatted = `${color}[${timestamp}] ${levelStr}${RESET}${scopeStr} ${message}`;

  if (data !== undefined) {
    if (data instanceof Error) {
      formatted += ` ${data.message}`;
    } else if (typeof data === "object") {
      formatted += ` ${JSON.stringify(data, null, 2)}`;
    } else {
      formatted += ` ${String(data)}`;
    }
  }

  return formatted;
}

function write(level: LogLevel, scope: string | undefined, message: string, data?: unknown): void {
  if (!shouldLog(level)) return;

  const line = formatMessage(level, scope, message, data);
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function debug(message: string, data?: unknown): void {
  write("debug", undefined, message, data);
}

export function info(message: string, data?: unknown): void {
  write("info", undefined, message, data);
}

export function warn(message: string, data?: unknown): void {
  write("warn", undefined, message, data);
}

export function error(message: string, data?: unknown): void {
  write("error", undefined, message, data);
}

export interface ScopedLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Logger whose lines are tagged with the emitting component, e.g. `[retention]`.
 * Shares the global level.
 */
export function createLogger(scope: string): ScopedLogger {
  return {
    debug: (message, data) => write("debug", scope, message, data),
    info: (message, data) => write("info", scope, message, data),
    warn: (message, data) => write("warn", scope, message, data),
    error: (message, data) => write("error", scope, message, data),
  };
}

export const logger = {
  debug,
  info,
  warn,
  error,
  scoped: createLogger,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
};
