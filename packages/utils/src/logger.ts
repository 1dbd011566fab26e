/**
 * Minimal logging library for the cell compiler and its tools.
 *
 * @module
 * Loggers are tagged with a module name, filter by severity and take lazy
 * messages, so expensive values are only computed when printed.
 *
 * @example
 * ```typescript
 * import { getLogger } from "@cellchain/utils/logger";
 *
 * const logger = getLogger("toolchain", { level: "debug" });
 *
 * // Logs will show: [DEBUG][toolchain::HH:MM:SS.mmm] Created program ...
 * logger.debug(() => ["Created program", program.getSourceFiles().length]);
 * ```
 *
 * The initial level of every logger is read from `LOG_LEVEL` when set.
 */

import { getEnv } from "./env.ts";

export type LogMessage = unknown | (() => unknown);

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Styles for `%c`; consoles without styling drop them.
const COLORS: Record<LogLevel, string> = {
  debug: "color: #6b7280; font-weight: 500",
  info: "color: #10b981; font-weight: 500",
  warn: "color: #eab308; font-weight: 500",
  error: "color: #ef4444; font-weight: 500",
};

const SINKS: Record<LogLevel, (...data: unknown[]) => void> = {
  debug: (...data) => console.debug(...data),
  info: (...data) => console.log(...data),
  warn: (...data) => console.warn(...data),
  error: (...data) => console.error(...data),
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

// HH:MM:SS.mmm
function getTimeStamp(): string {
  return new Date().toISOString().slice(11, 23);
}

function resolveMessages(messages: LogMessage[]): unknown[] {
  return messages.flatMap((msg) => {
    const resolved = typeof msg === "function" ? msg() : msg;
    return Array.isArray(resolved) ? resolved : [resolved];
  });
}

function getEnvLevel(): LogLevel | undefined {
  const envLevel = getEnv("LOG_LEVEL");
  return envLevel && isLogLevel(envLevel) ? envLevel : undefined;
}

export interface GetLoggerOptions {
  /**
   * Whether this logger prints anything. Defaults to true.
   */
  enabled?: boolean;
  /**
   * The minimum level printed.
   * Defaults to `LOG_LEVEL` from the environment, then "info".
   */
  level?: LogLevel;
}

export class Logger {
  readonly enabled: boolean;
  public level: LogLevel;

  constructor(private readonly moduleName: string, options?: GetLoggerOptions) {
    this.enabled = options?.enabled ?? true;
    this.level = options?.level ?? getEnvLevel() ?? "info";
  }

  private emit(level: LogLevel, messages: LogMessage[]): void {
    if (!this.enabled || LOG_LEVELS[level] < LOG_LEVELS[this.level]) {
      return;
    }
    SINKS[level](
      `%c[${level.toUpperCase()}][${this.moduleName}::${getTimeStamp()}]`,
      COLORS[level],
      ...resolveMessages(messages),
    );
  }

  debug(...messages: LogMessage[]): void {
    this.emit("debug", messages);
  }

  info(...messages: LogMessage[]): void {
    this.emit("info", messages);
  }

  warn(...messages: LogMessage[]): void {
    this.emit("warn", messages);
  }

  error(...messages: LogMessage[]): void {
    this.emit("error", messages);
  }
}

const loggers = new Map<string, Logger>();

/**
 * Create a logger tagged with the specified module name.
 * If a logger with the same module name already exists, returns the existing
 * instance and ignores `options`.
 */
export function getLogger(
  moduleName: string,
  options?: GetLoggerOptions,
): Logger {
  const existing = loggers.get(moduleName);
  if (existing) {
    return existing;
  }
  const logger = new Logger(moduleName, options);
  loggers.set(moduleName, logger);
  return logger;
}
