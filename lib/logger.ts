/**
 * Scoped console logger.
 * Writes `[scope] message` lines; info/debug to stdout, warn/error to stderr.
 */

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly scope: string;
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : "info";
}

class ConsoleLogger implements Logger {
  constructor(
    readonly scope: string,
    private readonly level: LogLevel
  ) {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private tag(): string {
    return chalk.dim(`[${this.scope}]`);
  }

  debug(message: string, ...meta: unknown[]): void {
    if (this.enabled("debug")) {
      console.log(this.tag(), chalk.gray(message), ...meta);
    }
  }

  info(message: string, ...meta: unknown[]): void {
    if (this.enabled("info")) {
      console.log(this.tag(), message, ...meta);
    }
  }

  warn(message: string, ...meta: unknown[]): void {
    if (this.enabled("warn")) {
      console.warn(this.tag(), chalk.yellow(message), ...meta);
    }
  }

  error(message: string, ...meta: unknown[]): void {
    if (this.enabled("error")) {
      console.error(this.tag(), chalk.red(message), ...meta);
    }
  }

  child(scope: string): Logger {
    return new ConsoleLogger(`${this.scope}/${scope}`, this.level);
  }
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  return new ConsoleLogger(
    scope,
    options.level ?? resolveLogLevel(process.env.LOG_LEVEL)
  );
}

/** Logger that drops everything; used by tests and quiet CLI runs */
export const silentLogger: Logger = createLogger("silent", { level: "silent" });
