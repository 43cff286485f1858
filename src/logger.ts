import * as v from "valibot";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LogLevelSchema = v.picklist(LOG_LEVELS);

class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly prefix: string;

  constructor(prefix: string, level: LogLevel) {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return (
      this.level !== "silent" &&
      LOG_LEVELS.indexOf(this.level) <= LOG_LEVELS.indexOf(level)
    );
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.debug(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.info(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }
}

/**
 * Resolves the default level from the environment.
 *
 * `LOG_LEVEL` wins when it names a known level; otherwise tests run silent
 * and everything else logs from `info` up.
 */
export function resolveLogLevel(
  env: Record<string, string | undefined> = process.env,
): LogLevel {
  const fromEnv = v.safeParse(LogLevelSchema, env["LOG_LEVEL"]);
  if (fromEnv.success) {
    return fromEnv.output;
  }

  return env["NODE_ENV"] === "test" ? "silent" : "info";
}

export function createLogger(prefix = "", level?: LogLevel): Logger {
  return new ConsoleLogger(prefix, level ?? resolveLogLevel());
}
