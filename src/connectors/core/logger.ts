import type { Logger, LogLevel } from "./types.js";

export interface LoggerOptions {
  level?: LogLevel;
}

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly level: LogLevel;

  constructor(component: string, opts: LoggerOptions = {}) {
    this.prefix = `[${component}]`;
    this.level = opts.level ?? "info";
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    if (this.level !== "debug") return;
    console.debug(`${this.prefix} ${msg}${formatData(data)}`);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    console.log(`${this.prefix} ${msg}${formatData(data)}`);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    console.warn(`${this.prefix} ⚠ ${msg}${formatData(data)}`);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ✗ ${msg}${formatData(data)}`);
  }

  /** Same sink and level, nested component name. */
  child(component: string): ConsoleLogger {
    return new ConsoleLogger(`${this.prefix.slice(1, -1)}:${component}`, {
      level: this.level,
    });
  }
}

function formatData(data?: Record<string, unknown>): string {
  return data ? ` ${JSON.stringify(data)}` : "";
}

export function createLogger(
  component: string,
  opts: LoggerOptions = {},
): ConsoleLogger {
  return new ConsoleLogger(component, opts);
}
