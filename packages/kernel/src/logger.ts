import type { Logger, LogLevel } from "@tickweave/schemas";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly threshold: number;
  private readonly level: LogLevel;

  constructor(component: string, level: LogLevel = "info") {
    // Component tags end up in terminal output; keep control characters out
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    const safe = component.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 64);
    this.prefix = `[tickweave:${safe}]`;
    this.level = level;
    this.threshold = LEVEL_ORDER[level];
  }

  child(component: string): ConsoleLogger {
    return new ConsoleLogger(component, this.level);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.threshold <= LEVEL_ORDER.debug) console.debug(`${this.prefix} ${message}`, data ?? "");
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.threshold <= LEVEL_ORDER.info) console.log(`${this.prefix} ${message}`, data ?? "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.threshold <= LEVEL_ORDER.warn) console.warn(`${this.prefix} ${message}`, data ?? "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ${message}`, data ?? "");
  }
}
