import { resolve } from "node:path";
import type { HistoryPolicy, LogLevel } from "@tickweave/schemas";
import { isLogLevel } from "@tickweave/kernel";

export interface CliConfig {
  journalPath: string;
  tickBudget: number;
  /** Per-poll input timeout for live play. 0 disables. */
  inputTimeoutMs: number;
  historyPolicy: HistoryPolicy;
  logLevel: LogLevel;
  /** Extra dodge level presets. */
  levelsPath?: string;
}

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function parsePositiveInt(value: string, label: string): number {
  const n = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(n) || n < 1) {
    throw new ConfigError(`Invalid ${label}: "${value}" (must be a positive integer)`);
  }
  return n;
}

export function parseInteger(value: string, label: string): number {
  const n = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(n)) {
    throw new ConfigError(`Invalid ${label}: "${value}" (must be an integer)`);
  }
  return n;
}

export function parseNonNegativeInt(value: string, label: string): number {
  const n = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(n) || n < 0) {
    throw new ConfigError(`Invalid ${label}: "${value}" (must be a non-negative integer)`);
  }
  return n;
}

export function parseLogLevel(value: string, label: string): LogLevel {
  const level = value.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(`Invalid ${label}: "${value}" (must be one of debug, info, warn, error)`);
  }
  return level;
}

export function historyPolicyFor(window: number | undefined): HistoryPolicy {
  return window === undefined ? { kind: "full" } : { kind: "window", size: window };
}

/** Reads host settings from the environment. Unset variables take their defaults. */
export function loadConfig(env: Env = process.env): CliConfig {
  const read = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value === "" ? undefined : value;
  };

  const budget = read("TICKWEAVE_TICK_BUDGET");
  const timeout = read("TICKWEAVE_INPUT_TIMEOUT_MS");
  const window = read("TICKWEAVE_HISTORY_WINDOW");
  const level = read("TICKWEAVE_LOG_LEVEL");
  const levelsPath = read("TICKWEAVE_LEVELS_PATH");

  const config: CliConfig = {
    journalPath: resolve(read("TICKWEAVE_JOURNAL_PATH") ?? "journal/events.jsonl"),
    tickBudget: budget !== undefined ? parsePositiveInt(budget, "TICKWEAVE_TICK_BUDGET") : 1000,
    inputTimeoutMs: timeout !== undefined ? parseNonNegativeInt(timeout, "TICKWEAVE_INPUT_TIMEOUT_MS") : 30000,
    historyPolicy: historyPolicyFor(window !== undefined ? parsePositiveInt(window, "TICKWEAVE_HISTORY_WINDOW") : undefined),
    logLevel: level !== undefined ? parseLogLevel(level, "TICKWEAVE_LOG_LEVEL") : "info",
  };
  if (levelsPath !== undefined) config.levelsPath = resolve(levelsPath);
  return config;
}
