// Pure formatting for CLI output. No I/O.

import type { JournalEvent, SessionStatus } from "@tickweave/schemas";
import type { SessionOutcome } from "@tickweave/kernel";

export interface Palette {
  dim(s: string): string;
  green(s: string): string;
  red(s: string): string;
  yellow(s: string): string;
  cyan(s: string): string;
  bold(s: string): string;
}

export const ANSI: Palette = {
  dim: (s) => `\x1b[2m${s}\x1b[0m`,
  green: (s) => `\x1b[32m${s}\x1b[0m`,
  red: (s) => `\x1b[31m${s}\x1b[0m`,
  yellow: (s) => `\x1b[33m${s}\x1b[0m`,
  cyan: (s) => `\x1b[36m${s}\x1b[0m`,
  bold: (s) => `\x1b[1m${s}\x1b[0m`,
};

const same = (s: string): string => s;
export const PLAIN: Palette = { dim: same, green: same, red: same, yellow: same, cyan: same, bold: same };

export const MAX_PAYLOAD_LEN = 400;

export function truncate(s: string, max: number): string {
  return s.length > max ? `${s.slice(0, max)}... (${s.length} chars total)` : s;
}

export function colorForType(type: string, palette: Palette): (s: string) => string {
  if (type.endsWith("completed")) return palette.green;
  if (type.endsWith("failed")) return palette.red;
  if (type.endsWith("exhausted") || type.endsWith("cancelled")) return palette.yellow;
  if (type.startsWith("tick.")) return palette.dim;
  return palette.cyan;
}

/** `[HH:MM:SS.mmm] type` plus the payload on an indented second line. */
export function formatEvent(event: JournalEvent, palette: Palette = ANSI): string {
  const ts = event.timestamp.split("T")[1]?.slice(0, 12) ?? "";
  const head = `[${ts}] ${colorForType(event.type, palette)(event.type)}`;
  if (Object.keys(event.payload).length === 0) return head;
  return `${head}\n         ${truncate(JSON.stringify(event.payload), MAX_PAYLOAD_LEN)}`;
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

export function formatOutcome<Score>(outcome: SessionOutcome<Score>, palette: Palette = ANSI): string {
  if (outcome.status === "completed") {
    return `${palette.green("Completed")} at tick ${outcome.terminalTick} with score ${palette.bold(JSON.stringify(outcome.score))} (${outcome.ticks} ticks this run)`;
  }
  const color = outcome.status === "failed" ? palette.red : palette.yellow;
  const { error } = outcome;
  return `${color(capitalize(outcome.status))} at tick ${error.tick} [${error.code}]: ${error.message}`;
}

export interface SessionSummary {
  session_id: string;
  game: string;
  status: SessionStatus;
  events: number;
  created: string;
}

const STATUS_EVENTS: Partial<Record<JournalEvent["type"], SessionStatus>> = {
  "session.created": "created",
  "session.started": "running",
  "session.resumed": "running",
  "session.completed": "completed",
  "session.exhausted": "exhausted",
  "session.failed": "failed",
  "session.cancelled": "cancelled",
};

/** Folds journal events into one row per session, in first-seen order. */
export function summarizeSessions(events: readonly JournalEvent[]): SessionSummary[] {
  const sessions = new Map<string, SessionSummary>();
  for (const event of events) {
    let summary = sessions.get(event.session_id);
    if (!summary) {
      summary = { session_id: event.session_id, game: "?", status: "created", events: 0, created: event.timestamp };
      sessions.set(event.session_id, summary);
    }
    summary.events++;
    if (event.type === "session.created" && typeof event.payload.game === "string") summary.game = event.payload.game;
    summary.status = STATUS_EVENTS[event.type] ?? summary.status;
  }
  return [...sessions.values()];
}

export function formatSessionRow(summary: SessionSummary, palette: Palette = ANSI): string {
  const status = colorForType(summary.status, palette)(`[${summary.status}]`);
  return `${summary.session_id}  ${summary.game}  ${status}  ${summary.events} events  ${summary.created}`;
}
