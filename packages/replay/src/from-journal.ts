import type { Journal } from "@tickweave/journal";
import type { JournalEvent, RecordedOutcome, SessionRecord } from "@tickweave/schemas";
import { SESSION_RECORD_FORMAT, hashValue } from "@tickweave/schemas";
import { readSessionSeed } from "@tickweave/kernel";

/**
 * Rebuilds a session record from what the journal saw: the created payload,
 * every published response, the published state hashes and the final outcome.
 */
export function recordFromJournal(journal: Journal, sessionId: string): SessionRecord {
  const events = journal.readSession(sessionId);
  const seed = readSessionSeed(events);
  if (!seed) throw new Error(`No session.created event for session ${sessionId}`);

  const stateHashes = [hashValue(seed.initialState)];
  for (const event of events) {
    if (event.type !== "tick.state_published") continue;
    const { tick, state_hash } = event.payload;
    if (tick === stateHashes.length && typeof state_hash === "string") stateHashes.push(state_hash);
  }

  const record: SessionRecord = {
    format: SESSION_RECORD_FORMAT,
    game: seed.game,
    identity: seed.identity,
    initial_state: seed.initialState,
    responses: seed.responses,
    state_hashes: stateHashes,
    recorded_at: new Date().toISOString(),
  };
  const outcome = finalOutcome(events);
  return outcome ? { ...record, outcome } : record;
}

function finalOutcome(events: readonly JournalEvent[]): RecordedOutcome | null {
  for (let i = events.length - 1; i >= 0; i--) {
    const event = events[i];
    if (!event) continue;
    const { payload } = event;
    switch (event.type) {
      case "session.completed":
        if (typeof payload.terminal_tick !== "number") return null;
        return { status: "completed", score: payload.score, terminal_tick: payload.terminal_tick };
      case "session.exhausted":
      case "session.failed":
      case "session.cancelled": {
        if (typeof payload.code !== "string" || typeof payload.tick !== "number") return null;
        const status = event.type === "session.exhausted" ? "exhausted" : event.type === "session.failed" ? "failed" : "cancelled";
        return { status, error_code: payload.code, tick: payload.tick };
      }
      default:
        break;
    }
  }
  return null;
}
