/**
 * Tickweave Core Types
 *
 * Canonical data model shared by the kernel, journal, replay and host packages.
 * A session is two append-only sequences indexed by the same tick counter:
 *
 *   state[0]   supplied by the host
 *   response[i] = respond(identity, state[0..i])
 *   state[i+1]  = transition(state[i], response[i])
 */

// ─── Sequences ──────────────────────────────────────────────────────

/** Non-negative tick counter shared by both sequences. */
export type SequenceIndex = number;

export type SequenceKind = "state" | "response";

/**
 * Read-only window over an already-published prefix of a sequence.
 * Indices are absolute: `at(lastIndex)` is the newest visible element.
 */
export interface SequenceView<T> extends Iterable<T> {
  readonly kind: SequenceKind;
  /** Absolute index of the first visible element. */
  readonly start: SequenceIndex;
  /** Number of visible elements. */
  readonly length: number;
  /** Absolute index of the newest visible element, or start - 1 when empty. */
  readonly lastIndex: SequenceIndex;
  at(index: SequenceIndex): T | undefined;
  latest(): T | undefined;
  toArray(): T[];
}

// ─── Identity ───────────────────────────────────────────────────────

/**
 * Cache-busting key for one play-through. Carries no gameplay meaning:
 * two sessions with identical opening history still differ here, so no
 * memoizing evaluator can hand one session the other's recorded responses.
 */
export interface ParticipantIdentity {
  readonly session_id: string;
  readonly participant: string;
}

// ─── Game definition (host supplied) ────────────────────────────────

export type TransitionPhase = "apply_response" | "integrate" | "resolve_interactions";

export const TRANSITION_PHASES: readonly TransitionPhase[] = [
  "apply_response",
  "integrate",
  "resolve_interactions",
];

/**
 * The three ordered sub-phases of a state transition. Each must be a pure
 * value transform: no clock, no randomness and no I/O. Randomness a game
 * needs travels inside the state (for example a seeded generator value).
 */
export interface TransitionPhases<S, R> {
  applyResponse(state: S, response: R, tick: SequenceIndex): S;
  integrate(state: S, tick: SequenceIndex): S;
  resolveInteractions(state: S, tick: SequenceIndex): S;
}

export interface GameDefinition<S, R, Score = number> {
  readonly name: string;
  readonly phases: TransitionPhases<S, R>;
  isTerminal(state: S): boolean;
  score(state: S): Score;
}

/** Rebuilds typed values from JSON read back from a journal or record. Throws on bad input. */
export interface GameCodec<S, R> {
  parseState(value: unknown): S;
  parseResponse(value: unknown): R;
}

export type ReplayableGame<S, R, Score = number> = GameDefinition<S, R, Score> & GameCodec<S, R>;

// ─── Responses ──────────────────────────────────────────────────────

export interface RespondContext {
  /** Tick whose response is being requested; equals `prefix.lastIndex`. */
  tick: SequenceIndex;
  signal: AbortSignal;
}

/**
 * Produces response[i] from the identity and the published state prefix
 * ending at state[i]. Implementations are either pure (scripted, policy)
 * or delegate to a live input capability.
 */
export interface ResponseProvider<S, R> {
  respond(
    identity: ParticipantIdentity,
    prefix: SequenceView<S>,
    context: RespondContext,
  ): R | Promise<R>;
}

export type HistoryPolicy =
  | { kind: "full" }
  | { kind: "window"; size: number };

// ─── External capabilities (live variant) ───────────────────────────

export interface InputCapability<Raw> {
  /** Called at most once per tick. */
  poll(signal: AbortSignal): Promise<Raw>;
}

export interface OutputCapability<Frame> {
  pushFrame(frame: Frame, tick: SequenceIndex): void | Promise<void>;
}

/** Delta policy for frames pushed to the participant. */
export type FrameProjector<S, Frame> = (previous: S | undefined, latest: S) => Frame;

// ─── Sessions ───────────────────────────────────────────────────────

export type SessionStatus =
  | "created"
  | "running"
  | "completed"
  | "exhausted"
  | "failed"
  | "cancelled";

export interface SessionLimits {
  tick_budget: number;
}

export interface Session {
  session_id: string;
  game: string;
  status: SessionStatus;
  identity: ParticipantIdentity;
  limits: SessionLimits;
  /** Ticks executed so far across every run of this session. */
  ticks: number;
  created_at: string;
  updated_at: string;
}

// ─── Logging ────────────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

// ─── Journal Events ─────────────────────────────────────────────────

export type JournalEventType =
  | "session.created"
  | "session.started"
  | "session.resumed"
  | "tick.response_published"
  | "tick.state_published"
  | "session.completed"
  | "session.exhausted"
  | "session.failed"
  | "session.cancelled";

export interface JournalEvent {
  event_id: string;
  timestamp: string;
  session_id: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}

// ─── Session records (persisted replay input) ───────────────────────

export const SESSION_RECORD_FORMAT = "tickweave.session/1";

export type RecordedOutcome =
  | { status: "completed"; score: unknown; terminal_tick: SequenceIndex }
  | { status: "exhausted" | "failed" | "cancelled"; error_code: string; tick: SequenceIndex };

export interface SessionRecord<S = unknown, R = unknown> {
  format: typeof SESSION_RECORD_FORMAT;
  game: string;
  identity: ParticipantIdentity;
  initial_state: S;
  responses: R[];
  state_hashes?: string[];
  outcome?: RecordedOutcome;
  recorded_at: string;
}
