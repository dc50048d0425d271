import type {
  GameCodec,
  GameDefinition,
  HistoryPolicy,
  JournalEvent,
  JournalEventType,
  Logger,
  ParticipantIdentity,
  RecordedOutcome,
  ResponseProvider,
  SequenceIndex,
  Session,
  SessionRecord,
  SessionStatus,
} from "@tickweave/schemas";
import {
  CancelledError,
  EngineError,
  NonTerminationError,
  SESSION_RECORD_FORMAT,
  TransitionError,
  errorMessage,
  hashValue,
} from "@tickweave/schemas";
import type { Journal } from "@tickweave/journal";
import { IdentityGuard } from "./identity.js";
import { ConsoleLogger } from "./logger.js";
import { Scheduler } from "./scheduler.js";
import type { AdvanceResult } from "./scheduler.js";
import { StateSequenceGenerator } from "./state-generator.js";
import { deepFreeze } from "./sequence-store.js";

export interface KernelConfig {
  journal?: Journal;
  logger?: Logger;
  /** Shared across kernels that must never hand out the same identity twice. */
  identityGuard?: IdentityGuard;
  /** Default: 1000 */
  defaultTickBudget?: number;
  historyPolicy?: HistoryPolicy;
  /** Include full states in `tick.state_published` events, not just their hashes. */
  journalStates?: boolean;
  freeze?: boolean;
  checkDeterminism?: boolean;
}

export interface CreateSessionOptions<S, R, Score> {
  game: GameDefinition<S, R, Score>;
  responder: ResponseProvider<S, R>;
  initialState: S;
  /** Participant name for a freshly issued identity. Default: "player" */
  participant?: string;
  /** Claim this identity instead of issuing one. Rejected if another session holds it. */
  identity?: ParticipantIdentity;
  tickBudget?: number;
}

export type SessionOutcome<Score> =
  | { status: "completed"; score: Score; terminalTick: SequenceIndex; ticks: number }
  | { status: "exhausted" | "failed" | "cancelled"; error: EngineError; ticks: number };

/** What a journal holds about one session: enough to rebuild its published prefix. */
export interface SessionSeed {
  game: string;
  identity: ParticipantIdentity;
  initialState: unknown;
  /** Absolute tick limit of the latest run. */
  tickBudget: number;
  responses: unknown[];
  /** Where the session stood at its last lifecycle event. */
  standing: "interrupted" | "exhausted" | "finished";
}

/** The game-agnostic slice of a session the kernel keeps in its registry. */
export interface SessionHandle {
  readonly identity: ParticipantIdentity;
  getSession(): Session;
  cancel(reason?: string): Promise<void>;
}

const VALID_TRANSITIONS: Record<SessionStatus, SessionStatus[]> = {
  created: ["running", "cancelled"],
  running: ["completed", "exhausted", "failed", "cancelled"],
  exhausted: ["running", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
};

const FINAL_STATUSES = new Set<SessionStatus>(["completed", "failed", "cancelled"]);

const FINISHED_EVENTS = new Set<JournalEventType>([
  "session.completed",
  "session.failed",
  "session.cancelled",
]);

export class Kernel {
  private config: KernelConfig;
  private guard: IdentityGuard;
  private logger: Logger;
  private sessions = new Map<string, SessionHandle>();

  constructor(config: KernelConfig = {}) {
    this.config = config;
    this.guard = config.identityGuard ?? new IdentityGuard();
    this.logger = config.logger ?? new ConsoleLogger("kernel", "warn");
  }

  async createSession<S, R, Score>(options: CreateSessionOptions<S, R, Score>): Promise<GameSession<S, R, Score>> {
    const tickBudget = options.tickBudget ?? this.config.defaultTickBudget ?? 1000;
    assertBudget(tickBudget);
    const identity = options.identity
      ? this.guard.claim(options.identity)
      : this.guard.issue(options.participant ?? "player");
    const initialState = this.config.freeze === false ? options.initialState : deepFreeze(options.initialState);

    const session = new GameSession<S, R, Score>({
      kernel: this.config,
      logger: this.logger,
      onFinished: (id) => this.discard(id),
      game: options.game,
      responder: options.responder,
      identity,
      tickBudget,
      states: [initialState],
      responses: [],
    });
    await this.config.journal?.tryEmit(identity.session_id, "session.created", {
      game: options.game.name,
      identity: { session_id: identity.session_id, participant: identity.participant },
      initial_state: initialState,
      tick_budget: tickBudget,
    });
    this.logger.info("Session created", { session_id: identity.session_id, game: options.game.name, tick_budget: tickBudget });
    this.track(session);
    return session;
  }

  /**
   * Rebuilds a session from the journal, recomputing states from the journaled
   * responses. An interrupted session comes back ready to `run()`, an exhausted
   * one ready to `extend()`. Returns null when the journal has no usable record
   * of the session, or the session already finished.
   */
  async resumeSession<S, R, Score>(
    sessionId: string,
    game: GameDefinition<S, R, Score> & GameCodec<S, R>,
    responder: ResponseProvider<S, R>,
  ): Promise<GameSession<S, R, Score> | null> {
    if (this.sessions.has(sessionId)) throw new Error(`Session ${sessionId} is already loaded`);
    const journal = this.config.journal;
    if (!journal) throw new Error("Cannot resume a session without a journal");

    const seed = readSessionSeed(journal.readSession(sessionId));
    if (!seed || seed.standing === "finished") return null;
    if (seed.game !== game.name) {
      throw new Error(`Session ${sessionId} was created for game "${seed.game}", not "${game.name}"`);
    }

    const generator = new StateSequenceGenerator(game.phases);
    const states: S[] = [game.parseState(seed.initialState)];
    const responses: R[] = seed.responses.map((value) => game.parseResponse(value));
    responses.forEach((response, tick) => {
      const current = states[tick];
      if (current === undefined) throw new Error(`state[${tick}] missing while rebuilding session ${sessionId}`);
      states.push(generator.next(current, response, tick));
    });

    const identity = this.guard.has(seed.identity) ? seed.identity : this.guard.claim(seed.identity);
    const session = new GameSession<S, R, Score>({
      kernel: this.config,
      logger: this.logger,
      onFinished: (id) => this.discard(id),
      game,
      responder,
      identity,
      tickBudget: seed.standing === "exhausted" ? responses.length : Math.max(seed.tickBudget, responses.length),
      status: seed.standing === "exhausted" ? "exhausted" : "created",
      states: this.config.freeze === false ? states : states.map((s) => deepFreeze(s)),
      responses: this.config.freeze === false ? responses : responses.map((r) => deepFreeze(r)),
      recovered: true,
    });
    this.logger.info("Session recovered from journal", { session_id: sessionId, ticks: responses.length, standing: seed.standing });
    this.track(session);
    return session;
  }

  /** Sessions that are loaded and not yet finished. Exhausted sessions stay until extended or cancelled. */
  getSession(sessionId: string): SessionHandle | undefined {
    return this.sessions.get(sessionId);
  }

  listSessions(): Session[] {
    return [...this.sessions.values()].map((s) => s.getSession());
  }

  /** Cancels every session that has not finished. */
  async shutdown(reason = "Kernel shutting down"): Promise<void> {
    await Promise.all([...this.sessions.values()].map((s) => s.cancel(reason)));
  }

  private track(session: SessionHandle): void {
    this.sessions.set(session.identity.session_id, session);
  }

  private discard(sessionId: string): void {
    if (this.sessions.delete(sessionId)) this.logger.debug("Session discarded", { session_id: sessionId });
  }
}

interface GameSessionInit<S, R, Score> {
  kernel: KernelConfig;
  logger: Logger;
  /** Called once the session reaches a status it can never leave. */
  onFinished?: (sessionId: string) => void;
  game: GameDefinition<S, R, Score>;
  responder: ResponseProvider<S, R>;
  identity: ParticipantIdentity;
  tickBudget: number;
  states: S[];
  responses: R[];
  status?: "created" | "exhausted";
  recovered?: boolean;
}

/**
 * One play-through. Owns the published prefixes between runs, so a session
 * that ran out of budget continues exactly where it stopped.
 */
export class GameSession<S, R, Score = number> implements SessionHandle {
  readonly identity: ParticipantIdentity;
  readonly game: GameDefinition<S, R, Score>;
  private readonly config: KernelConfig;
  private readonly logger: Logger;
  private readonly onFinished: ((sessionId: string) => void) | undefined;
  private readonly responder: ResponseProvider<S, R>;
  private readonly session: Session;
  private readonly stateLog: S[];
  private readonly responseLog: R[];
  private recovered: boolean;
  private outcome: SessionOutcome<Score> | null = null;
  private controller: AbortController | null = null;
  private running: Promise<SessionOutcome<Score>> | null = null;

  constructor(init: GameSessionInit<S, R, Score>) {
    const now = new Date().toISOString();
    this.config = init.kernel;
    this.logger = init.logger;
    this.onFinished = init.onFinished;
    this.game = init.game;
    this.responder = init.responder;
    this.identity = init.identity;
    this.stateLog = init.states;
    this.responseLog = init.responses;
    this.recovered = init.recovered ?? false;
    this.session = {
      session_id: init.identity.session_id,
      game: init.game.name,
      status: init.status ?? "created",
      identity: init.identity,
      limits: { tick_budget: init.tickBudget },
      ticks: Math.max(0, init.states.length - 1),
      created_at: now,
      updated_at: now,
    };
  }

  /** Runs until a terminal state, the budget runs out, an error, or cancellation. */
  async run(signal?: AbortSignal): Promise<SessionOutcome<Score>> {
    if (this.session.status !== "created") {
      throw new Error(`Cannot run session ${this.session.session_id} in status "${this.session.status}"`);
    }
    return this.start(signal, this.recovered ? "session.resumed" : "session.started");
  }

  /** Grants more ticks to an exhausted session and continues it. */
  async extend(additionalBudget: number, signal?: AbortSignal): Promise<SessionOutcome<Score>> {
    assertBudget(additionalBudget);
    if (this.session.status !== "exhausted") {
      throw new Error(`Only an exhausted session can be extended; session is "${this.session.status}"`);
    }
    this.session.limits = { tick_budget: this.session.limits.tick_budget + additionalBudget };
    return this.start(signal, "session.resumed");
  }

  /** Stops an in-flight run, or closes a session that is not running. */
  async cancel(reason?: string): Promise<void> {
    if (this.running && this.controller) {
      this.controller.abort(reason);
      await this.running;
      return;
    }
    if (this.session.status !== "created" && this.session.status !== "exhausted") return;
    const error = new CancelledError(this.stateLog.length - 1, reason);
    this.transition("cancelled");
    this.outcome = { status: "cancelled", error, ticks: 0 };
    await this.config.journal?.tryEmit(this.session.session_id, "session.cancelled", error.toJSON());
  }

  states(): readonly S[] {
    return [...this.stateLog];
  }

  responses(): readonly R[] {
    return [...this.responseLog];
  }

  getSession(): Session {
    return { ...this.session, limits: { ...this.session.limits } };
  }

  getOutcome(): SessionOutcome<Score> | null {
    return this.outcome;
  }

  /** Everything needed to replay this session bit for bit. */
  toRecord(): SessionRecord<S, R> {
    const record: SessionRecord<S, R> = {
      format: SESSION_RECORD_FORMAT,
      game: this.game.name,
      identity: { session_id: this.identity.session_id, participant: this.identity.participant },
      initial_state: this.stateLog[0] ?? missingInitialState(),
      responses: [...this.responseLog],
      state_hashes: this.stateLog.map((s) => hashValue(s)),
      recorded_at: new Date().toISOString(),
    };
    const outcome = this.outcome ? recordedOutcome(this.outcome) : undefined;
    return outcome ? { ...record, outcome } : record;
  }

  private start(signal: AbortSignal | undefined, event: "session.started" | "session.resumed"): Promise<SessionOutcome<Score>> {
    if (this.running) throw new Error(`Session ${this.session.session_id} is already running`);
    this.transition("running");
    this.running = this.execute(signal, event).finally(() => {
      this.running = null;
      this.controller = null;
    });
    return this.running;
  }

  private async execute(external: AbortSignal | undefined, event: "session.started" | "session.resumed"): Promise<SessionOutcome<Score>> {
    const journal = this.config.journal;
    const sessionId = this.session.session_id;
    const pending: Promise<unknown>[] = [];
    const controller = new AbortController();
    this.controller = controller;
    const forward = () => controller.abort(external?.reason);
    if (external?.aborted) forward();
    else external?.addEventListener("abort", forward, { once: true });

    const budget = this.session.limits.tick_budget - this.session.ticks;
    const fromTick = this.stateLog.length - 1;
    await journal?.tryEmit(sessionId, event, event === "session.started"
      ? { tick_budget: budget }
      : { from_tick: fromTick, tick_budget: budget, ...(this.recovered ? { recovered: true } : {}) });
    this.recovered = false;

    const scheduler = new Scheduler<S, R, Score>({
      game: this.game,
      responder: this.responder,
      historyPolicy: this.config.historyPolicy,
      freeze: this.config.freeze,
      checkDeterminism: this.config.checkDeterminism,
      logger: this.logger,
      observer: {
        onResponse: (tick, response) => {
          this.responseLog.push(response);
          if (journal) pending.push(journal.tryEmit(sessionId, "tick.response_published", { tick, response }));
        },
        onState: (index, state) => {
          this.stateLog.push(state);
          this.session.ticks++;
          if (!journal) return;
          const payload: Record<string, unknown> = { tick: index, state_hash: hashValue(state) };
          if (this.config.journalStates) payload.state = state;
          pending.push(journal.tryEmit(sessionId, "tick.state_published", payload));
        },
      },
    });

    const ticksBefore = this.session.ticks;
    let outcome: SessionOutcome<Score>;
    try {
      outcome = outcomeOf(await scheduler.advance({
        identity: this.identity,
        tickBudget: Math.max(0, budget),
        signal: controller.signal,
        resumeFrom: { states: this.stateLog, responses: this.responseLog },
      }));
    } catch (err) {
      const tick = this.stateLog.length - 1;
      this.logger.error("Run stopped by an unexpected error", { session_id: sessionId, tick, error: errorMessage(err) });
      outcome = {
        status: "failed",
        error: new TransitionError(`Run stopped at tick ${tick}: ${errorMessage(err)}`, tick, "resolve_interactions", { cause: err }),
        ticks: this.session.ticks - ticksBefore,
      };
    } finally {
      external?.removeEventListener("abort", forward);
      await Promise.all(pending);
    }

    this.outcome = outcome;
    this.transition(outcome.status);
    if (outcome.status === "completed") {
      await journal?.tryEmit(sessionId, "session.completed", {
        score: outcome.score,
        terminal_tick: outcome.terminalTick,
        ticks: this.session.ticks,
      });
      this.logger.info("Session completed", { session_id: sessionId, terminal_tick: outcome.terminalTick, ticks: this.session.ticks });
    } else {
      await journal?.tryEmit(sessionId, `session.${outcome.status}`, outcome.error.toJSON());
      const data = { session_id: sessionId, code: outcome.error.code, tick: outcome.error.tick };
      if (outcome.status === "failed") this.logger.warn("Session failed", { ...data, error: outcome.error.message });
      else this.logger.info(`Session ${outcome.status}`, data);
    }
    return outcome;
  }

  private transition(next: SessionStatus): void {
    const allowed = VALID_TRANSITIONS[this.session.status];
    if (!allowed.includes(next)) {
      throw new Error(`Invalid session transition: ${this.session.status} → ${next}`);
    }
    this.session.status = next;
    this.session.updated_at = new Date().toISOString();
    if (FINAL_STATUSES.has(next)) this.onFinished?.(this.session.session_id);
  }
}

/** Collects the created payload and the journaled responses of one session. */
export function readSessionSeed(events: readonly JournalEvent[]): SessionSeed | null {
  const created = events.find((e) => e.type === "session.created");
  if (!created) return null;
  const { game, identity, initial_state, tick_budget } = created.payload;
  if (typeof game !== "string" || typeof tick_budget !== "number" || !("initial_state" in created.payload)) return null;
  if (!isRecord(identity) || typeof identity.session_id !== "string" || typeof identity.participant !== "string") return null;

  const responses: unknown[] = [];
  let limit = tick_budget;
  let standing: SessionSeed["standing"] = "interrupted";
  for (const event of events) {
    const { payload } = event;
    switch (event.type) {
      case "tick.response_published":
        // Duplicates cannot happen in an intact chain; the first write wins
        if (payload.tick === responses.length) responses.push(payload.response);
        break;
      case "session.started":
        if (typeof payload.tick_budget === "number") limit = payload.tick_budget;
        standing = "interrupted";
        break;
      case "session.resumed":
        if (typeof payload.from_tick === "number" && typeof payload.tick_budget === "number") {
          limit = payload.from_tick + payload.tick_budget;
        }
        standing = "interrupted";
        break;
      case "session.exhausted":
        standing = "exhausted";
        break;
      default:
        if (FINISHED_EVENTS.has(event.type)) standing = "finished";
        break;
    }
  }
  return {
    game,
    identity: { session_id: identity.session_id, participant: identity.participant },
    initialState: initial_state,
    tickBudget: limit,
    responses,
    standing,
  };
}

/** Maps a scheduler result onto the session status it ends in. */
export function outcomeOf<S, R, Score>(result: AdvanceResult<S, R, Score>): SessionOutcome<Score> {
  if (result.ok) {
    return { status: "completed", score: result.score, terminalTick: result.terminalTick, ticks: result.ticks };
  }
  const { error } = result;
  const status = error instanceof NonTerminationError ? "exhausted" : error instanceof CancelledError ? "cancelled" : "failed";
  return { status, error, ticks: result.ticks };
}

function recordedOutcome<Score>(outcome: SessionOutcome<Score>): RecordedOutcome {
  if (outcome.status === "completed") {
    return { status: "completed", score: outcome.score, terminal_tick: outcome.terminalTick };
  }
  return { status: outcome.status, error_code: outcome.error.code, tick: outcome.error.tick };
}

function assertBudget(budget: number): void {
  if (!Number.isInteger(budget) || budget < 0) {
    throw new Error(`Tick budget must be a non-negative integer, got ${budget}`);
  }
}

function missingInitialState(): never {
  throw new Error("Session has no initial state");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
