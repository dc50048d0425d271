import type {
  GameDefinition,
  HistoryPolicy,
  Logger,
  ParticipantIdentity,
  ResponseProvider,
  SequenceIndex,
  SequenceView,
} from "@tickweave/schemas";
import {
  CancelledError,
  EngineError,
  InputUnavailableError,
  NonTerminationError,
  TimeoutError,
  TransitionError,
  errorMessage,
} from "@tickweave/schemas";
import { SequenceStore } from "./sequence-store.js";
import { StateSequenceGenerator } from "./state-generator.js";
import { TerminationDetector } from "./termination.js";

/** Synchronous callbacks fired right after an element is published. */
export interface TickObserver<S, R> {
  onResponse?(tick: SequenceIndex, response: R): void;
  onState?(index: SequenceIndex, state: S): void;
}

export interface SchedulerConfig<S, R, Score> {
  game: GameDefinition<S, R, Score>;
  responder: ResponseProvider<S, R>;
  /** How much history the responder sees. Default: full prefix. */
  historyPolicy?: HistoryPolicy;
  /** Deep-freeze published elements. Default: true */
  freeze?: boolean;
  checkDeterminism?: boolean;
  observer?: TickObserver<S, R>;
  logger?: Logger;
}

/** Published prefixes to continue from. `responses` may run one ahead of the last transition. */
export interface PublishedPrefix<S, R> {
  states: readonly S[];
  responses: readonly R[];
}

export type AdvanceRequest<S, R> = {
  identity: ParticipantIdentity;
  /** Maximum number of ticks this call may execute. */
  tickBudget: number;
  signal?: AbortSignal;
} & ({ initialState: S } | { resumeFrom: PublishedPrefix<S, R> });

export interface TickRecord<S, R> {
  /** Tick whose response was consumed; `state` is state[tick + 1]. */
  tick: SequenceIndex;
  response: R;
  state: S;
  terminal: boolean;
}

interface RunSummary<S, R> {
  /** Ticks executed by this call. */
  ticks: number;
  states: SequenceView<S>;
  responses: SequenceView<R>;
}

export type AdvanceResult<S, R, Score> =
  | (RunSummary<S, R> & { ok: true; score: Score; terminalTick: SequenceIndex })
  | (RunSummary<S, R> & { ok: false; error: EngineError });

/**
 * Drives the mutual dependency between the two sequences. At tick i it
 * requests response[i] from the responder (seeing states up to i), publishes
 * it, computes and publishes state[i+1], then asks the detector about
 * state[i+1]. The only suspension points are the responder call and the
 * transition; both observe the abort signal.
 */
export class Scheduler<S, R, Score = number> {
  private readonly config: SchedulerConfig<S, R, Score>;
  private readonly generator: StateSequenceGenerator<S, R>;

  constructor(config: SchedulerConfig<S, R, Score>) {
    this.config = config;
    this.generator = new StateSequenceGenerator(config.game.phases, {
      checkDeterminism: config.checkDeterminism ?? false,
    });
  }

  async advance(request: AdvanceRequest<S, R>): Promise<AdvanceResult<S, R, Score>> {
    const run = this.ticks(request);
    for (;;) {
      const step = await run.next();
      if (step.done) return step.value;
    }
  }

  /**
   * Pull-based form of {@link advance}: each `next()` computes exactly one
   * more tick. Nothing beyond the last pulled tick is ever computed.
   */
  async *ticks(request: AdvanceRequest<S, R>): AsyncGenerator<TickRecord<S, R>, AdvanceResult<S, R, Score>, void> {
    const { identity, tickBudget } = request;
    if (!Number.isInteger(tickBudget) || tickBudget < 0) {
      throw new Error(`Tick budget must be a non-negative integer, got ${tickBudget}`);
    }
    const freeze = this.config.freeze ?? true;
    const seed = "resumeFrom" in request ? checkPrefix(request.resumeFrom) : { states: [request.initialState], responses: [] };
    const states = new SequenceStore<S>("state", { freeze, seed: seed.states });
    const responses = new SequenceStore<R>("response", { freeze, seed: seed.responses });
    const detector = new TerminationDetector<S, Score>(this.config.game);
    const signal = request.signal ?? new AbortController().signal;
    const window = this.config.historyPolicy?.kind === "window" ? this.config.historyPolicy.size : undefined;
    const logger = this.config.logger;
    let ticks = 0;

    const summary = (): RunSummary<S, R> => ({ ticks, states: states.view(), responses: responses.view() });
    const fail = (error: EngineError): AdvanceResult<S, R, Score> => {
      logger?.debug("Advance stopped", { code: error.code, tick: error.tick, ticks });
      return { ok: false, error, ...summary() };
    };

    const opening = detector.inspect(states);
    if (opening.terminal) {
      return { ok: true, score: opening.score, terminalTick: opening.index, ...summary() };
    }

    for (;;) {
      const tick = states.lastIndex;
      if (signal.aborted) return fail(new CancelledError(tick, abortReason(signal)));
      if (ticks >= tickBudget) return fail(new NonTerminationError(tick, tickBudget));

      const current = states.at(tick);
      if (current === undefined) throw new Error(`state[${tick}] missing from published prefix`);

      // A response published before an interrupted transition is reused, never recomputed
      let response = responses.length > tick ? responses.at(tick) : undefined;
      if (response === undefined) {
        const prefix = states.view({ end: tick, window });
        let value: R;
        try {
          value = await suspend(
            () => this.config.responder.respond(identity, prefix, { tick, signal }),
            signal,
            tick,
          );
        } catch (err) {
          return fail(responseFailure(err, tick, signal));
        }
        try {
          response = responses.publish(tick, value);
        } catch (err) {
          return fail(
            new InputUnavailableError(`Response for tick ${tick} could not be published: ${errorMessage(err)}`, tick, { cause: err }),
          );
        }
        this.config.observer?.onResponse?.(tick, response);
      }

      const consumed = response;
      let next: S;
      try {
        next = await suspend(() => this.generator.next(current, consumed, tick), signal, tick);
      } catch (err) {
        return fail(transitionFailure(err, tick, signal));
      }
      let published: S;
      try {
        published = states.publish(tick + 1, next);
      } catch (err) {
        return fail(
          new TransitionError(`State ${tick + 1} could not be published: ${errorMessage(err)}`, tick, "resolve_interactions", { cause: err }),
        );
      }
      ticks++;
      this.config.observer?.onState?.(tick + 1, published);

      const verdict = detector.inspect(states);
      yield { tick, response: consumed, state: published, terminal: verdict.terminal };
      if (verdict.terminal) {
        logger?.debug("Terminal state reached", { index: verdict.index, ticks });
        return { ok: true, score: verdict.score, terminalTick: verdict.index, ...summary() };
      }
    }
  }
}

/** One-call form: build a scheduler and run it to a score or an error. */
export function advance<S, R, Score>(
  config: SchedulerConfig<S, R, Score>,
  request: AdvanceRequest<S, R>,
): Promise<AdvanceResult<S, R, Score>> {
  return new Scheduler(config).advance(request);
}

function checkPrefix<S, R>(prefix: PublishedPrefix<S, R>): PublishedPrefix<S, R> {
  const { states, responses } = prefix;
  if (states.length === 0) throw new Error("Cannot resume from an empty state prefix");
  if (responses.length !== states.length - 1 && responses.length !== states.length) {
    throw new Error(
      `Inconsistent prefix: ${states.length} states need ${states.length - 1} or ${states.length} responses, got ${responses.length}`,
    );
  }
  return prefix;
}

/**
 * Awaits `work` unless the signal aborts first. Work runs on a microtask, so
 * synchronous throws become rejections.
 */
async function suspend<T>(work: () => T | Promise<T>, signal: AbortSignal, tick: SequenceIndex): Promise<T> {
  if (signal.aborted) throw new CancelledError(tick, abortReason(signal));
  let onAbort: () => void = () => {};
  const cancelled = new Promise<never>((_, reject) => {
    onAbort = () => reject(new CancelledError(tick, abortReason(signal)));
    signal.addEventListener("abort", onAbort, { once: true });
  });
  try {
    return await Promise.race([Promise.resolve().then(work), cancelled]);
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}

function abortReason(signal: AbortSignal): string | undefined {
  const reason: unknown = signal.reason;
  return typeof reason === "string" ? reason : undefined;
}

function responseFailure(err: unknown, tick: SequenceIndex, signal: AbortSignal): EngineError {
  if (err instanceof CancelledError || err instanceof InputUnavailableError) return err;
  if (signal.aborted) return new CancelledError(tick, abortReason(signal));
  if (err instanceof TimeoutError) return new InputUnavailableError(err.message, tick, { cause: err });
  return new InputUnavailableError(`Responder failed at tick ${tick}: ${errorMessage(err)}`, tick, { cause: err });
}

function transitionFailure(err: unknown, tick: SequenceIndex, signal: AbortSignal): EngineError {
  if (err instanceof CancelledError || err instanceof TransitionError) return err;
  if (signal.aborted) return new CancelledError(tick, abortReason(signal));
  return new TransitionError(`Transition failed at tick ${tick}: ${errorMessage(err)}`, tick, "apply_response", { cause: err });
}
