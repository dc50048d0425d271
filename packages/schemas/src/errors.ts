import type { SequenceIndex, TransitionPhase } from "./types.js";

export type EngineErrorCode =
  | "TRANSITION_FAILED"
  | "INPUT_UNAVAILABLE"
  | "NON_TERMINATION"
  | "CANCELLED";

/**
 * Base for every way an `advance` call can end without a score.
 * `tick` is the index of the state that was current when the run stopped.
 */
export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;
  readonly tick: SequenceIndex;

  constructor(message: string, tick: SequenceIndex, options?: { cause?: unknown }) {
    super(message, options);
    this.tick = tick;
  }

  toJSON(): Record<string, unknown> {
    return { code: this.code, message: this.message, tick: this.tick };
  }
}

export class TransitionError extends EngineError {
  readonly code = "TRANSITION_FAILED";
  readonly phase: TransitionPhase;

  constructor(message: string, tick: SequenceIndex, phase: TransitionPhase, options?: { cause?: unknown }) {
    super(message, tick, options);
    this.name = "TransitionError";
    this.phase = phase;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), phase: this.phase };
  }
}

export class InputUnavailableError extends EngineError {
  readonly code = "INPUT_UNAVAILABLE";

  constructor(message: string, tick: SequenceIndex, options?: { cause?: unknown }) {
    super(message, tick, options);
    this.name = "InputUnavailableError";
  }
}

/** Budget ran out before a terminal state. A policy signal, not a defect. */
export class NonTerminationError extends EngineError {
  readonly code = "NON_TERMINATION";
  readonly budget: number;

  constructor(tick: SequenceIndex, budget: number) {
    super(`No terminal state after ${budget} ticks (last state index ${tick})`, tick);
    this.name = "NonTerminationError";
    this.budget = budget;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), budget: this.budget };
  }
}

export class CancelledError extends EngineError {
  readonly code = "CANCELLED";

  constructor(tick: SequenceIndex, reason?: string) {
    super(reason ? `Cancelled at tick ${tick}: ${reason}` : `Cancelled at tick ${tick}`, tick);
    this.name = "CancelledError";
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
