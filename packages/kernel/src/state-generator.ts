import type { SequenceIndex, TransitionPhase, TransitionPhases } from "@tickweave/schemas";
import { TransitionError, errorMessage, hashValue } from "@tickweave/schemas";

export interface StateGeneratorOptions {
  /**
   * Run every transition twice and compare the results. Catches phases that
   * read a clock, randomness or other hidden input. Doubles transition cost.
   */
  checkDeterminism?: boolean;
}

/**
 * Computes state[i+1] from state[i] and response[i] by running the three
 * phases in their fixed order: apply the response, integrate motion, then
 * resolve interactions.
 */
export class StateSequenceGenerator<S, R> {
  private readonly phases: TransitionPhases<S, R>;
  private readonly checkDeterminism: boolean;

  constructor(phases: TransitionPhases<S, R>, options?: StateGeneratorOptions) {
    this.phases = phases;
    this.checkDeterminism = options?.checkDeterminism ?? false;
  }

  next(state: S, response: R, tick: SequenceIndex): S {
    const next = this.transition(state, response, tick);
    if (this.checkDeterminism && hashValue(this.transition(state, response, tick)) !== hashValue(next)) {
      throw new TransitionError(
        `Transition at tick ${tick} is not deterministic: identical inputs produced different states`,
        tick,
        "resolve_interactions",
      );
    }
    return next;
  }

  private transition(state: S, response: R, tick: SequenceIndex): S {
    const applied = this.runPhase("apply_response", tick, () => this.phases.applyResponse(state, response, tick));
    const integrated = this.runPhase("integrate", tick, () => this.phases.integrate(applied, tick));
    return this.runPhase("resolve_interactions", tick, () => this.phases.resolveInteractions(integrated, tick));
  }

  private runPhase(phase: TransitionPhase, tick: SequenceIndex, fn: () => S): S {
    let result: S;
    try {
      result = fn();
    } catch (err) {
      if (err instanceof TransitionError) throw err;
      throw new TransitionError(`${phase} failed at tick ${tick}: ${errorMessage(err)}`, tick, phase, { cause: err });
    }
    if (result === undefined || result === null) {
      throw new TransitionError(`${phase} returned no state at tick ${tick}`, tick, phase);
    }
    return result;
  }
}

/** One-shot form of {@link StateSequenceGenerator.next}. */
export function transition<S, R>(
  phases: TransitionPhases<S, R>,
  state: S,
  response: R,
  tick: SequenceIndex,
): S {
  return new StateSequenceGenerator(phases).next(state, response, tick);
}
