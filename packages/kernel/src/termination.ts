import type { GameDefinition, SequenceIndex } from "@tickweave/schemas";

/** The parts of a sequence the detector may touch: the newest element only. */
export interface PublishedTip<S> {
  readonly lastIndex: SequenceIndex;
  latest(): S | undefined;
}

export type TerminalVerdict<Score> =
  | { terminal: false; index: SequenceIndex }
  | { terminal: true; index: SequenceIndex; score: Score };

/**
 * Applies `isTerminal` to the most recently published state and nothing
 * else. Each index is inspected at most once, and `score` runs exactly once,
 * on the first terminal state.
 */
export class TerminationDetector<S, Score> {
  private readonly game: Pick<GameDefinition<S, unknown, Score>, "isTerminal" | "score">;
  private lastInspected: SequenceIndex = -1;
  private verdict: TerminalVerdict<Score> | null = null;

  constructor(game: Pick<GameDefinition<S, unknown, Score>, "isTerminal" | "score">) {
    this.game = game;
  }

  inspect(states: PublishedTip<S>): TerminalVerdict<Score> {
    if (this.verdict?.terminal) return this.verdict;
    const index = states.lastIndex;
    if (index <= this.lastInspected && this.verdict) return this.verdict;

    const latest = states.latest();
    if (latest === undefined) return { terminal: false, index };
    this.lastInspected = index;
    this.verdict = this.game.isTerminal(latest)
      ? { terminal: true, index, score: this.game.score(latest) }
      : { terminal: false, index };
    return this.verdict;
  }

  get inspectedThrough(): SequenceIndex {
    return this.lastInspected;
  }
}
