import type { FrameProjector, ReplayableGame } from "@tickweave/schemas";
import type { ResponsePolicy } from "@tickweave/kernel";

export interface GameOptions {
  /** Seed for games that carry a random generator in their state. */
  seed?: number;
  /** Named difficulty preset. */
  level?: string;
  /** Finish line for games that have one. */
  target?: number;
}

/**
 * Everything a host needs to run one game: the pure rules, how to start,
 * how to read a participant's typed input and how to draw a frame.
 */
export interface GameModule<S, R> {
  readonly game: ReplayableGame<S, R>;
  readonly description: string;
  createInitialState(options?: GameOptions): S;
  /** Turns one line of typed input into a response. Throws on input it cannot read. */
  decodeInput(raw: string): R;
  renderFrame: FrameProjector<S, string>;
  /** Pure policy that plays without a participant. */
  autopilot: ResponsePolicy<S, R>;
}
