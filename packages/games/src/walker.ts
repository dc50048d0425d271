import type { ReplayableGame } from "@tickweave/schemas";
import type { GameModule } from "./types.js";
import { isRecord } from "./codec.js";

export interface WalkerState {
  position: number;
  target: number;
}

/** Signed number of steps taken in one tick. */
export type WalkerStep = number;

export const DEFAULT_WALKER_TARGET = 3;

/** A point on a line that walks until it reaches its target. Scores its final position. */
export const walkerGame: ReplayableGame<WalkerState, WalkerStep> = {
  name: "walker",
  phases: {
    applyResponse: (state, step) => {
      if (!Number.isInteger(step)) throw new Error(`Step must be an integer, got ${step}`);
      return { ...state, position: state.position + step };
    },
    integrate: (state) => state,
    resolveInteractions: (state) => state,
  },
  isTerminal: (state) => state.position >= state.target,
  score: (state) => state.position,
  parseState: (value) => {
    if (!isRecord(value) || typeof value.position !== "number" || typeof value.target !== "number") {
      throw new Error("Expected a walker state with numeric position and target");
    }
    return { position: value.position, target: value.target };
  },
  parseResponse: (value) => {
    if (typeof value !== "number" || !Number.isInteger(value)) {
      throw new Error(`Expected an integer step, got ${JSON.stringify(value)}`);
    }
    return value;
  },
};

export function decodeWalkerInput(raw: string): WalkerStep {
  const text = raw.trim();
  if (text === "") return 1;
  if (!/^[+-]?\d+$/.test(text)) throw new Error(`Not a step: "${text}"`);
  return Number.parseInt(text, 10);
}

export function renderWalker(_previous: WalkerState | undefined, state: WalkerState): string {
  const width = Math.max(state.target, state.position, 0) + 1;
  const track = Array.from({ length: width }, (_, i) => {
    if (i === state.position) return "@";
    return i === state.target ? "|" : ".";
  }).join("");
  const offTrack = state.position < 0 ? `  (${state.position})` : "";
  return `${track}${offTrack}\nposition ${state.position} / target ${state.target}`;
}

export const walker: GameModule<WalkerState, WalkerStep> = {
  game: walkerGame,
  description: "Walk along a line until you reach the target",
  createInitialState: (options) => {
    const target = options?.target ?? DEFAULT_WALKER_TARGET;
    if (!Number.isInteger(target)) throw new Error(`Walker target must be an integer, got ${target}`);
    return { position: 0, target };
  },
  decodeInput: (raw) => decodeWalkerInput(raw),
  renderFrame: renderWalker,
  autopilot: (_identity, prefix) => {
    const latest = prefix.latest();
    return latest && latest.position > latest.target ? -1 : 1;
  },
};
