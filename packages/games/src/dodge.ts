import type { ReplayableGame, SequenceView } from "@tickweave/schemas";
import type { GameModule, GameOptions } from "./types.js";
import type { DodgeLevel } from "./levels.js";
import { BUILTIN_LEVELS } from "./levels.js";
import { isInteger, isRecord } from "./codec.js";
import { nextRandom, normalizeSeed } from "./rng.js";

export interface Obstacle {
  lane: number;
  /** Distance from the player row. Row 0 is where collisions happen. */
  row: number;
}

export interface DodgeState {
  lanes: number;
  rows: number;
  spawnChance: number;
  goal: number;
  lane: number;
  lives: number;
  dodged: number;
  /** Obstacles that hit the player on the last tick. */
  hits: number;
  obstacles: Obstacle[];
  /** Generator seed carried forward so transitions stay pure. */
  rng: number;
}

export type DodgeMove = -1 | 0 | 1;

export const DEFAULT_DODGE_LEVEL = "normal";
export const DEFAULT_DODGE_SEED = 1;

function isMove(value: unknown): value is DodgeMove {
  return value === -1 || value === 0 || value === 1;
}

function isObstacle(value: unknown): value is Obstacle {
  return isRecord(value) && isInteger(value.lane) && isInteger(value.row);
}

/**
 * Obstacles fall down lanes toward the player, who sidesteps them. Each tick:
 * the move shifts the player, obstacles fall one row and maybe a new one
 * spawns, then everything on the player row either hits or counts as dodged.
 */
export const dodgeGame: ReplayableGame<DodgeState, DodgeMove> = {
  name: "dodge",
  phases: {
    applyResponse: (state, move) => {
      if (!isMove(move)) throw new Error(`Move must be -1, 0 or 1, got ${String(move)}`);
      const lane = Math.min(state.lanes - 1, Math.max(0, state.lane + move));
      return { ...state, lane };
    },

    integrate: (state) => {
      const obstacles = state.obstacles.map((o) => ({ lane: o.lane, row: o.row - 1 }));
      const spawn = nextRandom(state.rng);
      let rng = spawn.seed;
      if (spawn.value < state.spawnChance) {
        const pick = nextRandom(rng);
        rng = pick.seed;
        obstacles.push({ lane: Math.floor(pick.value * state.lanes), row: state.rows - 1 });
      }
      return { ...state, obstacles, rng };
    },

    resolveInteractions: (state) => {
      let hits = 0;
      let dodged = 0;
      const remaining: Obstacle[] = [];
      for (const obstacle of state.obstacles) {
        if (obstacle.lane < 0 || obstacle.lane >= state.lanes) {
          throw new Error(`Obstacle in lane ${obstacle.lane} is outside lanes 0..${state.lanes - 1}`);
        }
        if (obstacle.row > 0) remaining.push(obstacle);
        else if (obstacle.lane === state.lane) hits++;
        else dodged++;
      }
      return {
        ...state,
        obstacles: remaining,
        hits,
        lives: Math.max(0, state.lives - hits),
        dodged: state.dodged + dodged,
      };
    },
  },

  isTerminal: (state) => state.lives === 0 || state.dodged >= state.goal,

  // Surviving lives only count for a win
  score: (state) => state.dodged * 10 + (state.dodged >= state.goal ? state.lives * 50 : 0),

  parseState: (value) => {
    if (!isRecord(value)) throw new Error("Expected a dodge state object");
    const { lanes, rows, spawnChance, goal, lane, lives, dodged, hits, obstacles, rng } = value;
    if (
      !isInteger(lanes) || !isInteger(rows) || typeof spawnChance !== "number" || !isInteger(goal)
      || !isInteger(lane) || !isInteger(lives) || !isInteger(dodged) || !isInteger(hits) || !isInteger(rng)
    ) {
      throw new Error("Dodge state has missing or non-numeric fields");
    }
    if (!Array.isArray(obstacles) || !obstacles.every(isObstacle)) {
      throw new Error("Dodge state obstacles must be { lane, row } pairs");
    }
    return {
      lanes, rows, spawnChance, goal, lane, lives, dodged, hits,
      obstacles: obstacles.map((o) => ({ lane: o.lane, row: o.row })),
      rng,
    };
  },

  parseResponse: (value) => {
    if (!isMove(value)) throw new Error(`Expected a move of -1, 0 or 1, got ${JSON.stringify(value)}`);
    return value;
  },
};

export function createDodgeState(level: DodgeLevel, seed: number = DEFAULT_DODGE_SEED): DodgeState {
  return {
    lanes: level.lanes,
    rows: level.rows,
    spawnChance: level.spawn_chance,
    goal: level.goal,
    lane: Math.floor(level.lanes / 2),
    lives: level.lives,
    dodged: 0,
    hits: 0,
    obstacles: [],
    rng: normalizeSeed(seed),
  };
}

const MOVE_WORDS: Record<string, DodgeMove> = {
  a: -1, h: -1, left: -1, "<": -1,
  "": 0, s: 0, ".": 0, stay: 0,
  d: 1, l: 1, right: 1, ">": 1,
};

export function decodeDodgeInput(raw: string): DodgeMove {
  const word = raw.trim().toLowerCase();
  if (!Object.hasOwn(MOVE_WORDS, word)) throw new Error(`Unknown move "${word}" (use a, s or d)`);
  return MOVE_WORDS[word] ?? 0;
}

/** Draws the field top row first with the player on the bottom row. */
export function renderDodge(previous: DodgeState | undefined, state: DodgeState): string {
  const lines: string[] = [];
  for (let row = state.rows - 1; row >= 0; row--) {
    const cells = Array.from({ length: state.lanes }, (_, lane) => {
      if (row === 0 && lane === state.lane) return "@";
      return state.obstacles.some((o) => o.lane === lane && o.row === row) ? "#" : ".";
    });
    lines.push(`|${cells.join("")}|`);
  }
  let status = `lives ${state.lives}  dodged ${state.dodged}/${state.goal}`;
  if (state.hits > 0) status += "  hit!";
  else if (previous && state.dodged > previous.dodged) status += "  dodged!";
  lines.push(status);
  return lines.join("\n");
}

/** Row of the nearest obstacle in a lane, or Infinity when the lane is clear. */
function threat(state: DodgeState, lane: number): number {
  let nearest = Infinity;
  for (const o of state.obstacles) {
    if (o.lane === lane && o.row < nearest) nearest = o.row;
  }
  return nearest;
}

/**
 * Stays put unless the next falling obstacle is in its lane, then moves to the
 * neighbouring lane whose nearest obstacle is furthest away (left on a tie).
 */
export function dodgeAutopilot(_identity: unknown, prefix: SequenceView<DodgeState>): DodgeMove {
  const state = prefix.latest();
  if (!state || threat(state, state.lane) > 1) return 0;
  let best: DodgeMove = 0;
  let bestThreat = threat(state, state.lane);
  for (const move of [-1, 1] as const) {
    const lane = state.lane + move;
    if (lane < 0 || lane >= state.lanes) continue;
    const t = threat(state, lane);
    if (t > bestThreat) {
      best = move;
      bestThreat = t;
    }
  }
  return best;
}

export function createDodgeModule(levels: readonly DodgeLevel[] = BUILTIN_LEVELS): GameModule<DodgeState, DodgeMove> {
  const findLevel = (name: string): DodgeLevel => {
    const level = levels.find((l) => l.name === name);
    if (!level) {
      throw new Error(`Unknown dodge level "${name}" (available: ${levels.map((l) => l.name).join(", ")})`);
    }
    return level;
  };
  return {
    game: dodgeGame,
    description: `Sidestep falling obstacles (levels: ${levels.map((l) => l.name).join(", ")})`,
    createInitialState: (options?: GameOptions) =>
      createDodgeState(findLevel(options?.level ?? DEFAULT_DODGE_LEVEL), options?.seed ?? DEFAULT_DODGE_SEED),
    decodeInput: decodeDodgeInput,
    renderFrame: renderDodge,
    autopilot: dodgeAutopilot,
  };
}
