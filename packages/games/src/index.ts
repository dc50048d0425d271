export type { GameModule, GameOptions } from "./types.js";
export { nextRandom, normalizeSeed } from "./rng.js";
export type { RandomDraw } from "./rng.js";
export { isInteger, isRecord, parseResponseList } from "./codec.js";
export {
  walker,
  walkerGame,
  decodeWalkerInput,
  renderWalker,
  DEFAULT_WALKER_TARGET,
} from "./walker.js";
export type { WalkerState, WalkerStep } from "./walker.js";
export {
  createDodgeModule,
  createDodgeState,
  decodeDodgeInput,
  dodgeAutopilot,
  dodgeGame,
  renderDodge,
  DEFAULT_DODGE_LEVEL,
  DEFAULT_DODGE_SEED,
} from "./dodge.js";
export type { DodgeMove, DodgeState, Obstacle } from "./dodge.js";
export { BUILTIN_LEVELS, loadLevelsFromFile, mergeLevels } from "./levels.js";
export type { DodgeLevel } from "./levels.js";
export { GameRegistry, createGameRegistry } from "./registry.js";
export type { GameVisitor, RegisteredGame } from "./registry.js";
