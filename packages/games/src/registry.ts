import type { GameModule } from "./types.js";
import type { DodgeLevel } from "./levels.js";
import { BUILTIN_LEVELS } from "./levels.js";
import { walker } from "./walker.js";
import { createDodgeModule } from "./dodge.js";

/** Receives a game module with its state and response types intact. */
export type GameVisitor<T> = <S, R>(module: GameModule<S, R>) => T;

/** A game module with its types hidden, so games of different shapes share one registry. */
export interface RegisteredGame {
  readonly name: string;
  readonly description: string;
  use<T>(visitor: GameVisitor<T>): T;
}

export class GameRegistry {
  private games = new Map<string, RegisteredGame>();

  register<S, R>(module: GameModule<S, R>): void {
    const name = module.game.name;
    if (this.games.has(name)) throw new Error(`Game "${name}" is already registered`);
    this.games.set(name, {
      name,
      description: module.description,
      use: (visitor) => visitor(module),
    });
  }

  get(name: string): RegisteredGame | undefined {
    return this.games.get(name);
  }

  require(name: string): RegisteredGame {
    const game = this.games.get(name);
    if (!game) {
      const available = [...this.games.keys()].join(", ") || "(none)";
      throw new Error(`Unknown game "${name}" (available: ${available})`);
    }
    return game;
  }

  list(): RegisteredGame[] {
    return [...this.games.values()];
  }
}

export function createGameRegistry(options?: { dodgeLevels?: readonly DodgeLevel[] }): GameRegistry {
  const registry = new GameRegistry();
  registry.register(walker);
  registry.register(createDodgeModule(options?.dodgeLevels ?? BUILTIN_LEVELS));
  return registry;
}
