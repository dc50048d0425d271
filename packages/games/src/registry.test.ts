import { describe, it, expect } from "vitest";
import { GameRegistry, createGameRegistry } from "./registry.js";
import { walker } from "./walker.js";

describe("GameRegistry", () => {
  it("registers the bundled games", () => {
    const registry = createGameRegistry();
    expect(registry.list().map((g) => g.name)).toEqual(["walker", "dodge"]);
    expect(registry.get("dodge")?.description).toBe("Sidestep falling obstacles (levels: easy, normal, hard)");
  });

  it("hands the typed module to a visitor", () => {
    const registry = createGameRegistry();
    const frame = registry.require("walker").use<string>((module) => module.renderFrame(undefined, module.createInitialState()));
    expect(frame).toBe("@..|\nposition 0 / target 3");
  });

  it("uses custom dodge levels", () => {
    const registry = createGameRegistry({
      dodgeLevels: [{ name: "solo", lanes: 1, rows: 2, lives: 1, goal: 1, spawn_chance: 0 }],
    });
    const lanes = registry.require("dodge").use<string | undefined>((module) => {
      const state = module.createInitialState({ level: "solo" });
      return module.renderFrame(undefined, state).split("\n")[0];
    });
    expect(lanes).toBe("|.|");
  });

  it("refuses duplicate and unknown games", () => {
    const registry = new GameRegistry();
    registry.register(walker);
    expect(() => registry.register(walker)).toThrow('Game "walker" is already registered');
    expect(() => registry.require("pong")).toThrow('Unknown game "pong" (available: walker)');
    expect(registry.get("pong")).toBeUndefined();
  });
});
