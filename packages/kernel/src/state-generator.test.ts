import { describe, it, expect } from "vitest";
import type { TransitionPhases } from "@tickweave/schemas";
import { TransitionError } from "@tickweave/schemas";
import { StateSequenceGenerator, transition } from "./state-generator.js";

const tracing: TransitionPhases<string, string> = {
  applyResponse: (s, r) => `${s}a${r}`,
  integrate: (s) => `${s}i`,
  resolveInteractions: (s) => `${s}r`,
};

describe("StateSequenceGenerator", () => {
  it("runs apply, integrate and resolve in that order", () => {
    const generator = new StateSequenceGenerator(tracing);
    expect(generator.next("", "x", 0)).toBe("axir");
    expect(generator.next("axir", "y", 1)).toBe("axirayir");
  });

  it("wraps a phase failure with the phase and tick", () => {
    const boom = new Error("boom");
    const generator = new StateSequenceGenerator<string, string>({
      ...tracing,
      integrate: () => {
        throw boom;
      },
    });
    let caught: unknown;
    try {
      generator.next("", "x", 4);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(TransitionError);
    if (!(caught instanceof TransitionError)) return;
    expect(caught.message).toBe("integrate failed at tick 4: boom");
    expect(caught.phase).toBe("integrate");
    expect(caught.tick).toBe(4);
    expect(caught.cause).toBe(boom);
  });

  it("lets a TransitionError raised by a phase through unchanged", () => {
    const original = new TransitionError("enemy 3 does not exist", 2, "resolve_interactions");
    const generator = new StateSequenceGenerator<string, string>({
      ...tracing,
      resolveInteractions: () => {
        throw original;
      },
    });
    expect(() => generator.next("", "x", 2)).toThrow(original);
  });

  it("rejects a phase that returns nothing", () => {
    const generator = new StateSequenceGenerator<string | null, string>({
      applyResponse: () => null,
      integrate: (s) => s,
      resolveInteractions: (s) => s,
    });
    expect(() => generator.next("start", "x", 0)).toThrow("apply_response returned no state at tick 0");
  });

  it("flags a phase with hidden state when determinism checking is on", () => {
    let counter = 0;
    const leaky: TransitionPhases<number, number> = {
      applyResponse: (s, r) => s + r,
      integrate: (s) => s + counter++,
      resolveInteractions: (s) => s,
    };
    const generator = new StateSequenceGenerator(leaky, { checkDeterminism: true });
    expect(() => generator.next(0, 1, 2)).toThrow(
      "Transition at tick 2 is not deterministic: identical inputs produced different states",
    );
  });

  it("accepts pure phases when determinism checking is on", () => {
    const generator = new StateSequenceGenerator(tracing, { checkDeterminism: true });
    expect(generator.next("", "z", 0)).toBe("azir");
  });
});

describe("transition", () => {
  it("computes a single step", () => {
    expect(transition(tracing, "s", "q", 9)).toBe("saqir");
  });
});
