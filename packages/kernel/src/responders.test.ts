import { describe, it, expect, vi } from "vitest";
import type { Logger, ParticipantIdentity, RespondContext, SequenceView } from "@tickweave/schemas";
import { InputUnavailableError, TimeoutError } from "@tickweave/schemas";
import {
  LiveResponseProvider,
  PolicyResponseProvider,
  ScriptedResponseProvider,
  latestFrame,
} from "./responders.js";
import { SequenceStore } from "./sequence-store.js";

const player: ParticipantIdentity = { session_id: "sess-1", participant: "player" };

function prefixOf<T>(values: T[]): SequenceView<T> {
  return new SequenceStore<T>("state", { seed: values }).view();
}

function context(tick: number): RespondContext {
  return { tick, signal: new AbortController().signal };
}

function mockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected a rejection");
}

describe("ScriptedResponseProvider", () => {
  it("answers by tick index", () => {
    const scripted = new ScriptedResponseProvider([1, 0, -1]);
    expect([0, 1, 2].map((t) => scripted.respond(player, prefixOf([0]), context(t)))).toEqual([1, 0, -1]);
  });

  it("reports an exhausted script as unavailable input", () => {
    const scripted = new ScriptedResponseProvider(["up", "down", "up"]);
    let caught: unknown;
    try {
      scripted.respond(player, prefixOf([0]), context(3));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InputUnavailableError);
    if (!(caught instanceof InputUnavailableError)) return;
    expect(caught.message).toBe("Script exhausted: no response for tick 3 (script has 3)");
    expect(caught.tick).toBe(3);
  });

  it("falls back once the script runs out", () => {
    const scripted = new ScriptedResponseProvider([5], { onExhausted: 0 });
    expect(scripted.respond(player, prefixOf([0]), context(0))).toBe(5);
    expect(scripted.respond(player, prefixOf([0]), context(7))).toBe(0);
  });

  it("repeats and cycles", () => {
    expect(ScriptedResponseProvider.repeat("stay").respond(player, prefixOf([0]), context(41))).toBe("stay");
    const cycle = ScriptedResponseProvider.cycle([1, 2, 3]);
    expect([0, 1, 2, 3, 4].map((t) => cycle.respond(player, prefixOf([0]), context(t)))).toEqual([1, 2, 3, 1, 2]);
    expect(() => ScriptedResponseProvider.cycle([])).toThrow("Cannot cycle an empty script");
  });
});

describe("PolicyResponseProvider", () => {
  it("decides from the identity and the visible history", () => {
    const policy = vi.fn((identity: ParticipantIdentity, prefix: SequenceView<number>) =>
      `${identity.participant}:${prefix.toArray().join(",")}`);
    const provider = new PolicyResponseProvider(policy);
    expect(provider.respond(player, prefixOf([1, 2]))).toBe("player:1,2");
  });
});

describe("LiveResponseProvider", () => {
  const decode = (raw: string) => (raw === "left" ? -1 : raw === "right" ? 1 : 0);

  it("pushes the newest frame, then polls and decodes", async () => {
    const calls: string[] = [];
    const provider = new LiveResponseProvider<number, number, string>({
      input: { poll: async () => { calls.push("poll"); return "left"; } },
      decode,
      output: {
        capability: { pushFrame: (frame, tick) => { calls.push(`frame ${frame}@${tick}`); } },
        project: latestFrame,
      },
    });
    expect(await provider.respond(player, prefixOf([3, 4]), context(1))).toBe(-1);
    expect(calls).toEqual(["frame 4@1", "poll"]);
  });

  it("sends the newest state when no projector is given", async () => {
    const pushFrame = vi.fn();
    const provider = new LiveResponseProvider<{ lane: number }, number, string>({
      input: { poll: async () => "right" },
      decode,
      output: { capability: { pushFrame } },
    });
    expect(await provider.respond(player, prefixOf([{ lane: 0 }, { lane: 2 }]), context(1))).toBe(1);
    expect(pushFrame.mock.calls).toEqual([[{ lane: 2 }, 1]]);
  });

  it("can push the frame after polling", async () => {
    const calls: string[] = [];
    const provider = new LiveResponseProvider<number, number, string>({
      input: { poll: async () => { calls.push("poll"); return "right"; } },
      decode,
      output: {
        capability: { pushFrame: () => { calls.push("frame"); } },
        project: latestFrame,
        when: "after_poll",
      },
    });
    expect(await provider.respond(player, prefixOf([0]), context(0))).toBe(1);
    expect(calls).toEqual(["poll", "frame"]);
  });

  it("hands the projector the previous and latest states", async () => {
    const project = vi.fn((previous: number | undefined, latest: number) => `${previous ?? "-"}>${latest}`);
    const pushFrame = vi.fn();
    const provider = new LiveResponseProvider<number, number, string, string>({
      input: { poll: async () => "" },
      decode,
      output: { capability: { pushFrame }, project },
    });
    await provider.respond(player, prefixOf([7]), context(0));
    await provider.respond(player, prefixOf([7, 9]), context(1));
    expect(pushFrame.mock.calls).toEqual([["->7", 0], ["7>9", 1]]);
  });

  it("turns a failed poll into unavailable input", async () => {
    const unplugged = new Error("device unplugged");
    const provider = new LiveResponseProvider<number, number, string>({
      input: { poll: async () => { throw unplugged; } },
      decode,
    });
    const err = await rejection(provider.respond(player, prefixOf([0, 1, 2]), context(2)));
    expect(err).toBeInstanceOf(InputUnavailableError);
    if (!(err instanceof InputUnavailableError)) return;
    expect(err.message).toBe("Input unavailable at tick 2: device unplugged");
    expect(err.tick).toBe(2);
    expect(err.cause).toBe(unplugged);
  });

  it("times out a poll that never answers", async () => {
    const provider = new LiveResponseProvider<number, number, string>({
      input: { poll: () => new Promise<string>(() => {}) },
      decode,
      timeoutMs: 10,
    });
    const err = await rejection(provider.respond(player, prefixOf([0]), context(0)));
    expect(err).toBeInstanceOf(InputUnavailableError);
    if (!(err instanceof InputUnavailableError)) return;
    expect(err.message).toBe("Input poll for tick 0 timed out after 10ms");
    expect(err.cause).toBeInstanceOf(TimeoutError);
  });

  it("reports input it cannot decode", async () => {
    const provider = new LiveResponseProvider<number, number, string>({
      input: { poll: async () => "jump" },
      decode: (raw) => {
        throw new Error(`unknown key "${raw}"`);
      },
    });
    const err = await rejection(provider.respond(player, prefixOf([0]), context(0)));
    expect(err).toBeInstanceOf(InputUnavailableError);
    if (!(err instanceof Error)) return;
    expect(err.message).toBe('Could not decode input at tick 0: unknown key "jump"');
  });

  it("logs frame delivery failures and keeps going", async () => {
    const logger = mockLogger();
    const provider = new LiveResponseProvider<number, number, string>({
      input: { poll: async () => "right" },
      decode,
      output: {
        capability: { pushFrame: async () => { throw new Error("screen gone"); } },
        project: latestFrame,
      },
      logger,
    });
    expect(await provider.respond(player, prefixOf([0]), context(0))).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith("Frame delivery failed", { tick: 0, error: "screen gone" });
  });
});
