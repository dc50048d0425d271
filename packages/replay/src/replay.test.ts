import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm } from "node:fs/promises";
import { Journal } from "@tickweave/journal";
import { Kernel, ScriptedResponseProvider } from "@tickweave/kernel";
import type { Logger, ReplayableGame, ResponseProvider, SessionRecord } from "@tickweave/schemas";
import { SESSION_RECORD_FORMAT, hashValue } from "@tickweave/schemas";
import { recordFromJournal } from "./from-journal.js";
import { replaySession } from "./replay.js";
import { parseSessionRecord, readSessionRecord, serializeSessionRecord, writeSessionRecord } from "./session-record.js";

interface Walker {
  position: number;
}

const walker: ReplayableGame<Walker, number> = {
  name: "walker",
  phases: {
    applyResponse: (s, r) => ({ position: s.position + r }),
    integrate: (s) => s,
    resolveInteractions: (s) => s,
  },
  isTerminal: (s) => s.position >= 5,
  score: (s) => s.position * 10,
  parseState: (value) => {
    if (typeof value !== "object" || value === null || !("position" in value) || typeof value.position !== "number") {
      throw new Error("not a walker state");
    }
    return { position: value.position };
  },
  parseResponse: (value) => {
    if (typeof value !== "number") throw new Error("not a step");
    return value;
  },
};

function mockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

async function playedRecord(kernel: Kernel, script: number[], tickBudget = 20): Promise<SessionRecord> {
  const session = await kernel.createSession({
    game: walker,
    responder: new ScriptedResponseProvider(script),
    initialState: { position: 0 },
    tickBudget,
  });
  await session.run();
  return session.toRecord();
}

describe("session records", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tickweave-replay-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("round-trip through a file", async () => {
    const record = await playedRecord(new Kernel({ logger: mockLogger() }), [2, 1, 2]);
    const file = join(dir, "records", "walker.json");
    await writeSessionRecord(file, record);
    expect(await readSessionRecord(file)).toEqual(JSON.parse(serializeSessionRecord(record)));
  });

  it("reject text that is not JSON", () => {
    expect(() => parseSessionRecord("{oops")).toThrow(/^Session record is not valid JSON: /);
  });

  it("reject a record with the wrong format tag", () => {
    const bad = {
      format: "tickweave.session/0",
      game: "walker",
      identity: { session_id: "sess-1", participant: "player" },
      initial_state: { position: 0 },
      responses: [],
      recorded_at: new Date().toISOString(),
    };
    expect(() => parseSessionRecord(bad)).toThrow(/^Invalid session record: \/format: /);
  });

  it("accept a minimal record", () => {
    const minimal = {
      format: SESSION_RECORD_FORMAT,
      game: "walker",
      identity: { session_id: "sess-1", participant: "player" },
      initial_state: { position: 0 },
      responses: [1, 1],
      recorded_at: "2026-01-01T00:00:00.000Z",
    };
    expect(parseSessionRecord(JSON.stringify(minimal))).toEqual(minimal);
  });
});

describe("replaySession", () => {
  it("reproduces a completed session bit for bit", async () => {
    const record = parseSessionRecord(serializeSessionRecord(await playedRecord(new Kernel({ logger: mockLogger() }), [2, 1, 2])));
    const report = await replaySession(record, walker);
    expect(report.reproduced).toBe(true);
    expect(report.divergedAt).toBeUndefined();
    expect(report.outcome).toEqual({ status: "completed", score: 50, terminalTick: 3, ticks: 3 });
    expect(report.states).toEqual([{ position: 0 }, { position: 2 }, { position: 3 }, { position: 5 }]);
  });

  it("reproduces an exhausted session", async () => {
    const record = await playedRecord(new Kernel({ logger: mockLogger() }), [1, 1], 2);
    expect(record.outcome).toEqual({ status: "exhausted", error_code: "NON_TERMINATION", tick: 2 });
    const report = await replaySession(record, walker);
    expect(report.reproduced).toBe(true);
    expect(report.outcome.status).toBe("exhausted");
  });

  it("reproduces a session that was cancelled mid-run", async () => {
    const kernel = new Kernel({ logger: mockLogger() });
    let stalled: () => void = () => {};
    const reached = new Promise<void>((resolve) => { stalled = resolve; });
    const responder: ResponseProvider<Walker, number> = {
      respond: (_id, _prefix, { tick }) => {
        if (tick < 2) return 1;
        stalled();
        return new Promise<number>(() => {});
      },
    };
    const session = await kernel.createSession({ game: walker, responder, initialState: { position: 0 } });
    const running = session.run();
    await reached;
    await session.cancel("quit");
    await running;

    const report = await replaySession(session.toRecord(), walker);
    expect(report.reproduced).toBe(true);
    expect(report.states).toEqual([{ position: 0 }, { position: 1 }, { position: 2 }]);
  });

  it("reports where a tampered response makes the run diverge", async () => {
    const record = await playedRecord(new Kernel({ logger: mockLogger() }), [1, 1, 1, 1, 1]);
    const tampered = { ...record, responses: [1, 1, 2, 1, 1] };
    const logger = mockLogger();
    const report = await replaySession(tampered, walker, { logger });
    expect(report.reproduced).toBe(false);
    expect(report.divergedAt).toBe(3);
    expect(logger.warn).toHaveBeenCalledWith("Replay diverged from record", {
      session_id: record.identity.session_id,
      diverged_at: 3,
    });
  });

  it("reports a changed game rule through the outcome", async () => {
    const record = await playedRecord(new Kernel({ logger: mockLogger() }), [1, 1, 1, 1, 1]);
    const { state_hashes: _ignored, ...withoutHashes } = record;
    const report = await replaySession(withoutHashes, { ...walker, score: (s: Walker) => s.position });
    expect(report.reproduced).toBe(false);
    expect(report.divergedAt).toBe(5);
  });

  it("refuses a record for another game", async () => {
    const record = await playedRecord(new Kernel({ logger: mockLogger() }), [5]);
    await expect(replaySession({ ...record, game: "dodge" }, walker)).rejects.toThrow(
      'Record is for game "dodge", not "walker"',
    );
  });
});

describe("recordFromJournal", () => {
  let dir: string;
  let journal: Journal;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tickweave-record-"));
    journal = new Journal(join(dir, "events.jsonl"), { fsync: false });
    await journal.init();
  });

  afterEach(async () => {
    await journal.close();
    await rm(dir, { recursive: true, force: true });
  });

  it("rebuilds the same record the session produces", async () => {
    const kernel = new Kernel({ journal, logger: mockLogger() });
    const session = await kernel.createSession({
      game: walker,
      responder: new ScriptedResponseProvider([3, 0, 2]),
      initialState: { position: 0 },
    });
    await session.run();

    const fromSession = session.toRecord();
    const fromJournal = recordFromJournal(journal, session.identity.session_id);
    expect({ ...fromJournal, recorded_at: "" }).toEqual({ ...JSON.parse(serializeSessionRecord(fromSession)), recorded_at: "" });
    expect(fromJournal.state_hashes?.[0]).toBe(hashValue({ position: 0 }));

    const report = await replaySession(fromJournal, walker);
    expect(report.reproduced).toBe(true);
  });

  it("leaves out the outcome of a session that has not finished", async () => {
    await journal.emit("sess-open", "session.created", {
      game: "walker",
      identity: { session_id: "sess-open", participant: "player" },
      initial_state: { position: 0 },
      tick_budget: 10,
    });
    await journal.emit("sess-open", "tick.response_published", { tick: 0, response: 4 });
    const record = recordFromJournal(journal, "sess-open");
    expect(record.responses).toEqual([4]);
    expect(record.outcome).toBeUndefined();
    expect(record.state_hashes).toEqual([hashValue({ position: 0 })]);
  });

  it("fails for a session the journal never saw", () => {
    expect(() => recordFromJournal(journal, "sess-missing")).toThrow("No session.created event for session sess-missing");
  });
});
