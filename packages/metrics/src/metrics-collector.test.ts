import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm } from "node:fs/promises";
import { Registry } from "prom-client";
import { Journal } from "@tickweave/journal";
import type { JournalEvent } from "@tickweave/schemas";
import { MetricsCollector } from "./metrics-collector.js";

function makeEvent(
  type: JournalEvent["type"],
  payload: Record<string, unknown> = {},
  overrides: Partial<JournalEvent> = {}
): JournalEvent {
  return {
    event_id: "evt-1",
    timestamp: new Date().toISOString(),
    session_id: "sess-1",
    type,
    payload,
    ...overrides,
  };
}

async function values(registry: Registry, name: string) {
  const metric = registry.getSingleMetric(name);
  if (!metric) throw new Error(`metric ${name} is not registered`);
  const { values: samples } = await metric.get();
  return samples.map((s) => ({ labels: { ...s.labels }, value: s.value }));
}

function playTicks(collector: MetricsCollector, sessionId: string, ticks: number): void {
  for (let tick = 0; tick < ticks; tick++) {
    collector.handleEvent(makeEvent("tick.response_published", { tick, response: 1 }, { session_id: sessionId }));
    collector.handleEvent(makeEvent("tick.state_published", { tick: tick + 1, state_hash: "h" }, { session_id: sessionId }));
  }
}

describe("MetricsCollector", () => {
  let collector: MetricsCollector;
  let registry: Registry;

  beforeEach(() => {
    registry = new Registry();
    collector = new MetricsCollector({ registry, collectDefault: false });
  });

  // ─── Session Metrics ─────────────────────────────────────────────

  describe("session metrics", () => {
    it("counts created sessions and tracks them as active", async () => {
      collector.handleEvent(makeEvent("session.created", { game: "walker" }));
      expect(await values(registry, "tickweave_sessions_total")).toEqual([{ labels: { status: "created" }, value: 1 }]);
      expect(await values(registry, "tickweave_sessions_active")).toEqual([{ labels: {}, value: 1 }]);
    });

    it("counts a session out when it finishes", async () => {
      collector.handleEvent(makeEvent("session.created", { game: "walker" }));
      collector.handleEvent(makeEvent("session.completed", { score: 3, terminal_tick: 3, ticks: 3 }));
      expect(await values(registry, "tickweave_sessions_active")).toEqual([{ labels: {}, value: 0 }]);
      expect(await values(registry, "tickweave_sessions_total")).toEqual([
        { labels: { status: "created" }, value: 1 },
        { labels: { status: "completed" }, value: 1 },
      ]);
    });

    it("counts an extended session back in", async () => {
      collector.handleEvent(makeEvent("session.created", { game: "walker" }));
      collector.handleEvent(makeEvent("session.exhausted", { code: "NON_TERMINATION", tick: 2 }));
      collector.handleEvent(makeEvent("session.resumed", { from_tick: 2, tick_budget: 5 }));
      expect(await values(registry, "tickweave_sessions_active")).toEqual([{ labels: {}, value: 1 }]);
    });

    it("counts an exhausted session out only once when it is then cancelled", async () => {
      collector.handleEvent(makeEvent("session.created", { game: "walker" }));
      playTicks(collector, "sess-1", 2);
      collector.handleEvent(makeEvent("session.exhausted", { code: "NON_TERMINATION", tick: 2 }));
      collector.handleEvent(makeEvent("session.cancelled", { code: "CANCELLED", tick: 2 }));
      expect(await values(registry, "tickweave_sessions_active")).toEqual([{ labels: {}, value: 0 }]);
      expect(await values(registry, "tickweave_sessions_total")).toEqual([
        { labels: { status: "created" }, value: 1 },
        { labels: { status: "exhausted" }, value: 1 },
        { labels: { status: "cancelled" }, value: 1 },
      ]);
      const text = await registry.getSingleMetricAsString("tickweave_session_ticks");
      expect(text).toContain('tickweave_session_ticks_count{status="exhausted"} 1');
      expect(text).not.toContain('status="cancelled"');
      playTicks(collector, "sess-1", 1);
      expect(await values(registry, "tickweave_ticks_total")).toEqual([
        { labels: { game: "walker" }, value: 2 },
        { labels: { game: "unknown" }, value: 1 },
      ]);
    });

    it("does not count a resumed session in twice", async () => {
      collector.handleEvent(makeEvent("session.resumed", { from_tick: 3, tick_budget: 5, recovered: true }));
      collector.handleEvent(makeEvent("session.resumed", { from_tick: 3, tick_budget: 5, recovered: true }));
      expect(await values(registry, "tickweave_sessions_active")).toEqual([{ labels: {}, value: 1 }]);
      collector.handleEvent(makeEvent("session.completed", { score: 3, terminal_tick: 4, ticks: 1 }));
      expect(await values(registry, "tickweave_sessions_active")).toEqual([{ labels: {}, value: 0 }]);
    });

    it("observes ticks per run in the histogram", async () => {
      collector.handleEvent(makeEvent("session.created", { game: "walker" }));
      playTicks(collector, "sess-1", 3);
      collector.handleEvent(makeEvent("session.completed", { score: 3, terminal_tick: 3, ticks: 3 }));
      const text = await registry.getSingleMetricAsString("tickweave_session_ticks");
      expect(text).toContain('tickweave_session_ticks_sum{status="completed"} 3');
      expect(text).toContain('tickweave_session_ticks_count{status="completed"} 1');
      expect(text).toContain('tickweave_session_ticks_bucket{le="5",status="completed"} 1');
    });
  });

  // ─── Tick Metrics ────────────────────────────────────────────────

  describe("tick metrics", () => {
    it("labels ticks and responses with the session's game", async () => {
      collector.handleEvent(makeEvent("session.created", { game: "walker" }, { session_id: "a" }));
      collector.handleEvent(makeEvent("session.created", { game: "dodge" }, { session_id: "b" }));
      playTicks(collector, "a", 2);
      playTicks(collector, "b", 1);
      expect(await values(registry, "tickweave_ticks_total")).toEqual([
        { labels: { game: "walker" }, value: 2 },
        { labels: { game: "dodge" }, value: 1 },
      ]);
      expect(await values(registry, "tickweave_responses_total")).toEqual([
        { labels: { game: "walker" }, value: 2 },
        { labels: { game: "dodge" }, value: 1 },
      ]);
    });

    it("keeps the game of an exhausted session for its next run", async () => {
      collector.handleEvent(makeEvent("session.created", { game: "dodge" }));
      collector.handleEvent(makeEvent("session.exhausted", { code: "NON_TERMINATION", tick: 0 }));
      collector.handleEvent(makeEvent("session.resumed", { from_tick: 0, tick_budget: 1 }));
      playTicks(collector, "sess-1", 1);
      expect(await values(registry, "tickweave_ticks_total")).toEqual([{ labels: { game: "dodge" }, value: 1 }]);
    });

    it("falls back to an unknown game for sessions it never saw created", async () => {
      playTicks(collector, "stranger", 1);
      expect(await values(registry, "tickweave_ticks_total")).toEqual([{ labels: { game: "unknown" }, value: 1 }]);
    });
  });

  // ─── Error Metrics ───────────────────────────────────────────────

  describe("error metrics", () => {
    it("counts runs that ended without a score by error code", async () => {
      collector.handleEvent(makeEvent("session.exhausted", { code: "NON_TERMINATION", tick: 100 }, { session_id: "a" }));
      collector.handleEvent(makeEvent("session.failed", { code: "TRANSITION_FAILED", tick: 4 }, { session_id: "b" }));
      collector.handleEvent(makeEvent("session.cancelled", { code: "CANCELLED", tick: 5 }, { session_id: "c" }));
      collector.handleEvent(makeEvent("session.failed", { code: "TRANSITION_FAILED", tick: 1 }, { session_id: "d" }));
      expect(await values(registry, "tickweave_errors_total")).toEqual([
        { labels: { kind: "NON_TERMINATION" }, value: 1 },
        { labels: { kind: "TRANSITION_FAILED" }, value: 2 },
        { labels: { kind: "CANCELLED" }, value: 1 },
      ]);
    });
  });

  // ─── Registry Handling ───────────────────────────────────────────

  describe("registry", () => {
    it("honours a custom prefix", async () => {
      const custom = new Registry();
      const prefixed = new MetricsCollector({ registry: custom, prefix: "game_", collectDefault: false });
      prefixed.handleEvent(makeEvent("session.created", { game: "walker" }));
      expect(custom.getSingleMetric("game_sessions_total")).toBeDefined();
      expect(custom.getSingleMetric("tickweave_sessions_total")).toBeUndefined();
    });

    it("collects process metrics by default", async () => {
      const withDefaults = new MetricsCollector({ registry: new Registry() });
      expect(await withDefaults.getMetrics()).toContain("tickweave_process_cpu_user_seconds_total");
    });

    it("exposes the Prometheus content type", () => {
      expect(collector.getContentType()).toContain("text/plain");
      expect(collector.getRegistry()).toBe(registry);
    });

    it("reset clears values and tracking", async () => {
      collector.handleEvent(makeEvent("session.created", { game: "walker" }));
      collector.reset();
      playTicks(collector, "sess-1", 1);
      expect(await values(registry, "tickweave_ticks_total")).toEqual([{ labels: { game: "unknown" }, value: 1 }]);
    });
  });
});

describe("MetricsCollector.attach", () => {
  let dir: string;
  let journal: Journal;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tickweave-metrics-"));
    journal = new Journal(join(dir, "events.jsonl"), { fsync: false });
    await journal.init();
  });

  afterEach(async () => {
    await journal.close();
    await rm(dir, { recursive: true, force: true });
  });

  it("follows journal events until detached", async () => {
    const registry = new Registry();
    const collector = new MetricsCollector({ registry, collectDefault: false });
    collector.attach(journal);
    await journal.emit("sess-1", "session.created", { game: "walker" });
    collector.detach();
    await journal.emit("sess-2", "session.created", { game: "walker" });
    expect(await values(registry, "tickweave_sessions_total")).toEqual([{ labels: { status: "created" }, value: 1 }]);
  });

  it("does not double count when attached twice", async () => {
    const registry = new Registry();
    const collector = new MetricsCollector({ registry, collectDefault: false });
    collector.attach(journal);
    collector.attach(journal);
    await journal.emit("sess-1", "session.created", { game: "walker" });
    expect(await values(registry, "tickweave_sessions_active")).toEqual([{ labels: {}, value: 1 }]);
  });
});
