import {
  Registry,
  Counter,
  Gauge,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";
import type { Journal } from "@tickweave/journal";
import type { JournalEvent } from "@tickweave/schemas";

export interface MetricsCollectorConfig {
  registry?: Registry;
  prefix?: string;
  collectDefault?: boolean;
}

export class MetricsCollector {
  private readonly registry: Registry;
  private readonly prefix: string;
  private unsubscribe?: () => void;

  // Per-session tracking, dropped when the session finishes
  private readonly sessionGames = new Map<string, string>();
  private readonly sessionTicks = new Map<string, number>();
  private readonly activeSessions = new Set<string>();

  // ─── Session Metrics ───────────────────────────────────────────────
  private readonly sessionsTotal: Counter;
  private readonly sessionsActive: Gauge;
  private readonly sessionTicksHistogram: Histogram;

  // ─── Tick Metrics ──────────────────────────────────────────────────
  private readonly ticksTotal: Counter;
  private readonly responsesTotal: Counter;

  // ─── Error Metrics ─────────────────────────────────────────────────
  private readonly errorsTotal: Counter;

  constructor(config?: MetricsCollectorConfig) {
    this.registry = config?.registry ?? new Registry();
    this.prefix = config?.prefix ?? "tickweave_";

    if (config?.collectDefault !== false) {
      collectDefaultMetrics({ register: this.registry, prefix: this.prefix });
    }

    this.sessionsTotal = new Counter({
      name: `${this.prefix}sessions_total`,
      help: "Total number of sessions by status",
      labelNames: ["status"] as const,
      registers: [this.registry],
    });

    this.sessionsActive = new Gauge({
      name: `${this.prefix}sessions_active`,
      help: "Number of sessions created or resumed that have not finished",
      registers: [this.registry],
    });

    this.sessionTicksHistogram = new Histogram({
      name: `${this.prefix}session_ticks`,
      help: "Ticks executed per session run, by how the run ended",
      labelNames: ["status"] as const,
      buckets: [1, 5, 10, 50, 100, 500, 1000, 5000, 10000],
      registers: [this.registry],
    });

    this.ticksTotal = new Counter({
      name: `${this.prefix}ticks_total`,
      help: "Total published states by game",
      labelNames: ["game"] as const,
      registers: [this.registry],
    });

    this.responsesTotal = new Counter({
      name: `${this.prefix}responses_total`,
      help: "Total published responses by game",
      labelNames: ["game"] as const,
      registers: [this.registry],
    });

    this.errorsTotal = new Counter({
      name: `${this.prefix}errors_total`,
      help: "Runs that ended without a score, by error code",
      labelNames: ["kind"] as const,
      registers: [this.registry],
    });
  }

  attach(journal: Journal): void {
    this.detach();
    this.unsubscribe = journal.on((event) => this.handleEvent(event));
  }

  detach(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = undefined;
    }
  }

  handleEvent(event: JournalEvent): void {
    const sessionId = event.session_id;
    switch (event.type) {
      // ─── Session Events ────────────────────────────────────────────
      case "session.created": {
        const game = typeof event.payload.game === "string" ? event.payload.game : "unknown";
        this.sessionGames.set(sessionId, game);
        this.sessionTicks.set(sessionId, 0);
        this.sessionsTotal.inc({ status: "created" });
        this.markActive(sessionId);
        break;
      }

      case "session.resumed":
        this.markActive(sessionId);
        if (!this.sessionTicks.has(sessionId)) this.sessionTicks.set(sessionId, 0);
        break;

      case "session.completed":
        this.finish(sessionId, "completed");
        break;

      case "session.exhausted":
      case "session.failed":
      case "session.cancelled": {
        const status = event.type.slice("session.".length);
        const kind = typeof event.payload.code === "string" ? event.payload.code : "unknown";
        this.errorsTotal.inc({ kind });
        this.finish(sessionId, status);
        break;
      }

      // ─── Tick Events ───────────────────────────────────────────────
      case "tick.response_published":
        this.responsesTotal.inc({ game: this.gameOf(sessionId) });
        break;

      case "tick.state_published":
        this.ticksTotal.inc({ game: this.gameOf(sessionId) });
        this.sessionTicks.set(sessionId, (this.sessionTicks.get(sessionId) ?? 0) + 1);
        break;

      default:
        break;
    }
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  getRegistry(): Registry {
    return this.registry;
  }

  reset(): void {
    this.registry.resetMetrics();
    this.sessionGames.clear();
    this.sessionTicks.clear();
    this.activeSessions.clear();
  }

  private markActive(sessionId: string): void {
    if (this.activeSessions.has(sessionId)) return;
    this.activeSessions.add(sessionId);
    this.sessionsActive.inc();
  }

  private finish(sessionId: string, status: string): void {
    this.sessionsTotal.inc({ status });
    // Cancelling an exhausted session ends no run; it was already counted out
    if (this.activeSessions.delete(sessionId)) {
      this.sessionsActive.dec();
      this.sessionTicksHistogram.observe({ status }, this.sessionTicks.get(sessionId) ?? 0);
    }
    // Exhausted sessions may be extended; keep their game and start the next run's count fresh
    this.sessionTicks.delete(sessionId);
    if (status !== "exhausted") this.sessionGames.delete(sessionId);
  }

  private gameOf(sessionId: string): string {
    return this.sessionGames.get(sessionId) ?? "unknown";
  }
}
