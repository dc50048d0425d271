import { resolve } from "node:path";
import { Command } from "commander";
import { Journal } from "@tickweave/journal";
import {
  ConsoleLogger,
  Kernel,
  LiveResponseProvider,
  PolicyResponseProvider,
  ScriptedResponseProvider,
  readSessionSeed,
} from "@tickweave/kernel";
import type { GameSession, SessionOutcome } from "@tickweave/kernel";
import { MetricsCollector } from "@tickweave/metrics";
import { readSessionRecord, recordFromJournal, replaySession, writeSessionRecord } from "@tickweave/replay";
import { BUILTIN_LEVELS, createGameRegistry, loadLevelsFromFile, mergeLevels, parseResponseList } from "@tickweave/games";
import type { GameModule, GameOptions, GameRegistry } from "@tickweave/games";
import type { InputCapability, Logger, LogLevel, ResponseProvider, SessionRecord } from "@tickweave/schemas";
import { errorMessage } from "@tickweave/schemas";
import type { CliConfig, Env } from "./config.js";
import {
  historyPolicyFor,
  loadConfig,
  parseInteger,
  parseLogLevel,
  parseNonNegativeInt,
  parsePositiveInt,
} from "./config.js";
import { ANSI, PLAIN, formatEvent, formatOutcome, formatSessionRow, summarizeSessions } from "./formatter.js";
import type { Palette } from "./formatter.js";
import { FrameOutput, LineInput } from "./terminal.js";
import type { TextWriter } from "./terminal.js";

export interface CliDeps {
  env: Env;
  stdin: NodeJS.ReadableStream;
  stdout: TextWriter;
  color?: boolean;
  setExitCode(code: number): void;
  createLogger?(component: string, level: LogLevel): Logger;
  /** Calls `handler` on Ctrl+C until the returned function is called. */
  onInterrupt?(handler: () => void): () => void;
}

export const EXIT_CODES: Record<SessionOutcome<unknown>["status"], number> = {
  completed: 0,
  failed: 1,
  exhausted: 2,
  cancelled: 130,
};

type GlobalOptions = {
  journal?: string;
  logLevel?: string;
};

interface SessionFlags {
  seed?: string;
  level?: string;
  target?: string;
  budget?: string;
  history?: string;
  levels?: string;
  record?: string;
  metrics?: boolean;
  ephemeral?: boolean;
  check?: boolean;
}

interface SimulateFlags extends SessionFlags {
  responses?: string;
  autopilot?: boolean;
  frames?: boolean;
}

interface PlayFlags extends SessionFlags {
  timeout?: string;
}

interface ResumeFlags {
  autopilot?: boolean;
  budget?: string;
  timeout?: string;
  history?: string;
  levels?: string;
  record?: string;
}

interface Context {
  deps: CliDeps;
  config: CliConfig;
  logger: Logger;
  loggerFor(component: string): Logger;
  palette: Palette;
  print(line: string): void;
}

type Outcome = SessionOutcome<number>;

interface ReplaySummary {
  reproduced: boolean;
  divergedAt?: number;
  outcome: Outcome;
  frame: string | undefined;
}

function processInterrupt(handler: () => void): () => void {
  process.once("SIGINT", handler);
  return () => process.removeListener("SIGINT", handler);
}

function gameOptions(flags: SessionFlags): GameOptions {
  const options: GameOptions = {};
  if (flags.seed !== undefined) options.seed = parseInteger(flags.seed, "--seed");
  if (flags.level !== undefined) options.level = flags.level;
  if (flags.target !== undefined) options.target = parseInteger(flags.target, "--target");
  return options;
}

async function openJournal(ctx: Context): Promise<Journal> {
  const journal = new Journal(ctx.config.journalPath, { logger: ctx.loggerFor("journal") });
  await journal.init();
  return journal;
}

async function loadRegistry(ctx: Context, levelsFlag: string | undefined): Promise<GameRegistry> {
  const levelsPath = levelsFlag !== undefined ? resolve(levelsFlag) : ctx.config.levelsPath;
  if (levelsPath === undefined) return createGameRegistry();
  const custom = await loadLevelsFromFile(levelsPath);
  return createGameRegistry({ dodgeLevels: mergeLevels(BUILTIN_LEVELS, custom) });
}

/** Runs `work` with an abort signal that Ctrl+C trips. */
async function interruptible<T>(ctx: Context, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const listen = ctx.deps.onInterrupt ?? processInterrupt;
  const stop = listen(() => controller.abort("Interrupted"));
  try {
    return await work(controller.signal);
  } finally {
    stop();
  }
}

/** Shows each frame before the wrapped responder answers. */
function withFrames<S, R>(responder: ResponseProvider<S, R>, module: GameModule<S, R>, output: FrameOutput): ResponseProvider<S, R> {
  return {
    respond: (identity, prefix, context) => {
      const latest = prefix.latest();
      if (latest !== undefined) output.pushFrame(module.renderFrame(prefix.at(prefix.lastIndex - 1), latest), context.tick);
      return responder.respond(identity, prefix, context);
    },
  };
}

/**
 * Live responder reading moves from stdin. Lines the game cannot read are
 * rejected on the spot, so one typo does not end the session.
 */
function liveResponder<S, R>(module: GameModule<S, R>, ctx: Context, timeoutMs: number) {
  const lines = new LineInput(ctx.deps.stdin);
  const input: InputCapability<string> = {
    poll: async (signal) => {
      for (;;) {
        const line = await lines.poll(signal);
        try {
          module.decodeInput(line);
          return line;
        } catch (err) {
          ctx.deps.stdout.write(`${errorMessage(err)}\n> `);
        }
      }
    },
  };
  const responder = new LiveResponseProvider<S, R, string, string>({
    input,
    decode: (raw) => module.decodeInput(raw),
    output: { capability: new FrameOutput(ctx.deps.stdout), project: module.renderFrame },
    timeoutMs,
    logger: ctx.logger,
  });
  return { responder, close: () => lines.close() };
}

async function finishSession<S, R>(
  ctx: Context,
  module: GameModule<S, R>,
  session: GameSession<S, R>,
  outcome: Outcome,
  flags: { record?: string },
  metrics?: MetricsCollector,
): Promise<void> {
  const states = session.states();
  const last = states.at(-1);
  if (last !== undefined) ctx.print(module.renderFrame(states.at(-2), last));
  ctx.print(formatOutcome(outcome, ctx.palette));
  if (flags.record !== undefined) {
    const path = resolve(flags.record);
    await writeSessionRecord(path, session.toRecord());
    ctx.print(`Record written to ${path}`);
  }
  if (metrics) ctx.print((await metrics.getMetrics()).trimEnd());
  ctx.deps.setExitCode(EXIT_CODES[outcome.status]);
}

async function runNewSession<S, R>(
  ctx: Context,
  module: GameModule<S, R>,
  responder: ResponseProvider<S, R>,
  flags: SessionFlags,
): Promise<Outcome> {
  const journal = flags.ephemeral ? undefined : await openJournal(ctx);
  if (flags.metrics && !journal) throw new Error("--metrics reads the journal; drop --ephemeral");
  const metrics = flags.metrics ? new MetricsCollector({ collectDefault: false }) : undefined;
  if (metrics && journal) metrics.attach(journal);
  try {
    const window = flags.history !== undefined ? parsePositiveInt(flags.history, "--history") : undefined;
    const kernel = new Kernel({
      journal,
      logger: ctx.loggerFor("kernel"),
      historyPolicy: window !== undefined ? historyPolicyFor(window) : ctx.config.historyPolicy,
      defaultTickBudget: flags.budget !== undefined ? parsePositiveInt(flags.budget, "--budget") : ctx.config.tickBudget,
      checkDeterminism: flags.check,
    });
    const session = await kernel.createSession({
      game: module.game,
      responder,
      initialState: module.createInitialState(gameOptions(flags)),
    });
    ctx.print(`Session ${session.identity.session_id} (${module.game.name})`);
    const outcome = await interruptible(ctx, (signal) => session.run(signal));
    await finishSession(ctx, module, session, outcome, flags, metrics);
    return outcome;
  } finally {
    metrics?.detach();
    await journal?.close();
  }
}

function simulateGame<S, R>(ctx: Context, module: GameModule<S, R>, flags: SimulateFlags): Promise<Outcome> {
  if (flags.responses !== undefined && flags.autopilot) throw new Error("Pass either --responses or --autopilot, not both");
  let responder: ResponseProvider<S, R>;
  if (flags.autopilot) {
    responder = new PolicyResponseProvider(module.autopilot);
  } else if (flags.responses !== undefined) {
    responder = new ScriptedResponseProvider(parseResponseList(flags.responses, (raw) => module.decodeInput(raw)));
  } else {
    throw new Error("Pass --responses <list> or --autopilot");
  }
  if (flags.frames) responder = withFrames(responder, module, new FrameOutput(ctx.deps.stdout, ""));
  return runNewSession(ctx, module, responder, flags);
}

async function playGame<S, R>(ctx: Context, module: GameModule<S, R>, flags: PlayFlags): Promise<Outcome> {
  const timeoutMs = flags.timeout !== undefined ? parseNonNegativeInt(flags.timeout, "--timeout") : ctx.config.inputTimeoutMs;
  const live = liveResponder(module, ctx, timeoutMs);
  ctx.print(`${module.game.name}: ${module.description}. Type a move and press enter; Ctrl+C quits.`);
  try {
    return await runNewSession(ctx, module, live.responder, flags);
  } finally {
    live.close();
  }
}

async function resumeGame<S, R>(
  ctx: Context,
  module: GameModule<S, R>,
  journal: Journal,
  sessionId: string,
  flags: ResumeFlags,
): Promise<Outcome | null> {
  const timeoutMs = flags.timeout !== undefined ? parseNonNegativeInt(flags.timeout, "--timeout") : ctx.config.inputTimeoutMs;
  const live = flags.autopilot ? null : liveResponder(module, ctx, timeoutMs);
  const responder = live?.responder ?? new PolicyResponseProvider(module.autopilot);
  const window = flags.history !== undefined ? parsePositiveInt(flags.history, "--history") : undefined;
  try {
    const kernel = new Kernel({
      journal,
      logger: ctx.loggerFor("kernel"),
      historyPolicy: window !== undefined ? historyPolicyFor(window) : ctx.config.historyPolicy,
    });
    const session = await kernel.resumeSession(sessionId, module.game, responder);
    if (!session) return null;
    const { status, ticks } = session.getSession();
    ctx.print(`Resuming session ${sessionId} (${module.game.name}) at tick ${ticks}`);
    const outcome = await interruptible(ctx, (signal) => status === "exhausted"
      ? session.extend(flags.budget !== undefined ? parsePositiveInt(flags.budget, "--budget") : ctx.config.tickBudget, signal)
      : session.run(signal));
    await finishSession(ctx, module, session, outcome, flags);
    return outcome;
  } finally {
    live?.close();
  }
}

async function replayRecord<S, R>(ctx: Context, module: GameModule<S, R>, record: SessionRecord, check: boolean): Promise<ReplaySummary> {
  const report = await replaySession(record, module.game, { checkDeterminism: check, logger: ctx.logger });
  const last = report.states.at(-1);
  const summary: ReplaySummary = {
    reproduced: report.reproduced,
    outcome: report.outcome,
    frame: last !== undefined ? module.renderFrame(report.states.at(-2), last) : undefined,
  };
  if (report.divergedAt !== undefined) summary.divergedAt = report.divergedAt;
  return summary;
}

export function buildProgram(deps: CliDeps): Command {
  const program = new Command();
  const palette = deps.color ? ANSI : PLAIN;

  const context = (): Context => {
    const config = loadConfig(deps.env);
    const globals = program.opts<GlobalOptions>();
    if (globals.journal !== undefined) config.journalPath = resolve(globals.journal);
    if (globals.logLevel !== undefined) config.logLevel = parseLogLevel(globals.logLevel, "--log-level");
    const loggerFor = (component: string): Logger =>
      deps.createLogger?.(component, config.logLevel) ?? new ConsoleLogger(component, config.logLevel);
    return { deps, config, logger: loggerFor("cli"), loggerFor, palette, print: (line) => deps.stdout.write(`${line}\n`) };
  };

  program
    .name("tickweave")
    .description("Pull-based, replayable game sessions")
    .version("0.1.0")
    .option("--journal <path>", "Journal file (defaults to TICKWEAVE_JOURNAL_PATH)")
    .option("--log-level <level>", "debug, info, warn or error (defaults to TICKWEAVE_LOG_LEVEL)");

  const sessionOptions = (command: Command): Command => command
    .option("--seed <n>", "Seed for games with randomness")
    .option("--level <name>", "Difficulty preset")
    .option("--target <n>", "Finish line for games that have one")
    .option("--budget <n>", "Tick budget (defaults to TICKWEAVE_TICK_BUDGET)")
    .option("--history <n>", "Show the responder only the last n states")
    .option("--levels <file>", "YAML file with extra dodge levels")
    .option("--record <file>", "Write a replayable session record")
    .option("--metrics", "Print Prometheus metrics for the run")
    .option("--ephemeral", "Do not write to the journal")
    .option("--check", "Run every transition twice to catch impure game rules");

  // ─── Games ───────────────────────────────────────────────────────

  program.command("games").description("List available games")
    .option("--levels <file>", "YAML file with extra dodge levels")
    .action(async (opts: { levels?: string }) => {
      const ctx = context();
      const registry = await loadRegistry(ctx, opts.levels);
      for (const game of registry.list()) ctx.print(`${game.name}  ${game.description}`);
    });

  sessionOptions(program.command("play").description("Play a game from the terminal").argument("<game>", "Game name"))
    .option("--timeout <ms>", "Milliseconds to wait for each move; 0 waits forever")
    .action(async (name: string, opts: PlayFlags) => {
      const ctx = context();
      const registry = await loadRegistry(ctx, opts.levels);
      await registry.require(name).use<Promise<Outcome>>((module) => playGame(ctx, module, opts));
    });

  sessionOptions(program.command("simulate").description("Run a game from scripted responses or the autopilot").argument("<game>", "Game name"))
    .option("--responses <list>", "Comma separated responses, one per tick")
    .option("--autopilot", "Let the game's built-in policy play")
    .option("--frames", "Print every frame")
    .action(async (name: string, opts: SimulateFlags) => {
      const ctx = context();
      const registry = await loadRegistry(ctx, opts.levels);
      await registry.require(name).use<Promise<Outcome>>((module) => simulateGame(ctx, module, opts));
    });

  program.command("resume").description("Continue an interrupted or exhausted session from the journal").argument("<id>", "Session ID")
    .option("--autopilot", "Let the game's built-in policy play")
    .option("--budget <n>", "Extra ticks for an exhausted session")
    .option("--timeout <ms>", "Milliseconds to wait for each move; 0 waits forever")
    .option("--history <n>", "Show the responder only the last n states")
    .option("--levels <file>", "YAML file with extra dodge levels")
    .option("--record <file>", "Write a replayable session record")
    .action(async (sessionId: string, opts: ResumeFlags) => {
      const ctx = context();
      const journal = await openJournal(ctx);
      try {
        const seed = readSessionSeed(journal.readSession(sessionId));
        if (!seed) {
          ctx.print(`No session ${sessionId} in ${ctx.config.journalPath}`);
          deps.setExitCode(1);
          return;
        }
        const registry = await loadRegistry(ctx, opts.levels);
        const outcome = await registry.require(seed.game)
          .use<Promise<Outcome | null>>((module) => resumeGame(ctx, module, journal, sessionId, opts));
        if (!outcome) {
          ctx.print(`Session ${sessionId} already finished`);
          deps.setExitCode(1);
        }
      } finally {
        await journal.close();
      }
    });

  program.command("replay").description("Replay a session record and check it reproduces").argument("<record>", "Session record file")
    .option("--levels <file>", "YAML file with extra dodge levels")
    .option("--check", "Run every transition twice to catch impure game rules")
    .action(async (file: string, opts: { levels?: string; check?: boolean }) => {
      const ctx = context();
      const record = await readSessionRecord(resolve(file));
      const registry = await loadRegistry(ctx, opts.levels);
      const summary = await registry.require(record.game)
        .use<Promise<ReplaySummary>>((module) => replayRecord(ctx, module, record, opts.check ?? false));
      ctx.print(`Replayed ${record.responses.length} responses of session ${record.identity.session_id} (${record.game})`);
      if (summary.frame !== undefined) ctx.print(summary.frame);
      ctx.print(formatOutcome(summary.outcome, palette));
      if (summary.reproduced) {
        ctx.print(palette.green("Reproduced"));
      } else {
        ctx.print(palette.red(`Diverged at state ${summary.divergedAt ?? "?"}`));
        deps.setExitCode(1);
      }
    });

  // ─── Sessions ────────────────────────────────────────────────────

  const sessionCmd = program.command("session").description("Inspect journaled sessions");

  sessionCmd.command("ls").description("List sessions from the journal").action(async () => {
    const ctx = context();
    const journal = await openJournal(ctx);
    const sessions = summarizeSessions(await journal.readAll());
    await journal.close();
    if (sessions.length === 0) { ctx.print("No sessions found."); return; }
    for (const summary of sessions) ctx.print(formatSessionRow(summary, palette));
  });

  sessionCmd.command("show").description("Show a session's events").argument("<id>", "Session ID")
    .option("--record <file>", "Write a replayable session record")
    .action(async (sessionId: string, opts: { record?: string }) => {
      const ctx = context();
      const journal = await openJournal(ctx);
      try {
        const events = journal.readSession(sessionId);
        if (events.length === 0) {
          ctx.print(`No events found for session ${sessionId}`);
          deps.setExitCode(1);
          return;
        }
        for (const event of events) ctx.print(formatEvent(event, palette));
        if (opts.record !== undefined) {
          const path = resolve(opts.record);
          await writeSessionRecord(path, recordFromJournal(journal, sessionId));
          ctx.print(`Record written to ${path}`);
        }
      } finally {
        await journal.close();
      }
    });

  // ─── Journal ─────────────────────────────────────────────────────

  const journalCmd = program.command("journal").description("Journal maintenance");

  journalCmd.command("verify").description("Check the journal's hash chain").action(async () => {
    const ctx = context();
    // No init(): it would repair a broken chain before we could see it
    const journal = new Journal(ctx.config.journalPath);
    const integrity = await journal.verifyIntegrity();
    if (integrity.valid) {
      const events = await journal.readAll();
      ctx.print(`Journal integrity: ${palette.green("OK")} (${events.length} events)`);
    } else {
      ctx.print(`Journal integrity: ${palette.red(`BROKEN at event ${integrity.brokenAt ?? "?"}`)}`);
      deps.setExitCode(1);
    }
  });

  return program;
}
