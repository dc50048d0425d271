import type { Logger, RecordedOutcome, ReplayableGame, SequenceIndex, SessionRecord } from "@tickweave/schemas";
import { hashValue, stableStringify } from "@tickweave/schemas";
import { ScriptedResponseProvider, Scheduler, outcomeOf } from "@tickweave/kernel";
import type { AdvanceResult, SessionOutcome } from "@tickweave/kernel";

export interface ReplayOptions {
  /** Run every transition twice while replaying. */
  checkDeterminism?: boolean;
  logger?: Logger;
}

export interface ReplayReport<S, Score> {
  /** True when every recorded state hash and the recorded outcome came out the same. */
  reproduced: boolean;
  /** First state index whose hash, or the stop point, differs from the record. */
  divergedAt?: SequenceIndex;
  outcome: SessionOutcome<Score>;
  states: S[];
}

/**
 * Re-runs a recorded session from its initial state, identity and responses
 * with a scripted responder, then compares the result to the record.
 */
export async function replaySession<S, R, Score>(
  record: SessionRecord,
  game: ReplayableGame<S, R, Score>,
  options?: ReplayOptions,
): Promise<ReplayReport<S, Score>> {
  if (record.game !== game.name) {
    throw new Error(`Record is for game "${record.game}", not "${game.name}"`);
  }
  const initialState = game.parseState(record.initial_state);
  const responses = record.responses.map((value) => game.parseResponse(value));

  const scheduler = new Scheduler<S, R, Score>({
    game,
    responder: new ScriptedResponseProvider(responses),
    checkDeterminism: options?.checkDeterminism,
    logger: options?.logger,
  });
  const result = await scheduler.advance({
    identity: record.identity,
    tickBudget: responses.length,
    initialState,
  });

  const hashes = result.states.toArray().map((s) => hashValue(s));
  let divergedAt = firstDivergence(hashes, record.state_hashes);
  if (record.outcome && !sameOutcome(result, record.outcome)) {
    const stop = result.ok ? result.terminalTick : result.error.tick;
    const recordedStop = record.outcome.status === "completed" ? record.outcome.terminal_tick : record.outcome.tick;
    divergedAt = Math.min(divergedAt ?? Infinity, stop, recordedStop);
  }

  const report: ReplayReport<S, Score> = {
    reproduced: divergedAt === undefined,
    outcome: outcomeOf(result),
    states: result.states.toArray(),
  };
  if (divergedAt !== undefined) {
    report.divergedAt = divergedAt;
    options?.logger?.warn("Replay diverged from record", { session_id: record.identity.session_id, diverged_at: divergedAt });
  }
  return report;
}

function firstDivergence(actual: readonly string[], expected: readonly string[] | undefined): SequenceIndex | undefined {
  if (!expected) return undefined;
  const shared = Math.min(actual.length, expected.length);
  for (let i = 0; i < shared; i++) {
    if (actual[i] !== expected[i]) return i;
  }
  return actual.length !== expected.length ? shared : undefined;
}

/**
 * A completed or transition-failed record must be matched exactly. Any other
 * stop came from outside the core (budget, cancellation, lost input), so the
 * replay only has to stop at the same tick without reaching a terminal state.
 */
function sameOutcome<S, R, Score>(result: AdvanceResult<S, R, Score>, recorded: RecordedOutcome): boolean {
  if (recorded.status === "completed") {
    return result.ok
      && result.terminalTick === recorded.terminal_tick
      && stableStringify(result.score) === stableStringify(recorded.score);
  }
  if (result.ok) return false;
  if (recorded.status === "failed" && recorded.error_code === "TRANSITION_FAILED") {
    return result.error.code === "TRANSITION_FAILED" && result.error.tick === recorded.tick;
  }
  return result.error.tick === recorded.tick;
}
