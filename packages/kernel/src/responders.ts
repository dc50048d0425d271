import type {
  FrameProjector,
  InputCapability,
  Logger,
  OutputCapability,
  ParticipantIdentity,
  RespondContext,
  ResponseProvider,
  SequenceIndex,
  SequenceView,
} from "@tickweave/schemas";
import {
  InputUnavailableError,
  TimeoutError,
  errorMessage,
  withTimeout,
} from "@tickweave/schemas";

// ─── Scripted (pure) ────────────────────────────────────────────────

export type Script<R> = readonly R[] | ((tick: SequenceIndex) => R);

export interface ScriptedResponderOptions<R> {
  /** Returned once a finite script runs out. Without it, exhaustion is an input failure. */
  onExhausted?: R;
}

/**
 * Canned responses indexed by tick. Ignores the history it is shown, so a
 * session driven by it reproduces exactly from its initial state.
 */
export class ScriptedResponseProvider<R> implements ResponseProvider<unknown, R> {
  private readonly script: Script<R>;
  private readonly fallback: { value: R } | null;

  constructor(script: Script<R>, options?: ScriptedResponderOptions<R>) {
    this.script = script;
    this.fallback = options?.onExhausted !== undefined ? { value: options.onExhausted } : null;
  }

  static repeat<R>(value: R): ScriptedResponseProvider<R> {
    return new ScriptedResponseProvider(() => value);
  }

  static cycle<R>(values: readonly R[]): ScriptedResponseProvider<R> {
    if (values.length === 0) throw new Error("Cannot cycle an empty script");
    return new ScriptedResponseProvider((tick) => {
      const value = values[tick % values.length];
      if (value === undefined) throw new Error(`No scripted response at tick ${tick}`);
      return value;
    });
  }

  respond(_identity: ParticipantIdentity, _prefix: SequenceView<unknown>, context: RespondContext): R {
    const { tick } = context;
    if (typeof this.script === "function") return this.script(tick);
    const value = this.script[tick];
    if (value !== undefined) return value;
    if (this.fallback) return this.fallback.value;
    throw new InputUnavailableError(
      `Script exhausted: no response for tick ${tick} (script has ${this.script.length})`,
      tick,
    );
  }
}

// ─── Policy (pure) ──────────────────────────────────────────────────

export type ResponsePolicy<S, R> = (identity: ParticipantIdentity, prefix: SequenceView<S>) => R;

/** A pure decision function over the identity and the observed history. */
export class PolicyResponseProvider<S, R> implements ResponseProvider<S, R> {
  private readonly policy: ResponsePolicy<S, R>;

  constructor(policy: ResponsePolicy<S, R>) {
    this.policy = policy;
  }

  respond(identity: ParticipantIdentity, prefix: SequenceView<S>): R {
    return this.policy(identity, prefix);
  }
}

// ─── Live (impure) ──────────────────────────────────────────────────

/** Default projector: the frame is the newest state itself. */
export const latestFrame = <S>(_previous: S | undefined, latest: S): S => latest;

/** Without `project`, the capability receives {@link latestFrame} frames. */
export type LiveOutputConfig<S, Frame> = (
  | { capability: OutputCapability<Frame>; project: FrameProjector<S, Frame> }
  | { capability: OutputCapability<S>; project?: undefined }
) & {
  /** Default: "before_poll" */
  when?: "before_poll" | "after_poll";
};

export interface LiveResponderConfig<S, R, Raw, Frame> {
  input: InputCapability<Raw>;
  /** Turns raw device input into a response, given what the participant has seen. */
  decode(raw: Raw, prefix: SequenceView<S>): R;
  output?: LiveOutputConfig<S, Frame>;
  /** Per-call input timeout. 0 disables. Default: 30000 */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Delegates each response to an external input device. Pushes the newest
 * frame to the participant, polls once and decodes the result. Frame delivery
 * failures are logged and never stop the session.
 */
export class LiveResponseProvider<S, R, Raw, Frame = S> implements ResponseProvider<S, R> {
  private readonly config: LiveResponderConfig<S, R, Raw, Frame>;
  private readonly timeoutMs: number;

  constructor(config: LiveResponderConfig<S, R, Raw, Frame>) {
    this.config = config;
    this.timeoutMs = config.timeoutMs ?? 30000;
  }

  async respond(_identity: ParticipantIdentity, prefix: SequenceView<S>, context: RespondContext): Promise<R> {
    const { tick, signal } = context;
    const framesFirst = (this.config.output?.when ?? "before_poll") === "before_poll";
    if (framesFirst) await this.pushFrame(prefix, tick);

    let raw: Raw;
    try {
      raw = await withTimeout(this.config.input.poll(signal), this.timeoutMs, `Input poll for tick ${tick}`);
    } catch (err) {
      if (err instanceof InputUnavailableError) throw err;
      const reason = err instanceof TimeoutError ? err.message : `Input unavailable at tick ${tick}: ${errorMessage(err)}`;
      throw new InputUnavailableError(reason, tick, { cause: err });
    }

    if (!framesFirst) await this.pushFrame(prefix, tick);
    try {
      return this.config.decode(raw, prefix);
    } catch (err) {
      throw new InputUnavailableError(`Could not decode input at tick ${tick}: ${errorMessage(err)}`, tick, { cause: err });
    }
  }

  private async pushFrame(prefix: SequenceView<S>, tick: SequenceIndex): Promise<void> {
    const output = this.config.output;
    const latest = prefix.latest();
    if (!output || latest === undefined) return;
    const previous = prefix.at(prefix.lastIndex - 1);
    try {
      if (output.project === undefined) await output.capability.pushFrame(latestFrame(previous, latest), tick);
      else await output.capability.pushFrame(output.project(previous, latest), tick);
    } catch (err) {
      this.config.logger?.warn("Frame delivery failed", { tick, error: errorMessage(err) });
    }
  }
}
