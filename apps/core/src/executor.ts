import type { AgentRunner } from "./agent.js";
import { createStrategy, type CompletionStrategy } from "./completion.js";
import { ExecutionContext } from "./context.js";
import {
  AgentFailureError,
  ConfigError,
  HookFailureError,
  IterationExceededError,
  PipelineError,
  SessionStateError,
} from "./errors.js";
import type { EventSink, PipelineEvent, TokenUsage } from "./events.js";
import type { StageHooks } from "./hooks.js";
import { MANIFEST_PATH_KEY } from "./hooks.js";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";
import type { CompletionSignal, PipelineConfig, StageSpec } from "./pipeline-types.js";
import type { PromptRenderer } from "./renderer.js";
import { route } from "./router.js";
import type { Session, SessionStatus, SessionStore } from "./session-store.js";

export interface ExecutorOptions {
  readonly config: PipelineConfig;
  readonly runner: AgentRunner;
  readonly renderer: PromptRenderer;
  readonly store: SessionStore;
  readonly hooks?: StageHooks;
  readonly sink?: EventSink;
  /** Run-wide turn budget. Defaults to the pipeline's own. */
  readonly maxIterations?: number;
  readonly logger?: Pick<Logger, "debug" | "warn">;
}

/** Final state of one `run` call. The session has already been persisted. */
export interface RunOutcome {
  readonly status: Exclude<SessionStatus, "running">;
  readonly session: Session;
  /** Signal that ended or paused the run. */
  readonly signal?: string;
  readonly error?: PipelineError;
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** Event fields the executor fills in itself. */
type EventBody = DistributiveOmit<PipelineEvent, "pipelineKind" | "sessionId" | "turn">;

/**
 * Drives a session through the stage graph: render, stream agent turns into the
 * stage's completion strategy, fire hooks, route, persist. Strictly sequential.
 */
export class PipelineExecutor {
  private readonly config: PipelineConfig;
  private readonly maxIterations: number;

  constructor(private readonly options: ExecutorOptions) {
    this.config = options.config;
    this.maxIterations = options.maxIterations ?? options.config.maxIterations;
  }

  /**
   * Run a fresh or resumable session until it terminates, pauses or fails.
   * Store I/O failures propagate to the caller; every other failure is reported in the outcome.
   */
  async run(session: Session): Promise<RunOutcome> {
    if (session.pipelineKind !== this.config.kind) {
      throw new ConfigError(
        `Pipeline config error: session ${session.sessionId} belongs to "${session.pipelineKind}", not "${this.config.kind}"`,
      );
    }
    if (session.status === "completed" || session.status === "failed") {
      throw new SessionStateError(session.sessionId, session.status);
    }

    const ctx = ExecutionContext.fromSnapshot(session.context);
    session.status = "running";
    delete session.pauseReason;
    delete session.error;
    await this.persist(session, ctx);

    let runTurns = 0;
    for (;;) {
      const stageName = session.currentStage;
      let stageTurns = 0;
      try {
        const stage = this.lookupStage(stageName);
        await this.invokeHook(stageName, "before", () => this.options.hooks?.beforeStage?.(stageName, ctx));
        this.emit(session, { type: "stage_started", stage: stageName });

        const prompt = await this.renderPrompt(stage, ctx);
        const strategy = createStrategy(stage, this.config);
        let signal: CompletionSignal | null = null;
        while (signal === null) {
          if (stageTurns >= stage.maxTurns) throw new IterationExceededError("stage", stageName, stage.maxTurns);
          if (runTurns >= this.maxIterations) throw new IterationExceededError("run", stageName, this.maxIterations);
          stageTurns++;
          runTurns++;
          session.turns++;
          this.options.logger?.debug(msg.turnStarted(stageName, stageTurns, stage.maxTurns));
          signal = await this.runTurn(stage, prompt, stageTurns, strategy);
        }

        const signalName = signal.name;
        this.liftArtifacts(stage, signal, ctx);
        const accepted = Object.freeze({ ...signal });
        await this.invokeHook(stageName, "after", () => this.options.hooks?.afterStage?.(stageName, accepted, ctx));
        this.collectArtifactPaths(session, ctx, [MANIFEST_PATH_KEY]);
        this.emit(session, {
          type: "stage_completed",
          stage: stageName,
          signal: signalName,
          turns: stageTurns,
          usage: this.takeUsage(),
        });
        session.history.push({ stage: stageName, signal: signalName, turns: stageTurns });

        const next = route(stageName, signalName, this.config);
        switch (next.kind) {
          case "goto":
            session.currentStage = next.stage;
            await this.persist(session, ctx);
            continue;
          case "pause":
            if (next.artifactKey) this.collectArtifactPaths(session, ctx, [next.artifactKey]);
            session.status = "paused";
            session.pauseReason = next.reason;
            session.currentStage = next.resumeAt;
            await this.persist(session, ctx);
            this.emit(session, { type: "paused", stage: stageName, reason: next.reason });
            return { status: "paused", session, signal: signalName };
          case "terminate":
            session.status = "completed";
            await this.persist(session, ctx);
            this.emit(session, { type: "run_completed", stage: stageName, signal: signalName });
            return { status: "completed", session, signal: signalName };
        }
      } catch (err) {
        if (!(err instanceof PipelineError)) throw err;
        return this.fail(session, ctx, stageName, stageTurns, err);
      }
    }
  }

  private lookupStage(name: string): StageSpec {
    if (!Object.hasOwn(this.config.stages, name)) {
      throw new ConfigError(`Pipeline config error: stage "${name}" is not declared in "${this.config.kind}"`);
    }
    return this.config.stages[name];
  }

  private async renderPrompt(stage: StageSpec, ctx: ExecutionContext): Promise<string> {
    try {
      return await this.options.renderer.render(stage.prompt, ctx);
    } catch (err) {
      throw new AgentFailureError(stage.name, err);
    }
  }

  /** Stream one agent turn into the strategy. Returns the accepted signal, if any. */
  private async runTurn(
    stage: StageSpec,
    prompt: string,
    turn: number,
    strategy: CompletionStrategy,
  ): Promise<CompletionSignal | null> {
    try {
      const chunks = this.options.runner.runTurn({
        pipelineKind: this.config.kind,
        stage: stage.name,
        prompt,
        turn,
        tools: stage.tools,
        model: this.config.model,
      });
      for await (const chunk of chunks) {
        const signal = strategy.feed(chunk);
        if (signal) return signal;
      }
      return null;
    } catch (err) {
      throw new AgentFailureError(stage.name, err);
    } finally {
      strategy.endTurn();
    }
  }

  private async invokeHook(
    stage: string,
    phase: "before" | "after",
    call: () => void | Promise<void> | undefined,
  ): Promise<void> {
    try {
      await call();
    } catch (err) {
      throw new HookFailureError(stage, phase, err);
    }
  }

  /** Copy the stage's declared artifact keys (and its pause artifact) from the payload into context. */
  private liftArtifacts(stage: StageSpec, signal: CompletionSignal, ctx: ExecutionContext): void {
    const payload = signal.payload;
    if (!payload) return;
    const keys = new Set(stage.artifacts ?? []);
    if (stage.pause?.artifactKey && stage.pause.signal === signal.name) keys.add(stage.pause.artifactKey);
    for (const key of keys) {
      if (Object.hasOwn(payload, key)) ctx.set(key, payload[key]);
    }
  }

  private collectArtifactPaths(session: Session, ctx: ExecutionContext, keys: readonly string[]): void {
    for (const key of keys) {
      const value = ctx.getString(key);
      if (value) session.artifactPaths[key] = value;
    }
  }

  private async fail(
    session: Session,
    ctx: ExecutionContext,
    stage: string,
    stageTurns: number,
    error: PipelineError,
  ): Promise<RunOutcome> {
    session.status = "failed";
    session.error = { kind: error.kind, message: error.message };
    // A failed hook may have half-applied its changes; keep the last persisted context.
    await this.persist(session, error instanceof HookFailureError ? null : ctx);
    this.emit(session, {
      type: "run_failed",
      stage,
      errorKind: error.kind,
      message: error.message,
      turns: stageTurns,
      usage: this.takeUsage(),
    });
    return { status: "failed", session, error };
  }

  private async persist(session: Session, ctx: ExecutionContext | null): Promise<void> {
    if (ctx) session.context = ctx.snapshot();
    session.updatedAt = new Date().toISOString();
    await this.options.store.save(session);
  }

  private takeUsage(): TokenUsage | undefined {
    return this.options.runner.takeUsage?.();
  }

  private emit(session: Session, body: EventBody): void {
    const sink = this.options.sink;
    if (!sink) return;
    const event: PipelineEvent = {
      ...body,
      pipelineKind: session.pipelineKind,
      sessionId: session.sessionId,
      turn: session.turns,
    };
    try {
      sink.emit(event);
    } catch (err) {
      this.options.logger?.warn(msg.sinkFailed(event.type, err instanceof Error ? err.message : String(err)));
    }
  }
}
