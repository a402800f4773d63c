/**
 * RunOrchestrator: the caller surface around PipelineExecutor.
 * Seeds context for fresh runs, resumes persisted sessions and records stats.
 */
import type { AgentRunner } from "./agent.js";
import { type AppConfig, UsageError } from "./config.js";
import { ExitCode } from "./constants.js";
import { ExecutionContext } from "./context.js";
import { describeError } from "./errors.js";
import { fanOut, LoggingSink } from "./events.js";
import { PipelineExecutor, type RunOutcome } from "./executor.js";
import { hooksForPipeline } from "./hooks.js";
import type { Logger } from "./logger.js";
import { loadManifest, type ManifestDocument } from "./manifest.js";
import { msg } from "./messages.js";
import { defaultOutputDir, sessionLogPath } from "./paths.js";
import { applySwitches, type LoadedPipeline, loadPipelineConfig, switchesOff } from "./pipeline-config.js";
import type { JsonValue, PipelineConfig } from "./pipeline-types.js";
import { TemplateRenderer } from "./renderer.js";
import {
  createSession,
  FileSessionStore,
  formatSessionSummary,
  generateSessionId,
  loadForResume,
  type Session,
  type SessionStore,
} from "./session-store.js";
import { recordRunStats, StatsSink } from "./stats.js";
import { formatDuration, formatFileList, interpolate } from "./utils.js";

/** A runner that may hold a connection open for the duration of a run. */
export type ManagedRunner = AgentRunner & {
  start?(): Promise<void>;
  stop?(): Promise<void>;
};

export interface SeedOptions {
  readonly repoRoot: string;
  readonly sessionId: string;
  readonly files?: readonly string[];
  readonly entries?: Iterable<readonly [string, JsonValue]>;
  readonly outputDir?: string;
}

/**
 * Initial context for a fresh run: output_dir, the context file list, caller entries,
 * then the pipeline's defaults for every key still unset.
 */
export function seedContext(config: PipelineConfig, options: SeedOptions): ExecutionContext {
  const files = options.files ?? [];
  const ctx = new ExecutionContext([
    ["output_dir", options.outputDir ?? defaultOutputDir(options.repoRoot, config.kind, options.sessionId)],
    ["context_paths", [...files]],
    ["context_files", formatFileList(files)],
  ]);
  for (const [key, value] of options.entries ?? []) ctx.set(key, value);
  for (const [key, template] of Object.entries(config.defaults)) {
    if (!ctx.has(key)) ctx.set(key, interpolate(template, (k) => ctx.get(k)));
  }
  return ctx;
}

/** Context entries a manifest hands to the pipeline it targets. */
export function manifestEntries(doc: ManifestDocument): [string, JsonValue][] {
  const entries: [string, JsonValue][] = [];
  for (const [key, value] of Object.entries(doc.header)) {
    if (key === "pipeline" || key === "source" || key === "context") continue;
    entries.push([key, value]);
  }
  if (doc.body) entries.push(["manifest_body", doc.body]);
  return entries;
}

function manifestFiles(doc: ManifestDocument): string[] {
  const context = doc.header.context;
  if (typeof context === "string") return context ? [context] : [];
  if (Array.isArray(context)) return context.filter((item): item is string => typeof item === "string");
  return [];
}

export function exitCodeFor(outcome: RunOutcome): number {
  switch (outcome.status) {
    case "completed":
      return ExitCode.SUCCESS;
    case "paused":
      return ExitCode.PAUSED;
    case "failed":
      return ExitCode.FAILURE;
  }
}

export class RunOrchestrator {
  private readonly store: SessionStore;

  constructor(
    private readonly config: AppConfig,
    private readonly runner: ManagedRunner,
    private readonly logger: Logger,
    store?: SessionStore,
  ) {
    this.store = store ?? new FileSessionStore(config.repoRoot);
  }

  /** Fresh run of `kind` seeded from files and `--set` entries. */
  async start(kind: string): Promise<RunOutcome> {
    const loaded = await loadPipelineConfig(kind, this.config.repoRoot);
    return this.startFresh(loaded, this.config.files, Object.entries(this.config.contextEntries));
  }

  /** Fresh run of the pipeline a manifest targets, seeded from its header. */
  async startFromManifest(manifestPath: string): Promise<RunOutcome> {
    const doc = await loadManifest(manifestPath);
    this.logger.info(msg.manifestLoaded(manifestPath, doc.pipeline));
    if (this.config.pipelineKind !== undefined && this.config.pipelineKind !== doc.pipeline) {
      throw new UsageError(`Manifest ${manifestPath} targets "${doc.pipeline}", not "${this.config.pipelineKind}"`);
    }
    const loaded = await loadPipelineConfig(doc.pipeline, this.config.repoRoot);
    const entries = [...manifestEntries(doc), ...Object.entries(this.config.contextEntries)];
    return this.startFresh(loaded, [...manifestFiles(doc), ...this.config.files], entries);
  }

  /** Resume the latest (or the given) paused or interrupted session of `kind`. */
  async resume(kind: string, sessionId?: string): Promise<RunOutcome> {
    const loaded = await loadPipelineConfig(kind, this.config.repoRoot);
    const session = await loadForResume(this.store, kind, sessionId);
    this.logger.info(msg.runResuming(kind, session.sessionId, session.currentStage));
    this.logger.info(formatSessionSummary(session));
    return this.execute(loaded, session);
  }

  private async startFresh(
    loaded: LoadedPipeline,
    files: readonly string[],
    entries: Iterable<readonly [string, JsonValue]>,
  ): Promise<RunOutcome> {
    const sessionId = generateSessionId();
    const ctx = seedContext(loaded.config, {
      repoRoot: this.config.repoRoot,
      sessionId,
      files,
      entries,
      outputDir: this.config.outputDir,
    });
    const session = createSession(loaded.config, ctx, sessionId);
    this.logger.info(msg.runStarting(loaded.config.kind, sessionId));
    return this.execute(loaded, session);
  }

  private async execute(loaded: LoadedPipeline, session: Session): Promise<RunOutcome> {
    const { repoRoot } = this.config;
    const { pipelineKind, sessionId } = session;
    this.logger.attachSession(pipelineKind, sessionId, sessionLogPath(repoRoot, pipelineKind, sessionId));
    this.logger.info(msg.pipelineSource(loaded.source));

    // Switches read the persisted context, so a resumed run takes the same route.
    const lookup = (key: string) => session.context.find(([k]) => k === key)?.[1];
    for (const name of switchesOff(loaded.config, lookup)) this.logger.info(msg.switchOff(name));
    const config = applySwitches(loaded.config, lookup);
    const budget = this.config.maxIterations ?? config.maxIterations;
    this.logger.info(msg.configLoaded(config.model ?? this.config.model, budget, this.config.verbose));

    const stats = new StatsSink();
    const executor = new PipelineExecutor({
      config,
      runner: this.runner,
      renderer: new TemplateRenderer(repoRoot, config.kind),
      store: this.store,
      hooks: hooksForPipeline(config, repoRoot, this.logger),
      sink: fanOut([new LoggingSink(this.logger), stats], this.logger),
      maxIterations: this.config.maxIterations,
      logger: this.logger,
    });

    const startedAt = Date.now();
    await this.runner.start?.();
    let outcome: RunOutcome;
    try {
      outcome = await executor.run(session);
    } finally {
      await this.runner.stop?.();
    }

    try {
      await recordRunStats(repoRoot, config.kind, stats.snapshot());
    } catch (err) {
      this.logger.warn(msg.statsFailed(describeError(err)));
    }

    if (outcome.status === "paused") this.logger.info(msg.resumeHint(config.kind));
    this.logger.info(msg.elapsed(formatDuration(Date.now() - startedAt)));
    return outcome;
  }
}
