/** JSON-compatible value stored in context and session records. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Signal extracted from agent output. Exactly one per stage-run. */
export interface CompletionSignal {
  readonly name: string;
  readonly payload?: JsonObject;
}

/** JSON strategy: a JSON object whose `signalKey` holds the signal name. */
export interface JsonCompletionConfig {
  readonly type: "json";
  readonly signalKey: string;
  /** Explicit accepted signals. Defaults to every routable signal of the stage. */
  readonly signals?: readonly string[];
}

/** Sentinel strategy: a literal marker anywhere in the output. */
export interface SentinelCompletionConfig {
  readonly type: "sentinel";
  readonly marker: string;
  /** Signal reported when the marker is seen. */
  readonly signal: string;
}

export type CompletionConfig = JsonCompletionConfig | SentinelCompletionConfig;

/** Designated non-error signal that suspends the run for external input. */
export interface PauseSpec {
  readonly signal: string;
  readonly reason: string;
  /** Payload or context key holding the path of the human-facing artifact. */
  readonly artifactKey?: string;
  /** Stage to re-enter on resume. Defaults to the pausing stage. */
  readonly resumeAt?: string;
}

/** Tool access policy handed to the agent runner. */
export interface ToolPolicy {
  readonly allow?: readonly string[];
  readonly deny?: readonly string[];
}

export interface StageSpec {
  readonly name: string;
  /** Opaque handle resolved by the prompt renderer. */
  readonly prompt: string;
  readonly completion: CompletionConfig;
  readonly transitions: Readonly<Record<string, string>>;
  readonly maxTurns: number;
  readonly tools?: ToolPolicy;
  readonly pause?: PauseSpec;
  /** Payload keys lifted into context after the stage completes. */
  readonly artifacts?: readonly string[];
}

/** Manifest written when the run terminates with an end signal. */
export interface ManifestSpec {
  /** Output path template, interpolated from context. */
  readonly path: string;
  /** Pipeline kind the manifest targets. */
  readonly target: string;
  readonly flags: Readonly<Record<string, boolean>>;
  /** Header key → context key. */
  readonly fields: Readonly<Record<string, string>>;
  /** Context key whose value becomes the body. */
  readonly body?: string;
}

/**
 * Named on/off switch read from the run's context (a manifest flag or a `--set` entry).
 * While off, its transition overrides apply and stages left unreachable drop out.
 */
export interface SwitchSpec {
  readonly default: boolean;
  /** Stage → signal → target. */
  readonly whenOff: Readonly<Record<string, Readonly<Record<string, string>>>>;
}

/** Validated, frozen pipeline definition. */
export interface PipelineConfig {
  readonly kind: string;
  readonly description: string;
  readonly stages: Readonly<Record<string, StageSpec>>;
  readonly startStage: string;
  readonly endSignals: readonly string[];
  readonly maxIterations: number;
  readonly model?: string;
  /** Name of a built-in hook set. */
  readonly hooks?: string;
  /** Seed context entries, values interpolated with `{key}`. */
  readonly defaults: Readonly<Record<string, string>>;
  readonly manifest?: ManifestSpec;
  readonly switches: Readonly<Record<string, SwitchSpec>>;
}
