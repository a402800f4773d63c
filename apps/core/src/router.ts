import { TERMINAL_TARGET } from "./constants.js";
import { ConfigError, UnexpectedSignalError } from "./errors.js";
import type { PipelineConfig, StageSpec } from "./pipeline-types.js";

/** Routing decision for a completed stage. */
export type Next =
  | { readonly kind: "goto"; readonly stage: string }
  | { readonly kind: "pause"; readonly reason: string; readonly resumeAt: string; readonly artifactKey?: string }
  | { readonly kind: "terminate"; readonly signal: string };

/** Every signal that `stage` can route: its transitions, the global end signals and its pause signal. */
export function routableSignals(stage: StageSpec, endSignals: readonly string[]): string[] {
  const signals = new Set<string>([...Object.keys(stage.transitions), ...endSignals]);
  if (stage.pause) signals.add(stage.pause.signal);
  return [...signals];
}

/**
 * Decide what follows `signal` in `stageName`.
 * Global end signals win over the stage's own transition table.
 * Loops back to earlier stages are allowed; the run-wide budget bounds them.
 */
export function route(stageName: string, signal: string, config: PipelineConfig): Next {
  if (config.endSignals.includes(signal)) {
    return { kind: "terminate", signal };
  }

  const stage = config.stages[stageName];
  if (!stage) throw new ConfigError(`Pipeline config error: unknown stage "${stageName}"`);

  if (Object.hasOwn(stage.transitions, signal)) {
    const target = stage.transitions[signal];
    return target === TERMINAL_TARGET ? { kind: "terminate", signal } : { kind: "goto", stage: target };
  }

  if (stage.pause && stage.pause.signal === signal) {
    return {
      kind: "pause",
      reason: stage.pause.reason,
      resumeAt: stage.pause.resumeAt ?? stage.name,
      artifactKey: stage.pause.artifactKey,
    };
  }

  throw new UnexpectedSignalError(stageName, signal);
}
