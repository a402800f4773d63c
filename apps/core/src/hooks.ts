import * as fs from "node:fs/promises";
import * as path from "node:path";
import { TERMINAL_TARGET } from "./constants.js";
import type { ContextAccess } from "./context.js";
import { ConfigError } from "./errors.js";
import type { Logger } from "./logger.js";
import { buildManifest, writeManifest } from "./manifest.js";
import { msg } from "./messages.js";
import type { CompletionSignal, PipelineConfig } from "./pipeline-types.js";
import { interpolate } from "./utils.js";

/** Context key the manifest hook stores the written manifest path under. */
export const MANIFEST_PATH_KEY = "manifest_path";

/**
 * Before/after-stage callbacks. Hooks may derive or summarize context values;
 * they never see or influence the routing decision. A thrown error fails the run.
 */
export interface StageHooks {
  beforeStage?(stage: string, ctx: ContextAccess): void | Promise<void>;
  afterStage?(stage: string, signal: CompletionSignal, ctx: ContextAccess): void | Promise<void>;
}

export type HookLogger = Pick<Logger, "info" | "warn">;

/** Run several hook sets in order. */
export function composeHooks(...sets: StageHooks[]): StageHooks {
  return {
    async beforeStage(stage, ctx) {
      for (const hooks of sets) await hooks.beforeStage?.(stage, ctx);
    },
    async afterStage(stage, signal, ctx) {
      for (const hooks of sets) await hooks.afterStage?.(stage, signal, ctx);
    },
  };
}

/** Planning pipeline: depth defaults, clarification answers and assessment results. */
export function createPlanHooks(logger: HookLogger): StageHooks {
  return {
    async beforeStage(stage, ctx) {
      if (stage === "create_plan" && !ctx.has("depth")) {
        ctx.set("depth", "standard");
        logger.info(msg.hookDepthDefaulted);
      } else if (stage === "update_docs") {
        const clarificationsPath = ctx.getString("clarifications_path");
        if (!clarificationsPath) {
          ctx.set("clarification_answers", "");
          logger.warn(msg.hookNoClarifications);
          return;
        }
        let answers: string;
        try {
          answers = await fs.readFile(clarificationsPath, "utf-8");
        } catch {
          ctx.set("clarification_answers", "");
          logger.warn(msg.hookClarificationsMissing(clarificationsPath));
          return;
        }
        ctx.set("clarification_answers", answers);
        logger.info(msg.hookClarificationsInjected(clarificationsPath));
      }
    },

    afterStage(stage, signal, ctx) {
      if (stage === "assess") {
        const depth = signal.payload?.depth;
        const tier = signal.payload?.tier;
        if (!ctx.has("depth")) ctx.set("depth", typeof depth === "string" ? depth : "standard");
        if (!ctx.has("tier")) ctx.set("tier", typeof tier === "string" ? tier : signal.name);
        logger.info(msg.hookAssessed(ctx.getString("depth") ?? "", ctx.getString("tier") ?? ""));
      } else if (stage === "req_validate" && signal.name === "CLARIFICATIONS_NEEDED") {
        const clarificationsPath = signal.payload?.clarifications_path;
        if (typeof clarificationsPath === "string" && clarificationsPath !== "") {
          ctx.set("clarifications_path", clarificationsPath);
        } else {
          logger.warn(msg.hookClarificationsPathMissing);
        }
      }
    },
  };
}

/** Write the pipeline's manifest once a signal ends the run. */
export function createManifestHook(config: PipelineConfig, repoRoot: string, logger: HookLogger): StageHooks {
  const spec = config.manifest;
  if (!spec) return {};
  return {
    async afterStage(stage, signal, ctx) {
      const terminal =
        config.endSignals.includes(signal.name) || config.stages[stage].transitions[signal.name] === TERMINAL_TARGET;
      if (!terminal) return;
      const target = path.resolve(
        repoRoot,
        interpolate(spec.path, (key) => ctx.get(key)),
      );
      await writeManifest(target, buildManifest(spec, config.kind, ctx));
      ctx.set(MANIFEST_PATH_KEY, target);
      logger.info(msg.manifestWritten(target));
    },
  };
}

const BUILTIN_HOOKS: Readonly<Record<string, (logger: HookLogger) => StageHooks>> = {
  plan: createPlanHooks,
};

/** Look up a built-in hook set by the name a pipeline declares. */
export function resolveHookSet(name: string, logger: HookLogger): StageHooks {
  if (!Object.hasOwn(BUILTIN_HOOKS, name)) {
    throw new ConfigError(`Pipeline config error: unknown hook set "${name}". Valid: ${Object.keys(BUILTIN_HOOKS).join(", ")}`);
  }
  return BUILTIN_HOOKS[name](logger);
}

/** Every hook that applies to `config`: its named set first, then the manifest writer. */
export function hooksForPipeline(config: PipelineConfig, repoRoot: string, logger: HookLogger): StageHooks {
  const sets: StageHooks[] = [];
  if (config.hooks) sets.push(resolveHookSet(config.hooks, logger));
  sets.push(createManifestHook(config, repoRoot, logger));
  return composeHooks(...sets);
}
