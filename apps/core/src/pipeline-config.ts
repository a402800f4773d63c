import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { DEFAULT_MAX_ITERATIONS, DEFAULT_MAX_TURNS, SAFE_NAME, SIGNAL_KEY, STATE_DIR, TERMINAL_TARGET } from "./constants.js";
import { ConfigError } from "./errors.js";
import { bundledDefaultsDir } from "./paths.js";
import type {
  CompletionConfig,
  JsonValue,
  ManifestSpec,
  PauseSpec,
  PipelineConfig,
  StageSpec,
  SwitchSpec,
  ToolPolicy,
} from "./pipeline-types.js";
import { routableSignals } from "./router.js";

const PIPELINE_EXT = ".yaml";

type RawObject = Record<string, unknown>;

function fail(msg: string): never {
  throw new ConfigError(`Pipeline config error: ${msg}`);
}

function isRecord(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, context: string): RawObject {
  if (!isRecord(value)) fail(`${context} must be an object`);
  return value;
}

function requireString(obj: RawObject, key: string, context: string): string {
  const val = obj[key];
  if (typeof val !== "string" || val === "") {
    fail(`"${key}" must be a non-empty string in ${context}`);
  }
  return val;
}

function optionalString(obj: RawObject, key: string, context: string): string | undefined {
  const val = obj[key];
  if (val === undefined || val === null) return undefined;
  if (typeof val !== "string" || val === "") fail(`"${key}" must be a non-empty string if provided in ${context}`);
  return val;
}

function optionalPositiveInt(obj: RawObject, key: string, context: string, fallback: number): number {
  const val = obj[key];
  if (val === undefined || val === null) return fallback;
  if (typeof val !== "number" || !Number.isInteger(val) || val <= 0) {
    fail(`"${key}" must be a positive integer in ${context}`);
  }
  return val;
}

function optionalStringList(obj: RawObject, key: string, context: string): string[] | undefined {
  const val = obj[key];
  if (val === undefined || val === null) return undefined;
  if (!Array.isArray(val) || !val.every((item): item is string => typeof item === "string" && item !== "")) {
    fail(`"${key}" must be a list of non-empty strings in ${context}`);
  }
  return val;
}

function stringMap(obj: RawObject, key: string, context: string): Record<string, string> {
  const val = obj[key];
  if (val === undefined || val === null) return {};
  const map = requireObject(val, `"${key}" in ${context}`);
  const result: Record<string, string> = {};
  for (const [k, v] of Object.entries(map)) {
    if (typeof v === "string") result[k] = v;
    else if (typeof v === "number" || typeof v === "boolean") result[k] = String(v);
    else fail(`"${key}.${k}" must be a string in ${context}`);
  }
  return result;
}

function validateCompletion(raw: unknown, context: string): CompletionConfig {
  const obj = requireObject(raw, `"completion" in ${context}`);
  const type = requireString(obj, "type", `${context}.completion`);
  switch (type) {
    case "json":
      return {
        type: "json",
        signalKey: optionalString(obj, "signalKey", context) ?? SIGNAL_KEY,
        signals: optionalStringList(obj, "signals", `${context}.completion`),
      };
    case "sentinel": {
      const marker = requireString(obj, "marker", `${context}.completion`);
      return { type: "sentinel", marker, signal: optionalString(obj, "signal", context) ?? marker };
    }
    default:
      fail(`Unknown completion type "${type}" in ${context}. Valid: json, sentinel`);
  }
}

function validatePause(raw: unknown, stage: string, context: string): PauseSpec | undefined {
  if (raw === undefined || raw === null) return undefined;
  const obj = requireObject(raw, `"pause" in ${context}`);
  return {
    signal: requireString(obj, "signal", `${context}.pause`),
    reason: optionalString(obj, "reason", context) ?? `Stage "${stage}" needs input`,
    artifactKey: optionalString(obj, "artifactKey", context),
    resumeAt: optionalString(obj, "resumeAt", context),
  };
}

function validateTools(raw: unknown, context: string): ToolPolicy | undefined {
  if (raw === undefined || raw === null) return undefined;
  const obj = requireObject(raw, `"tools" in ${context}`);
  return {
    allow: optionalStringList(obj, "allow", `${context}.tools`),
    deny: optionalStringList(obj, "deny", `${context}.tools`),
  };
}

function validateStage(name: string, raw: unknown, defaultMaxTurns: number): StageSpec {
  const context = `stages.${name}`;
  const obj = requireObject(raw, context);
  return {
    name,
    prompt: requireString(obj, "prompt", context),
    completion: validateCompletion(obj.completion, context),
    transitions: stringMap(obj, "transitions", context),
    maxTurns: optionalPositiveInt(obj, "maxTurns", context, defaultMaxTurns),
    tools: validateTools(obj.tools, context),
    pause: validatePause(obj.pause, name, context),
    artifacts: optionalStringList(obj, "artifacts", context),
  };
}

function validateManifest(raw: unknown): ManifestSpec | undefined {
  if (raw === undefined || raw === null) return undefined;
  const obj = requireObject(raw, '"manifest"');
  const flags: Record<string, boolean> = {};
  if (obj.flags !== undefined && obj.flags !== null) {
    for (const [key, value] of Object.entries(requireObject(obj.flags, '"manifest.flags"'))) {
      if (typeof value !== "boolean") fail(`"manifest.flags.${key}" must be a boolean`);
      flags[key] = value;
    }
  }
  return {
    path: requireString(obj, "path", "manifest"),
    target: requireString(obj, "target", "manifest"),
    flags,
    fields: stringMap(obj, "fields", "manifest"),
    body: optionalString(obj, "body", "manifest"),
  };
}

function validateSwitches(raw: unknown, stages: Readonly<Record<string, StageSpec>>): Record<string, SwitchSpec> {
  if (raw === undefined || raw === null) return {};
  const switches: Record<string, SwitchSpec> = {};
  for (const [name, value] of Object.entries(requireObject(raw, '"switches"'))) {
    const context = `switches.${name}`;
    const obj = requireObject(value, context);
    const fallback = obj.default ?? true;
    if (typeof fallback !== "boolean") fail(`"default" must be a boolean in ${context}`);
    const overrides = requireObject(obj.whenOff, `"whenOff" in ${context}`);
    const whenOff: Record<string, Record<string, string>> = {};
    for (const stage of Object.keys(overrides)) {
      if (!Object.hasOwn(stages, stage)) fail(`${context}.whenOff names undeclared stage "${stage}"`);
      whenOff[stage] = stringMap(overrides, stage, `${context}.whenOff`);
    }
    switches[name] = { default: fallback, whenOff };
  }
  return switches;
}

/** Stage names reachable from the start stage through transitions and resume points. */
function reachableStages(stages: Readonly<Record<string, StageSpec>>, start: string): Set<string> {
  const seen = new Set<string>([start]);
  const queue = [start];
  while (queue.length > 0) {
    const current = stages[queue.shift() ?? start];
    const targets = [...Object.values(current.transitions)];
    if (current.pause?.resumeAt) targets.push(current.pause.resumeAt);
    for (const target of targets) {
      if (target === TERMINAL_TARGET || seen.has(target) || !Object.hasOwn(stages, target)) continue;
      seen.add(target);
      queue.push(target);
    }
  }
  return seen;
}

/** Cross-check stage references. Runs once, before any session exists. */
function validateGraph(config: PipelineConfig): void {
  const declared = new Set(Object.keys(config.stages));
  if (!declared.has(config.startStage)) fail(`startStage "${config.startStage}" is not a declared stage`);

  for (const stage of Object.values(config.stages)) {
    const ctx = `stage "${stage.name}"`;
    for (const [signal, target] of Object.entries(stage.transitions)) {
      if (target !== TERMINAL_TARGET && !declared.has(target)) {
        fail(`Transition ${signal} -> "${target}" in ${ctx} targets an undeclared stage`);
      }
    }

    if (stage.pause) {
      if (Object.hasOwn(stage.transitions, stage.pause.signal) || config.endSignals.includes(stage.pause.signal)) {
        fail(`Pause signal "${stage.pause.signal}" in ${ctx} is already routed`);
      }
      if (stage.pause.resumeAt && !declared.has(stage.pause.resumeAt)) {
        fail(`Pause resumeAt "${stage.pause.resumeAt}" in ${ctx} is not a declared stage`);
      }
    }

    const routable = new Set(routableSignals(stage, config.endSignals));
    if (routable.size === 0) fail(`${ctx} has no transitions, pause signal or end signals`);

    const completion = stage.completion;
    const produced = completion.type === "sentinel" ? [completion.signal] : (completion.signals ?? []);
    for (const signal of produced) {
      if (!routable.has(signal)) fail(`Signal "${signal}" of ${ctx} has no transition, pause or end signal`);
    }
  }

  const reachable = reachableStages(config.stages, config.startStage);
  const unreachable = [...declared].filter((name) => !reachable.has(name));
  if (unreachable.length > 0) fail(`Unreachable stages: ${unreachable.join(", ")}`);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const inner of Object.values(value)) deepFreeze(inner);
    Object.freeze(value);
  }
  return value;
}

/** Validate a parsed YAML document into a frozen pipeline definition. */
export function parsePipelineConfig(raw: unknown): PipelineConfig {
  if (!isRecord(raw)) fail("Config must be a YAML object");

  const stagesRaw = requireObject(raw.stages, '"stages"');
  if (Object.keys(stagesRaw).length === 0) fail('"stages" must declare at least one stage');

  const defaultMaxTurns = optionalPositiveInt(raw, "defaultMaxTurns", "pipeline", DEFAULT_MAX_TURNS);
  const stages: Record<string, StageSpec> = {};
  for (const [name, stageRaw] of Object.entries(stagesRaw)) {
    stages[name] = validateStage(name, stageRaw, defaultMaxTurns);
  }

  const config: PipelineConfig = {
    kind: requireString(raw, "name", "pipeline"),
    description: optionalString(raw, "description", "pipeline") ?? "",
    stages,
    startStage: requireString(raw, "startStage", "pipeline"),
    endSignals: optionalStringList(raw, "endSignals", "pipeline") ?? [],
    maxIterations: optionalPositiveInt(raw, "maxIterations", "pipeline", DEFAULT_MAX_ITERATIONS),
    model: optionalString(raw, "model", "pipeline"),
    hooks: optionalString(raw, "hooks", "pipeline"),
    defaults: stringMap(raw, "defaults", "pipeline"),
    manifest: validateManifest(raw.manifest),
    switches: validateSwitches(raw.switches, stages),
  };

  validateGraph(config);
  for (const name of Object.keys(config.switches)) {
    applySwitches(config, (key) => (key === name ? false : undefined));
  }
  return deepFreeze(config);
}

/** Effective state of a switch: a boolean or "true"/"false" context value, else the declared default. */
export function switchState(spec: SwitchSpec, value: JsonValue | undefined): boolean {
  if (typeof value === "boolean") return value;
  if (value === "true" || value === "false") return value === "true";
  return spec.default;
}

/** Names of the switches that are off for the given context. */
export function switchesOff(config: PipelineConfig, lookup: (key: string) => JsonValue | undefined): string[] {
  return Object.entries(config.switches)
    .filter(([name, spec]) => !switchState(spec, lookup(name)))
    .map(([name]) => name);
}

/**
 * The pipeline as it runs for a given context: transition overrides of every switch that is
 * off, with stages no longer reachable removed. Returns `config` itself when all are on.
 */
export function applySwitches(config: PipelineConfig, lookup: (key: string) => JsonValue | undefined): PipelineConfig {
  const off = switchesOff(config, lookup);
  if (off.length === 0) return config;

  const overridden: Record<string, StageSpec> = {};
  for (const [name, stage] of Object.entries(config.stages)) {
    const transitions = { ...stage.transitions };
    for (const switchName of off) Object.assign(transitions, config.switches[switchName].whenOff[name]);
    overridden[name] = { ...stage, transitions };
  }
  const reachable = reachableStages(overridden, config.startStage);
  const stages: Record<string, StageSpec> = {};
  for (const [name, stage] of Object.entries(overridden)) {
    if (reachable.has(name)) stages[name] = stage;
  }

  const switched: PipelineConfig = { ...config, stages };
  validateGraph(switched);
  return deepFreeze(switched);
}

/** Parse pipeline YAML text. */
export function parsePipelineYaml(text: string): PipelineConfig {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    fail(`invalid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parsePipelineConfig(raw);
}

export interface LoadedPipeline {
  readonly config: PipelineConfig;
  /** File the definition was read from. */
  readonly source: string;
}

function pipelineDirs(repoRoot: string): string[] {
  return [path.join(repoRoot, STATE_DIR, "pipelines"), path.join(bundledDefaultsDir(), "pipelines")];
}

/** Load a pipeline by kind. A repo-local definition overrides the bundled one. */
export async function loadPipelineConfig(kind: string, repoRoot: string): Promise<LoadedPipeline> {
  if (!SAFE_NAME.test(kind)) fail(`invalid pipeline kind "${kind}"`);
  for (const dir of pipelineDirs(repoRoot)) {
    const filePath = path.join(dir, `${kind}${PIPELINE_EXT}`);
    let text: string;
    try {
      text = await fs.readFile(filePath, "utf-8");
    } catch {
      continue;
    }
    const config = parsePipelineYaml(text);
    if (config.kind !== kind) fail(`${filePath} declares name "${config.kind}", expected "${kind}"`);
    return { config, source: filePath };
  }
  fail(`no pipeline named "${kind}" (looked in ${pipelineDirs(repoRoot).join(", ")})`);
}

/** Names of every pipeline available to the repo, bundled ones included. */
export async function listPipelineKinds(repoRoot: string): Promise<string[]> {
  const kinds = new Set<string>();
  for (const dir of pipelineDirs(repoRoot)) {
    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch {
      continue;
    }
    for (const entry of entries) {
      if (entry.endsWith(PIPELINE_EXT)) kinds.add(entry.slice(0, -PIPELINE_EXT.length));
    }
  }
  return [...kinds].sort();
}
