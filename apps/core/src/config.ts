import * as fs from "node:fs";
import * as path from "node:path";
import { parseArgs } from "node:util";
import { DEFAULT_MODEL, SAFE_NAME } from "./constants.js";
import { bundledDefaultsDir } from "./paths.js";

/** Bad command line or environment. Reported with the help text, exit code 1. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

type Env = Readonly<Record<string, string | undefined>>;

function readEnvString(env: Env, key: string, fallback: string): string {
  const value = env[key];
  if (value === undefined || value === "") return fallback;
  return value;
}

function readEnvBoolean(env: Env, key: string, fallback: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === "") return fallback;
  if (value === "true") return true;
  if (value === "false") return false;
  throw new UsageError(`Invalid value for ${key}: "${value}". Must be "true" or "false".`);
}

function parsePositiveInt(label: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new UsageError(`Invalid value for ${label}: "${value}". Must be a positive integer.`);
  }
  return parsed;
}

function readEnvPositiveInt(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value === "") return undefined;
  return parsePositiveInt(key, value);
}

export const COMMANDS = ["run", "resume", "status", "sessions", "clean", "stats", "pipelines"] as const;

export type CliCommand = (typeof COMMANDS)[number] | "help" | "version";

function isCommand(value: string): value is (typeof COMMANDS)[number] {
  return COMMANDS.some((c) => c === value);
}

export function readVersion(): string {
  const pkgPath = path.join(bundledDefaultsDir(), "..", "package.json");
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export const HELP_TEXT = `Usage: stageloop <command> [options]

Commands:
  run <kind> [files...]        Start a fresh run of a pipeline; files become context
  run --manifest <file>        Start the pipeline a manifest targets, seeded from its header
  resume <kind> [sessionId]    Resume the latest (or given) paused session
  status <kind> [sessionId]    Show a session summary
  sessions <kind>              List sessions, newest first
  clean <kind> [sessionId]     Delete one session, or every session of a kind
  stats                        Show cumulative pipeline stats
  pipelines                    List available pipelines

Options:
  -m, --manifest <file>        Manifest to run (with run)
  -s, --set <key=value>        Seed a context value (repeatable)
  -o, --output-dir <dir>       Directory stage artifacts are written to
  -n, --max-iterations <n>     Run-wide turn budget
  -v, --verbose                Stream agent output
  -V, --version                Show version number
  -h, --help                   Show this help message

Exit codes: 0 completed, 2 paused for input, 1 failed.

Environment variables (overridden by CLI flags):
  VERBOSE, MAX_ITERATIONS, SESSION_TIMEOUT_MS, MODEL

Examples:
  stageloop run plan docs/scope.md
  stageloop run --manifest .stageloop/output/plan/<session>/build.md
  stageloop resume plan
  stageloop run ship --set branch=main`;

const CONTEXT_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

function parseContextEntries(entries: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const entry of entries) {
    const eq = entry.indexOf("=");
    const key = eq === -1 ? entry : entry.slice(0, eq);
    if (eq === -1 || !CONTEXT_KEY.test(key)) {
      throw new UsageError(`Invalid --set "${entry}". Expected key=value with a word-character key.`);
    }
    out[key] = entry.slice(eq + 1);
  }
  return out;
}

/** Nearest ancestor of `start` holding a `.git` entry, or `start` itself. */
export function findRepoRoot(start: string): string {
  let dir = path.resolve(start);
  for (;;) {
    if (fs.existsSync(path.join(dir, ".git"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve(start);
    dir = parent;
  }
}

function parseCli(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        verbose: { type: "boolean", short: "v", default: false },
        help: { type: "boolean", short: "h", default: false },
        version: { type: "boolean", short: "V", default: false },
        manifest: { type: "string", short: "m" },
        set: { type: "string", short: "s", multiple: true },
        "output-dir": { type: "string", short: "o" },
        "max-iterations": { type: "string", short: "n" },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Core config loaded from environment variables and CLI arguments.
 * CLI args take precedence over env vars. Stage graphs live in pipeline YAML files.
 */
export interface AppConfig {
  readonly command: CliCommand;
  readonly repoRoot: string;
  readonly verbose: boolean;
  readonly pipelineKind: string | undefined;
  readonly sessionId: string | undefined;
  /** Context files given to `run`, resolved against the working directory. */
  readonly files: readonly string[];
  readonly manifestPath: string | undefined;
  readonly contextEntries: Readonly<Record<string, string>>;
  readonly outputDir: string | undefined;
  /** Overrides the pipeline's own run-wide budget when set. */
  readonly maxIterations: number | undefined;
  readonly model: string;
  readonly sessionTimeoutMs: number;
}

export interface ConfigSources {
  readonly argv: readonly string[];
  readonly env: Env;
  readonly cwd: string;
}

export function loadConfig(sources: Partial<ConfigSources> = {}): AppConfig {
  const argv = sources.argv ?? process.argv.slice(2);
  const env = sources.env ?? process.env;
  const cwd = sources.cwd ?? process.cwd();

  const { values, positionals } = parseCli(argv);

  const [first, ...rest] = positionals;
  let command: CliCommand;
  if (values.version) command = "version";
  else if (values.help || first === undefined) command = "help";
  else if (isCommand(first)) command = first;
  else throw new UsageError(`Unknown command "${first}". Valid: ${COMMANDS.join(", ")}`);

  const needsKind = command === "resume" || command === "status" || command === "sessions" || command === "clean";
  const [kind, ...args] = rest;
  if (needsKind && kind === undefined) throw new UsageError(`"${command}" needs a pipeline kind`);
  if (command === "run" && kind === undefined && values.manifest === undefined) {
    throw new UsageError('"run" needs a pipeline kind or --manifest');
  }
  if (command === "sessions" && args.length > 0) throw new UsageError('"sessions" takes no session id');
  if ((command === "resume" || command === "status" || command === "clean") && args.length > 1) {
    throw new UsageError(`"${command}" takes at most one session id`);
  }

  if (kind !== undefined && !SAFE_NAME.test(kind)) throw new UsageError(`Invalid pipeline kind "${kind}"`);
  const sessionId = command === "run" ? undefined : args[0];
  if (sessionId !== undefined && !SAFE_NAME.test(sessionId)) throw new UsageError(`Invalid session id "${sessionId}"`);

  const maxIterationsFlag = values["max-iterations"];
  const outputDir = values["output-dir"];

  return {
    command,
    repoRoot: findRepoRoot(cwd),
    verbose: values.verbose || readEnvBoolean(env, "VERBOSE", false),
    pipelineKind: kind,
    sessionId,
    files: command === "run" ? args.map((f) => path.resolve(cwd, f)) : [],
    manifestPath: values.manifest === undefined ? undefined : path.resolve(cwd, values.manifest),
    contextEntries: parseContextEntries(values.set ?? []),
    outputDir: outputDir === undefined ? undefined : path.resolve(cwd, outputDir),
    maxIterations:
      maxIterationsFlag === undefined
        ? readEnvPositiveInt(env, "MAX_ITERATIONS")
        : parsePositiveInt("--max-iterations", maxIterationsFlag),
    model: readEnvString(env, "MODEL", DEFAULT_MODEL),
    sessionTimeoutMs: readEnvPositiveInt(env, "SESSION_TIMEOUT_MS") ?? 1_800_000,
  };
}
