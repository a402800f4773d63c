import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { findRepoRoot, loadConfig, UsageError } from "./config.js";

const cwd = "/work/repo";

function load(argv: string[], env: Record<string, string> = {}) {
  return loadConfig({ argv, env, cwd });
}

describe("loadConfig", () => {
  it("shows help without a command", () => {
    expect(load([]).command).toBe("help");
    expect(load(["run", "-h"]).command).toBe("help");
    expect(load(["-V"]).command).toBe("version");
  });

  it("parses a run with context files and seeded values", () => {
    const config = load(["run", "plan", "docs/scope.md", "/abs/notes.md", "--set", "topic=billing", "-s", "empty="]);
    expect(config.command).toBe("run");
    expect(config.pipelineKind).toBe("plan");
    expect(config.files).toEqual(["/work/repo/docs/scope.md", "/abs/notes.md"]);
    expect(config.contextEntries).toEqual({ topic: "billing", empty: "" });
    expect(config.sessionId).toBeUndefined();
  });

  it("keeps everything after the first = in a seeded value", () => {
    expect(load(["run", "ship", "--set", "query=a=b"]).contextEntries).toEqual({ query: "a=b" });
  });

  it("rejects malformed --set entries", () => {
    expect(() => load(["run", "plan", "--set", "novalue"])).toThrow(UsageError);
    expect(() => load(["run", "plan", "--set", "bad key=1"])).toThrow(UsageError);
  });

  it("accepts a manifest run without a kind", () => {
    const config = load(["run", "--manifest", "out/build.md"]);
    expect(config.pipelineKind).toBeUndefined();
    expect(config.manifestPath).toBe("/work/repo/out/build.md");
  });

  it("requires a kind where the command needs one", () => {
    expect(() => load(["run"])).toThrow('"run" needs a pipeline kind or --manifest');
    expect(() => load(["resume"])).toThrow('"resume" needs a pipeline kind');
    expect(() => load(["sessions", "plan", "extra"])).toThrow(UsageError);
    expect(() => load(["clean", "plan", "a", "b"])).toThrow(UsageError);
  });

  it("takes an optional session id for resume, status and clean", () => {
    expect(load(["resume", "plan", "20260101T000000Z-abcd"]).sessionId).toBe("20260101T000000Z-abcd");
    expect(load(["status", "plan"]).sessionId).toBeUndefined();
  });

  it("rejects kinds and session ids that are not plain names", () => {
    expect(() => load(["clean", "../..", "package"])).toThrow('Invalid pipeline kind "../.."');
    expect(() => load(["status", "plan", "../x"])).toThrow('Invalid session id "../x"');
    expect(() => load(["run", "a/b"])).toThrow(UsageError);
  });

  it("rejects unknown commands and options", () => {
    expect(() => load(["deploy"])).toThrow('Unknown command "deploy"');
    expect(() => load(["run", "plan", "--bogus"])).toThrow(UsageError);
  });

  it("lets flags override environment variables", () => {
    const env = { MAX_ITERATIONS: "30", VERBOSE: "true", MODEL: "gpt-5", SESSION_TIMEOUT_MS: "1000" };
    expect(load(["run", "plan"], env)).toMatchObject({
      maxIterations: 30,
      verbose: true,
      model: "gpt-5",
      sessionTimeoutMs: 1000,
    });
    expect(load(["run", "plan", "-n", "5"], env).maxIterations).toBe(5);
  });

  it("uses defaults when the environment is empty", () => {
    expect(load(["stats"])).toMatchObject({
      command: "stats",
      maxIterations: undefined,
      verbose: false,
      model: "claude-sonnet-4.5",
      sessionTimeoutMs: 1_800_000,
    });
  });

  it("rejects invalid numeric and boolean values", () => {
    expect(() => load(["run", "plan", "--max-iterations", "0"])).toThrow(
      'Invalid value for --max-iterations: "0". Must be a positive integer.',
    );
    expect(() => load(["run", "plan"], { MAX_ITERATIONS: "lots" })).toThrow(UsageError);
    expect(() => load(["run", "plan"], { VERBOSE: "yes" })).toThrow(UsageError);
  });
});

describe("findRepoRoot", () => {
  const dirs: string[] = [];

  afterEach(async () => {
    for (const dir of dirs) await fs.rm(dir, { recursive: true, force: true });
    dirs.length = 0;
  });

  it("finds the nearest directory with a .git entry", async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "stageloop-root-"));
    dirs.push(root);
    await fs.mkdir(path.join(root, ".git"));
    const nested = path.join(root, "apps", "web");
    await fs.mkdir(nested, { recursive: true });
    expect(findRepoRoot(nested)).toBe(root);
  });
});
