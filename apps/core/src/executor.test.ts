import { describe, expect, it } from "vitest";
import type { AgentRunner, AgentTurnRequest } from "./agent.js";
import { ExecutionContext } from "./context.js";
import { SessionNotFoundError, SessionStateError } from "./errors.js";
import type { PipelineEvent } from "./events.js";
import { PipelineExecutor, type ExecutorOptions } from "./executor.js";
import type { StageHooks } from "./hooks.js";
import { parsePipelineConfig } from "./pipeline-config.js";
import type { PipelineConfig } from "./pipeline-types.js";
import { TemplateRenderer } from "./renderer.js";
import type { Session, SessionStore } from "./session-store.js";
import { createSession, loadForResume } from "./session-store.js";
import { RecordingSink } from "./test-support.js";

/** Replays scripted turns per stage. A stage with no turns left produces an empty turn. */
class ScriptedRunner implements AgentRunner {
  readonly name = "scripted";
  readonly calls: AgentTurnRequest[] = [];
  private readonly script: Map<string, string[][]>;

  constructor(script: Record<string, string[][]>) {
    this.script = new Map(Object.entries(script).map(([stage, turns]) => [stage, turns.map((t) => [...t])]));
  }

  async *runTurn(request: AgentTurnRequest): AsyncIterable<string> {
    this.calls.push(request);
    const chunks = this.script.get(request.stage)?.shift() ?? [];
    for (const chunk of chunks) yield chunk;
  }

  stages(): string[] {
    return this.calls.map((c) => c.stage);
  }
}

class MemoryStore implements SessionStore {
  readonly saves: Session[] = [];
  private readonly sessions = new Map<string, Session>();
  private readonly latest = new Map<string, string>();

  async save(session: Session): Promise<void> {
    this.saves.push(structuredClone(session));
    this.sessions.set(`${session.pipelineKind}/${session.sessionId}`, structuredClone(session));
    this.latest.set(session.pipelineKind, session.sessionId);
  }

  async load(pipelineKind: string): Promise<Session> {
    const id = this.latest.get(pipelineKind);
    if (id === undefined) throw new SessionNotFoundError(pipelineKind);
    return this.get(pipelineKind, id);
  }

  async get(pipelineKind: string, sessionId: string): Promise<Session> {
    const session = this.sessions.get(`${pipelineKind}/${sessionId}`);
    if (!session) throw new SessionNotFoundError(pipelineKind, sessionId);
    return structuredClone(session);
  }

  async list(pipelineKind: string): Promise<Session[]> {
    return [...this.sessions.values()].filter((s) => s.pipelineKind === pipelineKind).map((s) => structuredClone(s));
  }

  async remove(pipelineKind: string, sessionId: string): Promise<void> {
    this.sessions.delete(`${pipelineKind}/${sessionId}`);
  }
}

/** Simulates the process being killed right before the nth save. */
class CrashingStore extends MemoryStore {
  private count = 0;

  constructor(private readonly crashOnSave: number) {
    super();
  }

  override async save(session: Session): Promise<void> {
    this.count++;
    if (this.count === this.crashOnSave) throw new Error("process killed");
    await super.save(session);
  }
}

const sig = (name: string, extra: Record<string, string> = {}) => JSON.stringify({ signal: name, ...extra });

function planConfig(overrides: Record<string, unknown> = {}): PipelineConfig {
  return parsePipelineConfig({
    name: "plan",
    startStage: "research",
    endSignals: ["TASKS_COMPLETE"],
    stages: {
      research: {
        prompt: "Research {topic}",
        completion: { type: "json" },
        transitions: { RESEARCHED: "assess" },
        artifacts: ["notes"],
        maxTurns: 2,
      },
      assess: {
        prompt: "Assess",
        completion: { type: "json" },
        transitions: { LIGHT: "create_tasks", STANDARD: "create_plan" },
        artifacts: ["depth"],
        maxTurns: 2,
      },
      create_plan: { prompt: "Plan", completion: { type: "json" }, transitions: { PLANNED: "create_tasks" } },
      create_tasks: { prompt: "Tasks", completion: { type: "sentinel", marker: "TASKS_COMPLETE" }, maxTurns: 3 },
    },
    ...overrides,
  });
}

function setup(
  config: PipelineConfig,
  script: Record<string, string[][]>,
  extra: Partial<ExecutorOptions> = {},
): { executor: PipelineExecutor; runner: ScriptedRunner; store: MemoryStore; sink: RecordingSink } {
  const runner = new ScriptedRunner(script);
  const store = extra.store instanceof MemoryStore ? extra.store : new MemoryStore();
  const sink = new RecordingSink();
  const executor = new PipelineExecutor({
    config,
    runner,
    renderer: new TemplateRenderer("/nonexistent-repo", config.kind),
    sink,
    ...extra,
    store,
  });
  return { executor, runner, store, sink };
}

function fresh(config: PipelineConfig, entries: [string, string][] = [["topic", "billing"]]): Session {
  return createSession(config, new ExecutionContext(entries), "s1");
}

const lightScript = (): Record<string, string[][]> => ({
  research: [["Reading files...\n", sig("RESEARCHED", { notes: "three modules" })]],
  assess: [['{"signal": "LI', 'GHT", "depth": "light"}']],
  create_plan: [[sig("PLANNED")]],
  create_tasks: [["Wrote tasks. TASKS_COMP", "LETE"]],
});

describe("PipelineExecutor", () => {
  it("hands each stage's tool policy to the runner", async () => {
    const config = parsePipelineConfig({
      name: "plan",
      startStage: "research",
      endSignals: ["DONE"],
      stages: {
        research: {
          prompt: "Research",
          completion: { type: "json" },
          transitions: { RESEARCHED: "write" },
          tools: { allow: ["view", "web_fetch"] },
        },
        write: { prompt: "Write", completion: { type: "json" }, tools: { deny: ["shell"] } },
      },
    });
    const { executor, runner } = setup(config, { research: [[sig("RESEARCHED")]], write: [[sig("DONE")]] });

    await executor.run(fresh(config));

    expect(runner.calls.map((c) => c.tools)).toEqual([{ allow: ["view", "web_fetch"] }, { deny: ["shell"] }]);
  });

  it("skips create_plan when assess reports LIGHT", async () => {
    const config = planConfig();
    const { executor, runner, store } = setup(config, lightScript());

    const outcome = await executor.run(fresh(config));

    expect(outcome.status).toBe("completed");
    expect(outcome.signal).toBe("TASKS_COMPLETE");
    expect(runner.stages()).toEqual(["research", "assess", "create_tasks"]);
    expect(runner.calls[0].prompt).toBe("Research billing");
    expect(Object.fromEntries(outcome.session.context)).toEqual({ topic: "billing", notes: "three modules", depth: "light" });
    expect(outcome.session.history).toEqual([
      { stage: "research", signal: "RESEARCHED", turns: 1 },
      { stage: "assess", signal: "LIGHT", turns: 1 },
      { stage: "create_tasks", signal: "TASKS_COMPLETE", turns: 1 },
    ]);
    expect(await store.load("plan")).toEqual(outcome.session);
  });

  it("persists after every transition", async () => {
    const config = planConfig();
    const { executor, store } = setup(config, lightScript());
    await executor.run(fresh(config));
    expect(store.saves.map((s) => [s.currentStage, s.status])).toEqual([
      ["research", "running"],
      ["assess", "running"],
      ["create_tasks", "running"],
      ["create_tasks", "completed"],
    ]);
  });

  it("emits events with a monotonically increasing turn counter", async () => {
    const config = planConfig();
    const { executor, sink } = setup(config, lightScript());
    await executor.run(fresh(config));
    expect(sink.events.map((e) => [e.type, e.stage, e.turn])).toEqual([
      ["stage_started", "research", 0],
      ["stage_completed", "research", 1],
      ["stage_started", "assess", 1],
      ["stage_completed", "assess", 2],
      ["stage_started", "create_tasks", 2],
      ["stage_completed", "create_tasks", 3],
      ["run_completed", "create_tasks", 3],
    ]);
  });

  it("fails after exactly maxTurns turns without a signal", async () => {
    const config = planConfig();
    const { executor, runner, sink } = setup(config, {
      ...lightScript(),
      create_tasks: [["still working"], ["almost"], ["TASKS_COMP"], ["LETE"]],
    });

    const outcome = await executor.run(fresh(config));

    expect(outcome.status).toBe("failed");
    expect(outcome.error?.kind).toBe("IterationExceeded");
    expect(outcome.error?.message).toBe('Stage "create_tasks" used all 3 turns without a signal');
    expect(runner.stages().filter((s) => s === "create_tasks")).toHaveLength(3);
    expect(outcome.session.currentStage).toBe("create_tasks");
    expect(outcome.session.error).toEqual({
      kind: "IterationExceeded",
      message: 'Stage "create_tasks" used all 3 turns without a signal',
    });
    expect(sink.ofType("run_failed")).toMatchObject([{ stage: "create_tasks", turns: 3, errorKind: "IterationExceeded" }]);
  });

  it("does not join a marker split across two turns", async () => {
    const config = planConfig();
    const { executor } = setup(config, {
      ...lightScript(),
      create_tasks: [["TASKS_"], ["COMPLETE"], ["nothing"]],
    });
    expect((await executor.run(fresh(config))).status).toBe("failed");
  });

  it("retries a stage until a later turn produces a signal", async () => {
    const config = planConfig();
    const { executor, sink } = setup(config, {
      ...lightScript(),
      create_tasks: [["thinking"], ["TASKS_COMPLETE"]],
    });
    const outcome = await executor.run(fresh(config));
    expect(outcome.status).toBe("completed");
    expect(sink.ofType("stage_completed").at(-1)).toMatchObject({ stage: "create_tasks", turns: 2 });
  });

  it("stops reading agent output once a signal is accepted", async () => {
    const config = planConfig();
    let pulled = 0;
    const runner: AgentRunner = {
      name: "counting",
      async *runTurn(request) {
        const chunks = request.stage === "research" ? [sig("RESEARCHED"), "extra", "more"] : ["TASKS_COMPLETE"];
        if (request.stage === "assess") chunks[0] = sig("LIGHT");
        for (const chunk of chunks) {
          pulled++;
          yield chunk;
        }
      },
    };
    const { executor } = setup(config, {}, { runner });
    expect((await executor.run(fresh(config))).status).toBe("completed");
    expect(pulled).toBe(3);
  });

  it("reports a sentinel repeated in the output exactly once", async () => {
    const config = planConfig();
    const { executor, sink } = setup(config, {
      ...lightScript(),
      create_tasks: [["TASKS_COMPLETE\n", "and again TASKS_COMPLETE", " TASKS_COMPLETE"]],
    });
    await executor.run(fresh(config));
    expect(sink.ofType("stage_completed").filter((e) => e.stage === "create_tasks")).toHaveLength(1);
  });

  it("terminates on a global end signal even when the stage routes it elsewhere", async () => {
    const config = planConfig({ endSignals: ["TASKS_COMPLETE", "LIGHT"] });
    const { executor, runner } = setup(config, lightScript());
    const outcome = await executor.run(fresh(config));
    expect(outcome).toMatchObject({ status: "completed", signal: "LIGHT" });
    expect(runner.stages()).toEqual(["research", "assess"]);
  });

  it("fails the run when the run-wide budget runs out", async () => {
    const config = parsePipelineConfig({
      name: "loop",
      startStage: "build",
      endSignals: ["DONE"],
      maxIterations: 4,
      stages: {
        build: { prompt: "Build", completion: { type: "json" }, transitions: { AGAIN: "build" } },
      },
    });
    const { executor, runner } = setup(config, { build: Array.from({ length: 10 }, () => [sig("AGAIN")]) });

    const outcome = await executor.run(createSession(config, new ExecutionContext(), "loop-1"));

    expect(outcome.status).toBe("failed");
    expect(outcome.error?.message).toBe('Run budget of 4 turns exhausted in stage "build"');
    expect(runner.calls).toHaveLength(4);
  });

  it("lets the caller lower the run-wide budget", async () => {
    const config = planConfig();
    const { executor, runner } = setup(config, lightScript(), { maxIterations: 2 });
    const outcome = await executor.run(fresh(config));
    expect(outcome.error?.kind).toBe("IterationExceeded");
    expect(runner.stages()).toEqual(["research", "assess"]);
  });

  it("fails on a signal with no route", async () => {
    const base = planConfig();
    const config: PipelineConfig = {
      ...base,
      stages: {
        ...base.stages,
        assess: { ...base.stages.assess, completion: { type: "json", signalKey: "signal", signals: ["LIGHT", "ODD"] } },
      },
    };
    const { executor, sink } = setup(config, { ...lightScript(), assess: [[sig("ODD", { depth: "x" })]] });

    const outcome = await executor.run(fresh(config));

    expect(outcome.status).toBe("failed");
    expect(outcome.error?.kind).toBe("UnexpectedSignal");
    expect(outcome.session.currentStage).toBe("assess");
    expect(Object.fromEntries(outcome.session.context).depth).toBe("x");
    expect(sink.events.map((e) => e.type).slice(-2)).toEqual(["stage_completed", "run_failed"]);
  });

  it("maps runner errors to AgentFailure", async () => {
    const config = planConfig();
    const runner: AgentRunner = {
      name: "broken",
      runTurn() {
        return {
          [Symbol.asyncIterator]() {
            return { next: () => Promise.reject(new Error("connection reset")) };
          },
        };
      },
    };
    const { executor } = setup(config, {}, { runner });
    const outcome = await executor.run(fresh(config));
    expect(outcome.error?.kind).toBe("AgentFailure");
    expect(outcome.error?.message).toBe('Agent failed in stage "research": connection reset');
  });

  it("maps prompt rendering errors to AgentFailure", async () => {
    const config = planConfig();
    const { executor, runner } = setup(config, lightScript(), {
      renderer: { render: () => Promise.reject(new Error("template missing")) },
    });
    const outcome = await executor.run(fresh(config));
    expect(outcome.error?.kind).toBe("AgentFailure");
    expect(runner.calls).toHaveLength(0);
  });

  it("stops on a before-stage hook failure and keeps the last persisted context", async () => {
    const config = planConfig();
    const hooks: StageHooks = {
      beforeStage(stage, ctx) {
        if (stage !== "assess") return;
        ctx.set("half_written", true);
        throw new Error("disk full");
      },
    };
    const { executor, runner, store } = setup(config, lightScript(), { hooks });

    const outcome = await executor.run(fresh(config));

    expect(outcome.status).toBe("failed");
    expect(outcome.error?.kind).toBe("HookFailure");
    expect(outcome.error?.message).toBe('beforeStage hook failed for "assess": disk full');
    expect(runner.stages()).toEqual(["research"]);
    const persisted = await store.load("plan");
    expect(persisted.status).toBe("failed");
    expect(persisted.currentStage).toBe("assess");
    expect(Object.fromEntries(persisted.context)).toEqual({ topic: "billing", notes: "three modules" });
  });

  it("stops on an after-stage hook failure without routing", async () => {
    const config = planConfig();
    const hooks: StageHooks = {
      afterStage(stage) {
        if (stage === "assess") throw new Error("summary failed");
      },
    };
    const { executor, runner, sink } = setup(config, lightScript(), { hooks });
    const outcome = await executor.run(fresh(config));
    expect(outcome.error?.kind).toBe("HookFailure");
    expect(runner.stages()).toEqual(["research", "assess"]);
    expect(sink.ofType("stage_completed").map((e) => e.stage)).toEqual(["research"]);
  });

  it("lets hooks derive context values used by later prompts", async () => {
    const config = planConfig({
      stages: {
        research: { prompt: "Scope: {scope}", completion: { type: "json" }, transitions: { RESEARCHED: "$end" } },
      },
    });
    const hooks: StageHooks = {
      beforeStage(_stage, ctx) {
        ctx.set("scope", `${ctx.getString("topic")} module`);
      },
      afterStage(_stage, signal, ctx) {
        ctx.set("summary", `${signal.name} done`);
      },
    };
    const { executor, runner } = setup(config, { research: [[sig("RESEARCHED")]] }, { hooks });
    const outcome = await executor.run(fresh(config));
    expect(runner.calls[0].prompt).toBe("Scope: billing module");
    expect(Object.fromEntries(outcome.session.context).summary).toBe("RESEARCHED done");
    expect(outcome.status).toBe("completed");
  });

  it("ignores a throwing sink", async () => {
    const config = planConfig();
    const { executor } = setup(config, lightScript(), {
      sink: {
        emit() {
          throw new Error("sink down");
        },
      },
    });
    expect((await executor.run(fresh(config))).status).toBe("completed");
  });

  it("rejects a session that already finished", async () => {
    const config = planConfig();
    const { executor } = setup(config, lightScript());
    const session = fresh(config);
    session.status = "completed";
    await expect(executor.run(session)).rejects.toThrow(SessionStateError);
  });

  it("propagates store failures", async () => {
    const config = planConfig();
    const { executor } = setup(config, lightScript(), { store: new CrashingStore(1) });
    await expect(executor.run(fresh(config))).rejects.toThrow("process killed");
  });
});

describe("pause and resume", () => {
  function clarifyConfig(): PipelineConfig {
    return parsePipelineConfig({
      name: "plan",
      startStage: "validate",
      endSignals: ["VALIDATED", "READY"],
      stages: {
        validate: {
          prompt: "Validate",
          completion: { type: "json" },
          maxTurns: 2,
          pause: {
            signal: "CLARIFY",
            reason: "Questions need answers",
            artifactKey: "questions_path",
            resumeAt: "update_docs",
          },
        },
        update_docs: { prompt: "Apply {questions_path}", completion: { type: "json" }, transitions: { RETRY: "update_docs" } },
      },
    });
  }

  it("pauses with a reason and resumes at the resume stage", async () => {
    const config = clarifyConfig();
    const first = setup(config, { validate: [[sig("CLARIFY", { questions_path: "q.md" })]] });

    const paused = await first.executor.run(fresh(config));

    expect(paused.status).toBe("paused");
    expect(paused.session.pauseReason).toBe("Questions need answers");
    expect(paused.session.currentStage).toBe("update_docs");
    expect(paused.session.artifactPaths).toEqual({ questions_path: "q.md" });
    expect(first.sink.ofType("paused")).toMatchObject([{ stage: "validate", reason: "Questions need answers" }]);

    const resumed = await loadForResume(first.store, "plan");
    const second = setup(config, { update_docs: [[sig("READY")]] }, { store: first.store });
    const outcome = await second.executor.run(resumed);

    expect(outcome.status).toBe("completed");
    expect(second.runner.stages()).toEqual(["update_docs"]);
    expect(second.runner.calls[0].prompt).toBe("Apply q.md");
    expect(outcome.session.pauseReason).toBeUndefined();
    expect(outcome.session.history.map((h) => h.signal)).toEqual(["CLARIFY", "READY"]);
  });

  it("stays paused until a later run of the stage emits a routable signal", async () => {
    const config = parsePipelineConfig({
      name: "plan",
      startStage: "validate",
      endSignals: ["VALIDATED"],
      stages: {
        validate: { prompt: "Validate", completion: { type: "json" }, pause: { signal: "CLARIFY" } },
      },
    });
    const store = new MemoryStore();

    const first = setup(config, { validate: [[sig("CLARIFY")]] }, { store });
    expect((await first.executor.run(fresh(config))).status).toBe("paused");

    const second = setup(config, { validate: [[sig("CLARIFY")]] }, { store });
    const again = await second.executor.run(await loadForResume(store, "plan"));
    expect(again.status).toBe("paused");
    expect(again.session.pauseReason).toBe('Stage "validate" needs input');

    const third = setup(config, { validate: [[sig("VALIDATED")]] }, { store });
    const done = await third.executor.run(await loadForResume(store, "plan"));
    expect(done.status).toBe("completed");
    expect(done.session.history.map((h) => h.signal)).toEqual(["CLARIFY", "CLARIFY", "VALIDATED"]);
  });

  it("does not count turns from an earlier attempt against the run budget", async () => {
    const config = clarifyConfig();
    const store = new MemoryStore();
    const first = setup(config, { validate: [["..."], [sig("CLARIFY")]] }, { store, maxIterations: 2 });
    expect((await first.executor.run(fresh(config))).status).toBe("paused");

    const second = setup(config, { update_docs: [["..."], [sig("READY")]] }, { store, maxIterations: 2 });
    const outcome = await second.executor.run(await loadForResume(store, "plan"));
    expect(outcome.status).toBe("completed");
    expect(outcome.session.turns).toBe(4);
  });
});

describe("resume equivalence", () => {
  function abcConfig(): PipelineConfig {
    return parsePipelineConfig({
      name: "abc",
      startStage: "a",
      endSignals: ["C_DONE"],
      stages: {
        a: { prompt: "A", completion: { type: "json" }, transitions: { A_DONE: "b" }, artifacts: ["a_out"] },
        b: { prompt: "B {a_out}", completion: { type: "json" }, transitions: { B_DONE: "c" }, artifacts: ["b_out"] },
        c: { prompt: "C {b_out}", completion: { type: "sentinel", marker: "C_DONE" } },
      },
    });
  }

  const script = (): Record<string, string[][]> => ({
    a: [[sig("A_DONE", { a_out: "alpha" })]],
    b: [[sig("B_DONE", { b_out: "beta" })]],
    c: [["C_DONE"]],
  });

  const summary = (s: Session) => ({ status: s.status, context: s.context, history: s.history });

  it("matches an uninterrupted run after a kill and resume", async () => {
    const config = abcConfig();
    const start = () => createSession(config, new ExecutionContext([["seed", "x"]]), "abc-1");

    const straight = await setup(config, script()).executor.run(start());

    // Saves: 1 = start, 2 = after a, 3 = after b. Kill before the third lands.
    const store = new CrashingStore(3);
    await expect(setup(config, script(), { store }).executor.run(start())).rejects.toThrow("process killed");

    const interrupted = await loadForResume(store, "abc");
    expect(interrupted).toMatchObject({ status: "running", currentStage: "b" });

    const resumedRun = setup(config, script(), { store });
    const resumed = await resumedRun.executor.run(interrupted);

    expect(resumedRun.runner.stages()).toEqual(["b", "c"]);
    expect(summary(resumed.session)).toEqual(summary(straight.session));
    expect(Object.fromEntries(resumed.session.context)).toEqual({ seed: "x", a_out: "alpha", b_out: "beta" });
  });
});

describe("event ordering", () => {
  it("emits run_failed last with the failing stage", async () => {
    const config = planConfig();
    const { executor, sink } = setup(config, { research: [["no json here"], ["still none"]] });
    await executor.run(fresh(config));
    const last: PipelineEvent | undefined = sink.events.at(-1);
    expect(last).toMatchObject({ type: "run_failed", stage: "research", errorKind: "IterationExceeded", turn: 2 });
  });
});
