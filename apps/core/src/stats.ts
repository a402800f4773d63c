import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { EventSink, PipelineEvent, TokenUsage } from "./events.js";
import { statsFilePath } from "./paths.js";
import { isJsonObject } from "./utils.js";

/** Counters for one stage. */
export interface StageStats {
  runs: number;
  turns: number;
  completions: number;
  pauses: number;
  failures: number;
  inputTokens: number;
  outputTokens: number;
  signals: Record<string, number>;
}

/** Counters for one pipeline kind. */
export interface PipelineStats {
  runs: number;
  completed: number;
  paused: number;
  failed: number;
  stages: Record<string, StageStats>;
}

/** Top-level structure stored in .stageloop/stats.json. */
export interface StatsFile {
  pipelines: Record<string, PipelineStats>;
  lastUpdated: string;
}

export function emptyStageStats(): StageStats {
  return { runs: 0, turns: 0, completions: 0, pauses: 0, failures: 0, inputTokens: 0, outputTokens: 0, signals: {} };
}

export function emptyPipelineStats(): PipelineStats {
  return { runs: 0, completed: 0, paused: 0, failed: 0, stages: {} };
}

function emptyStats(): StatsFile {
  return { pipelines: {}, lastUpdated: new Date().toISOString() };
}

/** Accumulates counters from executor events for a single run. */
export class StatsSink implements EventSink {
  private readonly stats = emptyPipelineStats();

  emit(event: PipelineEvent): void {
    switch (event.type) {
      case "stage_started":
        this.stage(event.stage).runs += 1;
        break;
      case "stage_completed": {
        const s = this.stage(event.stage);
        s.completions += 1;
        s.turns += event.turns;
        s.signals[event.signal] = (s.signals[event.signal] ?? 0) + 1;
        addUsage(s, event.usage);
        break;
      }
      case "paused":
        this.stage(event.stage).pauses += 1;
        this.stats.runs += 1;
        this.stats.paused += 1;
        break;
      case "run_completed":
        this.stats.runs += 1;
        this.stats.completed += 1;
        break;
      case "run_failed": {
        const s = this.stage(event.stage);
        s.failures += 1;
        s.turns += event.turns;
        addUsage(s, event.usage);
        this.stats.runs += 1;
        this.stats.failed += 1;
        break;
      }
    }
  }

  /** Counters gathered so far. */
  snapshot(): PipelineStats {
    return structuredClone(this.stats);
  }

  private stage(name: string): StageStats {
    const existing = this.stats.stages[name];
    if (existing) return existing;
    const created = emptyStageStats();
    this.stats.stages[name] = created;
    return created;
  }
}

function addUsage(s: StageStats, usage: TokenUsage | undefined): void {
  if (!usage) return;
  s.inputTokens += usage.inputTokens;
  s.outputTokens += usage.outputTokens;
}

/** Add `delta` into `target` in place. */
export function mergePipelineStats(target: PipelineStats, delta: PipelineStats): PipelineStats {
  target.runs += delta.runs;
  target.completed += delta.completed;
  target.paused += delta.paused;
  target.failed += delta.failed;
  for (const [name, d] of Object.entries(delta.stages)) {
    const s = target.stages[name] ?? emptyStageStats();
    s.runs += d.runs;
    s.turns += d.turns;
    s.completions += d.completions;
    s.pauses += d.pauses;
    s.failures += d.failures;
    s.inputTokens += d.inputTokens;
    s.outputTokens += d.outputTokens;
    for (const [signal, count] of Object.entries(d.signals)) {
      s.signals[signal] = (s.signals[signal] ?? 0) + count;
    }
    target.stages[name] = s;
  }
  return target;
}

function num(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

function readCounts(value: unknown): Record<string, number> {
  const out: Record<string, number> = {};
  if (!isJsonObject(value)) return out;
  for (const [key, count] of Object.entries(value)) out[key] = num(count);
  return out;
}

function readStageStats(value: unknown): StageStats {
  if (!isJsonObject(value)) return emptyStageStats();
  return {
    runs: num(value.runs),
    turns: num(value.turns),
    completions: num(value.completions),
    pauses: num(value.pauses),
    failures: num(value.failures),
    inputTokens: num(value.inputTokens),
    outputTokens: num(value.outputTokens),
    signals: readCounts(value.signals),
  };
}

function readPipelineStats(value: unknown): PipelineStats {
  const stats = emptyPipelineStats();
  if (!isJsonObject(value)) return stats;
  stats.runs = num(value.runs);
  stats.completed = num(value.completed);
  stats.paused = num(value.paused);
  stats.failed = num(value.failed);
  if (isJsonObject(value.stages)) {
    for (const [name, s] of Object.entries(value.stages)) stats.stages[name] = readStageStats(s);
  }
  return stats;
}

/** Load stats.json. A missing or unreadable file yields empty stats. */
export async function loadStats(repoRoot: string): Promise<StatsFile> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(statsFilePath(repoRoot), "utf-8"));
  } catch {
    return emptyStats();
  }
  if (!isJsonObject(parsed)) return emptyStats();
  const stats = emptyStats();
  if (typeof parsed.lastUpdated === "string") stats.lastUpdated = parsed.lastUpdated;
  if (isJsonObject(parsed.pipelines)) {
    for (const [kind, p] of Object.entries(parsed.pipelines)) stats.pipelines[kind] = readPipelineStats(p);
  }
  return stats;
}

export async function saveStats(repoRoot: string, stats: StatsFile): Promise<void> {
  const filePath = statsFilePath(repoRoot);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(stats, null, 2));
}

/** Merge one run's counters into the stored totals. */
export async function recordRunStats(repoRoot: string, pipelineKind: string, delta: PipelineStats): Promise<StatsFile> {
  const stats = await loadStats(repoRoot);
  stats.pipelines[pipelineKind] = mergePipelineStats(stats.pipelines[pipelineKind] ?? emptyPipelineStats(), delta);
  stats.lastUpdated = new Date().toISOString();
  await saveStats(repoRoot, stats);
  return stats;
}

/** Format stats for CLI display. */
export function formatStats(stats: StatsFile): string {
  const lines: string[] = [];
  lines.push("📊 stageloop stats\n");
  lines.push(`Last updated: ${stats.lastUpdated}\n`);

  const pipelines = Object.entries(stats.pipelines);
  if (pipelines.length === 0) {
    lines.push("No runs recorded yet.");
    return lines.join("\n");
  }

  pipelines.sort((a, b) => a[0].localeCompare(b[0]));
  for (const [kind, p] of pipelines) {
    lines.push(`${kind}: ${p.runs} runs (${p.completed} completed, ${p.paused} paused, ${p.failed} failed)`);
    const stages = Object.entries(p.stages).sort((a, b) => b[1].runs - a[1].runs);
    if (stages.length === 0) {
      lines.push("");
      continue;
    }
    const nameW = Math.max(8, ...stages.map(([n]) => n.length));
    lines.push(
      `  ${"Stage".padEnd(nameW)}  ${"Runs".padStart(5)}  ${"Turns".padStart(6)}  ${"Fails".padStart(5)}  ${"Tokens In".padStart(10)}  ${"Tokens Out".padStart(11)}  Signals`,
    );
    lines.push(
      `  ${"─".repeat(nameW)}  ${"─".repeat(5)}  ${"─".repeat(6)}  ${"─".repeat(5)}  ${"─".repeat(10)}  ${"─".repeat(11)}  ${"─".repeat(20)}`,
    );
    for (const [name, s] of stages) {
      const signals = Object.entries(s.signals)
        .map(([sig, c]) => `${sig}(${c})`)
        .join(", ");
      const tokIn = s.inputTokens > 0 ? String(s.inputTokens) : "—";
      const tokOut = s.outputTokens > 0 ? String(s.outputTokens) : "—";
      lines.push(
        `  ${name.padEnd(nameW)}  ${String(s.runs).padStart(5)}  ${String(s.turns).padStart(6)}  ${String(s.failures).padStart(5)}  ${tokIn.padStart(10)}  ${tokOut.padStart(11)}  ${signals}`,
      );
    }
    lines.push("");
  }
  return lines.join("\n").trimEnd();
}
