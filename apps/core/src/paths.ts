import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { STATE_DIR } from "./constants.js";

const PACKAGE_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), "..");

/** Pipelines and prompt templates shipped with the package. */
export function bundledDefaultsDir(): string {
  return path.join(PACKAGE_DIR, "defaults");
}

/** Root state directory: <repo>/.stageloop */
export function stateRoot(repoRoot: string): string {
  return path.join(repoRoot, STATE_DIR);
}

/** Sessions for one pipeline kind: .stageloop/sessions/<kind>/ */
export function sessionsDir(repoRoot: string, pipelineKind: string): string {
  return path.join(stateRoot(repoRoot), "sessions", pipelineKind);
}

/** Pointer to the latest session of a kind: .stageloop/sessions/<kind>/latest */
export function latestPointerPath(repoRoot: string, pipelineKind: string): string {
  return path.join(sessionsDir(repoRoot, pipelineKind), "latest");
}

/** Repo-local prompt overrides: .stageloop/prompts/<kind>/ */
export function promptsDir(repoRoot: string, pipelineKind: string): string {
  return path.join(stateRoot(repoRoot), "prompts", pipelineKind);
}

/** Cumulative stats: .stageloop/stats.json */
export function statsFilePath(repoRoot: string): string {
  return path.join(stateRoot(repoRoot), "stats.json");
}

/** Default output directory for a run: .stageloop/output/<kind>/<sessionId> */
export function defaultOutputDir(repoRoot: string, pipelineKind: string, sessionId: string): string {
  return path.join(stateRoot(repoRoot), "output", pipelineKind, sessionId);
}

/** Log file of one session, appended to across resumes: .stageloop/logs/<kind>/<sessionId>.log */
export function sessionLogPath(repoRoot: string, pipelineKind: string, sessionId: string): string {
  return path.join(stateRoot(repoRoot), "logs", pipelineKind, `${sessionId}.log`);
}
