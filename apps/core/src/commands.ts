import { SessionNotFoundError } from "./errors.js";
import { listPipelineKinds, loadPipelineConfig } from "./pipeline-config.js";
import type { Session, SessionStore } from "./session-store.js";

/** One line per session, newest first. */
export function formatSessionList(sessions: readonly Session[]): string {
  const header = `  ${"Session".padEnd(22)} ${"Status".padEnd(10)} ${"Stage".padEnd(16)} ${"Turns".padStart(5)}  Created`;
  const rule = `  ${"─".repeat(22)} ${"─".repeat(10)} ${"─".repeat(16)} ${"─".repeat(5)}  ${"─".repeat(19)}`;
  const rows = sessions.map((s) => {
    const created = s.createdAt.replace("T", " ").replace(/\.\d+Z$/, "");
    return `  ${s.sessionId.padEnd(22)} ${s.status.padEnd(10)} ${s.currentStage.padEnd(16)} ${String(s.turns).padStart(5)}  ${created}`;
  });
  return [header, rule, ...rows].join("\n");
}

/** Delete one session, or every session of a kind. Returns the ids removed. */
export async function cleanSessions(store: SessionStore, pipelineKind: string, sessionId?: string): Promise<string[]> {
  if (sessionId) {
    await store.remove(pipelineKind, sessionId);
    return [sessionId];
  }
  const sessions = await store.list(pipelineKind);
  if (sessions.length === 0) throw new SessionNotFoundError(pipelineKind);
  for (const session of sessions) await store.remove(pipelineKind, session.sessionId);
  return sessions.map((s) => s.sessionId);
}

/** Available pipelines with their descriptions. */
export async function describePipelines(repoRoot: string): Promise<string[]> {
  const kinds = await listPipelineKinds(repoRoot);
  const width = Math.max(0, ...kinds.map((k) => k.length));
  const lines: string[] = [];
  for (const kind of kinds) {
    const { config } = await loadPipelineConfig(kind, repoRoot);
    lines.push(`  ${kind.padEnd(width)}  ${config.description}`.trimEnd());
  }
  return lines;
}
