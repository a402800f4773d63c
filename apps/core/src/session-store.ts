/**
 * Durable record of pipeline runs, one JSON file per session.
 *
 * Structure:
 *   .stageloop/
 *     sessions/
 *       <pipelineKind>/
 *         <sessionId>.json     # session record
 *         latest               # pointer to the most recently saved session
 *
 * A single writer per session is assumed; concurrent writers are not coordinated.
 */

import { randomBytes } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { SAFE_NAME } from "./constants.js";
import type { ContextEntry, ExecutionContext } from "./context.js";
import type { PipelineErrorKind } from "./errors.js";
import {
  describeError,
  InvalidSessionKeyError,
  SessionIOError,
  SessionNotFoundError,
  SessionStateError,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";
import { latestPointerPath, sessionsDir } from "./paths.js";
import type { JsonObject, JsonValue, PipelineConfig } from "./pipeline-types.js";
import { isJsonObject } from "./utils.js";

export type SessionStatus = "running" | "paused" | "completed" | "failed";

const STATUSES: readonly SessionStatus[] = ["running", "paused", "completed", "failed"];
const ERROR_KINDS: readonly PipelineErrorKind[] = [
  "ConfigError",
  "UnexpectedSignal",
  "IterationExceeded",
  "HookFailure",
  "AgentFailure",
];

/** One completed stage-run. */
export interface StageHistoryEntry {
  stage: string;
  signal: string;
  turns: number;
}

export interface SessionError {
  kind: PipelineErrorKind;
  message: string;
}

/** Persisted unit of work. Mutated by the executor, removed only by explicit cleanup. */
export interface Session {
  pipelineKind: string;
  sessionId: string;
  currentStage: string;
  /** Context entries in insertion order. */
  context: ContextEntry[];
  status: SessionStatus;
  /** Present only while paused. */
  pauseReason?: string;
  /** Manifest and human-facing artifact locations, keyed by context key. */
  artifactPaths: Record<string, string>;
  /** Agent turns consumed across every attempt. */
  turns: number;
  history: StageHistoryEntry[];
  /** Present only when failed. */
  error?: SessionError;
  createdAt: string;
  updatedAt: string;
}

export interface SessionStore {
  save(session: Session): Promise<void>;
  /** Latest session of a kind. */
  load(pipelineKind: string): Promise<Session>;
  get(pipelineKind: string, sessionId: string): Promise<Session>;
  /** Newest first. */
  list(pipelineKind: string): Promise<Session[]>;
  remove(pipelineKind: string, sessionId: string): Promise<void>;
}

/** Short sortable id: UTC timestamp plus 4 random hex chars. */
export function generateSessionId(now = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
  return `${stamp}-${randomBytes(2).toString("hex")}`;
}

/** Fresh session positioned at the pipeline's start stage. Not persisted until the executor runs it. */
export function createSession(config: PipelineConfig, context: ExecutionContext, sessionId = generateSessionId()): Session {
  const now = new Date().toISOString();
  return {
    pipelineKind: config.kind,
    sessionId,
    currentStage: config.startStage,
    context: context.snapshot(),
    status: "running",
    artifactPaths: {},
    turns: 0,
    history: [],
    createdAt: now,
    updatedAt: now,
  };
}

function str(obj: JsonObject, key: string, filePath: string): string {
  const value = obj[key];
  if (typeof value !== "string") throw new SessionIOError(filePath, new Error(`"${key}" must be a string`));
  return value;
}

function isStatus(value: unknown): value is SessionStatus {
  return STATUSES.some((s) => s === value);
}

function isErrorKind(value: unknown): value is PipelineErrorKind {
  return ERROR_KINDS.some((k) => k === value);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") return true;
  if (typeof value === "number") return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isJsonValue);
  return isJsonObject(value) && Object.values(value).every(isJsonValue);
}

function parseContext(raw: unknown, filePath: string): ContextEntry[] {
  if (!Array.isArray(raw)) throw new SessionIOError(filePath, new Error('"context" must be a list of entries'));
  const seen = new Set<string>();
  return raw.map((entry, i): ContextEntry => {
    if (!Array.isArray(entry) || entry.length !== 2) {
      throw new SessionIOError(filePath, new Error(`context entry ${i} must be a [key, value] pair`));
    }
    const [key, value] = entry;
    if (typeof key !== "string" || seen.has(key) || !isJsonValue(value)) {
      throw new SessionIOError(filePath, new Error(`context entry ${i} is malformed`));
    }
    seen.add(key);
    return [key, value];
  });
}

/** Reject kinds and ids that would escape the sessions directory. */
export function assertSessionKey(field: "pipeline kind" | "session id", value: string): void {
  if (!SAFE_NAME.test(value)) throw new InvalidSessionKeyError(field, value);
}

/** Validate a parsed session file. */
export function parseSession(raw: unknown, filePath: string): Session {
  if (!isJsonObject(raw)) throw new SessionIOError(filePath, new Error("session record must be an object"));
  const status = raw.status;
  if (!isStatus(status)) throw new SessionIOError(filePath, new Error(`unknown status ${JSON.stringify(status)}`));
  const context = parseContext(raw.context, filePath);

  const artifactPaths: Record<string, string> = {};
  if (isJsonObject(raw.artifactPaths)) {
    for (const [key, value] of Object.entries(raw.artifactPaths)) {
      if (typeof value === "string") artifactPaths[key] = value;
    }
  }

  const history: StageHistoryEntry[] = [];
  if (Array.isArray(raw.history)) {
    for (const entry of raw.history) {
      if (isJsonObject(entry) && typeof entry.stage === "string" && typeof entry.signal === "string") {
        history.push({ stage: entry.stage, signal: entry.signal, turns: typeof entry.turns === "number" ? entry.turns : 0 });
      }
    }
  }

  const session: Session = {
    pipelineKind: str(raw, "pipelineKind", filePath),
    sessionId: str(raw, "sessionId", filePath),
    currentStage: str(raw, "currentStage", filePath),
    context,
    status,
    artifactPaths,
    turns: typeof raw.turns === "number" ? raw.turns : 0,
    history,
    createdAt: str(raw, "createdAt", filePath),
    updatedAt: str(raw, "updatedAt", filePath),
  };
  if (status === "paused") session.pauseReason = typeof raw.pauseReason === "string" ? raw.pauseReason : "";
  const error = raw.error;
  if (isJsonObject(error) && isErrorKind(error.kind) && typeof error.message === "string") {
    session.error = { kind: error.kind, message: error.message };
  }
  return session;
}

/** File-backed store rooted at a repository. */
export class FileSessionStore implements SessionStore {
  constructor(
    private readonly repoRoot: string,
    private readonly logger?: Pick<Logger, "warn">,
  ) {}

  private kindDir(pipelineKind: string): string {
    assertSessionKey("pipeline kind", pipelineKind);
    return sessionsDir(this.repoRoot, pipelineKind);
  }

  private pointerPath(pipelineKind: string): string {
    assertSessionKey("pipeline kind", pipelineKind);
    return latestPointerPath(this.repoRoot, pipelineKind);
  }

  private filePath(pipelineKind: string, sessionId: string): string {
    assertSessionKey("session id", sessionId);
    return path.join(this.kindDir(pipelineKind), `${sessionId}.json`);
  }

  async save(session: Session): Promise<void> {
    const filePath = this.filePath(session.pipelineKind, session.sessionId);
    const pointer = this.pointerPath(session.pipelineKind);
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      // Write then rename so a kill mid-write leaves the previous record intact.
      const tmp = `${filePath}.tmp`;
      await fs.writeFile(tmp, JSON.stringify(session, null, 2));
      await fs.rename(tmp, filePath);
      await fs.writeFile(pointer, session.sessionId);
    } catch (err) {
      throw new SessionIOError(filePath, err);
    }
  }

  async load(pipelineKind: string): Promise<Session> {
    const pointer = this.pointerPath(pipelineKind);
    let sessionId: string;
    try {
      sessionId = (await fs.readFile(pointer, "utf-8")).trim();
    } catch {
      throw new SessionNotFoundError(pipelineKind);
    }
    if (sessionId === "") throw new SessionNotFoundError(pipelineKind);
    return this.get(pipelineKind, sessionId);
  }

  async get(pipelineKind: string, sessionId: string): Promise<Session> {
    const filePath = this.filePath(pipelineKind, sessionId);
    let text: string;
    try {
      text = await fs.readFile(filePath, "utf-8");
    } catch {
      throw new SessionNotFoundError(pipelineKind, sessionId);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new SessionIOError(filePath, err);
    }
    return parseSession(raw, filePath);
  }

  /** Unreadable records are skipped with a warning so the rest stay listable and removable. */
  async list(pipelineKind: string): Promise<Session[]> {
    const dir = this.kindDir(pipelineKind);
    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch {
      return [];
    }
    const sessions: Session[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(".json")) continue;
      const sessionId = entry.slice(0, -".json".length);
      try {
        sessions.push(await this.get(pipelineKind, sessionId));
      } catch (err) {
        if (!(err instanceof SessionIOError || err instanceof InvalidSessionKeyError)) throw err;
        this.logger?.warn(msg.sessionUnreadable(path.join(dir, entry), describeError(err)));
      }
    }
    sessions.sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.sessionId.localeCompare(a.sessionId));
    return sessions;
  }

  async remove(pipelineKind: string, sessionId: string): Promise<void> {
    const filePath = this.filePath(pipelineKind, sessionId);
    try {
      await fs.unlink(filePath);
    } catch {
      throw new SessionNotFoundError(pipelineKind, sessionId);
    }
    const pointer = this.pointerPath(pipelineKind);
    let latest: string | null = null;
    try {
      latest = (await fs.readFile(pointer, "utf-8")).trim();
    } catch {
      latest = null;
    }
    if (latest === sessionId) {
      try {
        await fs.unlink(pointer);
      } catch (err) {
        throw new SessionIOError(pointer, err);
      }
    }
  }
}

/**
 * Latest (or the given) session of a kind, checked for resume.
 * Paused sessions resume normally; a session still marked running was interrupted mid-stage
 * and resumes at the stage that was in flight. Completed and failed sessions are rejected.
 */
export async function loadForResume(store: SessionStore, pipelineKind: string, sessionId?: string): Promise<Session> {
  const session = sessionId ? await store.get(pipelineKind, sessionId) : await store.load(pipelineKind);
  if (session.status === "completed" || session.status === "failed") {
    throw new SessionStateError(session.sessionId, session.status);
  }
  return session;
}

/** Human-readable block describing a session, shown before resuming or by `status`. */
export function formatSessionSummary(session: Session): string {
  const lines = [
    `  Session:    ${session.sessionId}`,
    `  Pipeline:   ${session.pipelineKind}`,
    `  Status:     ${session.status}`,
    `  Stage:      ${session.currentStage}`,
    `  Turns:      ${session.turns}`,
  ];
  if (session.pauseReason) lines.push(`  Reason:     ${session.pauseReason}`);
  if (session.error) lines.push(`  Error:      ${session.error.kind}: ${session.error.message}`);
  const artifacts = Object.entries(session.artifactPaths);
  artifacts.forEach(([key, value], i) => {
    lines.push(`${i === 0 ? "  Artifacts: " : "             "} ${key}: ${value}`);
  });
  if (session.history.length > 0) {
    lines.push(`  History:    ${session.history.map((h) => `${h.stage} → ${h.signal}`).join(", ")}`);
  }
  lines.push(`  Last run:   ${session.updatedAt}`);
  return lines.join("\n");
}
