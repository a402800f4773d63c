#!/usr/bin/env node
import { cleanSessions, describePipelines, formatSessionList } from "./commands.js";
import { type AppConfig, HELP_TEXT, loadConfig, readVersion, UsageError } from "./config.js";
import { ExitCode } from "./constants.js";
import { CopilotAgentRunner } from "./copilot-runner.js";
import { InvalidSessionKeyError, SessionIOError, SessionNotFoundError, SessionStateError } from "./errors.js";
import { Logger } from "./logger.js";
import { msg } from "./messages.js";
import { exitCodeFor, RunOrchestrator } from "./orchestrator.js";
import { FileSessionStore, formatSessionSummary } from "./session-store.js";
import { formatStats, loadStats } from "./stats.js";

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  if (!(err instanceof UsageError)) throw err;
  console.error(`Error: ${err.message}\n\n${HELP_TEXT}`);
  process.exit(ExitCode.FAILURE);
}

function requireKind(): string {
  if (config.pipelineKind === undefined) {
    console.error(`Error: "${config.command}" needs a pipeline kind\n\n${HELP_TEXT}`);
    process.exit(ExitCode.FAILURE);
  }
  return config.pipelineKind;
}

function isReportable(err: unknown): err is Error {
  return (
    err instanceof SessionNotFoundError ||
    err instanceof SessionStateError ||
    err instanceof SessionIOError ||
    err instanceof InvalidSessionKeyError ||
    err instanceof UsageError
  );
}

/** Store lookups fail with a message, not a stack trace. */
function reportStoreError(err: unknown): never {
  if (isReportable(err)) {
    console.error(`Error: ${err.message}`);
    process.exit(ExitCode.FAILURE);
  }
  throw err;
}

const logger = new Logger(config.verbose);
const store = new FileSessionStore(config.repoRoot, logger);

switch (config.command) {
  case "help":
    console.log(HELP_TEXT);
    process.exit(ExitCode.SUCCESS);

  case "version":
    console.log(readVersion());
    process.exit(ExitCode.SUCCESS);

  case "pipelines": {
    const lines = await describePipelines(config.repoRoot);
    console.log(lines.length > 0 ? lines.join("\n") : msg.noPipelines);
    process.exit(ExitCode.SUCCESS);
  }

  case "stats":
    console.log(formatStats(await loadStats(config.repoRoot)));
    process.exit(ExitCode.SUCCESS);

  case "sessions": {
    const kind = requireKind();
    try {
      const sessions = await store.list(kind);
      console.log(sessions.length > 0 ? formatSessionList(sessions) : msg.noSessions(kind));
    } catch (err) {
      reportStoreError(err);
    }
    process.exit(ExitCode.SUCCESS);
  }

  case "status": {
    const kind = requireKind();
    try {
      const session = config.sessionId ? await store.get(kind, config.sessionId) : await store.load(kind);
      console.log(formatSessionSummary(session));
    } catch (err) {
      reportStoreError(err);
    }
    process.exit(ExitCode.SUCCESS);
  }

  case "clean": {
    const kind = requireKind();
    try {
      const removed = await cleanSessions(store, kind, config.sessionId);
      console.log(removed.length === 1 ? msg.sessionRemoved(removed[0]) : msg.sessionsRemoved(removed.length, kind));
    } catch (err) {
      reportStoreError(err);
    }
    process.exit(ExitCode.SUCCESS);
  }

  case "run":
  case "resume":
    break;
}

const runner = new CopilotAgentRunner(
  { model: config.model, verbose: config.verbose, sessionTimeoutMs: config.sessionTimeoutMs },
  logger,
);
const orchestrator = new RunOrchestrator(config, runner, logger, store);

// Graceful shutdown: stop the agent client; the session stays resumable at its current stage.
function handleSignal(signal: string): void {
  runner
    .stop()
    .catch((err: unknown) => logger.error(msg.stopFailed, err))
    .finally(() => process.exit(signal === "SIGINT" ? 130 : 143));
}

process.on("SIGINT", () => handleSignal("SIGINT"));
process.on("SIGTERM", () => handleSignal("SIGTERM"));

try {
  const outcome =
    config.command === "resume"
      ? await orchestrator.resume(requireKind(), config.sessionId)
      : config.manifestPath !== undefined
        ? await orchestrator.startFromManifest(config.manifestPath)
        : await orchestrator.start(requireKind());
  if (logger.logFilePath) console.log(msg.logFileHint(logger.logFilePath));
  process.exit(exitCodeFor(outcome));
} catch (err) {
  if (isReportable(err)) reportStoreError(err);
  logger.error(msg.runAborted, err);
  if (logger.logFilePath) console.error(msg.logFileHint(logger.logFilePath));
  process.exit(ExitCode.FAILURE);
}
