/** Copilot SDK session event names. */
export const SessionEvent = {
  MESSAGE_DELTA: "assistant.message_delta",
  TOOL_EXECUTION_START: "tool.execution_start",
  INTENT: "assistant.intent",
} as const;

/** System message injection mode for Copilot sessions. */
export const SYSTEM_MESSAGE_MODE = "append" as const;

/** Default JSON key agents use to report a stage signal. */
export const SIGNAL_KEY = "signal";

/** Transition target that ends the run. */
export const TERMINAL_TARGET = "$end";

/** Per-stage turn cap applied when a stage does not declare one. */
export const DEFAULT_MAX_TURNS = 10;

/** Run-wide turn budget applied when a pipeline does not declare one. */
export const DEFAULT_MAX_ITERATIONS = 50;

/** Default agent model. */
export const DEFAULT_MODEL = "claude-sonnet-4.5";

/** Pipeline kinds and session ids double as path segments under the state directory. */
export const SAFE_NAME = /^[A-Za-z0-9_-]+$/;

/** State directory at the repo root. */
export const STATE_DIR = ".stageloop";

/** Process exit codes for the three disjoint run outcomes. */
export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  PAUSED: 2,
} as const;

