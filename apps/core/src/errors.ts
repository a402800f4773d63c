/** Error kinds a run can fail with. */
export type PipelineErrorKind =
  | "ConfigError"
  | "UnexpectedSignal"
  | "IterationExceeded"
  | "HookFailure"
  | "AgentFailure";

/** Base class for failures the executor reports as a run outcome. */
export class PipelineError extends Error {
  constructor(
    readonly kind: PipelineErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PipelineError";
  }
}

/** Malformed or incomplete pipeline definition. Raised before any stage runs. */
export class ConfigError extends PipelineError {
  constructor(message: string) {
    super("ConfigError", message);
    this.name = "ConfigError";
  }
}

/** A stage produced a signal with no route. */
export class UnexpectedSignalError extends PipelineError {
  constructor(
    readonly stage: string,
    readonly signal: string,
  ) {
    super("UnexpectedSignal", `Stage "${stage}" produced unexpected signal "${signal}"`);
    this.name = "UnexpectedSignalError";
  }
}

/** A stage turn cap or the run-wide budget ran out before a signal arrived. */
export class IterationExceededError extends PipelineError {
  constructor(
    readonly scope: "stage" | "run",
    readonly stage: string,
    readonly limit: number,
  ) {
    super(
      "IterationExceeded",
      scope === "stage"
        ? `Stage "${stage}" used all ${limit} turns without a signal`
        : `Run budget of ${limit} turns exhausted in stage "${stage}"`,
    );
    this.name = "IterationExceededError";
  }
}

export class HookFailureError extends PipelineError {
  constructor(
    readonly stage: string,
    readonly phase: "before" | "after",
    cause: unknown,
  ) {
    super("HookFailure", `${phase}Stage hook failed for "${stage}": ${describeError(cause)}`, { cause });
    this.name = "HookFailureError";
  }
}

/** The agent transport or prompt rendering failed mid-stage. */
export class AgentFailureError extends PipelineError {
  constructor(
    readonly stage: string,
    cause: unknown,
  ) {
    super("AgentFailure", `Agent failed in stage "${stage}": ${describeError(cause)}`, { cause });
    this.name = "AgentFailureError";
  }
}

/** No persisted session exists for the requested pipeline kind or id. */
export class SessionNotFoundError extends Error {
  constructor(readonly pipelineKind: string, sessionId?: string) {
    super(
      sessionId
        ? `Session "${sessionId}" not found for pipeline "${pipelineKind}"`
        : `No session found for pipeline "${pipelineKind}"`,
    );
    this.name = "SessionNotFoundError";
  }
}

/** A session exists but is in a state the operation does not accept. */
export class SessionStateError extends Error {
  constructor(
    readonly sessionId: string,
    readonly status: string,
  ) {
    super(`Session "${sessionId}" is ${status} and cannot be resumed`);
    this.name = "SessionStateError";
  }
}

/** A pipeline kind or session id that cannot name a file under the state directory. */
export class InvalidSessionKeyError extends Error {
  constructor(
    readonly field: "pipeline kind" | "session id",
    readonly value: string,
  ) {
    super(`Invalid ${field} "${value}": use letters, digits, "-" and "_" only`);
    this.name = "InvalidSessionKeyError";
  }
}

export class SessionIOError extends Error {
  constructor(
    readonly filePath: string,
    cause: unknown,
  ) {
    super(`Session store I/O failed for ${filePath}: ${describeError(cause)}`, { cause });
    this.name = "SessionIOError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** A manifest document is missing its header or required keys. */
export class ManifestError extends Error {
  constructor(
    readonly filePath: string,
    message: string,
  ) {
    super(`Invalid manifest ${filePath}: ${message}`);
    this.name = "ManifestError";
  }
}
