import type { PipelineErrorKind } from "./errors.js";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";

/** Token counts reported by an agent runner for one stage-run. */
export interface TokenUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
}

interface EventBase {
  readonly pipelineKind: string;
  readonly sessionId: string;
  readonly stage: string;
  /** Session-wide turn counter. Never decreases, survives resume. */
  readonly turn: number;
}

/** Closed set of events the executor emits. */
export type PipelineEvent =
  | (EventBase & { readonly type: "stage_started" })
  | (EventBase & {
      readonly type: "stage_completed";
      readonly signal: string;
      /** Turns this stage-run consumed. */
      readonly turns: number;
      readonly usage?: TokenUsage;
    })
  | (EventBase & { readonly type: "paused"; readonly reason: string })
  | (EventBase & { readonly type: "run_completed"; readonly signal: string })
  | (EventBase & {
      readonly type: "run_failed";
      readonly errorKind: PipelineErrorKind;
      readonly message: string;
      /** Turns the failing stage-run consumed. */
      readonly turns: number;
      readonly usage?: TokenUsage;
    });

export type PipelineEventType = PipelineEvent["type"];

/** Receives executor events. Sinks observe only; they never feed back into control flow. */
export interface EventSink {
  emit(event: PipelineEvent): void;
}

/** Deliver each event to every sink. A throwing sink is logged and skipped. */
export function fanOut(sinks: readonly EventSink[], logger?: Pick<Logger, "warn">): EventSink {
  return {
    emit(event) {
      for (const sink of sinks) {
        try {
          sink.emit(event);
        } catch (err) {
          logger?.warn(msg.sinkFailed(event.type, err instanceof Error ? err.message : String(err)));
        }
      }
    },
  };
}

/** Turns executor events into log lines. */
export class LoggingSink implements EventSink {
  constructor(private readonly logger: Logger) {}

  emit(event: PipelineEvent): void {
    switch (event.type) {
      case "stage_started":
        this.logger.enterStage(event.stage);
        this.logger.info(msg.stageStarted(event.stage));
        break;
      case "stage_completed":
        this.logger.info(msg.stageCompleted(event.stage, event.signal, event.turns));
        break;
      case "paused":
        this.logger.warn(msg.runPaused(event.stage, event.reason));
        break;
      case "run_completed":
        this.logger.info(msg.runCompleted(event.signal));
        break;
      case "run_failed":
        this.logger.error(msg.runFailed(event.stage, event.errorKind), event.message);
        break;
    }
    if (event.type === "paused" || event.type === "run_completed" || event.type === "run_failed") {
      this.logger.enterStage(null);
    }
  }
}
