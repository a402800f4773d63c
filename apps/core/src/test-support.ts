import type { EventSink, PipelineEvent, PipelineEventType } from "./events.js";

/** Event sink that keeps every event for assertions. */
export class RecordingSink implements EventSink {
  readonly events: PipelineEvent[] = [];

  emit(event: PipelineEvent): void {
    this.events.push(event);
  }

  ofType<T extends PipelineEventType>(type: T): Extract<PipelineEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<PipelineEvent, { type: T }> => e.type === type);
  }
}
