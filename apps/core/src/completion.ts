import type { CompletionSignal, PipelineConfig, StageSpec } from "./pipeline-types.js";
import { routableSignals } from "./router.js";
import { isJsonObject } from "./utils.js";

/**
 * Extracts one signal from the streamed output of a single stage-run.
 * Once a signal is accepted the strategy is inert and further chunks are dropped.
 */
export interface CompletionStrategy {
  /** Feed the next output chunk. Returns the signal the first time one is accepted. */
  feed(chunk: string): CompletionSignal | null;
  /** Mark the end of an agent turn. Partial output does not carry into the next turn. */
  endTurn(): void;
  readonly accepted: CompletionSignal | null;
}

/**
 * Scan `text` from the `{` at `start` to its matching `}`.
 * Braces inside JSON strings are ignored. Returns -1 while the object is still open.
 */
export function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Accepts the first JSON object whose signal key names an accepted signal. */
export class JsonCompletion implements CompletionStrategy {
  private buffer = "";
  /** Earliest buffer offset that may still start an unseen or unfinished object. */
  private scanFrom = 0;
  private result: CompletionSignal | null = null;

  constructor(
    private readonly signalKey: string,
    private readonly acceptedSignals: ReadonlySet<string>,
  ) {}

  get accepted(): CompletionSignal | null {
    return this.result;
  }

  feed(chunk: string): CompletionSignal | null {
    if (this.result) return null;
    this.buffer += chunk;
    this.result = this.scan();
    return this.result;
  }

  endTurn(): void {
    this.buffer = "";
    this.scanFrom = 0;
  }

  private scan(): CompletionSignal | null {
    let pending = -1;
    let start = this.buffer.indexOf("{", this.scanFrom);
    while (start !== -1) {
      const end = findObjectEnd(this.buffer, start);
      if (end === -1) {
        if (pending === -1) pending = start;
      } else {
        const signal = this.match(this.buffer.slice(start, end + 1));
        if (signal) return signal;
      }
      start = this.buffer.indexOf("{", start + 1);
    }
    this.scanFrom = pending === -1 ? this.buffer.length : pending;
    return null;
  }

  private match(candidate: string): CompletionSignal | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      // Balanced braces but not JSON, e.g. code in prose.
      return null;
    }
    if (!isJsonObject(parsed)) return null;
    const name = parsed[this.signalKey];
    if (typeof name !== "string" || !this.acceptedSignals.has(name)) return null;
    return { name, payload: parsed };
  }
}

/** Accepts the first exact, case-sensitive occurrence of a marker. */
export class SentinelCompletion implements CompletionStrategy {
  /** Trailing output too short to contain the marker on its own. */
  private tail = "";
  private result: CompletionSignal | null = null;

  constructor(
    private readonly marker: string,
    private readonly signal: string,
  ) {}

  get accepted(): CompletionSignal | null {
    return this.result;
  }

  feed(chunk: string): CompletionSignal | null {
    if (this.result) return null;
    const text = this.tail + chunk;
    if (text.includes(this.marker)) {
      this.result = { name: this.signal };
      return this.result;
    }
    this.tail = text.slice(Math.max(0, text.length - (this.marker.length - 1)));
    return null;
  }

  endTurn(): void {
    this.tail = "";
  }
}

/** Build a fresh strategy for one run of `stage`. */
export function createStrategy(stage: StageSpec, config: PipelineConfig): CompletionStrategy {
  const completion = stage.completion;
  switch (completion.type) {
    case "json": {
      const accepted = completion.signals ?? routableSignals(stage, config.endSignals);
      return new JsonCompletion(completion.signalKey, new Set(accepted));
    }
    case "sentinel":
      return new SentinelCompletion(completion.marker, completion.signal);
  }
}
