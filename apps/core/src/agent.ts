import type { TokenUsage } from "./events.js";
import type { ToolPolicy } from "./pipeline-types.js";

/** One agent turn requested by the executor. */
export interface AgentTurnRequest {
  readonly pipelineKind: string;
  readonly stage: string;
  readonly prompt: string;
  /** 1-based turn number within the current stage-run. */
  readonly turn: number;
  readonly tools?: ToolPolicy;
  readonly model?: string;
}

/**
 * Text-generating worker the executor drives.
 * Chunks must arrive in order; the iterable ends when the runner considers the turn complete.
 * The executor stops iterating as soon as a signal is accepted.
 */
export interface AgentRunner {
  readonly name: string;
  runTurn(request: AgentTurnRequest): AsyncIterable<string>;
  /** Token usage accumulated since the previous call, when the runner reports it. */
  takeUsage?(): TokenUsage | undefined;
}

/** System message appended to each agent session: stage identity plus the tool policy. */
export function stageInstructions(request: AgentTurnRequest): string {
  const lines = [`You are running stage "${request.stage}" of the "${request.pipelineKind}" pipeline.`];
  const allow = request.tools?.allow ?? [];
  const deny = request.tools?.deny ?? [];
  if (allow.length > 0) lines.push(`You may use these tools: ${allow.join(", ")}.`);
  if (deny.length > 0) lines.push(`Do not use these tools: ${deny.join(", ")}.`);
  return lines.join("\n");
}

/** Tool lists for an agent session: `allow` limits the session to those tools, `deny` removes tools. */
export interface ToolFilter {
  availableTools?: string[];
  excludedTools?: string[];
}

export function toolFilter(policy?: ToolPolicy): ToolFilter {
  const filter: ToolFilter = {};
  if (policy?.allow && policy.allow.length > 0) filter.availableTools = [...policy.allow];
  if (policy?.deny && policy.deny.length > 0) filter.excludedTools = [...policy.deny];
  return filter;
}
