import type { CopilotSession } from "@github/copilot-sdk";
import { CopilotClient } from "@github/copilot-sdk";
import { type AgentRunner, type AgentTurnRequest, stageInstructions, toolFilter } from "./agent.js";
import { ChunkQueue } from "./chunk-queue.js";
import { SessionEvent, SYSTEM_MESSAGE_MODE } from "./constants.js";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";

export interface CopilotRunnerOptions {
  readonly model: string;
  readonly verbose: boolean;
  readonly sessionTimeoutMs: number;
}

/**
 * Agent runner backed by the Copilot SDK. Each turn gets a fresh session limited to the
 * stage's tool policy; assistant message deltas are yielded as they stream in.
 */
export class CopilotAgentRunner implements AgentRunner {
  readonly name = "copilot";
  private readonly client: CopilotClient;

  constructor(
    private readonly options: CopilotRunnerOptions,
    private readonly logger: Logger,
  ) {
    this.client = new CopilotClient({
      logLevel: options.verbose ? "debug" : "warning",
    });
  }

  async start(): Promise<void> {
    await this.client.start();
  }

  async stop(): Promise<void> {
    await this.client.stop();
  }

  async *runTurn(request: AgentTurnRequest): AsyncIterable<string> {
    const session = await this.client.createSession({
      model: request.model ?? this.options.model,
      systemMessage: { mode: SYSTEM_MESSAGE_MODE, content: stageInstructions(request) },
      ...toolFilter(request.tools),
      onPermissionRequest: async () => ({ kind: "approved" }),
    });

    const queue = new ChunkQueue();
    let streamed = false;
    this.attachListeners(session, queue, () => {
      streamed = true;
    });

    this.logger.startSpinner(msg.agentWorking(request.stage, request.turn));
    void session.sendAndWait({ prompt: request.prompt }, this.options.sessionTimeoutMs).then(
      (response) => {
        // Some models answer without streaming deltas.
        const content = response?.data.content ?? "";
        if (!streamed && content) queue.push(content);
        if (!streamed && !content) this.logger.warn(msg.emptyResponse(request.stage));
        queue.close();
      },
      (err: unknown) => queue.fail(err),
    );

    try {
      yield* queue;
    } finally {
      this.logger.stopSpinner();
      this.logger.newline();
      await session.destroy();
    }
  }

  private attachListeners(session: CopilotSession, queue: ChunkQueue, onDelta: () => void): void {
    session.on(SessionEvent.MESSAGE_DELTA, (e) => {
      onDelta();
      queue.push(e.data.deltaContent);
      this.logger.write(e.data.deltaContent);
    });
    if (this.options.verbose) {
      session.on(SessionEvent.TOOL_EXECUTION_START, (e) => {
        this.logger.debug(msg.toolExecution(e.data.toolName));
      });
      session.on(SessionEvent.INTENT, (e) => {
        this.logger.debug(msg.intentUpdate(e.data.intent));
      });
    }
  }
}
