/** Centralized log messages. Edit this file to change any user-facing output. */
export const msg = {
  // --- Lifecycle ---
  runStarting: (kind: string, sessionId: string) => `🚀 Starting pipeline "${kind}" (session ${sessionId})`,
  runResuming: (kind: string, sessionId: string, stage: string) =>
    `🔁 Resuming pipeline "${kind}" (session ${sessionId}) at stage "${stage}"`,
  configLoaded: (model: string, maxIterations: number, verbose: boolean) =>
    `⚙️  Config: model=${model}, maxIterations=${maxIterations}, verbose=${verbose}`,
  pipelineSource: (source: string) => `📋 Pipeline: ${source}`,
  manifestLoaded: (filePath: string, target: string) => `📄 Manifest ${filePath} targets "${target}"`,
  switchOff: (name: string) => `🔀 Switch "${name}" is off`,
  elapsed: (duration: string) => `⏱️  Elapsed: ${duration}`,
  logFileHint: (filePath: string) => `📝 Log file: ${filePath}`,

  // --- Stages ---
  stageStarted: (stage: string) => `\n[Stage: ${stage}]`,
  stageCompleted: (stage: string, signal: string, turns: number) =>
    `  ✅ ${stage} → ${signal} (${turns} turn${turns === 1 ? "" : "s"})`,
  turnStarted: (stage: string, turn: number, max: number) => `  └─ ${stage} turn ${turn}/${max}`,
  agentWorking: (stage: string, turn: number) => `${stage} is working (turn ${turn})…`,

  // --- Outcomes ---
  runCompleted: (signal: string) => `🏁 Pipeline completed with ${signal}`,
  runPaused: (stage: string, reason: string) => `⏸️  Paused after "${stage}": ${reason}`,
  resumeHint: (kind: string) => `   Resume with: stageloop resume ${kind}`,
  runFailed: (stage: string, kind: string) => `❌ ${kind} in stage "${stage}"`,

  // --- Hooks ---
  hookDepthDefaulted: "  ℹ️  No depth assessed yet, planning at standard depth",
  hookNoClarifications: "  ⚠️  No clarifications file recorded, continuing without answers",
  hookClarificationsMissing: (filePath: string) => `  ⚠️  Clarifications file not readable: ${filePath}`,
  hookClarificationsInjected: (filePath: string) => `  📥 Loaded clarification answers from ${filePath}`,
  hookAssessed: (depth: string, tier: string) => `  📐 Assessed depth=${depth}, tier=${tier}`,
  hookClarificationsPathMissing: "  ⚠️  CLARIFICATIONS_NEEDED without a clarifications_path",
  manifestWritten: (filePath: string) => `  📄 Manifest written: ${filePath}`,

  // --- Errors & Warnings ---
  sinkFailed: (eventType: string, detail: string) => `  ⚠️  Event sink failed on ${eventType}: ${detail}`,
  statsFailed: (detail: string) => `  ⚠️  Could not update stats: ${detail}`,
  runAborted: "❌ Run aborted",
  stopFailed: "⚠️  Failed to stop agent client",
  emptyResponse: (stage: string) => `  ⚠️  Empty response in stage "${stage}"`,

  // --- Verbose session events ---
  toolExecution: (name: string) => `    🔧 Tool: ${name}`,
  intentUpdate: (intent: string) => `    💭 Intent: ${intent}`,

  // --- Commands ---
  sessionUnreadable: (filePath: string, detail: string) => `⚠️  Skipping unreadable session ${filePath}: ${detail}`,
  noSessions: (kind: string) => `No sessions found for "${kind}".`,
  sessionRemoved: (sessionId: string) => `🗑️  Removed session ${sessionId}`,
  sessionsRemoved: (count: number, kind: string) => `🗑️  Removed ${count} session(s) for "${kind}"`,
  noPipelines: "No pipelines found.",
} as const;
