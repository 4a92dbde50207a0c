/** Centralized log messages. Edit this file to change any user-facing output. */
export const msg = {
  // --- Lifecycle ---
  startingCrew: (taskCount: number, process: string) => `🚀 Starting crew: ${taskCount} tasks, ${process} process`,
  crewComplete: "🏁 Crew finished. All tasks completed.",
  crewFailed: (taskId: string) => `❌ Crew stopped: task "${taskId}" failed`,
  configLoaded: (provider: string, model: string, verbose: boolean) =>
    `⚙️  Config: provider=${provider}, model=${model}, verbose=${verbose}`,
  crewSource: (source: string) => `📋 Crew file: ${source}`,
  agentSource: (agentId: string, source: string) => `  📄 Agent ${agentId}: ${source}`,

  // --- Tasks ---
  taskStart: (index: number, total: number, taskId: string, role: string) =>
    `\n[Task ${index}/${total}: ${taskId} (${role})]`,
  taskComplete: (taskId: string, elapsed: string) => `  ✅ ${taskId} completed in ${elapsed}`,
  taskFailed: (taskId: string) => `  ❌ ${taskId} failed`,
  taskSkipped: (taskId: string) => `  ⏭️  Skipping ${taskId} (already completed)`,
  taskRevision: (taskId: string, revision: number, max: number) =>
    `  🔁 ${taskId}: revision ${revision}/${max}`,
  outputWritten: (file: string) => `  📄 Output written to ${file}`,
  stateChange: (taskId: string, from: string, to: string) => `    · ${taskId}: ${from} → ${to}`,
  agentWorking: (label: string) => `${label} is working...`,

  // --- Human approval ---
  approvalHeader: (taskId: string) => `\n──── Review: ${taskId} ────`,
  approvalFooter: "────────────────────────",
  approvalPrompt:
    "Approve? [Enter/approve] accept · [reject: <feedback>] revise · [abandon] stop\n> ",
  autoApproved: (taskId: string) => `  ✅ ${taskId} approved automatically`,
  approvalInterrupted: (taskId: string) => `⚠️  Review of ${taskId} interrupted. Abandoning the run.`,
  approvalNoTty: "⚠️  stdin is not a terminal. Human approval gates will approve automatically.",
  humanFeedback: (preview: string) => `  ❌ Feedback: ${preview}`,
  approvedByHuman: (taskId: string) => `  ✅ ${taskId} approved`,
  defaultRevisionFeedback: "The reviewer rejected this answer. Revise it and try again.",

  // --- Errors & Warnings ---
  emptyResponse: (agent: string, attempt: number, max: number) =>
    `  ⚠️  Empty response from ${agent} (attempt ${attempt}/${max})`,
  callError: (agent: string, attempt: number, max: number) => `  ⚠️  Error calling ${agent} (attempt ${attempt}/${max})`,
  samplingUnsupported: (backend: string) =>
    `⚠️  The ${backend} backend ignores temperature and maxOutputTokens. Use LLM_PROVIDER=inference to apply them.`,
  fatal: (message: string) => `Error: ${message}`,

  // --- Verbose session events ---
  toolExecution: (name: string) => `    🔧 Tool: ${name}`,
  toolResult: (name: string, status: string) => `    🔧 ${name} → ${status}`,
  intentUpdate: (intent: string) => `    💭 Intent: ${intent}`,

  // --- Ping ---
  pingStart: (provider: string, model: string) => `📡 Pinging ${provider} (model ${model})...`,
  pingSuccess: (reply: string) => `✅ LLM reachable. Reply: ${reply}`,

  // --- Validate ---
  validateHeader: (process: string, maxRevisions: number) =>
    `🧾 Crew plan (${process} process, up to ${maxRevisions} revisions per approval gate)`,
  validateTask: (index: number, taskId: string, agentId: string, model: string) =>
    `  ${index}. ${taskId} (agent ${agentId}, model ${model})`,
  validateDetail: (label: string, value: string) => `       ${label}: ${value}`,
  validateOk: "✅ Configuration is valid.",

  // --- Checkpoints & Resume ---
  checkpointSaved: (taskId: string) => `  💾 Checkpoint saved after ${taskId}`,
  resuming: (runId: string, completedCount: number) =>
    `🔄 Resuming run ${runId} (${completedCount} tasks completed)`,
  noCheckpoint: "⚠️  No checkpoint found. Starting from the beginning.",
  summaryWritten: (file: string) => `📄 Summary: ${file}`,
  statsNotRecorded: (agentId: string, reason: string) => `  Stats not recorded for ${agentId}: ${reason}`,

  // --- Log File ---
  logFileHint: (path: string) => `📋 Full log: ${path}`,
} as const;
