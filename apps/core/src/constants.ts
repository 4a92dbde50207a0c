/** Copilot SDK session event names. */
export const SessionEvent = {
  MESSAGE_DELTA: "assistant.message_delta",
  TOOL_EXECUTION_START: "tool.execution_start",
  INTENT: "assistant.intent",
} as const;

/** System message injection mode for Copilot sessions. */
export const SYSTEM_MESSAGE_MODE = "append" as const;

/** Tool identifiers an agent may declare. Closed set. */
export const TOOL_IDS = ["read_file", "list_directory", "write_file", "run_shell"] as const;

export type ToolId = (typeof TOOL_IDS)[number];

export const PROCESS_KINDS = ["sequential", "parallel", "conditional"] as const;

export type ProcessKind = (typeof PROCESS_KINDS)[number];

export const LLM_PROVIDERS = ["copilot", "inference"] as const;

export type LlmProvider = (typeof LLM_PROVIDERS)[number];

export const DEFAULT_INFERENCE_BASE_URL = "https://models.github.ai/inference";

export const DEFAULT_MODEL = "gpt-4o";

/** Upper bound on human revision rounds when the crew file does not set one. */
export const DEFAULT_MAX_REVISIONS = 5;

/** Tool-call round trips allowed within a single inference request. */
export const MAX_TOOL_ROUNDS = 25;

export const AGENT_FILE_EXTENSIONS = [".yaml", ".yml"] as const;

/** Prefix used by tool results that report a failure to the agent. */
export const TOOL_ERROR_PREFIX = "Error";
