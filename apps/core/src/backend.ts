import type { CrewConfig } from "./config.js";
import { BackendUnavailableError } from "./errors.js";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";
import type { AgentTool } from "./tools.js";

/** Endpoint and sampling settings for one agent. Checked by the backend at call time. */
export interface LlmConfig {
  readonly model: string;
  readonly apiKey?: string;
  readonly baseUrl?: string;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
}

/** Everything the backend needs to answer on behalf of an agent. */
export interface AgentRequest {
  readonly agentId: string;
  /** Human-readable label for spinners and logs. */
  readonly label: string;
  /** Persona text sent as the system message. */
  readonly instructions: string;
  readonly prompt: string;
  readonly tools: readonly AgentTool[];
  readonly llm: LlmConfig;
}

export interface TokenUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
}

export interface AgentResponse {
  readonly content: string;
  readonly usage?: TokenUsage;
}

export interface LlmBackend {
  readonly name: string;
  start(): Promise<void>;
  stop(): Promise<void>;
  respond(request: AgentRequest): Promise<AgentResponse>;
}

export interface RetryOptions {
  readonly backend: string;
  readonly agentId: string;
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly logger: Logger;
}

/**
 * Run `attempt` up to `maxAttempts` times. Empty answers count as failures.
 * Once attempts run out, throws BackendUnavailableError carrying the last cause.
 */
export async function callWithRetries(
  options: RetryOptions,
  attempt: () => Promise<AgentResponse>,
): Promise<AgentResponse> {
  const { backend, agentId, maxAttempts, baseDelayMs, logger } = options;
  let lastError: unknown = new Error("no attempt was made");

  for (let i = 1; i <= maxAttempts; i++) {
    try {
      const response = await attempt();
      if (response.content.trim() !== "") return response;
      lastError = new Error("empty response");
      logger.warn(msg.emptyResponse(agentId, i, maxAttempts));
    } catch (err) {
      lastError = err;
      logger.error(msg.callError(agentId, i, maxAttempts), err);
    }
    if (i < maxAttempts && baseDelayMs > 0) {
      await new Promise((r) => setTimeout(r, baseDelayMs * 2 ** (i - 1)));
    }
  }
  throw new BackendUnavailableError(backend, agentId, lastError);
}

export const PING_PROMPT = "Ping";

/** Minimal round trip used by the `ping` command. */
export async function pingBackend(backend: LlmBackend, llm: LlmConfig): Promise<string> {
  const response = await backend.respond({
    agentId: "ping",
    label: "ping",
    instructions: "Reply with a single word.",
    prompt: PING_PROMPT,
    tools: [],
    llm,
  });
  return response.content;
}

export async function createBackend(config: CrewConfig, logger: Logger): Promise<LlmBackend> {
  if (config.backend.provider === "inference") {
    const { InferenceBackend } = await import("./inference-backend.js");
    return new InferenceBackend(
      {
        timeoutMs: config.sessionTimeoutMs,
        maxRetries: config.maxRetries,
      },
      logger,
    );
  }
  const { CopilotBackend } = await import("./copilot-backend.js");
  return new CopilotBackend(config, logger);
}
