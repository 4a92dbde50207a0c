/**
 * OpenAI-compatible chat completions backend (GitHub Models inference by default).
 * Runs the tool-call loop locally: every `tool_calls` entry is answered by the
 * matching AgentTool until the model returns a plain message.
 */
import { type AgentRequest, type AgentResponse, callWithRetries, type LlmBackend } from "./backend.js";
import { DEFAULT_INFERENCE_BASE_URL, MAX_TOOL_ROUNDS } from "./constants.js";
import { BackendUnavailableError } from "./errors.js";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";
import { isRecord } from "./utils.js";

export interface InferenceBackendOptions {
  readonly timeoutMs: number;
  readonly maxRetries: number;
  /** Base delay between attempts; doubles each retry. */
  readonly retryDelayMs?: number;
  readonly fetchFn?: typeof fetch;
}

interface ToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

type ChatMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: ToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

interface Completion {
  content: string | null;
  toolCalls: ToolCall[];
  inputTokens: number;
  outputTokens: number;
}

function parseToolCall(raw: unknown): ToolCall | null {
  if (!isRecord(raw) || typeof raw.id !== "string" || !isRecord(raw.function)) return null;
  const { name, arguments: args } = raw.function;
  if (typeof name !== "string") return null;
  return { id: raw.id, type: "function", function: { name, arguments: typeof args === "string" ? args : "{}" } };
}

export function parseCompletion(body: unknown): Completion {
  if (!isRecord(body) || !Array.isArray(body.choices) || body.choices.length === 0) {
    throw new Error("response has no choices");
  }
  const choice: unknown = body.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) {
    throw new Error("response choice has no message");
  }
  const message = choice.message;
  const toolCalls = Array.isArray(message.tool_calls)
    ? message.tool_calls.map(parseToolCall).filter((call): call is ToolCall => call !== null)
    : [];
  const usage = isRecord(body.usage) ? body.usage : {};
  return {
    content: typeof message.content === "string" ? message.content : null,
    toolCalls,
    inputTokens: typeof usage.prompt_tokens === "number" ? usage.prompt_tokens : 0,
    outputTokens: typeof usage.completion_tokens === "number" ? usage.completion_tokens : 0,
  };
}

function parseArguments(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    // Handed to the tool unparsed; its argument check reports the problem to the model.
    return raw;
  }
}

export class InferenceBackend implements LlmBackend {
  readonly name = "inference";
  private readonly fetchFn: typeof fetch;

  constructor(
    private readonly options: InferenceBackendOptions,
    private readonly logger: Logger,
  ) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async start(): Promise<void> {}

  async stop(): Promise<void> {}

  async respond(request: AgentRequest): Promise<AgentResponse> {
    if (!request.llm.apiKey) {
      throw new BackendUnavailableError(this.name, request.agentId, new Error("LLM_API_KEY is not set"));
    }
    return callWithRetries(
      {
        backend: this.name,
        agentId: request.agentId,
        maxAttempts: this.options.maxRetries,
        baseDelayMs: this.options.retryDelayMs ?? 1_000,
        logger: this.logger,
      },
      () => this.converse(request),
    );
  }

  private async converse(request: AgentRequest): Promise<AgentResponse> {
    const messages: ChatMessage[] = [
      { role: "system", content: request.instructions },
      { role: "user", content: request.prompt },
    ];
    let inputTokens = 0;
    let outputTokens = 0;

    this.logger.startSpinner(msg.agentWorking(request.label));
    try {
      for (let round = 1; round <= MAX_TOOL_ROUNDS; round++) {
        const completion = await this.complete(request, messages);
        inputTokens += completion.inputTokens;
        outputTokens += completion.outputTokens;

        if (completion.toolCalls.length === 0) {
          return { content: completion.content ?? "", usage: { inputTokens, outputTokens } };
        }

        messages.push({ role: "assistant", content: completion.content, tool_calls: completion.toolCalls });
        for (const call of completion.toolCalls) {
          this.logger.debug(msg.toolExecution(call.function.name));
          const tool = request.tools.find((t) => t.id === call.function.name);
          const output = tool
            ? await tool.invoke(parseArguments(call.function.arguments))
            : `Error: unknown tool "${call.function.name}"`;
          messages.push({ role: "tool", tool_call_id: call.id, content: output });
        }
      }
      throw new Error(`no final answer after ${MAX_TOOL_ROUNDS} tool rounds`);
    } finally {
      this.logger.stopSpinner();
    }
  }

  private async complete(request: AgentRequest, messages: readonly ChatMessage[]): Promise<Completion> {
    const { llm } = request;
    const baseUrl = (llm.baseUrl ?? DEFAULT_INFERENCE_BASE_URL).replace(/\/$/, "");
    const body: Record<string, unknown> = { model: llm.model, messages };
    if (llm.temperature !== undefined) body.temperature = llm.temperature;
    if (llm.maxOutputTokens !== undefined) body.max_tokens = llm.maxOutputTokens;
    if (request.tools.length > 0) {
      body.tools = request.tools.map((tool) => ({
        type: "function",
        function: { name: tool.id, description: tool.description, parameters: tool.parameters },
      }));
    }

    const res = await this.fetchFn(`${baseUrl}/chat/completions`, {
      method: "POST",
      headers: { "Content-Type": "application/json", Authorization: `Bearer ${llm.apiKey ?? ""}` },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!res.ok) {
      const text = await res.text();
      throw new Error(`HTTP ${res.status}: ${text.slice(0, 200)}`);
    }
    const json: unknown = await res.json();
    return parseCompletion(json);
  }
}
