import type { CopilotSession } from "@github/copilot-sdk";
import { CopilotClient, defineTool } from "@github/copilot-sdk";
import { type AgentRequest, type AgentResponse, callWithRetries, type LlmBackend } from "./backend.js";
import type { CrewConfig } from "./config.js";
import { SessionEvent, SYSTEM_MESSAGE_MODE } from "./constants.js";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";
import type { AgentTool } from "./tools.js";

function toCopilotTool(tool: AgentTool) {
  return defineTool(tool.id, {
    description: tool.description,
    parameters: { ...tool.parameters },
    handler: (args: unknown) => tool.invoke(args),
  });
}

type PermissionVerdict = { readonly kind: "approved" } | { readonly kind: "denied-by-rules" };

/**
 * Only calls to the crew's own tools are approved. The runtime's built-in shell, file
 * and URL tools would bypass the tool sandbox and the shell allow list.
 */
export function permissionFor(kind: string): PermissionVerdict {
  return kind === "custom-tool" ? { kind: "approved" } : { kind: "denied-by-rules" };
}

/**
 * Copilot SDK backend. Each request gets an isolated session whose system message is
 * the agent persona and whose custom tools are the agent's declared tools.
 */
export class CopilotBackend implements LlmBackend {
  readonly name = "copilot";
  private readonly client: CopilotClient;
  private samplingWarned = false;

  constructor(
    private readonly config: CrewConfig,
    private readonly logger: Logger,
  ) {
    this.client = new CopilotClient({
      logLevel: config.verbose ? "debug" : "warning",
    });
  }

  async start(): Promise<void> {
    await this.client.start();
  }

  async stop(): Promise<void> {
    await this.client.stop();
  }

  async respond(request: AgentRequest): Promise<AgentResponse> {
    this.warnUnsupportedSampling(request);
    return callWithRetries(
      {
        backend: this.name,
        agentId: request.agentId,
        maxAttempts: this.config.maxRetries,
        baseDelayMs: 0,
        logger: this.logger,
      },
      async () => {
        const session = await this.createSession(request);
        try {
          return { content: await this.send(session, request.prompt, msg.agentWorking(request.label)) };
        } finally {
          this.logger.stopSpinner();
          await session.destroy();
        }
      },
    );
  }

  /** The Copilot runtime chooses its own sampling; say so once instead of ignoring the settings silently. */
  private warnUnsupportedSampling(request: AgentRequest): void {
    if (this.samplingWarned) return;
    if (request.llm.temperature === undefined && request.llm.maxOutputTokens === undefined) return;
    this.samplingWarned = true;
    this.logger.warn(msg.samplingUnsupported(this.name));
  }

  private async createSession(request: AgentRequest): Promise<CopilotSession> {
    const { llm } = request;
    // A custom base URL routes the session through a bring-your-own-key provider.
    const byok = llm.baseUrl ? { provider: { type: "openai" as const, baseUrl: llm.baseUrl, apiKey: llm.apiKey } } : {};
    const session = await this.client.createSession({
      model: llm.model,
      systemMessage: { mode: SYSTEM_MESSAGE_MODE, content: request.instructions },
      tools: request.tools.map(toCopilotTool),
      // Built-in runtime tools stay off; the agent sees its declared tools only.
      availableTools: request.tools.map((tool) => tool.id),
      ...byok,
      onPermissionRequest: async (permission) => permissionFor(permission.kind),
    });

    if (this.config.verbose) {
      session.on(SessionEvent.MESSAGE_DELTA, (e) => {
        this.logger.write(e.data.deltaContent);
      });
      session.on(SessionEvent.TOOL_EXECUTION_START, (e) => {
        this.logger.debug(msg.toolExecution(e.data.toolName));
      });
      session.on(SessionEvent.INTENT, (e) => {
        this.logger.debug(msg.intentUpdate(e.data.intent));
      });
    }

    return session;
  }

  private async send(session: CopilotSession, prompt: string, spinnerLabel: string): Promise<string> {
    this.logger.startSpinner(spinnerLabel);
    const response = await session.sendAndWait({ prompt }, this.config.sessionTimeoutMs);
    this.logger.stopSpinner();
    this.logger.newline();
    return response?.data.content ?? "";
  }
}
