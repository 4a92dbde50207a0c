import type { AgentResponse, LlmBackend, LlmConfig } from "./backend.js";
import type { ToolId } from "./constants.js";
import { selectTools, type AgentTool, type ToolSet } from "./tools.js";

/** Immutable description of a role the LLM plays. */
export interface AgentSpec {
  readonly id: string;
  readonly role: string;
  readonly goal: string;
  readonly backstory: string;
  readonly tools: readonly ToolId[];
  readonly llm: LlmConfig;
}

/** System message for an agent. Persona strings are used verbatim. */
export function buildPersona(spec: Pick<AgentSpec, "role" | "goal" | "backstory">): string {
  return `You are ${spec.role}. ${spec.backstory}\n\nYour personal goal is: ${spec.goal}`;
}

export class Agent {
  readonly tools: readonly AgentTool[];
  private readonly persona: string;

  constructor(
    readonly spec: AgentSpec,
    toolSet: ToolSet,
    private readonly backend: LlmBackend,
  ) {
    this.tools = selectTools(toolSet, spec.tools);
    this.persona = buildPersona(spec);
  }

  get id(): string {
    return this.spec.id;
  }

  respond(prompt: string): Promise<AgentResponse> {
    return this.backend.respond({
      agentId: this.spec.id,
      label: this.spec.role,
      instructions: this.persona,
      prompt,
      tools: this.tools,
      llm: this.spec.llm,
    });
  }
}
