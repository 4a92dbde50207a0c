import { Agent } from "./agent.js";
import { type AgentRecord, loadAgentConfig } from "./agent-config.js";
import type { ApprovalGate } from "./approval.js";
import type { LlmBackend, LlmConfig } from "./backend.js";
import type { CompletedTaskSnapshot } from "./checkpoint.js";
import { type CrewConfig, modelEnvKey } from "./config.js";
import { BUNDLED_CREW_CONFIG, loadCrewConfig } from "./crew-config.js";
import type { CrewFileConfig, TaskEntryConfig } from "./crew-types.js";
import { CrewConfigError } from "./errors.js";
import { Crew, type TaskRecord, type TaskState } from "./crew.js";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";
import { resolvePlaceholders, type SubstitutionValues } from "./placeholders.js";
import { createProcess, type ProcessStrategy } from "./process.js";
import type { TaskSpec } from "./task.js";
import { createToolSet } from "./tools.js";

/** One task entry joined with its resolved agent record and effective LLM settings. */
export interface PlannedTask {
  readonly entry: TaskEntryConfig;
  readonly record: AgentRecord;
  readonly llm: LlmConfig;
}

/** Everything resolved from configuration before any LLM call. */
export interface CrewPlan {
  readonly crewFile: CrewFileConfig;
  readonly crewSource: string;
  readonly process: ProcessStrategy;
  readonly values: SubstitutionValues;
  /** File tool roots with placeholders resolved. */
  readonly roots: readonly string[];
  readonly tasks: readonly PlannedTask[];
}

export interface PlanSources {
  readonly bundledCrewConfig?: string;
  /** Bundled agents directory; null disables the fallback. */
  readonly bundledAgentsDir?: string | null;
}

/** Template values, lowest precedence first: repository paths, shape name, crew vars, CLI vars. */
export function buildSubstitutionValues(config: CrewConfig, crewVars: Readonly<Record<string, string>>): SubstitutionValues {
  return {
    REPO_SHAPES_PATH: config.shapesRepoPath,
    REPO_OBJECT_PATH: config.objectRepoPath,
    ...(config.shapeName === undefined ? {} : { shape_name: config.shapeName }),
    ...crewVars,
    ...config.vars,
  };
}

/** Model precedence: MODEL_NAME_<AGENT>, then the task's llm block, then the crew defaults. */
export function resolveLlmConfig(config: CrewConfig, crewFile: CrewFileConfig, entry: TaskEntryConfig): LlmConfig {
  const overrides = entry.llm ?? {};
  return {
    model: config.modelOverrides[modelEnvKey(entry.agent)] ?? overrides.model ?? crewFile.llm.model,
    apiKey: config.backend.apiKey,
    baseUrl: config.backend.baseUrl,
    temperature: overrides.temperature ?? crewFile.llm.temperature,
    maxOutputTokens: overrides.maxOutputTokens ?? crewFile.llm.maxOutputTokens,
  };
}

/**
 * Load the crew file and every agent record it references, resolving all templates.
 * Any configuration error surfaces here, before a task runs.
 */
export async function loadCrewPlan(config: CrewConfig, sources: PlanSources = {}): Promise<CrewPlan> {
  const loaded = loadCrewConfig(config.repoRoot, config.crewConfigFile, sources.bundledCrewConfig ?? BUNDLED_CREW_CONFIG);
  const crewFile = loaded.config;
  const process = createProcess(crewFile.process);
  const values = buildSubstitutionValues(config, crewFile.vars);
  const roots = crewFile.files.roots.map((root, i) => resolvePlaceholders(root, values, `files.roots[${i}]`));

  const agentOptions = {
    repoRoot: config.repoRoot,
    agentsDir: config.agentsDir,
    ...(sources.bundledAgentsDir === undefined ? {} : { bundledDir: sources.bundledAgentsDir }),
  };

  const tasks: PlannedTask[] = [];
  for (const entry of crewFile.tasks) {
    const record = await loadAgentConfig(entry.agent, values, agentOptions);
    tasks.push({ entry, record, llm: resolveLlmConfig(config, crewFile, entry) });
  }

  return { crewFile, crewSource: loaded.source, process, values, roots, tasks };
}

export interface PingTarget {
  readonly crewSource: string;
  readonly llm: LlmConfig;
}

/** LLM settings of the first task, read from the crew file alone. Agent records are not loaded. */
export function loadPingTarget(config: CrewConfig, sources: Pick<PlanSources, "bundledCrewConfig"> = {}): PingTarget {
  const loaded = loadCrewConfig(config.repoRoot, config.crewConfigFile, sources.bundledCrewConfig ?? BUNDLED_CREW_CONFIG);
  const [first] = loaded.config.tasks;
  if (!first) throw new CrewConfigError("crew file defines no tasks");
  return { crewSource: loaded.source, llm: resolveLlmConfig(config, loaded.config, first) };
}

export interface CrewDependencies {
  readonly backend: LlmBackend;
  readonly gate: ApprovalGate;
  readonly logger: Logger;
  readonly restored?: readonly CompletedTaskSnapshot[];
  readonly onTaskStateChange?: (record: TaskRecord, previous: TaskState) => void;
}

/** Bind the plan to a backend, tool set and approval gate. */
export function assembleCrew(
  plan: CrewPlan,
  config: Pick<CrewConfig, "repoRoot" | "crewDir" | "runId" | "shellTimeoutMs">,
  deps: CrewDependencies,
): Crew {
  const { logger } = deps;
  const toolSet = createToolSet({
    repoRoot: config.repoRoot,
    roots: plan.roots,
    shell: {
      cwd: config.repoRoot,
      timeoutMs: config.shellTimeoutMs,
      allowedCommands: plan.crewFile.shell.allowedCommands,
    },
    onInvocation: (invocation) => logger.debug(msg.toolResult(invocation.toolId, String(invocation.exitStatus))),
  });

  const tasks: TaskSpec[] = plan.tasks.map(({ entry, record, llm }) => ({
    id: entry.id,
    agent: new Agent(
      { id: record.id, role: record.role, goal: record.goal, backstory: record.backstory, tools: record.tools, llm },
      toolSet,
      deps.backend,
    ),
    description: record.taskDescription,
    expectedOutput: record.expectedOutput,
    dependsOn: entry.dependsOn,
    outputFile: record.outputFile,
    humanApproval: entry.humanApproval,
  }));

  return new Crew(tasks, {
    config,
    process: plan.process,
    gate: deps.gate,
    logger,
    maxRevisions: plan.crewFile.maxRevisions,
    restored: deps.restored,
    onTaskStateChange: deps.onTaskStateChange,
  });
}
