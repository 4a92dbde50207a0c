/**
 * Declarative crew configuration types.
 * Defines the shape of `crew.config.yaml`, the file that decides which agents run,
 * in what order, with which LLM settings and under which tool policy.
 */
import type { ProcessKind } from "./constants.js";

/** Sampling settings shared by every agent unless a task overrides them. */
export interface LlmDefaults {
  readonly model: string;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
}

export interface LlmOverrides {
  readonly model?: string;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
}

/** One entry of the `tasks` list. The agent record supplies the task text. */
export interface TaskEntryConfig {
  /** Defaults to the agent id. */
  readonly id: string;
  readonly agent: string;
  readonly dependsOn: readonly string[];
  readonly humanApproval: boolean;
  readonly llm?: LlmOverrides;
}

export interface FilePolicyConfig {
  /** Directories file tools may touch; templates allowed. */
  readonly roots: readonly string[];
}

export interface ShellPolicyConfig {
  /** Program names (argv[0] basename) the shell tool may run. */
  readonly allowedCommands: readonly string[];
}

/** Root configuration loaded from `crew.config.yaml`. */
export interface CrewFileConfig {
  readonly process: ProcessKind;
  readonly maxRevisions: number;
  readonly llm: LlmDefaults;
  /** Extra template values available to every agent record. */
  readonly vars: Readonly<Record<string, string>>;
  readonly files: FilePolicyConfig;
  readonly shell: ShellPolicyConfig;
  readonly tasks: readonly TaskEntryConfig[];
}
