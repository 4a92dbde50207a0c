import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { DEFAULT_MAX_REVISIONS, DEFAULT_MODEL, PROCESS_KINDS, type ProcessKind } from "./constants.js";
import type { CrewFileConfig, LlmDefaults, LlmOverrides, TaskEntryConfig } from "./crew-types.js";
import {
  fail,
  isRecord,
  optionalBoolean,
  optionalNumber,
  optionalPositiveInt,
  optionalString,
  optionalStringArray,
  requireString,
} from "./utils.js";

const PACKAGE_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), "..");
export const BUNDLED_CREW_CONFIG = path.join(PACKAGE_DIR, "defaults", "crew.config.yaml");

const DEFAULT_ALLOWED_COMMANDS = ["ls", "cat", "git", "npx", "deno", "tsc"];

function validateProcess(raw: unknown): ProcessKind {
  if (raw === undefined || raw === null) return "sequential";
  const match = PROCESS_KINDS.find((kind) => kind === raw);
  if (!match) fail(`Unknown process "${String(raw)}". Valid: ${PROCESS_KINDS.join(", ")}`);
  return match;
}

function validateTemperature(obj: Record<string, unknown>, ctx: string): number | undefined {
  const temperature = optionalNumber(obj, "temperature", ctx);
  if (temperature !== undefined && (temperature < 0 || temperature > 2)) {
    fail(`"temperature" must be between 0 and 2 in ${ctx}`);
  }
  return temperature;
}

function validateLlmDefaults(raw: unknown): LlmDefaults {
  if (raw === undefined || raw === null) return { model: DEFAULT_MODEL };
  if (!isRecord(raw)) fail('"llm" must be an object');
  return {
    model: optionalString(raw, "model", "llm") ?? DEFAULT_MODEL,
    temperature: validateTemperature(raw, "llm"),
    maxOutputTokens: optionalPositiveInt(raw, "maxOutputTokens", "llm"),
  };
}

function validateLlmOverrides(raw: unknown, ctx: string): LlmOverrides | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (!isRecord(raw)) fail(`"llm" must be an object in ${ctx}`);
  return {
    model: optionalString(raw, "model", ctx),
    temperature: validateTemperature(raw, ctx),
    maxOutputTokens: optionalPositiveInt(raw, "maxOutputTokens", ctx),
  };
}

function validateVars(raw: unknown): Record<string, string> {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) fail('"vars" must be an object mapping names to strings');
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
      fail(`Variable "${key}" must be a string, number or boolean`);
    }
    result[key] = String(value);
  }
  return result;
}

function validateTask(raw: unknown, index: number): TaskEntryConfig {
  const ctx = `tasks[${index}]`;
  if (!isRecord(raw)) fail(`${ctx} must be an object`);
  const agent = requireString(raw, "agent", ctx);
  return {
    id: optionalString(raw, "id", ctx) ?? agent,
    agent,
    dependsOn: optionalStringArray(raw, "dependsOn", ctx),
    humanApproval: optionalBoolean(raw, "humanApproval", ctx) ?? false,
    llm: validateLlmOverrides(raw.llm, ctx),
  };
}

/**
 * Check task ordering: ids are unique and every dependency names a task listed earlier.
 * Sequential execution then guarantees each dependency completes before its dependents start.
 */
function validateTaskOrder(tasks: readonly TaskEntryConfig[]): void {
  const seen = new Set<string>();
  const all = new Set(tasks.map((t) => t.id));
  for (const task of tasks) {
    if (seen.has(task.id)) fail(`Duplicate task id "${task.id}"`);
    for (const dep of task.dependsOn) {
      if (dep === task.id) fail(`Task "${task.id}" depends on itself`);
      if (!all.has(dep)) fail(`Task "${task.id}" depends on unknown task "${dep}"`);
      if (!seen.has(dep)) fail(`Task "${task.id}" depends on "${dep}", which runs later`);
    }
    seen.add(task.id);
  }
}

function validateTasks(raw: unknown): TaskEntryConfig[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    fail('"tasks" must be a non-empty array of task definitions');
  }
  const tasks = raw.map((item, i) => validateTask(item, i));
  validateTaskOrder(tasks);
  return tasks;
}

function validateSection(raw: unknown, name: string): Record<string, unknown> {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) fail(`"${name}" must be an object`);
  return raw;
}

export function parseCrewConfig(raw: unknown): CrewFileConfig {
  if (!isRecord(raw)) {
    fail("Config must be a YAML object");
  }

  const files = validateSection(raw.files, "files");
  const shell = validateSection(raw.shell, "shell");
  const allowedCommands = optionalStringArray(shell, "allowedCommands", "shell");

  return {
    process: validateProcess(raw.process),
    maxRevisions: optionalPositiveInt(raw, "maxRevisions", "config") ?? DEFAULT_MAX_REVISIONS,
    llm: validateLlmDefaults(raw.llm),
    vars: validateVars(raw.vars),
    files: { roots: optionalStringArray(files, "roots", "files") },
    shell: { allowedCommands: shell.allowedCommands === undefined ? DEFAULT_ALLOWED_COMMANDS : allowedCommands },
    tasks: validateTasks(raw.tasks),
  };
}

export interface LoadedCrewConfig {
  readonly config: CrewFileConfig;
  readonly source: string;
}

/** Load the crew file from the repo root, falling back to the bundled default. */
export function loadCrewConfig(repoRoot: string, fileName: string, bundledPath = BUNDLED_CREW_CONFIG): LoadedCrewConfig {
  const repoConfigPath = path.resolve(repoRoot, fileName);

  let yamlContent: string;
  let source: string;

  if (fs.existsSync(repoConfigPath)) {
    yamlContent = fs.readFileSync(repoConfigPath, "utf-8");
    source = repoConfigPath;
  } else if (fs.existsSync(bundledPath)) {
    yamlContent = fs.readFileSync(bundledPath, "utf-8");
    source = bundledPath;
  } else {
    fail(`No ${fileName} found in repo root or package defaults`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(yamlContent);
  } catch (err) {
    fail(`Failed to parse ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }

  return { config: parseCrewConfig(parsed), source };
}
