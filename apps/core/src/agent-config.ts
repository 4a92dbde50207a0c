import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { AGENT_FILE_EXTENSIONS, TOOL_IDS, type ToolId } from "./constants.js";
import { ConfigNotFoundError } from "./errors.js";
import { resolvePlaceholders, type SubstitutionValues } from "./placeholders.js";
import { fail, isRecord, optionalString, optionalStringArray, requireString } from "./utils.js";

const PACKAGE_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), "..");
export const BUNDLED_AGENTS_DIR = path.join(PACKAGE_DIR, "defaults", "agents");

const AGENT_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/** A fully resolved agent record: persona, task text and tool declarations. */
export interface AgentRecord {
  readonly id: string;
  readonly role: string;
  readonly goal: string;
  readonly backstory: string;
  readonly taskDescription: string;
  readonly expectedOutput: string;
  readonly outputFile: string | undefined;
  readonly tools: readonly ToolId[];
  /** File the record was read from. */
  readonly source: string;
}

export interface AgentConfigOptions {
  readonly repoRoot: string;
  readonly agentsDir: string;
  /** Directory searched after the repository's agents dir. Pass null to disable. */
  readonly bundledDir?: string | null;
}

function isToolId(value: string): value is ToolId {
  return TOOL_IDS.some((id) => id === value);
}

function candidatePaths(agentId: string, options: AgentConfigOptions): string[] {
  const dirs = [path.resolve(options.repoRoot, options.agentsDir)];
  const bundled = options.bundledDir === undefined ? BUNDLED_AGENTS_DIR : options.bundledDir;
  if (bundled !== null) dirs.push(bundled);
  return dirs.flatMap((dir) => AGENT_FILE_EXTENSIONS.map((ext) => path.join(dir, `${agentId}${ext}`)));
}

async function readFirst(paths: readonly string[]): Promise<{ file: string; content: string } | null> {
  for (const file of paths) {
    try {
      return { file, content: await fs.readFile(file, "utf-8") };
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") continue;
      throw err;
    }
  }
  return null;
}

/**
 * Load the record for `agentId` and substitute placeholders in every string field.
 * Reads from disk on every call.
 */
export async function loadAgentConfig(
  agentId: string,
  values: SubstitutionValues,
  options: AgentConfigOptions,
): Promise<AgentRecord> {
  if (!AGENT_ID_PATTERN.test(agentId)) {
    fail(`Agent id "${agentId}" may only contain letters, digits, "-" and "_"`);
  }

  const searched = candidatePaths(agentId, options);
  const found = await readFirst(searched);
  if (!found) throw new ConfigNotFoundError(agentId, searched);

  let raw: unknown;
  try {
    raw = parseYaml(found.content);
  } catch (err) {
    fail(`Failed to parse ${found.file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return resolveAgentRecord(agentId, raw, values, found.file);
}

/** Validate a parsed record and resolve its templates. Exposed for callers that hold the YAML already. */
export function resolveAgentRecord(
  agentId: string,
  raw: unknown,
  values: SubstitutionValues,
  source: string,
): AgentRecord {
  const ctx = `agent "${agentId}" (${source})`;
  if (!isRecord(raw)) fail(`${ctx} must be a YAML object`);

  const tools = optionalStringArray(raw, "tools", ctx).map((tool) => {
    if (!isToolId(tool)) fail(`Unknown tool "${tool}" in ${ctx}. Valid: ${TOOL_IDS.join(", ")}`);
    return tool;
  });

  const resolve = (key: string, template: string) => resolvePlaceholders(template, values, `${agentId}.${key}`);
  const outputFile = optionalString(raw, "output_file", ctx);

  return {
    id: agentId,
    role: resolve("role", requireString(raw, "role", ctx)),
    goal: resolve("goal", requireString(raw, "goal", ctx)),
    backstory: resolve("backstory", requireString(raw, "backstory", ctx)),
    taskDescription: resolve("task_description", requireString(raw, "task_description", ctx)),
    expectedOutput: resolve("expected_output", requireString(raw, "expected_output", ctx)),
    outputFile: outputFile === undefined ? undefined : resolve("output_file", outputFile),
    tools: [...new Set(tools)],
    source,
  };
}
