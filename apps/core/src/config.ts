import { execSync } from "node:child_process";
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { LLM_PROVIDERS, type LlmProvider } from "./constants.js";

type Env = Readonly<Record<string, string | undefined>>;

function readEnvString(env: Env, key: string, fallback: string): string {
  const value = env[key];
  if (value === undefined || value === "") return fallback;
  return value;
}

function readEnvOptional(env: Env, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = env[key];
    if (value !== undefined && value !== "") return value;
  }
  return undefined;
}

function readEnvBoolean(env: Env, key: string, fallback: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === "") return fallback;
  if (value === "true") return true;
  if (value === "false") return false;
  throw new Error(`Invalid value for ${key}: "${value}". Must be "true" or "false".`);
}

function readEnvPositiveInt(env: Env, key: string, fallback: number): number {
  const value = env[key];
  if (value === undefined || value === "") return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid value for ${key}: "${value}". Must be a positive integer.`);
  }
  return parsed;
}

function readEnvProvider(env: Env): LlmProvider {
  const value = readEnvString(env, "LLM_PROVIDER", "copilot");
  const match = LLM_PROVIDERS.find((p) => p === value);
  if (!match) {
    throw new Error(`Invalid value for LLM_PROVIDER: "${value}". Must be one of: ${LLM_PROVIDERS.join(", ")}.`);
  }
  return match;
}

export function readVersion(): string {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const pkgPath = path.join(dir, "..", "package.json");
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

/** Repository root: CREW_ROOT, else the enclosing git work tree, else the working directory. */
function resolveRepoRoot(env: Env): string {
  const explicit = readEnvOptional(env, "CREW_ROOT");
  if (explicit) return path.resolve(explicit);
  try {
    return execSync("git rev-parse --show-toplevel", { encoding: "utf-8", stdio: ["ignore", "pipe", "ignore"] }).trim();
  } catch {
    return process.cwd();
  }
}

export type CrewCommand = "run" | "validate" | "ping" | "stats";

const COMMANDS: readonly CrewCommand[] = ["run", "validate", "ping", "stats"];

export const HELP_TEXT = `Usage: shacl-crew [command] [options]

Commands:
  run              Run the agent crew (default)
  validate         Load and resolve every agent and task, then print the plan without calling the LLM
  ping             Send a one-word prompt to check the LLM connection
  stats            Show per-agent invocation statistics

Options:
  -s, --shape <name>   Shape name, available to templates as {shape_name}
      --var <k=v>      Extra template value (repeatable)
  -y, --yes            Approve every human-approval gate automatically
  -r, --resume         Resume the latest run, skipping completed tasks
  -v, --verbose        Enable verbose streaming output
  -V, --version        Show version number
  -h, --help           Show this help message

Examples:
  shacl-crew run --shape Email
  shacl-crew validate -s Email --var target_dir=src/solid
  shacl-crew ping

Environment variables (REPO_SHAPES_PATH, REPO_OBJECT_PATH, LLM_PROVIDER, LLM_API_KEY,
LLM_BASE_URL, MODEL_NAME_<AGENT>, ...) configure paths and the LLM backend.`;

export interface CliArgs {
  command: CrewCommand;
  help: boolean;
  version: boolean;
  verbose: boolean;
  resume: boolean;
  autoApprove: boolean;
  shapeName: string | undefined;
  vars: Record<string, string>;
}

function parseVar(raw: string): [string, string] {
  const eq = raw.indexOf("=");
  if (eq <= 0) {
    throw new Error(`Invalid --var "${raw}". Expected key=value.`);
  }
  return [raw.slice(0, eq).trim(), raw.slice(eq + 1)];
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
      version: { type: "boolean", short: "V", default: false },
      resume: { type: "boolean", short: "r", default: false },
      yes: { type: "boolean", short: "y", default: false },
      shape: { type: "string", short: "s" },
      var: { type: "string", multiple: true },
    },
  });

  let command: CrewCommand = "run";
  if (positionals.length > 0) {
    const match = COMMANDS.find((c) => c === positionals[0]);
    if (!match) {
      throw new Error(`Unknown command "${positionals[0]}". Use one of: ${COMMANDS.join(", ")}.`);
    }
    command = match;
  }

  return {
    command,
    help: values.help ?? false,
    version: values.version ?? false,
    verbose: values.verbose ?? false,
    resume: values.resume ?? false,
    autoApprove: values.yes ?? false,
    shapeName: values.shape,
    vars: Object.fromEntries((values.var ?? []).map(parseVar)),
  };
}

/** Connection settings for the LLM backend. Model choice lives in the crew file. */
export interface BackendSettings {
  readonly provider: LlmProvider;
  readonly apiKey: string | undefined;
  readonly baseUrl: string | undefined;
}

/**
 * Process-wide configuration from environment variables and CLI arguments.
 * Built once at startup and passed to every component; CLI args win over env vars.
 */
export interface CrewConfig {
  readonly command: CrewCommand;
  readonly repoRoot: string;
  readonly verbose: boolean;
  readonly resume: boolean;
  readonly autoApprove: boolean;
  readonly shapeName: string | undefined;
  readonly vars: Readonly<Record<string, string>>;
  readonly shapesRepoPath: string;
  readonly objectRepoPath: string;
  readonly agentsDir: string;
  readonly crewConfigFile: string;
  readonly crewDir: string;
  readonly runId: string;
  readonly sessionTimeoutMs: number;
  readonly shellTimeoutMs: number;
  readonly maxRetries: number;
  readonly backend: BackendSettings;
  /** Per-agent model overrides from MODEL_NAME_<AGENT> variables, keyed by upper-cased agent id. */
  readonly modelOverrides: Readonly<Record<string, string>>;
}

const MODEL_ENV_PREFIX = "MODEL_NAME_";

function readModelOverrides(env: Env): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(MODEL_ENV_PREFIX) && value) {
      result[key.slice(MODEL_ENV_PREFIX.length)] = value;
    }
  }
  return result;
}

/** Environment variable suffix for an agent id: `code-reviewer` → `CODE_REVIEWER`. */
export function modelEnvKey(agentId: string): string {
  return agentId.toUpperCase().replace(/[^A-Z0-9]/g, "_");
}

export function buildConfig(cli: CliArgs, env: Env): CrewConfig {
  return {
    command: cli.command,
    repoRoot: resolveRepoRoot(env),
    verbose: cli.verbose || readEnvBoolean(env, "VERBOSE", false),
    resume: cli.resume,
    autoApprove: cli.autoApprove || readEnvBoolean(env, "AUTO_APPROVE", false),
    shapeName: cli.shapeName ?? readEnvOptional(env, "SHAPE_NAME"),
    vars: cli.vars,
    shapesRepoPath: readEnvString(env, "REPO_SHAPES_PATH", "./blueprints"),
    objectRepoPath: readEnvString(env, "REPO_OBJECT_PATH", "./blueprints"),
    agentsDir: readEnvString(env, "AGENTS_DIR", "agents"),
    crewConfigFile: readEnvString(env, "CREW_CONFIG", "crew.config.yaml"),
    crewDir: readEnvString(env, "CREW_DIR", ".crew"),
    runId: new Date().toISOString().replace(/[:.]/g, "-"),
    sessionTimeoutMs: readEnvPositiveInt(env, "SESSION_TIMEOUT_MS", 1_800_000),
    shellTimeoutMs: readEnvPositiveInt(env, "SHELL_TIMEOUT_MS", 60_000),
    maxRetries: readEnvPositiveInt(env, "MAX_RETRIES", 2),
    backend: {
      provider: readEnvProvider(env),
      apiKey: readEnvOptional(env, "LLM_API_KEY", "GITHUB_COPILOT_TOKEN"),
      baseUrl: readEnvOptional(env, "LLM_BASE_URL"),
    },
    modelOverrides: readModelOverrides(env),
  };
}

export function loadConfig(argv: readonly string[] = process.argv.slice(2), env: Env = process.env): CrewConfig {
  return buildConfig(parseCliArgs(argv), env);
}
