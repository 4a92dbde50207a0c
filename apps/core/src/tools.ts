import * as fs from "node:fs/promises";
import * as path from "node:path";
import { TOOL_ERROR_PREFIX, type ToolId } from "./constants.js";
import { formatShellReport, runShellCommand, type ShellOptions } from "./shell-tool.js";
import { isRecord, writeFileAtomic } from "./utils.js";

/** JSON schema describing a tool's arguments, handed to the LLM as-is. */
export type ToolParameters = Readonly<Record<string, unknown>>;

export type ToolExitStatus = number | "timed_out" | "failed";

/** Record of a single tool call. Passed to observers, never stored. */
export interface ToolInvocation {
  readonly toolId: ToolId;
  readonly input: unknown;
  readonly output: string;
  readonly exitStatus: ToolExitStatus;
}

/** A capability an agent may call. `invoke` never rejects; failures come back as text. */
export interface AgentTool {
  readonly id: ToolId;
  readonly description: string;
  readonly parameters: ToolParameters;
  invoke(args: unknown): Promise<string>;
}

export type ToolSet = Readonly<Record<ToolId, AgentTool>>;

export interface ToolSetOptions {
  readonly repoRoot: string;
  /** Directories file tools may read and write; relative entries resolve against repoRoot. */
  readonly roots: readonly string[];
  readonly shell: ShellOptions;
  readonly onInvocation?: (invocation: ToolInvocation) => void;
}

interface ToolResult {
  output: string;
  exitStatus: ToolExitStatus;
}

type ToolHandler = (args: unknown) => Promise<ToolResult>;

function failed(message: string): ToolResult {
  return { output: `${TOOL_ERROR_PREFIX}: ${message}`, exitStatus: "failed" };
}

function ok(output: string): ToolResult {
  return { output, exitStatus: 0 };
}

function stringArg(args: unknown, key: string): string | undefined {
  if (!isRecord(args)) return undefined;
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

const PATH_PARAMETERS: ToolParameters = {
  type: "object",
  properties: { path: { type: "string", description: "File system path" } },
  required: ["path"],
  additionalProperties: false,
};

/** Real path of `target`, following symlinks through its nearest existing ancestor. */
async function realpathOfNearest(target: string): Promise<string> {
  const missing: string[] = [];
  let current = target;
  for (;;) {
    try {
      return path.join(await fs.realpath(current), ...missing.reverse());
    } catch (err) {
      const parent = path.dirname(current);
      if (parent === current || !isMissingPath(err)) throw err;
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

function isMissingPath(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

class FileSandbox {
  private readonly roots: readonly string[];
  private realRoots: Promise<string[]> | null = null;

  constructor(
    private readonly repoRoot: string,
    roots: readonly string[],
  ) {
    const effective = roots.length > 0 ? roots : [repoRoot];
    this.roots = effective.map((root) => path.resolve(repoRoot, root));
  }

  /** Real path when it lies inside an allowed root, otherwise null. Symlinks are followed before the check. */
  async resolve(target: string): Promise<string | null> {
    this.realRoots ??= Promise.all(this.roots.map(realpathOfNearest));
    const roots = await this.realRoots;
    const resolved = await realpathOfNearest(path.resolve(this.repoRoot, target));
    const inside = roots.some((root) => resolved === root || resolved.startsWith(`${root}${path.sep}`));
    return inside ? resolved : null;
  }

  denied(target: string): ToolResult {
    return failed(`Access denied - path outside allowed directories: ${target}`);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Build the full tool set. Agents receive the subset they declare via `selectTools`. */
export function createToolSet(options: ToolSetOptions): ToolSet {
  const sandbox = new FileSandbox(options.repoRoot, options.roots);

  const wrap = (id: ToolId, description: string, parameters: ToolParameters, handler: ToolHandler): AgentTool => ({
    id,
    description,
    parameters,
    async invoke(args: unknown): Promise<string> {
      let result: ToolResult;
      try {
        result = await handler(args);
      } catch (err) {
        result = failed(errorMessage(err));
      }
      options.onInvocation?.({ toolId: id, input: args, output: result.output, exitStatus: result.exitStatus });
      return result.output;
    },
  });

  return {
    read_file: wrap(
      "read_file",
      "Read the complete contents of a text file.",
      PATH_PARAMETERS,
      async (args) => {
        const target = stringArg(args, "path");
        if (target === undefined) return failed('missing string argument "path"');
        const resolved = await sandbox.resolve(target);
        if (resolved === null) return sandbox.denied(target);
        try {
          return ok(await fs.readFile(resolved, "utf-8"));
        } catch (err) {
          return failed(errorMessage(err));
        }
      },
    ),

    list_directory: wrap(
      "list_directory",
      "List the entries of a directory. Each line is prefixed with [DIR] or [FILE].",
      PATH_PARAMETERS,
      async (args) => {
        const target = stringArg(args, "path");
        if (target === undefined) return failed('missing string argument "path"');
        const resolved = await sandbox.resolve(target);
        if (resolved === null) return sandbox.denied(target);
        try {
          const entries = await fs.readdir(resolved, { withFileTypes: true });
          const lines = entries
            .map((entry) => ({ name: entry.name, dir: entry.isDirectory() }))
            .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
            .map((entry) => `${entry.dir ? "[DIR]" : "[FILE]"} ${entry.name}`);
          return ok(lines.join("\n"));
        } catch (err) {
          return failed(errorMessage(err));
        }
      },
    ),

    write_file: wrap(
      "write_file",
      "Create or overwrite a file with the given content. Parent directories are created.",
      {
        type: "object",
        properties: {
          path: { type: "string", description: "File system path" },
          content: { type: "string", description: "Complete file content" },
        },
        required: ["path", "content"],
        additionalProperties: false,
      },
      async (args) => {
        const target = stringArg(args, "path");
        const content = stringArg(args, "content");
        if (target === undefined) return failed('missing string argument "path"');
        if (content === undefined) return failed('missing string argument "content"');
        const resolved = await sandbox.resolve(target);
        if (resolved === null) return sandbox.denied(target);
        try {
          await writeFileAtomic(resolved, content);
          return ok(`Successfully wrote to ${target}`);
        } catch (err) {
          return failed(errorMessage(err));
        }
      },
    ),

    run_shell: wrap(
      "run_shell",
      `Run a command in the repository root (no shell features). Allowed programs: ${
        options.shell.allowedCommands.join(", ") || "none"
      }. Times out after ${options.shell.timeoutMs / 1000} seconds.`,
      {
        type: "object",
        properties: { command: { type: "string", description: "Command line to execute" } },
        required: ["command"],
        additionalProperties: false,
      },
      async (args) => {
        const command = stringArg(args, "command");
        if (command === undefined) {
          return { output: formatShellReport({ kind: "failed", message: 'missing string argument "command"' }), exitStatus: "failed" };
        }
        const outcome = await runShellCommand(command, options.shell);
        const exitStatus: ToolExitStatus =
          outcome.kind === "completed" ? (outcome.exitCode ?? "failed") : outcome.kind === "timed_out" ? "timed_out" : "failed";
        return { output: formatShellReport(outcome), exitStatus };
      },
    ),
  };
}

export function selectTools(toolSet: ToolSet, ids: readonly ToolId[]): AgentTool[] {
  return ids.map((id) => toolSet[id]);
}
