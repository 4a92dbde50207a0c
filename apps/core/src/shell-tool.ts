/**
 * Whitelisted command execution for agents.
 * Commands are split into argv and spawned without a shell, so pipes, redirects
 * and `;` reach the program as plain arguments instead of being interpreted.
 */
import { spawn } from "node:child_process";
import * as path from "node:path";

export interface ShellOptions {
  readonly cwd: string;
  readonly timeoutMs: number;
  /** Program basenames that may run, e.g. `git`, `npx`. */
  readonly allowedCommands: readonly string[];
}

export type ShellOutcome =
  | {
      readonly kind: "completed";
      readonly stdout: string;
      readonly stderr: string;
      readonly exitCode: number | null;
      readonly signal: NodeJS.Signals | null;
    }
  | { readonly kind: "timed_out"; readonly timeoutMs: number }
  | { readonly kind: "failed"; readonly message: string };

/** Split a command line into argv, honoring single quotes, double quotes and backslash escapes. */
export function splitCommand(command: string): string[] {
  const argv: string[] = [];
  let current = "";
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < command.length; i++) {
    const ch = command[i];
    if (quote !== null) {
      if (ch === quote) {
        quote = null;
      } else if (ch === "\\" && quote === '"' && i + 1 < command.length) {
        i++;
        current += command[i];
      } else {
        current += ch;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) {
        argv.push(current);
        current = "";
        inToken = false;
      }
    } else if (ch === "\\" && i + 1 < command.length) {
      i++;
      current += command[i];
      inToken = true;
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quote !== null) throw new Error(`unterminated ${quote} quote`);
  if (inToken) argv.push(current);
  return argv;
}

export function runShellCommand(command: string, options: ShellOptions): Promise<ShellOutcome> {
  let argv: string[];
  try {
    argv = splitCommand(command);
  } catch (err) {
    return Promise.resolve({ kind: "failed", message: err instanceof Error ? err.message : String(err) });
  }
  if (argv.length === 0) {
    return Promise.resolve({ kind: "failed", message: "empty command" });
  }

  const program = path.basename(argv[0]);
  if (!options.allowedCommands.includes(program)) {
    return Promise.resolve({
      kind: "failed",
      message: `"${program}" is not an allowed command (allowed: ${options.allowedCommands.join(", ") || "none"})`,
    });
  }

  return new Promise((resolve) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    const finish = (outcome: ShellOutcome): void => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      resolve(outcome);
    };

    const child = spawn(argv[0], argv.slice(1), { cwd: options.cwd, stdio: ["ignore", "pipe", "pipe"] });

    timer = setTimeout(() => {
      child.kill("SIGKILL");
      finish({ kind: "timed_out", timeoutMs: options.timeoutMs });
    }, options.timeoutMs);

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", (err) => finish({ kind: "failed", message: err.message }));
    child.on("close", (exitCode, signal) =>
      finish({
        kind: "completed",
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
        exitCode,
        signal,
      }),
    );
  });
}

/** Render an outcome as the text an agent reads back. */
export function formatShellReport(outcome: ShellOutcome): string {
  switch (outcome.kind) {
    case "timed_out":
      return `Command timed out after ${outcome.timeoutMs / 1000} seconds`;
    case "failed":
      return `Error executing command: ${outcome.message}`;
    case "completed": {
      const report = `STDOUT:\n${outcome.stdout}\nSTDERR:\n${outcome.stderr}`;
      if (outcome.exitCode === 0) return report;
      return `${report}\nReturn code: ${outcome.exitCode ?? outcome.signal ?? "unknown"}`;
    }
  }
}
