import * as path from "node:path";
import type { CrewConfig } from "./config.js";

type PathConfig = Pick<CrewConfig, "repoRoot" | "crewDir" | "runId">;

/** Root .crew directory. */
export function crewRoot(config: Pick<CrewConfig, "repoRoot" | "crewDir">): string {
  return path.join(config.repoRoot, config.crewDir);
}

/** Per-run directory: .crew/runs/<runId>/ */
export function runDir(config: PathConfig): string {
  return path.join(crewRoot(config), "runs", config.runId);
}

/** Task outputs inside a run: .crew/runs/<runId>/tasks/ */
export function tasksDir(config: PathConfig): string {
  return path.join(runDir(config), "tasks");
}

export function checkpointFilePath(config: PathConfig): string {
  return path.join(runDir(config), "checkpoint.json");
}

/** Pointer to the latest run id: .crew/latest */
export function latestPointerPath(config: Pick<CrewConfig, "repoRoot" | "crewDir">): string {
  return path.join(crewRoot(config), "latest");
}

export function statsFilePath(config: Pick<CrewConfig, "repoRoot" | "crewDir">): string {
  return path.join(crewRoot(config), "stats.json");
}

/** Resolve a possibly relative path against the repository root. */
export function resolveRepoPath(repoRoot: string, target: string): string {
  return path.isAbsolute(target) ? target : path.join(repoRoot, target);
}
