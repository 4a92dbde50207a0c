import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CrewConfig } from "./config.js";
import { checkpointFilePath, crewRoot, latestPointerPath } from "./paths.js";
import { isRecord, writeFileAtomic } from "./utils.js";

type RunPaths = Pick<CrewConfig, "repoRoot" | "crewDir" | "runId">;

/** A task that finished before the checkpoint was written. */
export interface CompletedTaskSnapshot {
  taskId: string;
  agentId: string;
  output: string;
  revisions: number;
  startedAt?: string;
  completedAt?: string;
}

export interface CrewCheckpoint {
  runId: string;
  /** Completed tasks in execution order. */
  completed: CompletedTaskSnapshot[];
  savedAt: string;
}

function isSnapshot(value: unknown): value is CompletedTaskSnapshot {
  return (
    isRecord(value) &&
    typeof value.taskId === "string" &&
    typeof value.agentId === "string" &&
    typeof value.output === "string" &&
    typeof value.revisions === "number" &&
    (value.startedAt === undefined || typeof value.startedAt === "string") &&
    (value.completedAt === undefined || typeof value.completedAt === "string")
  );
}

export function isCrewCheckpoint(value: unknown): value is CrewCheckpoint {
  return (
    isRecord(value) &&
    typeof value.runId === "string" &&
    typeof value.savedAt === "string" &&
    Array.isArray(value.completed) &&
    value.completed.every(isSnapshot)
  );
}

export async function readLatestRunId(config: Pick<CrewConfig, "repoRoot" | "crewDir">): Promise<string | null> {
  try {
    const runId = (await fs.readFile(latestPointerPath(config), "utf-8")).trim();
    return runId === "" ? null : runId;
  } catch {
    return null;
  }
}

export async function writeLatestPointer(config: RunPaths): Promise<void> {
  await fs.mkdir(crewRoot(config), { recursive: true });
  await fs.writeFile(latestPointerPath(config), config.runId);
}

/** Persist the checkpoint for `config.runId` and point `latest` at this run. */
export async function saveCheckpoint(config: RunPaths, checkpoint: CrewCheckpoint): Promise<void> {
  await writeFileAtomic(checkpointFilePath(config), JSON.stringify(checkpoint, null, 2));
  await writeLatestPointer(config);
}

/** Checkpoint of the run named by the `latest` pointer. Null when there is none or it is unreadable. */
export async function loadLatestCheckpoint(
  config: Pick<CrewConfig, "repoRoot" | "crewDir">,
): Promise<CrewCheckpoint | null> {
  const runId = await readLatestRunId(config);
  if (!runId) return null;
  const filePath = path.join(crewRoot(config), "runs", runId, "checkpoint.json");
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(filePath, "utf-8"));
  } catch {
    return null;
  }
  return isCrewCheckpoint(parsed) && parsed.runId === runId ? parsed : null;
}

export async function clearCheckpoint(config: RunPaths): Promise<void> {
  await fs.rm(checkpointFilePath(config), { force: true });
}
