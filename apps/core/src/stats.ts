import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CrewConfig } from "./config.js";
import { statsFilePath } from "./paths.js";
import { isRecord } from "./utils.js";

type StatsPaths = Pick<CrewConfig, "repoRoot" | "crewDir">;

/** Stats for a single agent. */
export interface AgentStats {
  invocations: number;
  totalElapsedMs: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  models: Record<string, number>;
}

/** Top-level stats structure stored in .crew/stats.json. */
export interface CrewStats {
  agents: Record<string, AgentStats>;
  totalRuns: number;
  lastUpdated: string;
}

function emptyStats(): CrewStats {
  return { agents: {}, totalRuns: 0, lastUpdated: new Date().toISOString() };
}

function isAgentStats(value: unknown): value is AgentStats {
  return (
    isRecord(value) &&
    typeof value.invocations === "number" &&
    typeof value.totalElapsedMs === "number" &&
    typeof value.totalInputTokens === "number" &&
    typeof value.totalOutputTokens === "number" &&
    isRecord(value.models) &&
    Object.values(value.models).every((count) => typeof count === "number")
  );
}

function isCrewStats(value: unknown): value is CrewStats {
  return (
    isRecord(value) &&
    typeof value.totalRuns === "number" &&
    typeof value.lastUpdated === "string" &&
    isRecord(value.agents) &&
    Object.values(value.agents).every(isAgentStats)
  );
}

/** Stored stats, or empty stats when the file is missing or malformed. */
export async function loadStats(config: StatsPaths): Promise<CrewStats> {
  try {
    const parsed: unknown = JSON.parse(await fs.readFile(statsFilePath(config), "utf-8"));
    return isCrewStats(parsed) ? parsed : emptyStats();
  } catch {
    return emptyStats();
  }
}

export async function saveStats(config: StatsPaths, stats: CrewStats): Promise<void> {
  const filePath = statsFilePath(config);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(stats, null, 2));
}

export interface InvocationRecord {
  agentId: string;
  model: string;
  elapsedMs: number;
  inputTokens?: number;
  outputTokens?: number;
}

/** Record a single agent invocation. */
export async function recordAgentInvocation(config: StatsPaths, record: InvocationRecord): Promise<void> {
  const stats = await loadStats(config);
  const agent = stats.agents[record.agentId] ?? {
    invocations: 0,
    totalElapsedMs: 0,
    totalInputTokens: 0,
    totalOutputTokens: 0,
    models: {},
  };
  agent.invocations += 1;
  agent.totalElapsedMs += record.elapsedMs;
  agent.totalInputTokens += record.inputTokens ?? 0;
  agent.totalOutputTokens += record.outputTokens ?? 0;
  agent.models[record.model] = (agent.models[record.model] ?? 0) + 1;
  stats.agents[record.agentId] = agent;
  stats.lastUpdated = new Date().toISOString();
  await saveStats(config, stats);
}

/** Increment the total runs counter. */
export async function recordRunStart(config: StatsPaths): Promise<void> {
  const stats = await loadStats(config);
  stats.totalRuns += 1;
  stats.lastUpdated = new Date().toISOString();
  await saveStats(config, stats);
}

/** Format stats for CLI display. */
export function formatStats(stats: CrewStats): string {
  const lines: string[] = [];
  lines.push("📊 shacl-crew stats\n");
  lines.push(`Total runs: ${stats.totalRuns}`);
  lines.push(`Last updated: ${stats.lastUpdated}\n`);

  const agents = Object.entries(stats.agents);
  if (agents.length === 0) {
    lines.push("No agent invocations recorded yet.");
    return lines.join("\n");
  }

  // Most used first
  agents.sort((a, b) => b[1].invocations - a[1].invocations);

  const nameW = Math.max(8, ...agents.map(([n]) => n.length));
  lines.push(
    `  ${"Agent".padEnd(nameW)}  ${"Calls".padStart(6)}  ${"Total Time".padStart(11)}  ${"Avg Time".padStart(9)}  ${"Tokens In".padStart(10)}  ${"Tokens Out".padStart(11)}  Models`,
  );
  lines.push(
    `  ${"─".repeat(nameW)}  ${"─".repeat(6)}  ${"─".repeat(11)}  ${"─".repeat(9)}  ${"─".repeat(10)}  ${"─".repeat(11)}  ${"─".repeat(20)}`,
  );

  for (const [name, a] of agents) {
    const avgMs = a.invocations > 0 ? Math.round(a.totalElapsedMs / a.invocations) : 0;
    const models = Object.entries(a.models)
      .map(([m, c]) => `${m}(${c})`)
      .join(", ");
    const tokIn = a.totalInputTokens > 0 ? String(a.totalInputTokens) : "-";
    const tokOut = a.totalOutputTokens > 0 ? String(a.totalOutputTokens) : "-";
    lines.push(
      `  ${name.padEnd(nameW)}  ${String(a.invocations).padStart(6)}  ${formatDuration(a.totalElapsedMs).padStart(11)}  ${formatDuration(avgMs).padStart(9)}  ${tokIn.padStart(10)}  ${tokOut.padStart(11)}  ${models}`,
    );
  }

  return lines.join("\n");
}

export function formatDuration(ms: number): string {
  const sec = Math.floor(ms / 1000);
  if (sec < 60) return `${sec}s`;
  const m = Math.floor(sec / 60);
  const s = sec % 60;
  return `${m}m ${String(s).padStart(2, "0")}s`;
}
