import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { formatDuration, formatStats, loadStats, recordAgentInvocation, recordRunStart } from "./stats.js";

let repoRoot: string;
const paths = () => ({ repoRoot, crewDir: ".crew" });

beforeEach(async () => {
  repoRoot = await fs.mkdtemp(path.join(os.tmpdir(), "stats-"));
});

afterEach(async () => {
  await fs.rm(repoRoot, { recursive: true, force: true });
});

describe("stats", () => {
  it("starts empty", async () => {
    const stats = await loadStats(paths());
    expect(stats.totalRuns).toBe(0);
    expect(stats.agents).toEqual({});
  });

  it("accumulates invocations per agent and model", async () => {
    await recordRunStart(paths());
    await recordAgentInvocation(paths(), { agentId: "architect", model: "gpt-4o", elapsedMs: 1_000, inputTokens: 100, outputTokens: 40 });
    await recordAgentInvocation(paths(), { agentId: "architect", model: "o1", elapsedMs: 500 });

    const stats = await loadStats(paths());
    expect(stats.totalRuns).toBe(1);
    expect(stats.agents.architect).toEqual({
      invocations: 2,
      totalElapsedMs: 1_500,
      totalInputTokens: 100,
      totalOutputTokens: 40,
      models: { "gpt-4o": 1, o1: 1 },
    });
  });

  it("treats a corrupt file as empty", async () => {
    await fs.mkdir(path.join(repoRoot, ".crew"));
    await fs.writeFile(path.join(repoRoot, ".crew", "stats.json"), '{"agents": []}');
    expect((await loadStats(paths())).agents).toEqual({});
  });
});

describe("formatStats", () => {
  it("says when nothing was recorded", () => {
    expect(formatStats({ agents: {}, totalRuns: 0, lastUpdated: "2026-01-01T00:00:00.000Z" })).toBe(
      "📊 shacl-crew stats\n\nTotal runs: 0\nLast updated: 2026-01-01T00:00:00.000Z\n\nNo agent invocations recorded yet.",
    );
  });

  it("prints one row per agent, busiest first", () => {
    const text = formatStats({
      agents: {
        qa: { invocations: 1, totalElapsedMs: 2_000, totalInputTokens: 0, totalOutputTokens: 0, models: { "gpt-4o": 1 } },
        architect: { invocations: 3, totalElapsedMs: 90_000, totalInputTokens: 300, totalOutputTokens: 120, models: { "gpt-4o": 3 } },
      },
      totalRuns: 2,
      lastUpdated: "2026-01-01T00:00:00.000Z",
    });
    const rows = text.split("\n").slice(-2);
    expect(rows[0]).toBe(`  architect       3       1m 30s        30s         300          120  gpt-4o(3)`);
    expect(rows[1]).toBe(`  qa              1           2s         2s           -            -  gpt-4o(1)`);
  });
});

describe("formatDuration", () => {
  it("formats seconds and minutes", () => {
    expect(formatDuration(59_999)).toBe("59s");
    expect(formatDuration(61_000)).toBe("1m 01s");
  });
});
