import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { buildPrompt, persistTaskOutput } from "./task.js";

const task = { description: "Describe the Email shape.", expectedOutput: "A markdown summary." };

describe("buildPrompt", () => {
  it("states the expected output after the description", () => {
    expect(buildPrompt(task, [])).toBe(
      "Describe the Email shape.\n\nThis is the expected criteria for your final answer: A markdown summary.",
    );
  });

  it("adds dependency outputs in the given order", () => {
    const prompt = buildPrompt(task, [
      { taskId: "architect", output: "guide" },
      { taskId: "developer", output: "code" },
    ]);
    expect(prompt).toBe(
      [
        "Describe the Email shape.",
        "This is the expected criteria for your final answer: A markdown summary.",
        "# Context from previous tasks",
        "## architect\nguide",
        "## developer\ncode",
      ].join("\n\n"),
    );
  });

  it("ends with the latest human feedback, verbatim", () => {
    const prompt = buildPrompt(task, [], [
      { candidate: "draft one", feedback: "add null check" },
      { candidate: "draft two", feedback: "  keep   spacing  " },
    ]);
    expect(prompt).toBe(
      [
        "Describe the Email shape.",
        "This is the expected criteria for your final answer: A markdown summary.",
        "# Previous answer (revision 1)\ndraft one",
        "# Human feedback\nadd null check",
        "# Previous answer (revision 2)\ndraft two",
        "# Human feedback\n  keep   spacing  ",
      ].join("\n\n"),
    );
    expect(prompt.endsWith("  keep   spacing  ")).toBe(true);
  });
});

describe("persistTaskOutput", () => {
  it("writes relative to the repository root", async () => {
    const repoRoot = await fs.mkdtemp(path.join(os.tmpdir(), "task-"));
    try {
      const target = await persistTaskOutput(repoRoot, "agent_work/architect.md", "# Guide");
      expect(target).toBe(path.join(repoRoot, "agent_work", "architect.md"));
      expect(await fs.readFile(target, "utf-8")).toBe("# Guide");
    } finally {
      await fs.rm(repoRoot, { recursive: true, force: true });
    }
  });
});
