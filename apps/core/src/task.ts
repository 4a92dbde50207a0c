import type { Agent } from "./agent.js";
import { resolveRepoPath } from "./paths.js";
import { writeFileAtomic } from "./utils.js";

/** A unit of work bound to one agent. Templates are already resolved. */
export interface TaskSpec {
  readonly id: string;
  readonly agent: Agent;
  readonly description: string;
  readonly expectedOutput: string;
  /** Ids of earlier tasks whose output this task receives. */
  readonly dependsOn: readonly string[];
  /** Repository-relative path for the approved output. */
  readonly outputFile?: string;
  readonly humanApproval: boolean;
}

/** Completed output of a dependency, handed to a later task. */
export interface TaskContext {
  readonly taskId: string;
  readonly output: string;
}

/** A rejected candidate together with the reviewer's feedback. */
export interface Revision {
  readonly candidate: string;
  readonly feedback: string;
}

export const EXPECTED_OUTPUT_PREFIX = "This is the expected criteria for your final answer:";
export const CONTEXT_HEADING = "# Context from previous tasks";
export const FEEDBACK_HEADING = "# Human feedback";

/**
 * Assemble the prompt for one attempt at a task.
 * Context blocks follow `dependsOn` order; revisions follow in the order they happened,
 * so the latest feedback ends the prompt.
 */
export function buildPrompt(
  task: Pick<TaskSpec, "description" | "expectedOutput">,
  context: readonly TaskContext[],
  revisions: readonly Revision[] = [],
): string {
  const sections = [task.description, `${EXPECTED_OUTPUT_PREFIX} ${task.expectedOutput}`];

  if (context.length > 0) {
    const blocks = context.map((c) => `## ${c.taskId}\n${c.output}`);
    sections.push([CONTEXT_HEADING, ...blocks].join("\n\n"));
  }

  revisions.forEach((revision, i) => {
    sections.push(`# Previous answer (revision ${i + 1})\n${revision.candidate}`);
    sections.push(`${FEEDBACK_HEADING}\n${revision.feedback}`);
  });

  return sections.join("\n\n");
}

/** Write a task's approved output to its output file. Returns the absolute path. */
export async function persistTaskOutput(repoRoot: string, outputFile: string, output: string): Promise<string> {
  const target = resolveRepoPath(repoRoot, outputFile);
  await writeFileAtomic(target, output);
  return target;
}
