/**
 * Crew orchestrator.
 * Drives each task through its state machine, feeds completed outputs to dependents,
 * runs the human approval loop and persists run artifacts (task files, checkpoint, stats).
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ApprovalGate } from "./approval.js";
import { type CompletedTaskSnapshot, clearCheckpoint, saveCheckpoint, writeLatestPointer } from "./checkpoint.js";
import type { CrewConfig } from "./config.js";
import { InvalidTransitionError, RevisionLimitError, RunAbandonedError } from "./errors.js";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";
import { runDir, tasksDir } from "./paths.js";
import type { ProcessStrategy } from "./process.js";
import { formatDuration, recordAgentInvocation } from "./stats.js";
import { buildPrompt, persistTaskOutput, type Revision, type TaskContext, type TaskSpec } from "./task.js";
import { preview } from "./utils.js";

export type TaskState = "pending" | "running" | "awaiting_approval" | "completed" | "failed";

const TRANSITIONS: Readonly<Record<TaskState, readonly TaskState[]>> = {
  pending: ["running"],
  running: ["awaiting_approval", "completed", "failed"],
  awaiting_approval: ["running", "completed", "failed"],
  completed: [],
  failed: [],
};

export interface TaskRecord {
  readonly id: string;
  readonly agentId: string;
  readonly state: TaskState;
  readonly output?: string;
  /** Rejected candidates so far. */
  readonly revisions: number;
  readonly startedAt?: string;
  readonly completedAt?: string;
  readonly error?: string;
}

type MutableRecord = { -readonly [K in keyof TaskRecord]: TaskRecord[K] };

export interface CrewRunResult {
  readonly runId: string;
  readonly status: "completed" | "failed";
  /** One record per task, in execution order. */
  readonly tasks: readonly TaskRecord[];
  readonly finalOutput?: string;
  readonly error?: Error;
}

export interface CrewOptions {
  readonly config: Pick<CrewConfig, "repoRoot" | "crewDir" | "runId">;
  readonly process: ProcessStrategy;
  readonly gate: ApprovalGate;
  readonly logger: Logger;
  readonly maxRevisions: number;
  /** Tasks finished by an earlier attempt at this run. They start out completed. */
  readonly restored?: readonly CompletedTaskSnapshot[];
  readonly onTaskStateChange?: (record: TaskRecord, previous: TaskState) => void;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class Crew {
  private readonly records = new Map<string, MutableRecord>();

  constructor(
    private readonly tasks: readonly TaskSpec[],
    private readonly options: CrewOptions,
  ) {
    const restored = new Map((options.restored ?? []).map((s) => [s.taskId, s]));
    for (const task of tasks) {
      const snapshot = restored.get(task.id);
      this.records.set(
        task.id,
        snapshot
          ? {
              id: task.id,
              agentId: task.agent.id,
              state: "completed",
              output: snapshot.output,
              revisions: snapshot.revisions,
              startedAt: snapshot.startedAt,
              completedAt: snapshot.completedAt,
            }
          : { id: task.id, agentId: task.agent.id, state: "pending", revisions: 0 },
      );
    }
  }

  get runId(): string {
    return this.options.config.runId;
  }

  /** Current records in execution order. */
  snapshot(): TaskRecord[] {
    return this.tasks.map((task) => ({ ...this.record(task.id) }));
  }

  async kickoff(): Promise<CrewRunResult> {
    const { logger, process } = this.options;
    logger.info(msg.startingCrew(this.tasks.length, process.kind));

    try {
      await process.run(this.tasks, (task, index) => this.execute(task, index));
    } catch (err) {
      const failedTask = this.snapshot().find((r) => r.state === "failed");
      if (failedTask) logger.error(msg.crewFailed(failedTask.id), err);
      return { runId: this.runId, status: "failed", tasks: this.snapshot(), error: toError(err) };
    }

    const tasks = this.snapshot();
    await this.writeSummary(tasks);
    await writeLatestPointer(this.options.config);
    await clearCheckpoint(this.options.config);
    logger.info(msg.crewComplete);
    return { runId: this.runId, status: "completed", tasks, finalOutput: tasks.at(-1)?.output };
  }

  private record(taskId: string): MutableRecord {
    const record = this.records.get(taskId);
    if (!record) throw new Error(`Unknown task "${taskId}"`);
    return record;
  }

  private transition(record: MutableRecord, to: TaskState): void {
    const from = record.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new InvalidTransitionError(record.id, from, to);
    }
    record.state = to;
    this.options.logger.debug(msg.stateChange(record.id, from, to));
    this.options.onTaskStateChange?.({ ...record }, from);
  }

  /** Outputs of the task's dependencies, in `dependsOn` order. Only completed outputs are visible. */
  private contextFor(task: TaskSpec): TaskContext[] {
    return task.dependsOn.map((dep) => {
      const record = this.record(dep);
      if (record.state !== "completed" || record.output === undefined) {
        throw new Error(`Task "${task.id}" needs "${dep}", which has not completed`);
      }
      return { taskId: dep, output: record.output };
    });
  }

  private async execute(task: TaskSpec, index: number): Promise<void> {
    const { logger } = this.options;
    const record = this.record(task.id);
    if (record.state === "completed") {
      logger.info(msg.taskSkipped(task.id));
      return;
    }

    logger.info(msg.taskStart(index + 1, this.tasks.length, task.id, task.agent.spec.role));
    const startTime = Date.now();
    record.startedAt = new Date(startTime).toISOString();
    this.transition(record, "running");

    try {
      const output = await this.produceApprovedOutput(task, record);
      if (task.outputFile) {
        await persistTaskOutput(this.options.config.repoRoot, task.outputFile, output);
        logger.info(msg.outputWritten(task.outputFile));
      }
      record.output = output;
      record.completedAt = new Date().toISOString();
    } catch (err) {
      record.error = toError(err).message;
      this.transition(record, "failed");
      logger.info(msg.taskFailed(task.id));
      throw err;
    }

    this.transition(record, "completed");
    logger.info(msg.taskComplete(task.id, formatDuration(Date.now() - startTime)));
    await this.writeTaskArtifact(task, record.output);
    await this.saveProgress();
    logger.debug(msg.checkpointSaved(task.id));
  }

  /** Ask the agent until its answer is accepted. Without a gate the first answer stands. */
  private async produceApprovedOutput(task: TaskSpec, record: MutableRecord): Promise<string> {
    const { gate, logger, maxRevisions } = this.options;
    const context = this.contextFor(task);
    const revisions: Revision[] = [];

    for (;;) {
      const candidate = await this.ask(task, buildPrompt(task, context, revisions));
      if (!task.humanApproval) return candidate;

      this.transition(record, "awaiting_approval");
      const decision = await gate.review(task.id, candidate);
      switch (decision.kind) {
        case "approve":
          logger.info(msg.approvedByHuman(task.id));
          return candidate;
        case "abandon":
          throw new RunAbandonedError(task.id);
        case "revise":
          if (revisions.length >= maxRevisions) {
            throw new RevisionLimitError(task.id, maxRevisions);
          }
          logger.info(msg.humanFeedback(preview(decision.feedback)));
          revisions.push({ candidate, feedback: decision.feedback });
          record.revisions = revisions.length;
          logger.info(msg.taskRevision(task.id, revisions.length, maxRevisions));
          this.transition(record, "running");
          break;
      }
    }
  }

  private async ask(task: TaskSpec, prompt: string): Promise<string> {
    const start = Date.now();
    const response = await task.agent.respond(prompt);
    // Stats are best effort; the answer already arrived.
    try {
      await recordAgentInvocation(this.options.config, {
        agentId: task.agent.id,
        model: task.agent.spec.llm.model,
        elapsedMs: Date.now() - start,
        inputTokens: response.usage?.inputTokens,
        outputTokens: response.usage?.outputTokens,
      });
    } catch (err) {
      this.options.logger.debug(msg.statsNotRecorded(task.agent.id, toError(err).message));
    }
    return response.content;
  }

  private async writeTaskArtifact(task: TaskSpec, output: string | undefined): Promise<void> {
    const dir = tasksDir(this.options.config);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(path.join(dir, `${task.id}.md`), `# ${task.id} (${task.agent.spec.role})\n\n${output ?? ""}\n`);
  }

  private async saveProgress(): Promise<void> {
    const completed: CompletedTaskSnapshot[] = [];
    for (const record of this.snapshot()) {
      if (record.state !== "completed" || record.output === undefined) continue;
      completed.push({
        taskId: record.id,
        agentId: record.agentId,
        output: record.output,
        revisions: record.revisions,
        startedAt: record.startedAt,
        completedAt: record.completedAt,
      });
    }
    await saveCheckpoint(this.options.config, { runId: this.runId, completed, savedAt: new Date().toISOString() });
  }

  private async writeSummary(records: readonly TaskRecord[]): Promise<void> {
    const lines = [`# Crew run ${this.runId}`, ""];
    for (const record of records) {
      lines.push(`## ${record.id}`, "", `- Agent: ${record.agentId}`, `- Revisions: ${record.revisions}`, "");
      lines.push(record.output ?? "", "");
    }
    const file = path.join(runDir(this.options.config), "summary.md");
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, lines.join("\n"));
    this.options.logger.info(msg.summaryWritten(file));
  }
}
