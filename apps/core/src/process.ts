import type { ProcessKind } from "./constants.js";
import { CrewConfigError } from "./errors.js";
import type { TaskSpec } from "./task.js";

/** Decides the order in which tasks execute. `execute` rejects to stop the run. */
export interface ProcessStrategy {
  readonly kind: ProcessKind;
  run(tasks: readonly TaskSpec[], execute: (task: TaskSpec, index: number) => Promise<void>): Promise<void>;
}

/** One task at a time, in declaration order. */
export class SequentialProcess implements ProcessStrategy {
  readonly kind = "sequential";

  async run(tasks: readonly TaskSpec[], execute: (task: TaskSpec, index: number) => Promise<void>): Promise<void> {
    for (const [index, task] of tasks.entries()) {
      await execute(task, index);
    }
  }
}

export function createProcess(kind: ProcessKind): ProcessStrategy {
  switch (kind) {
    case "sequential":
      return new SequentialProcess();
    case "parallel":
    case "conditional":
      throw new CrewConfigError(`process "${kind}" is not supported yet; use "sequential"`);
  }
}
