export type CrewErrorCode =
  | "CONFIG_NOT_FOUND"
  | "PLACEHOLDER_MISSING"
  | "CONFIG_INVALID"
  | "BACKEND_UNAVAILABLE"
  | "REVISION_LIMIT"
  | "RUN_ABANDONED"
  | "INVALID_TRANSITION";

/** Base class for every error the crew raises on purpose. */
export class CrewError extends Error {
  constructor(
    readonly code: CrewErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No agent record backs the requested identifier. */
export class ConfigNotFoundError extends CrewError {
  constructor(
    readonly agentId: string,
    readonly searched: readonly string[],
  ) {
    super("CONFIG_NOT_FOUND", `No configuration found for agent "${agentId}" (searched: ${searched.join(", ")})`);
  }
}

/** A template references a key the substitution mapping does not contain. */
export class PlaceholderMissingError extends CrewError {
  constructor(
    readonly key: string,
    readonly field: string,
  ) {
    super("PLACEHOLDER_MISSING", `Placeholder "{${key}}" in ${field} has no value`);
  }
}

export class CrewConfigError extends CrewError {
  constructor(message: string) {
    super("CONFIG_INVALID", `Crew config error: ${message}`);
  }
}

/** The LLM backend could not produce an answer. Fatal to the run. */
export class BackendUnavailableError extends CrewError {
  constructor(backend: string, agentId: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("BACKEND_UNAVAILABLE", `${backend} backend failed for agent "${agentId}": ${detail}`, { cause });
  }
}

export class RevisionLimitError extends CrewError {
  constructor(taskId: string, limit: number) {
    super("REVISION_LIMIT", `Task "${taskId}" was not approved after ${limit} revision(s)`);
  }
}

export class RunAbandonedError extends CrewError {
  constructor(taskId: string) {
    super("RUN_ABANDONED", `Run abandoned by operator during task "${taskId}"`);
  }
}

export class InvalidTransitionError extends CrewError {
  constructor(taskId: string, from: string, to: string) {
    super("INVALID_TRANSITION", `Task "${taskId}" cannot move from ${from} to ${to}`);
  }
}
