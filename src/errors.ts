export type ErrorCode =
  | "INVALID_DEFINITION"
  | "DUPLICATE_TASK"
  | "UNKNOWN_DEPENDENCY"
  | "CYCLE_DETECTED"
  | "INVALID_CONDITION"
  | "DUPLICATE_REGISTRATION"
  | "UNKNOWN_TOOL"
  | "EXECUTOR_FAILED"
  | "TIMEOUT"
  | "CANCELLED"
  | "INVALID_CONFIG";

/** Base class for every error raised by the engine. */
export class EngineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EngineError";
    this.code = code;
  }
}

// --- Definition-time errors: raised before any task runs ---

export class DefinitionError extends EngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_DEFINITION", `Invalid workflow definition: ${issues.join("; ")}`);
    this.name = "DefinitionError";
    this.issues = issues;
  }
}

export class DuplicateTaskError extends EngineError {
  constructor(readonly taskId: string) {
    super("DUPLICATE_TASK", `Task id "${taskId}" is declared more than once`);
    this.name = "DuplicateTaskError";
  }
}

/** A `dependsOn` entry names a task id that does not exist in the workflow. */
export class DependencyReferenceError extends EngineError {
  constructor(
    readonly taskId: string,
    readonly missingDependency: string,
  ) {
    super("UNKNOWN_DEPENDENCY", `Task "${taskId}" depends on unknown task "${missingDependency}"`);
    this.name = "DependencyReferenceError";
  }
}

export class CycleError extends EngineError {
  /** Ordered ids of the cycle; the first id is repeated at the end. */
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super("CYCLE_DETECTED", `Dependency cycle detected: ${cycle.join("→")}`);
    this.name = "CycleError";
    this.cycle = cycle;
  }
}

export class ConditionError extends EngineError {
  constructor(
    readonly expression: string,
    detail: string,
    readonly taskId?: string,
  ) {
    super(
      "INVALID_CONDITION",
      taskId
        ? `Invalid condition on task "${taskId}" (${expression}): ${detail}`
        : `Invalid condition (${expression}): ${detail}`,
    );
    this.name = "ConditionError";
  }
}

// --- Task-time errors: recorded on the task, never thrown out of a run ---

export class TimeoutError extends EngineError {
  constructor(readonly timeoutMs: number, message?: string) {
    super("TIMEOUT", message ?? `Timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class ExecutorError extends EngineError {
  constructor(
    readonly taskName: string,
    message: string,
    options?: { cause?: unknown; code?: ErrorCode },
  ) {
    super(options?.code ?? "EXECUTOR_FAILED", message, options);
    this.name = "ExecutorError";
  }
}

export class CancelledError extends EngineError {
  constructor(message = "Run cancelled") {
    super("CANCELLED", message);
    this.name = "CancelledError";
  }
}

// --- Everything else ---

export class RegistrationError extends EngineError {
  constructor(message: string) {
    super("DUPLICATE_REGISTRATION", message);
    this.name = "RegistrationError";
  }
}

export class ConfigError extends EngineError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
    this.name = "ConfigError";
  }
}

/** Render any thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
