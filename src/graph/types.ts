import type { CompiledCondition } from "./condition.js";

/** Opaque key-value data handed to and returned from tool executors. */
export type TaskData = Record<string, unknown>;

export type Task = {
  /** Unique within the workflow; defaults to `name`. */
  id: string;
  /** Tool to invoke. */
  name: string;
  config: TaskData;
  dependsOn: string[];
  /** Boolean expression over prior outputs; absent means always eligible. */
  condition?: string;
  retryCount: number;
  timeoutSeconds?: number;
};

export type WorkflowDefinition = {
  name: string;
  description?: string;
  tasks: Task[];
  parallelExecution: boolean;
  maxParallel: number;
  /** Global wall-clock budget for the whole run. */
  timeoutSeconds?: number;
};

/** A definition that passed validation. */
export type TaskGraph = {
  definition: WorkflowDefinition;
  /** Declaration order. */
  tasks: Task[];
  byId: ReadonlyMap<string, Task>;
  /** task id → ids of the tasks that list it in `dependsOn`. */
  dependents: ReadonlyMap<string, string[]>;
  conditions: ReadonlyMap<string, CompiledCondition>;
  /** Concurrency ceiling after applying `parallelExecution`. */
  concurrency: number;
};

export type TaskStatus = "pending" | "skipped" | "running" | "succeeded" | "failed";

export type SkipReason =
  /** The task's own condition evaluated false. */
  | "condition"
  /** An upstream task was skipped by its condition. */
  | "upstream-skipped"
  /** An upstream task failed. */
  | "upstream-failed"
  /** The run was cancelled before the task started. */
  | "cancelled";

export type TaskErrorKind = "timeout" | "executor" | "cancelled";

export type TaskError = {
  kind: TaskErrorKind;
  message: string;
};

export type TaskState = {
  id: string;
  name: string;
  status: TaskStatus;
  attempts: number;
  output?: TaskData;
  error?: TaskError;
  skipReason?: SkipReason;
  input?: TaskData;
  /** Readiness wave at which the task became eligible. */
  wave?: number;
  startedAt?: number;
  finishedAt?: number;
};

export type WorkflowStatus = "success" | "partial" | "failed";

export type WorkflowResult = {
  runId: string;
  workflow: string;
  status: WorkflowStatus;
  /** Final state per task id, in declaration order. */
  tasks: Record<string, TaskState>;
  /** Observed readiness waves, each in declaration order. */
  waves: string[][];
  errors: string[];
  metadata: {
    tasksTotal: number;
    tasksSucceeded: number;
    tasksFailed: number;
    tasksSkipped: number;
    timedOut: boolean;
    cancelled: boolean;
  };
  startedAt: number;
  finishedAt: number;
  durationMs: number;
};
