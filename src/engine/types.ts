import type { TaskData, TaskStatus, WorkflowResult } from "../graph/types.js";
import type { RetryOptions } from "../utils/retry.js";

export type ExecutionRequest = {
  taskId: string;
  /** 1-based attempt number. */
  attempt: number;
  /** Aborted when the attempt times out or the run is cancelled. */
  signal: AbortSignal;
};

/**
 * Does the actual work of a task. Must be safe to call concurrently for
 * distinct tasks and should stop work when `signal` aborts.
 */
export interface TaskExecutor {
  execute(taskName: string, input: TaskData, request: ExecutionRequest): Promise<TaskData>;
}

export type ProgressEvent = {
  runId: string;
  taskId: string;
  status: TaskStatus;
  attempt: number;
  wave?: number;
  at: number;
};

export type RunOptions = {
  /** Defaults to a random UUID. */
  runId?: string;
  /** Cancels the run: running attempts are aborted, pending tasks skipped. */
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
};

export type EngineOptions = {
  executor: TaskExecutor;
  /** Back-off between attempts; falls back to the `retry` config section. */
  retry?: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs">;
};

export type ActiveRun = {
  runId: string;
  workflow: string;
  startedAt: number;
};

export type { WorkflowResult };
