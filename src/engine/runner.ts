import { CancelledError, EngineError, ExecutorError, TimeoutError, errorMessage } from "../errors.js";
import type { Task, TaskData, TaskError, TaskGraph } from "../graph/types.js";
import { log } from "../utils/logger.js";
import { abortReason, withRetry } from "../utils/retry.js";
import { withTimeout } from "../utils/timeout.js";
import type { ExecutionContext } from "./context.js";
import type { TaskExecutor } from "./types.js";

export type RunnerDeps = {
  graph: TaskGraph;
  context: ExecutionContext;
  executor: TaskExecutor;
  /** Aborted on the global deadline or on cancellation. */
  runSignal: AbortSignal;
  /** Epoch ms of the global deadline, if the workflow has one. */
  deadline?: number;
  retry: { baseDelayMs: number; maxDelayMs: number };
};

export function isTaskData(value: unknown): value is TaskData {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Classify a thrown value for the task's state record. */
export function toTaskError(err: unknown): TaskError {
  if (err instanceof TimeoutError) return { kind: "timeout", message: err.message };
  if (err instanceof CancelledError) return { kind: "cancelled", message: err.message };
  return { kind: "executor", message: errorMessage(err) };
}

/**
 * Drives one task to a terminal state: condition check, input resolution,
 * then a bounded attempt loop with a deadline per attempt.
 */
export class TaskRunner {
  constructor(
    private readonly task: Task,
    private readonly deps: RunnerDeps,
  ) {}

  /**
   * Evaluate the condition and, if it holds, move the task to running with
   * its resolved input. Returns false when the task was skipped instead.
   */
  begin(): boolean {
    const { task } = this;
    const { context } = this.deps;

    if (!this.conditionHolds()) {
      log.info(`Task "${task.id}" skipped: condition is false`, { condition: task.condition });
      context.skip(task.id, "condition");
      return false;
    }

    context.start(task.id, this.resolveInput());
    log.info(`Dispatching "${task.id}" to tool "${task.name}"`);
    return true;
  }

  conditionHolds(): boolean {
    const compiled = this.deps.graph.conditions.get(this.task.id);
    if (!compiled) return true;
    return compiled.evaluate((id) => this.deps.context.outputOf(id));
  }

  /** Dependency outputs as `<id>_output`, overlaid with the task's config. */
  resolveInput(): TaskData {
    const input: TaskData = {};
    for (const dep of this.task.dependsOn) {
      input[`${dep}_output`] = this.deps.context.outputOf(dep);
    }
    return { ...input, ...this.task.config };
  }

  /** Run the attempt loop and commit the result. Never rejects. */
  async execute(): Promise<void> {
    const { task } = this;
    const { context, runSignal, retry } = this.deps;
    const input = context.get(task.id).input ?? this.resolveInput();

    try {
      const output = await withRetry(
        (attempt) => {
          context.recordAttempt(task.id);
          return withTimeout((signal) => this.invoke(input, attempt, signal), {
            timeoutMs: this.attemptTimeoutMs(),
            signal: runSignal,
          });
        },
        {
          maxAttempts: task.retryCount + 1,
          baseDelayMs: retry.baseDelayMs,
          maxDelayMs: retry.maxDelayMs,
          signal: runSignal,
          onRetry: (err, attempt, delayMs) => {
            log.warn(`Task "${task.id}" attempt ${attempt} failed, retrying in ${delayMs}ms`, {
              error: errorMessage(err),
            });
          },
        },
      );
      context.succeed(task.id, output);
      log.info(`Task "${task.id}" succeeded`, { attempts: context.get(task.id).attempts });
    } catch (err) {
      const cause = runSignal.aborted ? abortReason(runSignal) : err;
      const attempts = context.get(task.id).attempts;
      log.error(`Task "${task.id}" failed after ${attempts} attempt(s)`, { error: errorMessage(cause) });
      context.fail(task.id, toTaskError(cause));
    }
  }

  /** Task-level timeout if set, else whatever is left of the global budget. */
  private attemptTimeoutMs(): number | undefined {
    if (this.task.timeoutSeconds !== undefined) return this.task.timeoutSeconds * 1000;
    if (this.deps.deadline !== undefined) return Math.max(0, this.deps.deadline - Date.now());
    return undefined;
  }

  private async invoke(input: TaskData, attempt: number, signal: AbortSignal): Promise<TaskData> {
    const { task } = this;
    let output: unknown;
    try {
      output = await this.deps.executor.execute(task.name, input, { taskId: task.id, attempt, signal });
    } catch (err) {
      if (err instanceof EngineError) throw err;
      throw new ExecutorError(task.name, errorMessage(err), { cause: err });
    }
    if (!isTaskData(output)) {
      throw new ExecutorError(task.name, `Tool "${task.name}" returned a non-object result`);
    }
    return output;
  }
}
