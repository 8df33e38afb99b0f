import { randomUUID } from "node:crypto";
import { getConfig } from "../config.js";
import { CancelledError, TimeoutError, errorMessage } from "../errors.js";
import { parseWorkflow } from "../graph/loader.js";
import { validateWorkflow } from "../graph/task-graph.js";
import type { TaskGraph, WorkflowDefinition } from "../graph/types.js";
import { log } from "../utils/logger.js";
import { aggregate } from "./aggregator.js";
import { ExecutionContext } from "./context.js";
import { TaskRunner } from "./runner.js";
import { Scheduler } from "./scheduler.js";
import type { ActiveRun, EngineOptions, RunOptions, TaskExecutor, WorkflowResult } from "./types.js";

type RunHandle = ActiveRun & { controller: AbortController; context: ExecutionContext };

export class Engine {
  private readonly executor: TaskExecutor;
  private readonly retry: EngineOptions["retry"];
  private readonly runs = new Map<string, RunHandle>();

  constructor(opts: EngineOptions) {
    this.executor = opts.executor;
    this.retry = opts.retry;
  }

  /** Validate a definition. Throws on the first structural problem. */
  validate(definition: WorkflowDefinition): TaskGraph {
    return validateWorkflow(definition);
  }

  /** Parse raw JSON-shaped input and validate it. */
  load(raw: unknown): TaskGraph {
    return validateWorkflow(parseWorkflow(raw));
  }

  activeRuns(): ActiveRun[] {
    return [...this.runs.values()].map(({ runId, workflow, startedAt }) => ({ runId, workflow, startedAt }));
  }

  /** Cancel a run in progress. Returns false if no such run is active. */
  cancel(runId: string): boolean {
    const run = this.runs.get(runId);
    if (!run) return false;
    log.info(`Cancelling run ${runId}`);
    run.context.cancel();
    run.controller.abort(new CancelledError());
    return true;
  }

  /**
   * Execute a validated graph to completion. Task failures are recorded in
   * the result; this only rejects on internal errors.
   */
  async run(graph: TaskGraph, opts: RunOptions = {}): Promise<WorkflowResult> {
    const runId = opts.runId ?? randomUUID();
    const { definition } = graph;
    const startedAt = Date.now();
    const context = new ExecutionContext(graph);
    const controller = new AbortController();
    const config = getConfig().retry;
    const retry = {
      baseDelayMs: this.retry?.baseDelayMs ?? config.baseDelayMs,
      maxDelayMs: this.retry?.maxDelayMs ?? config.maxDelayMs,
    };

    let timedOut = false;
    let cancelled = false;

    const { onProgress } = opts;
    const unsubscribe = onProgress
      ? context.onChange((state) => {
          try {
            onProgress({
              runId,
              taskId: state.id,
              status: state.status,
              attempt: state.attempts,
              wave: state.wave,
              at: Date.now(),
            });
          } catch (err) {
            log.warn("Progress listener threw", { runId, error: errorMessage(err) });
          }
        })
      : undefined;

    const onCancel = (): void => {
      if (controller.signal.aborted) return;
      cancelled = true;
      log.info(`Run ${runId} cancelled by caller`);
      context.cancel();
      controller.abort(new CancelledError());
    };

    let timer: NodeJS.Timeout | undefined;
    const deadline =
      definition.timeoutSeconds !== undefined ? startedAt + definition.timeoutSeconds * 1000 : undefined;
    if (definition.timeoutSeconds !== undefined) {
      const budgetMs = definition.timeoutSeconds * 1000;
      timer = setTimeout(() => {
        if (controller.signal.aborted) return;
        timedOut = true;
        const err = new TimeoutError(
          budgetMs,
          `Workflow "${definition.name}" exceeded its ${definition.timeoutSeconds}s deadline`,
        );
        log.warn(err.message, { runId });
        context.expire({ kind: "timeout", message: err.message });
        controller.abort(err);
      }, budgetMs);
    }

    this.runs.set(runId, { runId, workflow: definition.name, startedAt, controller, context });
    log.info(`Run ${runId} started`, { workflow: definition.name, tasks: graph.tasks.length });

    const scheduler = new Scheduler({
      graph,
      context,
      signal: controller.signal,
      createRunner: (task) =>
        new TaskRunner(task, { graph, context, executor: this.executor, runSignal: controller.signal, deadline, retry }),
    });

    try {
      if (opts.signal?.aborted) onCancel();
      else opts.signal?.addEventListener("abort", onCancel, { once: true });
      await scheduler.run();
    } finally {
      if (timer) clearTimeout(timer);
      opts.signal?.removeEventListener("abort", onCancel);
      unsubscribe?.();
      this.runs.delete(runId);
    }

    // cancel() through the engine aborts with a CancelledError as well
    if (!timedOut && controller.signal.reason instanceof CancelledError) cancelled = true;

    const result = aggregate({
      runId,
      graph,
      states: context.snapshot(),
      startedAt,
      finishedAt: Date.now(),
      timedOut,
      cancelled,
    });
    log.info(`Run ${runId} finished: ${result.status}`, {
      durationMs: result.durationMs,
      succeeded: result.metadata.tasksSucceeded,
      failed: result.metadata.tasksFailed,
      skipped: result.metadata.tasksSkipped,
    });
    return result;
  }
}
