import type { Task, TaskGraph } from "../graph/types.js";
import { log } from "../utils/logger.js";
import type { ExecutionContext } from "./context.js";
import type { TaskRunner } from "./runner.js";

export type SchedulerDeps = {
  graph: TaskGraph;
  context: ExecutionContext;
  createRunner: (task: Task) => TaskRunner;
  /** Once aborted, no new task is started. */
  signal: AbortSignal;
};

/**
 * Starts eligible tasks whenever the context reports a change, keeping at
 * most `graph.concurrency` of them running.
 */
export class Scheduler {
  private pumping = false;
  private dirty = false;
  private finish?: () => void;

  constructor(private readonly deps: SchedulerDeps) {}

  /** Resolves once every task is terminal. */
  run(): Promise<void> {
    return new Promise((resolve) => {
      const unsubscribe = this.deps.context.onChange(() => this.pump());
      this.finish = () => {
        unsubscribe();
        resolve();
      };
      this.pump();
    });
  }

  private pump(): void {
    if (this.pumping) {
      this.dirty = true;
      return;
    }
    this.pumping = true;
    try {
      do {
        this.dirty = false;
        this.fill();
      } while (this.dirty);
    } finally {
      this.pumping = false;
    }
    this.checkDone();
  }

  private fill(): void {
    const { context, graph, signal } = this.deps;
    while (!signal.aborted && context.runningCount() < graph.concurrency) {
      const task = context.nextEligible();
      if (!task) return;
      const runner = this.deps.createRunner(task);
      // a false condition skips the task and leaves the slot free
      if (!runner.begin()) continue;
      runner.execute().catch((err: unknown) => {
        log.error(`Runner for "${task.id}" crashed`, { error: String(err) });
      });
    }
  }

  private checkDone(): void {
    const { context } = this.deps;
    if (!this.finish) return;

    if (context.isComplete()) {
      const finish = this.finish;
      this.finish = undefined;
      finish();
      return;
    }

    if (context.runningCount() > 0) return;
    if (this.deps.signal.aborted) {
      context.cancel();
      return;
    }
    if (!context.nextEligible()) {
      const stuck = this.deps.graph.tasks
        .filter((task) => context.get(task.id).status === "pending")
        .map((task) => task.id);
      log.error("Scheduler stalled: tasks pending but none eligible", { tasks: stuck });
      context.skipPending("upstream-failed");
    }
  }
}
