import type {
  SkipReason,
  Task,
  TaskData,
  TaskError,
  TaskGraph,
  TaskState,
  TaskStatus,
} from "../graph/types.js";
import { log } from "../utils/logger.js";

export type StateListener = (state: Readonly<TaskState>) => void;

const TERMINAL: ReadonlySet<TaskStatus> = new Set(["succeeded", "failed", "skipped"]);

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL.has(status);
}

/** Skip reasons that count against the run's outcome. */
export function isFailureSkip(reason: SkipReason | undefined): boolean {
  return reason === "upstream-failed" || reason === "cancelled";
}

/**
 * Per-run task state, the only mutable state shared between the scheduler
 * and the task runners.
 *
 * Every mutation is a synchronous method, so on Node's single event loop a
 * commit (including the skip propagation it triggers) is never interleaved
 * with another commit or an eligibility check. Listeners are notified only
 * after the whole commit has been applied, with snapshots taken at commit time.
 */
export class ExecutionContext {
  private readonly states = new Map<string, TaskState>();
  private readonly listeners = new Set<StateListener>();
  private readonly outbox: TaskState[] = [];
  private delivering = false;
  private running = 0;

  constructor(private readonly graph: TaskGraph) {
    for (const task of graph.tasks) {
      this.states.set(task.id, { id: task.id, name: task.name, status: "pending", attempts: 0 });
    }
  }

  /** Subscribe to state changes. Returns an unsubscribe function. */
  onChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get(id: string): Readonly<TaskState> {
    return this.state(id);
  }

  /** Output of a succeeded task, undefined for any other status. */
  outputOf(id: string): TaskData | undefined {
    const state = this.states.get(id);
    return state?.status === "succeeded" ? state.output : undefined;
  }

  runningCount(): number {
    return this.running;
  }

  hasPending(): boolean {
    for (const state of this.states.values()) {
      if (state.status === "pending") return true;
    }
    return false;
  }

  isComplete(): boolean {
    for (const state of this.states.values()) {
      if (!isTerminal(state.status)) return false;
    }
    return true;
  }

  /** Pending and every dependency succeeded. */
  isEligible(task: Task): boolean {
    if (this.state(task.id).status !== "pending") return false;
    return task.dependsOn.every((dep) => this.states.get(dep)?.status === "succeeded");
  }

  /** First eligible task in declaration order. */
  nextEligible(): Task | undefined {
    return this.graph.tasks.find((task) => this.isEligible(task));
  }

  /** Copy of every task state, in declaration order. */
  snapshot(): Record<string, TaskState> {
    const out: Record<string, TaskState> = {};
    for (const [id, state] of this.states) {
      out[id] = { ...state };
    }
    return out;
  }

  // --- Transitions ---

  /** pending → running. The first attempt is recorded separately. */
  start(id: string, input: TaskData): void {
    const state = this.transition(id, ["pending"], "running");
    state.input = input;
    state.wave = this.waveOf(id);
    state.startedAt = Date.now();
    this.running++;
  }

  recordAttempt(id: string): number {
    const state = this.state(id);
    if (state.status !== "running") {
      throw new Error(`Cannot record an attempt for task "${id}" in status ${state.status}`);
    }
    const limit = this.task(id).retryCount + 1;
    if (state.attempts >= limit) {
      throw new Error(`Task "${id}" has already used all ${limit} attempt(s)`);
    }
    state.attempts++;
    this.notify([state]);
    return state.attempts;
  }

  succeed(id: string, output: TaskData): void {
    const state = this.transition(id, ["running"], "succeeded");
    state.output = output;
    state.finishedAt = Date.now();
    this.running--;
    this.notify([state]);
  }

  /** Mark a task failed and skip everything downstream in the same commit. */
  fail(id: string, error: TaskError): void {
    const wasRunning = this.state(id).status === "running";
    const state = this.transition(id, ["pending", "running"], "failed");
    if (wasRunning) this.running--;
    state.error = error;
    state.finishedAt = Date.now();
    this.notify([state, ...this.propagate(id, "upstream-failed")]);
  }

  /** Skip a pending task and everything downstream in the same commit. */
  skip(id: string, reason: SkipReason): void {
    const state = this.transition(id, ["pending"], "skipped");
    state.skipReason = reason;
    if (reason === "condition") state.wave = this.waveOf(id);
    state.finishedAt = Date.now();
    const downstream: SkipReason = isFailureSkip(reason) ? "upstream-failed" : "upstream-skipped";
    this.notify([state, ...this.propagate(id, downstream)]);
  }

  /** Fail every pending task at once (global deadline). */
  expire(error: TaskError): void {
    const changed: TaskState[] = [];
    const now = Date.now();
    for (const state of this.states.values()) {
      if (state.status !== "pending") continue;
      state.status = "failed";
      state.error = error;
      state.finishedAt = now;
      changed.push(state);
    }
    this.notify(changed);
  }

  /** Skip every pending task as cancelled. */
  cancel(): void {
    this.skipPending("cancelled");
  }

  /** Skip every pending task at once. */
  skipPending(reason: SkipReason): void {
    const changed: TaskState[] = [];
    const now = Date.now();
    for (const state of this.states.values()) {
      if (state.status !== "pending") continue;
      state.status = "skipped";
      state.skipReason = reason;
      state.finishedAt = now;
      changed.push(state);
    }
    this.notify(changed);
  }

  // --- Internals ---

  /** Transitively skip pending dependents of `id`. Idempotent. */
  private propagate(id: string, reason: SkipReason): TaskState[] {
    const changed: TaskState[] = [];
    const queue = [...(this.graph.dependents.get(id) ?? [])];
    const now = Date.now();

    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined) break;
      const state = this.state(next);
      if (state.status !== "pending") continue;
      state.status = "skipped";
      state.skipReason = reason;
      state.finishedAt = now;
      changed.push(state);
      queue.push(...(this.graph.dependents.get(next) ?? []));
    }

    if (changed.length > 0) {
      log.info(`Skipping ${changed.length} task(s) downstream of "${id}"`, {
        reason,
        tasks: changed.map((s) => s.id),
      });
    }
    return changed;
  }

  private waveOf(id: string): number {
    let wave = 0;
    for (const dep of this.task(id).dependsOn) {
      wave = Math.max(wave, (this.states.get(dep)?.wave ?? 0) + 1);
    }
    return wave;
  }

  private transition(id: string, from: TaskStatus[], to: TaskStatus): TaskState {
    const state = this.state(id);
    if (!from.includes(state.status)) {
      throw new Error(`Illegal transition for task "${id}": ${state.status} → ${to}`);
    }
    state.status = to;
    return state;
  }

  private state(id: string): TaskState {
    const state = this.states.get(id);
    if (!state) throw new Error(`Unknown task "${id}"`);
    return state;
  }

  private task(id: string): Task {
    const task = this.graph.byId.get(id);
    if (!task) throw new Error(`Unknown task "${id}"`);
    return task;
  }

  /**
   * Deliver snapshots of the changed states. A listener that triggers
   * another commit has that commit's changes queued behind the current ones.
   */
  private notify(changed: TaskState[]): void {
    for (const state of changed) this.outbox.push({ ...state });
    if (this.delivering) return;
    this.delivering = true;
    try {
      let next = this.outbox.shift();
      while (next) {
        for (const listener of this.listeners) listener(next);
        next = this.outbox.shift();
      }
    } finally {
      this.delivering = false;
    }
  }
}
