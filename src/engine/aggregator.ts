import type { TaskGraph, TaskState, WorkflowResult, WorkflowStatus } from "../graph/types.js";
import { isFailureSkip } from "./context.js";

export type AggregateInput = {
  runId: string;
  graph: TaskGraph;
  states: Record<string, TaskState>;
  startedAt: number;
  finishedAt: number;
  timedOut: boolean;
  cancelled: boolean;
};

/** Whether a terminal state counts against the run's outcome. */
export function isFailure(state: TaskState): boolean {
  return state.status === "failed" || (state.status === "skipped" && isFailureSkip(state.skipReason));
}

export function workflowStatus(states: TaskState[]): WorkflowStatus {
  const anyFailure = states.some(isFailure);
  if (!anyFailure) return "success";
  return states.some((s) => s.status === "succeeded") ? "partial" : "failed";
}

/** Readiness waves as they were observed, each in declaration order. */
export function observedWaves(states: TaskState[]): string[][] {
  const waves: string[][] = [];
  for (const state of states) {
    if (state.wave === undefined) continue;
    while (waves.length <= state.wave) waves.push([]);
    waves[state.wave].push(state.id);
  }
  return waves.filter((wave) => wave.length > 0);
}

export function aggregate(input: AggregateInput): WorkflowResult {
  const { graph } = input;
  const tasks: Record<string, TaskState> = {};
  const ordered: TaskState[] = [];
  for (const task of graph.tasks) {
    const state = input.states[task.id];
    if (!state) continue;
    tasks[task.id] = state;
    ordered.push(state);
  }

  const errors = ordered
    .filter((s) => s.status === "failed" && s.error)
    .map((s) => `${s.id}: ${s.error?.message ?? "failed"}`);

  return {
    runId: input.runId,
    workflow: graph.definition.name,
    status: workflowStatus(ordered),
    tasks,
    waves: observedWaves(ordered),
    errors,
    metadata: {
      tasksTotal: ordered.length,
      tasksSucceeded: ordered.filter((s) => s.status === "succeeded").length,
      tasksFailed: ordered.filter((s) => s.status === "failed").length,
      tasksSkipped: ordered.filter((s) => s.status === "skipped").length,
      timedOut: input.timedOut,
      cancelled: input.cancelled,
    },
    startedAt: input.startedAt,
    finishedAt: input.finishedAt,
    durationMs: input.finishedAt - input.startedAt,
  };
}
