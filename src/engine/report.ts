import type { SkipReason, TaskData, TaskError, TaskState, TaskStatus, WorkflowResult, WorkflowStatus } from "../graph/types.js";

export type AgentTaskReport = {
  id: string;
  tool: string;
  status: TaskStatus;
  attempts: number;
  output?: TaskData;
  error?: TaskError;
  skipReason?: SkipReason;
};

/** A flat, JSON-safe view of a result for programs that consume it. */
export type AgentReport = {
  runId: string;
  workflow: string;
  status: WorkflowStatus;
  success: boolean;
  durationMs: number;
  startedAt: string;
  finishedAt: string;
  tasks: AgentTaskReport[];
  waves: string[][];
  errors: string[];
  metadata: WorkflowResult["metadata"];
};

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

function taskLine(state: TaskState): string {
  switch (state.status) {
    case "succeeded":
      return `  ${state.id}: succeeded after ${plural(state.attempts, "attempt")}`;
    case "failed": {
      const kind = state.error?.kind ?? "executor";
      const message = state.error?.message ?? "unknown error";
      return `  ${state.id}: failed after ${plural(state.attempts, "attempt")} [${kind}] ${message}`;
    }
    case "skipped":
      return `  ${state.id}: skipped (${state.skipReason ?? "unknown"})`;
    default:
      return `  ${state.id}: ${state.status}`;
  }
}

export function toHumanReadable(result: WorkflowResult): string {
  const { metadata } = result;
  const lines = [
    `Workflow "${result.workflow}": ${result.status.toUpperCase()} in ${result.durationMs}ms`,
    `Tasks: ${metadata.tasksSucceeded} succeeded, ${metadata.tasksFailed} failed, ${metadata.tasksSkipped} skipped (${metadata.tasksTotal} total)`,
  ];
  if (metadata.timedOut) lines.push("The run hit its global deadline.");
  if (metadata.cancelled) lines.push("The run was cancelled.");
  for (const state of Object.values(result.tasks)) lines.push(taskLine(state));
  if (result.errors.length > 0) {
    lines.push("Errors:");
    for (const err of result.errors) lines.push(`  - ${err}`);
  }
  return lines.join("\n");
}

export function toAgentFormat(result: WorkflowResult): AgentReport {
  return {
    runId: result.runId,
    workflow: result.workflow,
    status: result.status,
    success: result.status === "success",
    durationMs: result.durationMs,
    startedAt: new Date(result.startedAt).toISOString(),
    finishedAt: new Date(result.finishedAt).toISOString(),
    tasks: Object.values(result.tasks).map((state) => ({
      id: state.id,
      tool: state.name,
      status: state.status,
      attempts: state.attempts,
      output: state.output,
      error: state.error,
      skipReason: state.skipReason,
    })),
    waves: result.waves,
    errors: result.errors,
    metadata: result.metadata,
  };
}
