import type { TaskStatus, WorkflowResult, WorkflowStatus } from "../graph/types.js";

// --- REST ---

export type RunRecord = {
  runId: string;
  workflow: string;
  state: "running" | "finished" | "error";
  startedAt: number;
  finishedAt?: number;
  result?: WorkflowResult;
  error?: string;
};

// --- SSE Event Types ---

export type SSEEvent =
  | { type: "run:started"; runId: string; workflow: string }
  | { type: "task:status"; runId: string; taskId: string; status: TaskStatus; attempt: number; wave?: number }
  | { type: "run:complete"; runId: string; status: WorkflowStatus; durationMs: number }
  | { type: "run:error"; runId: string; error: string }
  | { type: "run:deleted"; runId: string };
