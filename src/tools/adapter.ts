import type { TaskData } from "../graph/types.js";
import type { ExecutionRequest } from "../engine/types.js";

export interface ToolAdapter {
  name: string;
  type: "http" | "function" | string;
  description?: string;

  execute(input: TaskData, request: ExecutionRequest): Promise<TaskData>;
  healthCheck?(): Promise<boolean>;
}
