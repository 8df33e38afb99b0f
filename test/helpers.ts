import type { ExecutionRequest, TaskExecutor } from "../src/engine/types.js";
import { validateWorkflow } from "../src/graph/task-graph.js";
import type { Task, TaskData, TaskGraph, WorkflowDefinition } from "../src/graph/types.js";

export function task(id: string, dependsOn: string[] = [], extra: Partial<Task> = {}): Task {
  return { id, name: id, config: {}, dependsOn, retryCount: 0, ...extra };
}

export function workflow(tasks: Task[], extra: Partial<WorkflowDefinition> = {}): WorkflowDefinition {
  return { name: "test", tasks, parallelExecution: true, maxParallel: 5, ...extra };
}

export function graphOf(tasks: Task[], extra: Partial<WorkflowDefinition> = {}): TaskGraph {
  return validateWorkflow(workflow(tasks, extra));
}

export type Handler = (input: TaskData, request: ExecutionRequest) => Promise<TaskData>;

/** Dispatches on tool name; tools without a handler return `{ tool: <name> }`. */
export function executorFrom(handlers: Record<string, Handler> = {}): TaskExecutor {
  return {
    async execute(taskName, input, request) {
      const handler = handlers[taskName];
      if (!handler) return { tool: taskName };
      return handler(input, request);
    },
  };
}

/** The layered example: A,B / C,E / D. */
export function layeredTasks(): Task[] {
  return [
    task("A"),
    task("B"),
    task("C", ["A", "B"]),
    task("D", ["C"]),
    task("E", ["B"]),
  ];
}
