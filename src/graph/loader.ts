import { readFile } from "node:fs/promises";
import { getConfig } from "../config.js";
import { DefinitionError, errorMessage } from "../errors.js";
import { parseOrThrow, WorkflowDefinitionSchema } from "../schemas.js";
import type { WorkflowDefinition } from "./types.js";

/**
 * Turn authored definition data into a WorkflowDefinition. Applies defaults
 * (`id` falls back to `name`, `max_parallel` to the configured limit) but
 * does not check the graph itself; see validateWorkflow.
 */
export function parseWorkflow(raw: unknown): WorkflowDefinition {
  const parsed = parseOrThrow(WorkflowDefinitionSchema, raw);
  return {
    name: parsed.name,
    description: parsed.description,
    parallelExecution: parsed.parallel_execution,
    maxParallel: parsed.max_parallel ?? getConfig().limits.maxParallel,
    timeoutSeconds: parsed.timeout_seconds,
    tasks: parsed.tools.map((tool) => ({
      id: tool.id ?? tool.name,
      name: tool.name,
      config: tool.config,
      dependsOn: tool.depends_on,
      condition: tool.condition,
      retryCount: tool.retry_count,
      timeoutSeconds: tool.timeout_seconds,
    })),
  };
}

/** Read a JSON workflow definition from disk. */
export async function loadWorkflowFile(path: string): Promise<WorkflowDefinition> {
  const text = await readFile(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new DefinitionError([`${path} is not valid JSON: ${errorMessage(err)}`]);
  }
  return parseWorkflow(raw);
}
