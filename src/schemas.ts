import { z } from "zod";
import { DefinitionError } from "./errors.js";

// --- Workflow definition input (snake_case, as authored) ---

/** Largest deadline a Node.js timer can hold (2^31 - 1 ms), in whole seconds. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

const timeoutSeconds = z
  .number()
  .positive("timeout_seconds must be > 0")
  .max(MAX_TIMEOUT_SECONDS, `timeout_seconds must be <= ${MAX_TIMEOUT_SECONDS}`)
  .optional();

export const ToolSpecSchema = z.object({
  name: z.string().trim().min(1, "tool name is required"),
  id: z.string().trim().min(1, "id must not be empty").optional(),
  depends_on: z.array(z.string().trim().min(1, "dependency id must not be empty")).default([]),
  condition: z.string().trim().min(1, "condition must not be empty").optional(),
  retry_count: z.number().int().min(0, "retry_count must be >= 0").default(0),
  timeout_seconds: timeoutSeconds,
  config: z.record(z.unknown()).default({}),
});

export const WorkflowDefinitionSchema = z.object({
  name: z.string().trim().min(1, "workflow name is required"),
  description: z.string().optional(),
  parallel_execution: z.boolean().default(true),
  max_parallel: z.number().int().min(1, "max_parallel must be >= 1").optional(),
  timeout_seconds: timeoutSeconds,
  tools: z.array(ToolSpecSchema),
});

export type ToolSpec = z.input<typeof ToolSpecSchema>;
export type WorkflowDefinitionInput = z.input<typeof WorkflowDefinitionSchema>;
export type ParsedWorkflowDefinition = z.output<typeof WorkflowDefinitionSchema>;

// --- Server requests ---

export const SubmitWorkflowRequestSchema = z.object({
  workflow: z.unknown().refine((v) => v !== undefined && v !== null, "workflow is required"),
});

export type SubmitWorkflowRequest = z.infer<typeof SubmitWorkflowRequestSchema>;

/** Flatten zod issues into `path: message` strings. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
}

/** Parse `raw` with `schema`, throwing a DefinitionError listing every issue. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new DefinitionError(formatIssues(result.error));
  }
  return result.data;
}
