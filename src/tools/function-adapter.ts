import type { ExecutionRequest } from "../engine/types.js";
import type { TaskData } from "../graph/types.js";
import { log } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";
import type { ToolAdapter } from "./adapter.js";

export type ToolFunction = (input: TaskData, request: ExecutionRequest) => Promise<TaskData>;

export type FunctionAdapterOptions = {
  name: string;
  fn: ToolFunction;
  description?: string;
  /** Own timeout in ms, applied on top of the engine's deadline. */
  timeout?: number;
};

/** Runs a tool as an in-process async function. */
export class FunctionAdapter implements ToolAdapter {
  readonly name: string;
  readonly type = "function" as const;
  readonly description?: string;

  private fn: ToolFunction;
  private timeout?: number;

  constructor(opts: FunctionAdapterOptions) {
    this.name = opts.name;
    this.fn = opts.fn;
    this.description = opts.description;
    this.timeout = opts.timeout;
  }

  async execute(input: TaskData, request: ExecutionRequest): Promise<TaskData> {
    log.debug(`[${this.name}] Running function for task "${request.taskId}"`);
    if (this.timeout === undefined) return this.fn(input, request);
    return withTimeout((signal) => this.fn(input, { ...request, signal }), {
      timeoutMs: this.timeout,
      signal: request.signal,
    });
  }
}
