import { isTaskData } from "../engine/runner.js";
import type { ExecutionRequest } from "../engine/types.js";
import { ExecutorError } from "../errors.js";
import type { TaskData } from "../graph/types.js";
import { log } from "../utils/logger.js";
import type { ToolAdapter } from "./adapter.js";

export type HttpAdapterOptions = {
  name: string;
  url: string;
  headers?: Record<string, string>;
  description?: string;
};

/**
 * Posts `{ tool, taskId, attempt, input }` as JSON and expects a JSON object
 * back. Cancellation and deadlines come in through `request.signal`.
 */
export class HttpAdapter implements ToolAdapter {
  readonly name: string;
  readonly type = "http" as const;
  readonly description?: string;

  private url: string;
  private headers: Record<string, string>;

  constructor(opts: HttpAdapterOptions) {
    this.name = opts.name;
    this.url = opts.url;
    this.headers = opts.headers ?? {};
    this.description = opts.description;
  }

  async execute(input: TaskData, request: ExecutionRequest): Promise<TaskData> {
    log.debug(`[${this.name}] Calling ${this.url} for task "${request.taskId}"`);

    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.headers },
      body: JSON.stringify({ tool: this.name, taskId: request.taskId, attempt: request.attempt, input }),
      signal: request.signal,
    });

    const text = await res.text();
    if (!res.ok) {
      throw new ExecutorError(this.name, `HTTP ${res.status}: ${text}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new ExecutorError(this.name, `Tool "${this.name}" returned a body that is not JSON`);
    }
    if (!isTaskData(body)) {
      throw new ExecutorError(this.name, `Tool "${this.name}" returned JSON that is not an object`);
    }
    return body;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(this.url, {
        method: "HEAD",
        signal: AbortSignal.timeout(5_000),
      });
      return res.ok;
    } catch (err) {
      log.debug(`[${this.name}] Health check error`, { error: String(err) });
      return false;
    }
  }
}
