import type { ExecutionRequest, TaskExecutor } from "../engine/types.js";
import { ExecutorError, RegistrationError, errorMessage } from "../errors.js";
import type { TaskData } from "../graph/types.js";
import { log } from "../utils/logger.js";
import type { ToolAdapter } from "./adapter.js";

export type ToolHealth = {
  name: string;
  healthy: boolean;
  lastCheck: number;
  responseTimeMs?: number;
  error?: string;
};

/**
 * The lookup table from tool name to adapter. Implements TaskExecutor so an
 * Engine can dispatch to it directly.
 */
export class ToolRegistry implements TaskExecutor {
  private tools = new Map<string, ToolAdapter>();

  add(tool: ToolAdapter): void {
    if (this.tools.has(tool.name)) {
      throw new RegistrationError(`Tool "${tool.name}" already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  remove(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): ToolAdapter | undefined {
    return this.tools.get(name);
  }

  list(): ToolAdapter[] {
    return [...this.tools.values()];
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  async execute(taskName: string, input: TaskData, request: ExecutionRequest): Promise<TaskData> {
    const tool = this.tools.get(taskName);
    if (!tool) {
      throw new ExecutorError(taskName, `No tool registered under "${taskName}"`, { code: "UNKNOWN_TOOL" });
    }
    log.debug(`[${tool.name}] attempt ${request.attempt} for task "${request.taskId}"`);
    return tool.execute(input, request);
  }

  async checkHealth(name: string): Promise<ToolHealth> {
    const tool = this.get(name);
    if (!tool) {
      return { name, healthy: false, lastCheck: Date.now(), error: "Tool not found" };
    }
    // no health check method: assume healthy
    if (!tool.healthCheck) return { name, healthy: true, lastCheck: Date.now() };

    const start = Date.now();
    try {
      const healthy = await tool.healthCheck();
      return { name, healthy, lastCheck: Date.now(), responseTimeMs: Date.now() - start };
    } catch (err) {
      log.warn(`Health check failed for tool "${name}"`, { error: errorMessage(err) });
      return {
        name,
        healthy: false,
        lastCheck: Date.now(),
        responseTimeMs: Date.now() - start,
        error: errorMessage(err),
      };
    }
  }

  async checkAllHealth(): Promise<ToolHealth[]> {
    return Promise.all(this.names().map((name) => this.checkHealth(name)));
  }
}
