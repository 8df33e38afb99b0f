import { randomUUID } from "node:crypto";
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { getConfig } from "../config.js";
import { Engine } from "../engine/engine.js";
import { EngineError, errorMessage } from "../errors.js";
import type { TaskGraph } from "../graph/types.js";
import type { RunStore } from "../persistence/store.js";
import { formatIssues, SubmitWorkflowRequestSchema } from "../schemas.js";
import type { ToolRegistry } from "../tools/registry.js";
import { log } from "../utils/logger.js";
import type { RunRecord, SSEEvent } from "./types.js";

export type WorkflowServerOptions = {
  tools: ToolRegistry;
  /** Defaults to an Engine dispatching to `tools`. */
  engine?: Engine;
  port?: number;
  host?: string;
  runStore?: RunStore;
};

/** JSON API for submitting workflows and following them over SSE. */
export class WorkflowServer {
  private tools: ToolRegistry;
  private engine: Engine;
  private port: number;
  private host: string;
  private server: Server | null = null;
  private runs = new Map<string, RunRecord>();
  private runStore?: RunStore;
  private sseClients = new Set<ServerResponse>();

  constructor(opts: WorkflowServerOptions) {
    this.tools = opts.tools;
    this.engine = opts.engine ?? new Engine({ executor: opts.tools });
    this.port = opts.port ?? getConfig().server.port;
    this.host = opts.host ?? getConfig().server.host;
    this.runStore = opts.runStore;
  }

  start(): Promise<{ port: number; host: string }> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        log.error("Request handler error", { error: errorMessage(err) });
        if (!res.headersSent) {
          json(res, 500, { error: "Internal server error" });
        }
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.on("error", reject);
      server.listen(this.port, this.host, () => {
        const addr = server.address();
        if (addr && typeof addr === "object") {
          this.port = addr.port;
          this.host = addr.address;
        }
        log.info(`Server listening at http://${this.host}:${this.port}`);
        resolve({ port: this.port, host: this.host });
      });
    });
  }

  stop(): void {
    for (const client of this.sseClients) {
      client.end();
    }
    this.sseClients.clear();
    for (const run of this.engine.activeRuns()) this.engine.cancel(run.runId);
    this.server?.close();
    this.server = null;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const pathname = url.pathname;
    const method = req.method ?? "GET";

    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (method === "GET" && pathname === "/api/health") {
      return this.handleHealth(res);
    }

    if (method === "GET" && pathname === "/api/events") {
      return this.handleSSE(req, res);
    }

    if (method === "GET" && pathname === "/api/runs") {
      return this.handleListRuns(res);
    }

    if (method === "POST" && pathname === "/api/runs") {
      return this.handleSubmit(req, res);
    }

    const cancelMatch = pathname.match(/^\/api\/runs\/([^/]+)\/cancel$/);
    if (method === "POST" && cancelMatch) {
      return this.handleCancel(res, cancelMatch[1]);
    }

    const runMatch = pathname.match(/^\/api\/runs\/([^/]+)$/);
    if (method === "GET" && runMatch) {
      return this.handleGetRun(res, runMatch[1]);
    }

    if (method === "DELETE" && runMatch) {
      return this.handleDeleteRun(res, runMatch[1]);
    }

    json(res, 404, { error: "Not found" });
  }

  private handleHealth(res: ServerResponse): void {
    const tools = this.tools.list().map((t) => ({ name: t.name, type: t.type, description: t.description }));
    json(res, 200, { ok: true, tools, activeRuns: this.engine.activeRuns().length });
  }

  private handleSSE(req: IncomingMessage, res: ServerResponse): void {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(":\n\n");

    this.sseClients.add(res);
    req.on("close", () => {
      this.sseClients.delete(res);
    });
  }

  private handleListRuns(res: ServerResponse): void {
    const records = [...this.runs.values()].sort((a, b) => b.startedAt - a.startedAt);
    if (this.runStore) {
      // finished runs come from history; in-flight ones only live in memory
      const running = records
        .filter((run) => run.state === "running")
        .map((run) => ({ runId: run.runId, workflow: run.workflow, state: run.state, startedAt: run.startedAt }));
      json(res, 200, [...running, ...this.runStore.list()]);
      return;
    }
    const runs = records.map((run) => ({
      runId: run.runId,
      workflow: run.workflow,
      state: run.state,
      status: run.result?.status,
      startedAt: run.startedAt,
      finishedAt: run.finishedAt,
    }));
    json(res, 200, runs);
  }

  private handleGetRun(res: ServerResponse, runId: string): void {
    const run = this.runs.get(runId) ?? this.storedRun(runId);
    if (!run) {
      json(res, 404, { error: "Run not found" });
      return;
    }
    json(res, 200, run);
  }

  private storedRun(runId: string): RunRecord | undefined {
    const result = this.runStore?.get(runId);
    if (!result) return undefined;
    return {
      runId,
      workflow: result.workflow,
      state: "finished",
      startedAt: result.startedAt,
      finishedAt: result.finishedAt,
      result,
    };
  }

  private handleDeleteRun(res: ServerResponse, runId: string): void {
    const inMemory = this.runs.delete(runId);
    const fromStore = this.runStore?.delete(runId) ?? false;

    if (!inMemory && !fromStore) {
      json(res, 404, { error: "Run not found" });
      return;
    }

    this.broadcastSSE({ type: "run:deleted", runId });
    json(res, 200, { deleted: true, runId });
  }

  private handleCancel(res: ServerResponse, runId: string): void {
    if (!this.engine.cancel(runId)) {
      json(res, 404, { error: "Run not active" });
      return;
    }
    json(res, 200, { cancelled: true, runId });
  }

  private async handleSubmit(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readBody(req);
    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch {
      json(res, 400, { error: "Invalid JSON body" });
      return;
    }

    const request = SubmitWorkflowRequestSchema.safeParse(raw);
    if (!request.success) {
      json(res, 400, { error: formatIssues(request.error).join("; ") });
      return;
    }

    let graph: TaskGraph;
    try {
      graph = this.engine.load(request.data.workflow);
    } catch (err) {
      if (!(err instanceof EngineError)) throw err;
      json(res, 400, { error: err.message, code: err.code });
      return;
    }

    const runId = randomUUID();
    const run: RunRecord = {
      runId,
      workflow: graph.definition.name,
      state: "running",
      startedAt: Date.now(),
    };

    if (this.runs.size >= getConfig().limits.maxRuns) {
      const oldest = [...this.runs.keys()][0];
      this.runs.delete(oldest);
    }

    this.runs.set(runId, run);
    json(res, 201, { runId, workflow: run.workflow });

    this.executeRun(run, graph).catch((err: unknown) => {
      log.error("Run execution error", { runId, error: errorMessage(err) });
    });
  }

  private persist(run: RunRecord): void {
    if (!run.result) return;
    try {
      this.runStore?.insert(run.result);
    } catch (err) {
      log.error("Failed to persist run", { runId: run.runId, error: errorMessage(err) });
    }
  }

  private async executeRun(run: RunRecord, graph: TaskGraph): Promise<void> {
    const { runId } = run;
    this.broadcastSSE({ type: "run:started", runId, workflow: run.workflow });

    try {
      const result = await this.engine.run(graph, {
        runId,
        onProgress: (event) => {
          this.broadcastSSE({
            type: "task:status",
            runId,
            taskId: event.taskId,
            status: event.status,
            attempt: event.attempt,
            wave: event.wave,
          });
        },
      });
      run.state = "finished";
      run.result = result;
      run.finishedAt = result.finishedAt;
      this.persist(run);
      this.broadcastSSE({ type: "run:complete", runId, status: result.status, durationMs: result.durationMs });
    } catch (err) {
      run.state = "error";
      run.error = errorMessage(err);
      run.finishedAt = Date.now();
      this.broadcastSSE({ type: "run:error", runId, error: run.error });
    }
  }

  private broadcastSSE(event: SSEEvent): void {
    const data = `data: ${JSON.stringify(event)}\n\n`;
    for (const client of this.sseClients) {
      client.write(data);
    }
  }
}

function json(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}
