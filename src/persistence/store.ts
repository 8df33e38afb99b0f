import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getConfig } from "../config.js";
import type { WorkflowResult, WorkflowStatus } from "../graph/types.js";

export type RunSummary = {
  runId: string;
  workflow: string;
  status: WorkflowStatus;
  startedAt: number;
  finishedAt: number;
};

type RunRow = {
  run_id: string;
  workflow: string;
  status: WorkflowStatus;
  result: string;
  started_at: number;
  finished_at: number;
};

/** History of finished runs, one row per WorkflowResult. */
export class RunStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? getConfig().persistence.dbPath;
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id      TEXT PRIMARY KEY,
        workflow    TEXT NOT NULL,
        status      TEXT NOT NULL,
        result      TEXT NOT NULL,
        started_at  INTEGER NOT NULL,
        finished_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);
    `);
  }

  insert(result: WorkflowResult): void {
    this.db
      .prepare(`
        INSERT OR REPLACE INTO runs (run_id, workflow, status, result, started_at, finished_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `)
      .run(
        result.runId,
        result.workflow,
        result.status,
        JSON.stringify(result),
        result.startedAt,
        result.finishedAt,
      );
  }

  get(runId: string): WorkflowResult | undefined {
    const row = this.db.prepare<[string], RunRow>("SELECT * FROM runs WHERE run_id = ?").get(runId);
    return row ? rowToResult(row) : undefined;
  }

  /** Most recent first. */
  list(limit = 50): RunSummary[] {
    const rows = this.db
      .prepare<[number], RunRow>("SELECT * FROM runs ORDER BY started_at DESC LIMIT ?")
      .all(limit);
    return rows.map((row) => ({
      runId: row.run_id,
      workflow: row.workflow,
      status: row.status,
      startedAt: row.started_at,
      finishedAt: row.finished_at,
    }));
  }

  /** Delete a specific run by ID. Returns true if deleted. */
  delete(runId: string): boolean {
    const result = this.db.prepare("DELETE FROM runs WHERE run_id = ?").run(runId);
    return result.changes > 0;
  }

  /** Delete all runs. Returns count of deleted runs. */
  deleteAll(): number {
    return this.db.prepare("DELETE FROM runs").run().changes;
  }

  deleteOlderThan(timestamp: number): number {
    return this.db.prepare("DELETE FROM runs WHERE started_at < ?").run(timestamp).changes;
  }

  close(): void {
    this.db.close();
  }
}

function rowToResult(row: RunRow): WorkflowResult {
  return JSON.parse(row.result);
}
