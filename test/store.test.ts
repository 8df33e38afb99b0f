import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { WorkflowResult } from "../src/graph/types.js";
import { RunStore } from "../src/persistence/store.js";

function result(runId: string, startedAt: number): WorkflowResult {
  return {
    runId,
    workflow: "nightly",
    status: "success",
    tasks: { a: { id: "a", name: "a", status: "succeeded", attempts: 1, output: { n: 1 } } },
    waves: [["a"]],
    errors: [],
    metadata: {
      tasksTotal: 1,
      tasksSucceeded: 1,
      tasksFailed: 0,
      tasksSkipped: 0,
      timedOut: false,
      cancelled: false,
    },
    startedAt,
    finishedAt: startedAt + 10,
    durationMs: 10,
  };
}

describe("RunStore", () => {
  let store: RunStore;

  beforeEach(() => {
    store = new RunStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("round-trips a result", () => {
    store.insert(result("r1", 100));
    expect(store.get("r1")).toEqual(result("r1", 100));
    expect(store.get("missing")).toBeUndefined();
  });

  it("lists the most recent runs first", () => {
    store.insert(result("old", 100));
    store.insert(result("new", 200));
    expect(store.list()).toEqual([
      { runId: "new", workflow: "nightly", status: "success", startedAt: 200, finishedAt: 210 },
      { runId: "old", workflow: "nightly", status: "success", startedAt: 100, finishedAt: 110 },
    ]);
    expect(store.list(1).map((r) => r.runId)).toEqual(["new"]);
  });

  it("replaces a run stored twice", () => {
    store.insert(result("r1", 100));
    store.insert({ ...result("r1", 100), status: "partial" });
    expect(store.list()).toHaveLength(1);
    expect(store.get("r1")?.status).toBe("partial");
  });

  it("deletes runs", () => {
    store.insert(result("a", 100));
    store.insert(result("b", 200));
    store.insert(result("c", 300));

    expect(store.delete("a")).toBe(true);
    expect(store.delete("a")).toBe(false);
    expect(store.deleteOlderThan(250)).toBe(1);
    expect(store.list().map((r) => r.runId)).toEqual(["c"]);
    expect(store.deleteAll()).toBe(1);
  });
});
