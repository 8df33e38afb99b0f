import { describe, expect, it } from "vitest";
import { Engine } from "../src/engine/engine.js";
import type { ProgressEvent } from "../src/engine/types.js";
import { ConditionError, CycleError, DefinitionError } from "../src/errors.js";
import { sleep } from "../src/utils/retry.js";
import { executorFrom, graphOf, layeredTasks, task, type Handler } from "./helpers.js";

const noBackoff = { baseDelayMs: 0 };

function engineWith(handlers: Record<string, Handler> = {}): Engine {
  return new Engine({ executor: executorFrom(handlers), retry: noBackoff });
}

describe("Engine.run", () => {
  it("passes dependency outputs as <id>_output merged under config", async () => {
    const engine = engineWith({
      a: async () => ({ value: 1 }),
      b: async (input) => ({ seen: input }),
    });
    const graph = graphOf([task("a"), task("b", ["a"], { config: { mode: "fast" } })]);

    const result = await engine.run(graph);

    expect(result.status).toBe("success");
    expect(result.tasks.b.input).toEqual({ a_output: { value: 1 }, mode: "fast" });
    expect(result.tasks.b.output).toEqual({ seen: { a_output: { value: 1 }, mode: "fast" } });
  });

  it("lets config keys win over dependency outputs", async () => {
    const engine = engineWith({ a: async () => ({ value: 1 }) });
    const graph = graphOf([task("a"), task("b", ["a"], { config: { a_output: "override" } })]);

    const result = await engine.run(graph);

    expect(result.tasks.b.input).toEqual({ a_output: "override" });
  });

  it("runs the layered example in three waves", async () => {
    const result = await engineWith().run(graphOf(layeredTasks()));

    expect(result.status).toBe("success");
    expect(result.waves).toEqual([["A", "B"], ["C", "E"], ["D"]]);
    expect(result.metadata).toEqual({
      tasksTotal: 5,
      tasksSucceeded: 5,
      tasksFailed: 0,
      tasksSkipped: 0,
      timedOut: false,
      cancelled: false,
    });
    expect(result.tasks.D.output).toEqual({ tool: "D" });
  });

  it("never starts a task before its dependencies finish", async () => {
    const log: string[] = [];
    const tracked: Handler = async (_input, req) => {
      log.push(`start:${req.taskId}`);
      await sleep(req.taskId === "A" ? 20 : 5);
      log.push(`end:${req.taskId}`);
      return {};
    };
    const tasks = layeredTasks();
    const engine = engineWith(Object.fromEntries(tasks.map((t) => [t.name, tracked])));

    await engine.run(graphOf(tasks));

    for (const t of tasks) {
      for (const dep of t.dependsOn) {
        expect(log.indexOf(`end:${dep}`)).toBeLessThan(log.indexOf(`start:${t.id}`));
      }
    }
  });

  it("runs independent tasks concurrently up to maxParallel", async () => {
    let running = 0;
    let peak = 0;
    const slow: Handler = async () => {
      running++;
      peak = Math.max(peak, running);
      await sleep(50);
      running--;
      return {};
    };
    const tasks = ["w", "x", "y", "z"].map((id) => task(id, [], { name: "slow" }));

    const parallel = await engineWith({ slow }).run(graphOf(tasks, { maxParallel: 4 }));
    expect(peak).toBe(4);
    expect(parallel.durationMs).toBeLessThan(190);

    peak = 0;
    await engineWith({ slow }).run(graphOf(tasks, { maxParallel: 2 }));
    expect(peak).toBe(2);

    peak = 0;
    await engineWith({ slow }).run(graphOf(tasks, { parallelExecution: false }));
    expect(peak).toBe(1);
  });

  it("retries until an attempt succeeds", async () => {
    const attempts: number[] = [];
    const engine = engineWith({
      flaky: async (_input, req) => {
        attempts.push(req.attempt);
        if (req.attempt < 3) throw new Error(`failure ${req.attempt}`);
        return { ok: true };
      },
    });

    const result = await engine.run(graphOf([task("flaky", [], { retryCount: 3 })]));

    expect(attempts).toEqual([1, 2, 3]);
    expect(result.status).toBe("success");
    expect(result.tasks.flaky.attempts).toBe(3);
    expect(result.tasks.flaky.output).toEqual({ ok: true });
  });

  it("fails after the last attempt and skips the downstream tasks", async () => {
    const engine = engineWith({
      a: async () => {
        throw new Error("boom");
      },
    });
    const graph = graphOf([task("a", [], { retryCount: 1 }), task("b", ["a"]), task("c", ["b"]), task("d")]);

    const result = await engine.run(graph);

    expect(result.tasks.a.status).toBe("failed");
    expect(result.tasks.a.attempts).toBe(2);
    expect(result.tasks.a.error).toEqual({ kind: "executor", message: "boom" });
    expect(result.tasks.b.status).toBe("skipped");
    expect(result.tasks.b.skipReason).toBe("upstream-failed");
    expect(result.tasks.c.skipReason).toBe("upstream-failed");
    expect(result.tasks.b.attempts).toBe(0);
    expect(result.tasks.d.status).toBe("succeeded");
    expect(result.status).toBe("partial");
    expect(result.errors).toEqual(["a: boom"]);
  });

  it("reports failed when nothing succeeded", async () => {
    const engine = engineWith({
      a: async () => {
        throw new Error("nope");
      },
    });
    const result = await engine.run(graphOf([task("a"), task("b", ["a"])]));
    expect(result.status).toBe("failed");
  });

  it("times out a slow attempt without touching its siblings", async () => {
    const engine = engineWith({
      slow: async (_input, req) => {
        await sleep(1_000, req.signal);
        return {};
      },
    });
    const graph = graphOf([task("slow", [], { timeoutSeconds: 0.05 }), task("after", ["slow"]), task("sibling")]);

    const result = await engine.run(graph);

    expect(result.tasks.slow.status).toBe("failed");
    expect(result.tasks.slow.error).toEqual({ kind: "timeout", message: "Timed out after 50ms" });
    expect(result.tasks.after.skipReason).toBe("upstream-failed");
    expect(result.tasks.sibling.status).toBe("succeeded");
    expect(result.status).toBe("partial");
  });

  it("retries an attempt that timed out", async () => {
    const engine = engineWith({
      slow: async (_input, req) => {
        if (req.attempt === 1) await sleep(1_000, req.signal);
        return { attempt: req.attempt };
      },
    });

    const result = await engine.run(graphOf([task("slow", [], { timeoutSeconds: 0.05, retryCount: 1 })]));

    expect(result.tasks.slow.status).toBe("succeeded");
    expect(result.tasks.slow.output).toEqual({ attempt: 2 });
  });

  it("skips a task whose condition is false, and its dependents", async () => {
    const called: string[] = [];
    const record: Handler = async (_input, req) => {
      called.push(req.taskId);
      return {};
    };
    const engine = engineWith({
      decide: async () => ({ confidence: 0.5 }),
      review: record,
      publish: record,
      fallback: record,
    });
    const graph = graphOf(
      [
        task("decide"),
        task("review", ["decide"], { condition: "decide.confidence >= 0.8" }),
        task("publish", ["review"]),
        task("fallback", ["decide"], { condition: "decide.confidence < 0.8" }),
      ],
      { maxParallel: 1 },
    );

    const result = await engine.run(graph);

    expect(called).toEqual(["fallback"]);
    expect(result.tasks.review.status).toBe("skipped");
    expect(result.tasks.review.skipReason).toBe("condition");
    expect(result.tasks.publish.skipReason).toBe("upstream-skipped");
    expect(result.tasks.fallback.status).toBe("succeeded");
    expect(result.status).toBe("success");
    expect(result.waves).toEqual([["decide"], ["review", "fallback"]]);
  });

  it("evaluates a condition only after the task it reads has finished", async () => {
    const called: string[] = [];
    const engine = engineWith({
      decide: async () => {
        await sleep(20);
        return { ok: true };
      },
      act: async (_input, req) => {
        called.push(req.taskId);
        return {};
      },
    });

    const result = await engine.run(
      graphOf([task("decide"), task("act", ["decide"], { condition: "decide.ok == true" })]),
    );

    expect(called).toEqual(["act"]);
    expect(result.tasks.act.status).toBe("succeeded");
    expect(
      () =>
        engine.load({
          name: "loose",
          tools: [{ name: "decide" }, { name: "act", condition: "decide.ok == true" }],
        }),
    ).toThrow(ConditionError);
  });

  it("never starts a dependent when its dependencies settle together and one fails", async () => {
    const called: string[] = [];
    const gate = sleep(10);
    const engine = engineWith({
      a: async () => {
        await gate;
        throw new Error("boom");
      },
      b: async () => {
        await gate;
        return { ok: true };
      },
      c: async (_input, req) => {
        called.push(req.taskId);
        return {};
      },
    });

    const result = await engine.run(graphOf([task("a"), task("b"), task("c", ["a", "b"])]));

    expect(called).toEqual([]);
    expect(result.tasks.a.status).toBe("failed");
    expect(result.tasks.b.status).toBe("succeeded");
    expect(result.tasks.c.status).toBe("skipped");
    expect(result.tasks.c.skipReason).toBe("upstream-failed");
    expect(result.tasks.c.attempts).toBe(0);
    expect(result.status).toBe("partial");
  });

  it("fails pending and running tasks when the workflow deadline passes", async () => {
    const engine = engineWith({
      slow: async (_input, req) => {
        await sleep(1_000, req.signal);
        return {};
      },
    });
    const graph = graphOf(
      [task("slow", [], { timeoutSeconds: 5 }), task("after", ["slow"]), task("quick")],
      { timeoutSeconds: 0.1 },
    );

    const result = await engine.run(graph);
    const message = 'Workflow "test" exceeded its 0.1s deadline';

    expect(result.tasks.slow.error).toEqual({ kind: "timeout", message });
    expect(result.tasks.slow.attempts).toBe(1);
    expect(result.tasks.after.status).toBe("failed");
    expect(result.tasks.after.error).toEqual({ kind: "timeout", message });
    expect(result.tasks.after.attempts).toBe(0);
    expect(result.tasks.quick.status).toBe("succeeded");
    expect(result.metadata.timedOut).toBe(true);
    expect(result.status).toBe("partial");
  });

  it("cancels through the caller's signal", async () => {
    const controller = new AbortController();
    const engine = engineWith({
      slow: async (_input, req) => {
        setTimeout(() => controller.abort(), 10);
        await sleep(1_000, req.signal);
        return {};
      },
    });
    const graph = graphOf([task("slow"), task("after", ["slow"]), task("queued")], { maxParallel: 1 });

    const result = await engine.run(graph, { signal: controller.signal });

    expect(result.tasks.slow.error).toEqual({ kind: "cancelled", message: "Run cancelled" });
    expect(result.tasks.after.skipReason).toBe("cancelled");
    expect(result.tasks.queued.skipReason).toBe("cancelled");
    expect(result.metadata.cancelled).toBe(true);
    expect(result.status).toBe("failed");
  });

  it("skips everything when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await engineWith().run(graphOf([task("a"), task("b")]), { signal: controller.signal });

    expect(result.tasks.a.skipReason).toBe("cancelled");
    expect(result.tasks.b.skipReason).toBe("cancelled");
    expect(result.status).toBe("failed");
  });

  it("tracks active runs and cancels them by id", async () => {
    let seen: string[] = [];
    const engine: Engine = engineWith({
      slow: async (_input, req) => {
        seen = engine.activeRuns().map((r) => r.runId);
        setTimeout(() => engine.cancel("run-1"), 10);
        await sleep(1_000, req.signal);
        return {};
      },
    });

    const result = await engine.run(graphOf([task("slow")]), { runId: "run-1" });

    expect(seen).toEqual(["run-1"]);
    expect(result.runId).toBe("run-1");
    expect(result.tasks.slow.error?.kind).toBe("cancelled");
    expect(result.metadata.cancelled).toBe(true);
    expect(engine.activeRuns()).toEqual([]);
    expect(engine.cancel("run-1")).toBe(false);
  });

  it("reports every status change as progress", async () => {
    const events: ProgressEvent[] = [];
    const result = await engineWith().run(graphOf([task("a"), task("b", ["a"])]), {
      runId: "r",
      onProgress: (e) => events.push(e),
    });

    expect(result.status).toBe("success");
    expect(events.map((e) => `${e.taskId}:${e.status}:${e.attempt}`)).toEqual([
      "a:running:1",
      "a:succeeded:1",
      "b:running:1",
      "b:succeeded:1",
    ]);
    expect(events.every((e) => e.runId === "r")).toBe(true);
    expect(events[3].wave).toBe(1);
  });

  it("keeps running when a progress listener throws", async () => {
    const result = await engineWith().run(graphOf([task("a")]), {
      onProgress: () => {
        throw new Error("listener broke");
      },
    });
    expect(result.status).toBe("success");
  });

  it("fails a task whose tool returns something other than an object", async () => {
    const engine = new Engine({
      executor: {
        execute: async () => JSON.parse("[1, 2]"),
      },
    });
    const result = await engine.run(graphOf([task("a")]));
    expect(result.tasks.a.error).toEqual({ kind: "executor", message: 'Tool "a" returned a non-object result' });
  });

  it("succeeds on an empty workflow", async () => {
    const result = await engineWith().run(graphOf([]));
    expect(result.status).toBe("success");
    expect(result.waves).toEqual([]);
    expect(result.metadata.tasksTotal).toBe(0);
  });
});

describe("Engine.load", () => {
  it("parses and validates raw definitions", () => {
    const graph = engineWith().load({
      name: "pipeline",
      tools: [{ name: "fetch" }, { name: "summarize", depends_on: ["fetch"], retry_count: 2 }],
    });
    expect(graph.definition.name).toBe("pipeline");
    expect(graph.byId.get("summarize")?.retryCount).toBe(2);
    expect(graph.concurrency).toBe(5);
  });

  it("rejects invalid shapes and invalid graphs", () => {
    const engine = engineWith();
    expect(() => engine.load({ tools: [] })).toThrow(DefinitionError);
    expect(() =>
      engine.load({
        name: "loop",
        tools: [
          { name: "a", depends_on: ["b"] },
          { name: "b", depends_on: ["a"] },
        ],
      }),
    ).toThrow(CycleError);
  });
});
