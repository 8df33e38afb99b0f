#!/usr/bin/env node

import { Command } from "commander";
import { configure } from "./config.js";
import { Engine } from "./engine/engine.js";
import { toAgentFormat, toHumanReadable } from "./engine/report.js";
import { errorMessage } from "./errors.js";
import { loadWorkflowFile } from "./graph/loader.js";
import { estimateDurationSeconds, readinessWaves, validateWorkflow } from "./graph/task-graph.js";
import type { TaskGraph } from "./graph/types.js";
import { RunStore } from "./persistence/store.js";
import { WorkflowServer } from "./server/server.js";
import { HttpAdapter } from "./tools/http-adapter.js";
import { ToolRegistry } from "./tools/registry.js";
import { setLogLevel } from "./utils/logger.js";
import { integerOption } from "./utils/options.js";

const program = new Command();

program
  .name("toolgraph")
  .description("Run tool workflows as dependency graphs")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

/** One HttpAdapter per tool name, each posting to `<endpoint>/<name>`. */
function httpTools(endpoint: string, names: Iterable<string>): ToolRegistry {
  const base = endpoint.replace(/\/$/, "");
  const tools = new ToolRegistry();
  for (const name of new Set(names)) {
    tools.add(new HttpAdapter({ name, url: `${base}/${encodeURIComponent(name)}` }));
  }
  return tools;
}

async function loadGraph(file: string): Promise<TaskGraph> {
  return validateWorkflow(await loadWorkflowFile(file));
}

function printWaves(graph: TaskGraph): void {
  readinessWaves(graph).forEach((wave, i) => {
    console.log(`  wave ${i}: ${wave.join(", ")}`);
  });
}

function fail(err: unknown): void {
  console.error("Error:", errorMessage(err));
  process.exitCode = 1;
}

// --- validate ---
program
  .command("validate")
  .description("Check a workflow definition without running it")
  .argument("<file>", "Workflow definition (JSON)")
  .action(async (file: string) => {
    try {
      const graph = await loadGraph(file);
      console.log(`Workflow "${graph.definition.name}" is valid (${graph.tasks.length} tasks)`);
      printWaves(graph);
    } catch (err) {
      fail(err);
    }
  });

// --- plan ---
program
  .command("plan")
  .description("Show the readiness waves and a duration estimate (dry-run)")
  .argument("<file>", "Workflow definition (JSON)")
  .action(async (file: string) => {
    try {
      const graph = await loadGraph(file);
      console.log(`Workflow "${graph.definition.name}" (concurrency ${graph.concurrency})`);
      printWaves(graph);
      console.log(`Estimated duration: ${estimateDurationSeconds(graph)}s`);
    } catch (err) {
      fail(err);
    }
  });

// --- run ---
program
  .command("run")
  .description("Run a workflow, sending each tool call over HTTP")
  .argument("<file>", "Workflow definition (JSON)")
  .requiredOption("-e, --endpoint <url>", "Base URL; tool <name> is posted to <url>/<name>")
  .option("--save", "Store the result in the run history")
  .option("--json", "Print the result as JSON")
  .action(async (file: string, opts: { endpoint: string; save?: boolean; json?: boolean }) => {
    let graph: TaskGraph;
    try {
      graph = await loadGraph(file);
    } catch (err) {
      fail(err);
      return;
    }

    const engine = new Engine({ executor: httpTools(opts.endpoint, graph.tasks.map((t) => t.name)) });
    const controller = new AbortController();
    const onSigint = (): void => controller.abort();
    process.once("SIGINT", onSigint);

    try {
      const result = await engine.run(graph, { signal: controller.signal });
      console.log(opts.json ? JSON.stringify(toAgentFormat(result), null, 2) : toHumanReadable(result));
      if (opts.save) {
        const store = new RunStore();
        try {
          store.insert(result);
        } finally {
          store.close();
        }
      }
      if (result.status !== "success") process.exitCode = 1;
    } catch (err) {
      fail(err);
    } finally {
      process.off("SIGINT", onSigint);
    }
  });

// --- history ---
program
  .command("history")
  .description("List stored runs, most recent first")
  .option("-l, --limit <n>", "How many runs to show", integerOption(1), 20)
  .action((opts: { limit: number }) => {
    const store = new RunStore();
    try {
      const runs = store.list(opts.limit);
      if (runs.length === 0) {
        console.log("No stored runs.");
        return;
      }
      for (const run of runs) {
        const when = new Date(run.startedAt).toISOString();
        console.log(`${when}  ${run.status.padEnd(7)}  ${run.workflow}  (${run.runId})`);
      }
    } finally {
      store.close();
    }
  });

// --- serve ---
program
  .command("serve")
  .description("Start the HTTP API for submitting and following runs")
  .requiredOption("-e, --endpoint <url>", "Base URL tools are posted to")
  .requiredOption("-t, --tool <name...>", "Tool names to register")
  .option("-p, --port <port>", "Port", integerOption(0))
  .option("--host <host>", "Host")
  .option("--no-history", "Do not store finished runs")
  .action(async (opts: { endpoint: string; tool: string[]; port?: number; host?: string; history: boolean }) => {
    if (opts.port !== undefined || opts.host !== undefined) {
      configure({
        server: {
          ...(opts.port !== undefined ? { port: opts.port } : {}),
          ...(opts.host !== undefined ? { host: opts.host } : {}),
        },
      });
    }
    const tools = httpTools(opts.endpoint, opts.tool);
    const runStore = opts.history ? new RunStore() : undefined;
    const server = new WorkflowServer({ tools, runStore });

    const addr = await server.start();
    console.log(`API:   http://${addr.host}:${addr.port}/api`);
    console.log(`Tools: ${tools.names().join(", ")}`);
    console.log("Press Ctrl+C to stop.\n");

    process.on("SIGINT", () => {
      server.stop();
      runStore?.close();
      process.exit(0);
    });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
