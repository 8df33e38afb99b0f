import { getConfig } from "../config.js";
import {
  ConditionError,
  CycleError,
  DefinitionError,
  DependencyReferenceError,
  DuplicateTaskError,
} from "../errors.js";
import { MAX_TIMEOUT_SECONDS } from "../schemas.js";
import { compileCondition, type CompiledCondition } from "./condition.js";
import type { Task, TaskGraph, WorkflowDefinition } from "./types.js";

/**
 * Validate a workflow definition and build its task graph.
 *
 * Checks run in order and fail fast: duplicate ids, unknown dependencies,
 * cycles, condition expressions, then timeouts. Nothing executes on an
 * invalid graph. A condition may only read outputs of the task's own
 * dependencies, which have all succeeded by the time it is evaluated.
 */
export function validateWorkflow(definition: WorkflowDefinition): TaskGraph {
  const byId = new Map<string, Task>();
  for (const task of definition.tasks) {
    if (byId.has(task.id)) throw new DuplicateTaskError(task.id);
    byId.set(task.id, task);
  }

  for (const task of definition.tasks) {
    for (const dep of task.dependsOn) {
      if (!byId.has(dep)) throw new DependencyReferenceError(task.id, dep);
    }
  }

  const cycle = findCycle(definition.tasks, byId);
  if (cycle) throw new CycleError(cycle);

  const conditions = new Map<string, CompiledCondition>();
  for (const task of definition.tasks) {
    if (task.condition === undefined) continue;
    const compiled = compileCondition(task.condition, task.id);
    const unknown = compiled.roots.find((root) => !byId.has(root));
    if (unknown !== undefined) {
      throw new ConditionError(task.condition, `"${unknown}" is not a task id in this workflow`, task.id);
    }
    const undeclared = compiled.roots.find((root) => !task.dependsOn.includes(root));
    if (undeclared !== undefined) {
      throw new ConditionError(task.condition, `"${undeclared}" is not a dependency of "${task.id}"`, task.id);
    }
    conditions.set(task.id, compiled);
  }

  const overlong = [
    ...(exceedsTimerLimit(definition.timeoutSeconds) ? ["timeout_seconds"] : []),
    ...definition.tasks
      .filter((task) => exceedsTimerLimit(task.timeoutSeconds))
      .map((task) => `task "${task.id}": timeout_seconds`),
  ];
  if (overlong.length > 0) {
    throw new DefinitionError(overlong.map((field) => `${field} must be <= ${MAX_TIMEOUT_SECONDS}`));
  }

  return {
    definition,
    tasks: definition.tasks,
    byId,
    dependents: buildDependents(definition.tasks),
    conditions,
    concurrency: definition.parallelExecution ? definition.maxParallel : 1,
  };
}

function exceedsTimerLimit(seconds: number | undefined): boolean {
  return seconds !== undefined && seconds > MAX_TIMEOUT_SECONDS;
}

/** Map each task id to the ids of the tasks that depend on it. */
function buildDependents(tasks: Task[]): Map<string, string[]> {
  const dependents = new Map<string, string[]>();
  for (const task of tasks) dependents.set(task.id, []);
  for (const task of tasks) {
    for (const dep of task.dependsOn) {
      dependents.get(dep)?.push(task.id);
    }
  }
  return dependents;
}

/**
 * Depth-first search along `dependsOn` edges keeping the recursion stack.
 * Returns the first cycle found, replayed from the repeated node, e.g.
 * `["A", "C", "B", "A"]`.
 */
function findCycle(tasks: Task[], byId: ReadonlyMap<string, Task>): string[] | undefined {
  const done = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  function dfs(id: string): string[] | undefined {
    stack.push(id);
    onStack.add(id);
    for (const dep of byId.get(id)?.dependsOn ?? []) {
      if (onStack.has(dep)) {
        return [...stack.slice(stack.indexOf(dep)), dep];
      }
      if (!done.has(dep)) {
        const found = dfs(dep);
        if (found) return found;
      }
    }
    stack.pop();
    onStack.delete(id);
    done.add(id);
    return undefined;
  }

  for (const task of tasks) {
    if (done.has(task.id)) continue;
    const found = dfs(task.id);
    if (found) return found;
  }
  return undefined;
}

/** Return tasks in topological order (dependencies first, ties by declaration). */
export function topologicalSort(graph: TaskGraph): Task[] {
  const visited = new Set<string>();
  const sorted: Task[] = [];

  function visit(task: Task): void {
    if (visited.has(task.id)) return;
    visited.add(task.id);
    for (const dep of task.dependsOn) {
      const depTask = graph.byId.get(dep);
      if (depTask) visit(depTask);
    }
    sorted.push(task);
  }

  for (const task of graph.tasks) visit(task);
  return sorted;
}

/**
 * Readiness wave of every task: 0 for tasks without dependencies, otherwise
 * one more than the latest wave among its dependencies.
 */
export function waveIndexes(graph: TaskGraph): Map<string, number> {
  const waves = new Map<string, number>();
  for (const task of topologicalSort(graph)) {
    let wave = 0;
    for (const dep of task.dependsOn) {
      wave = Math.max(wave, (waves.get(dep) ?? 0) + 1);
    }
    waves.set(task.id, wave);
  }
  return waves;
}

/** Group task ids into readiness waves, each in declaration order. */
export function readinessWaves(graph: TaskGraph): string[][] {
  const indexes = waveIndexes(graph);
  const waves: string[][] = [];
  for (const task of graph.tasks) {
    const wave = indexes.get(task.id) ?? 0;
    while (waves.length <= wave) waves.push([]);
    waves[wave].push(task.id);
  }
  return waves;
}

/** All tasks reachable from `id` through dependents, breadth first. */
export function descendants(graph: TaskGraph, id: string): string[] {
  const seen = new Set<string>();
  const queue = [...(graph.dependents.get(id) ?? [])];
  const order: string[] = [];

  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    order.push(next);
    queue.push(...(graph.dependents.get(next) ?? []));
  }
  return order;
}

/**
 * Rough wall-clock estimate in seconds: per wave, the slowest task when the
 * workflow runs in parallel or the sum when it is sequential, plus 10%.
 * Tasks without a timeout count the configured default estimate.
 */
export function estimateDurationSeconds(graph: TaskGraph): number {
  const fallback = getConfig().limits.defaultTaskEstimateSeconds;
  let total = 0;
  for (const wave of readinessWaves(graph)) {
    const costs = wave.map((id) => graph.byId.get(id)?.timeoutSeconds ?? fallback);
    total += graph.concurrency > 1 ? Math.max(...costs) : costs.reduce((a, b) => a + b, 0);
  }
  return Math.round(total * 1.1 * 100) / 100;
}
