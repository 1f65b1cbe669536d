import type { OverallStatus, Task, TaskStatus, WorkflowStatus } from "./types.js";

/** Minimal shape the graph algorithms need. */
export type GraphNode = {
  id: string;
  dependencies: readonly string[];
};

/** Build the reverse index: node id → ids of nodes that depend on it. */
export function dependentsIndex(nodes: readonly GraphNode[]): Map<string, string[]> {
  const dependents = new Map<string, string[]>();
  for (const node of nodes) {
    for (const dep of node.dependencies) {
      const list = dependents.get(dep) ?? [];
      list.push(node.id);
      dependents.set(dep, list);
    }
  }
  return dependents;
}

/**
 * Find one dependency cycle using DFS with coloring.
 * Returns the ids on the cycle in dependency order, or undefined for a DAG.
 * Edges to ids outside `nodes` are ignored.
 */
export function findCycle(nodes: readonly GraphNode[]): string[] | undefined {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const byId = new Map(nodes.map((n) => [n.id, n]));
  const color = new Map<string, number>();
  for (const node of nodes) color.set(node.id, WHITE);
  const stack: string[] = [];

  function dfs(id: string): string[] | undefined {
    color.set(id, GRAY);
    stack.push(id);
    for (const dep of byId.get(id)?.dependencies ?? []) {
      const c = color.get(dep);
      if (c === GRAY) return stack.slice(stack.indexOf(dep)); // back edge
      if (c === WHITE) {
        const found = dfs(dep);
        if (found) return found;
      }
    }
    stack.pop();
    color.set(id, BLACK);
    return undefined;
  }

  for (const node of nodes) {
    if (color.get(node.id) === WHITE) {
      const found = dfs(node.id);
      if (found) return found;
    }
  }
  return undefined;
}

/**
 * Kahn's algorithm. Among nodes that are ready at the same time the input
 * order is kept, so an already-ordered list comes back unchanged.
 * Returns undefined when the graph has a cycle. Edges to unknown ids are ignored.
 */
export function topologicalOrder<T extends GraphNode>(nodes: readonly T[]): T[] | undefined {
  const ids = new Set(nodes.map((n) => n.id));
  const remaining = new Map<string, number>();
  for (const node of nodes) {
    remaining.set(node.id, new Set(node.dependencies.filter((d) => ids.has(d))).size);
  }
  const dependents = dependentsIndex(nodes);
  const placed = new Set<string>();
  const sorted: T[] = [];

  while (sorted.length < nodes.length) {
    const next = nodes.find((n) => !placed.has(n.id) && remaining.get(n.id) === 0);
    if (!next) return undefined;
    placed.add(next.id);
    sorted.push(next);
    for (const dependent of new Set(dependents.get(next.id) ?? [])) {
      remaining.set(dependent, (remaining.get(dependent) ?? 0) - 1);
    }
  }
  return sorted;
}

/** Pending tasks whose every dependency has completed, in input order. */
export function executableTasks(tasks: readonly Task[]): Task[] {
  const completed = new Set(tasks.filter((t) => t.status === "completed").map((t) => t.id));
  return tasks.filter(
    (t) => t.status === "pending" && t.dependencies.every((d) => completed.has(d)),
  );
}

export function countByStatus(tasks: readonly Task[]): Record<TaskStatus, number> {
  const counts: Record<TaskStatus, number> = { pending: 0, blocked: 0, in_progress: 0, completed: 0, failed: 0 };
  for (const task of tasks) counts[task.status] += 1;
  return counts;
}

export function deriveOverallStatus(counts: Record<TaskStatus, number>, total: number): OverallStatus {
  if (counts.failed > 0) return counts.completed > 0 ? "partially_completed" : "failed";
  if (counts.completed === total) return "completed";
  if (counts.in_progress > 0) return "in_progress";
  return "pending";
}

export function deriveWorkflowStatus(workflowId: string, tasks: readonly Task[]): WorkflowStatus {
  const counts = countByStatus(tasks);
  const total = tasks.length;
  return {
    workflowId,
    totalTasks: total,
    counts,
    completedTasks: counts.completed,
    failedTasks: counts.failed,
    pendingTasks: counts.pending + counts.blocked,
    inProgressTasks: counts.in_progress,
    overallStatus: deriveOverallStatus(counts, total),
    progressPercentage: total > 0 ? (counts.completed / total) * 100 : 0,
  };
}

export type DeadlockReport = {
  /** Tasks left pending or blocked. */
  stuckTaskIds: string[];
  /** Dependency cycles among the stuck tasks. */
  cycles: string[][];
  /** Stuck task id → dependencies that failed. */
  failedDependencies: Record<string, string[]>;
  /** Stuck task id → dependencies that are not in the workflow. */
  missingDependencies: Record<string, string[]>;
};

/** Explain why no stuck task can ever become executable. */
export function diagnoseDeadlock(tasks: readonly Task[]): DeadlockReport {
  const byId = new Map(tasks.map((t) => [t.id, t]));
  const stuck = tasks.filter((t) => t.status === "pending" || t.status === "blocked");
  const failedDependencies: Record<string, string[]> = {};
  const missingDependencies: Record<string, string[]> = {};

  for (const task of stuck) {
    const failed = task.dependencies.filter((d) => byId.get(d)?.status === "failed");
    const missing = task.dependencies.filter((d) => !byId.has(d));
    if (failed.length > 0) failedDependencies[task.id] = failed;
    if (missing.length > 0) missingDependencies[task.id] = missing;
  }

  const cycles: string[][] = [];
  let remaining: GraphNode[] = stuck;
  for (let cycle = findCycle(remaining); cycle; cycle = findCycle(remaining)) {
    cycles.push(cycle);
    const onCycle = new Set(cycle);
    remaining = remaining.filter((n) => !onCycle.has(n.id));
  }

  return {
    stuckTaskIds: stuck.map((t) => t.id),
    cycles,
    failedDependencies,
    missingDependencies,
  };
}
