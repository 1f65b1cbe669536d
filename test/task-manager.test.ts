import { beforeEach, describe, expect, it } from "vitest";
import {
  DependencyNotFoundError,
  InvalidTransitionError,
  NoActiveWorkflowError,
  PlanValidationError,
  StoreError,
  TaskNotFoundError,
} from "../src/errors.js";
import { TaskStore } from "../src/persistence/store.js";
import { TaskManager } from "../src/workflow/manager.js";

function complete(manager: TaskManager, taskId: string, artifacts: Record<string, unknown> = {}): void {
  manager.updateTaskStatus(taskId, "in_progress");
  manager.updateTaskStatus(taskId, "completed", { success: true, result: "ok", artifacts });
}

function conserved(manager: TaskManager): boolean {
  const { counts, totalTasks } = manager.getWorkflowStatus();
  return Object.values(counts).reduce((a, b) => a + b, 0) === totalTasks;
}

describe("TaskManager", () => {
  let store: TaskStore;
  let manager: TaskManager;

  beforeEach(() => {
    store = new TaskStore(":memory:");
    manager = new TaskManager({ store });
    manager.createWorkflow("test workflow");
  });

  it("requires an active workflow", () => {
    const idle = new TaskManager({ store });
    expect(() => idle.addTask("x", "general_task")).toThrow(NoActiveWorkflowError);
    expect(() => idle.getAllTasks()).toThrow(NoActiveWorkflowError);
  });

  it("starts tasks pending or blocked depending on their dependencies", () => {
    const a = manager.addTask("first", "general_task");
    const b = manager.addTask("second", "general_task", [a]);
    expect(manager.getTask(a)?.status).toBe("pending");
    expect(manager.getTask(b)?.status).toBe("blocked");
  });

  it("rejects a missing dependency without changing anything", () => {
    manager.addTask("first", "general_task");
    let caught: unknown;
    try {
      manager.addTask("second", "general_task", ["nope"]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DependencyNotFoundError);
    expect(caught instanceof DependencyNotFoundError && caught.dependencyId).toBe("nope");
    expect(manager.getAllTasks()).toHaveLength(1);

    const loaded = store.loadWorkflow(manager.workflowId);
    expect(loaded.found && loaded.tasks.length).toBe(1);
  });

  it("runs a linear chain one task at a time", () => {
    const a = manager.addTask("A", "general_task");
    const b = manager.addTask("B", "general_task", [a]);
    const c = manager.addTask("C", "general_task", [a, b]);

    expect(manager.getExecutableTasks().map((t) => t.id)).toEqual([a]);
    complete(manager, a);
    expect(manager.getTask(b)?.status).toBe("pending");
    expect(manager.getTask(c)?.status).toBe("blocked");
    expect(manager.getExecutableTasks().map((t) => t.id)).toEqual([b]);
    complete(manager, b);
    expect(manager.getExecutableTasks().map((t) => t.id)).toEqual([c]);
    complete(manager, c);

    const status = manager.getWorkflowStatus();
    expect(status.overallStatus).toBe("completed");
    expect(status.progressPercentage).toBe(100);
    expect(conserved(manager)).toBe(true);
  });

  it("unblocks a task only when every dependency completed", () => {
    const a = manager.addTask("A", "general_task");
    const b = manager.addTask("B", "general_task");
    const c = manager.addTask("C", "general_task", [a, b]);

    complete(manager, a);
    expect(manager.getTask(c)?.status).toBe("blocked");
    complete(manager, b);
    expect(manager.getTask(c)?.status).toBe("pending");
  });

  it("leaves dependents blocked when a dependency fails", () => {
    const a = manager.addTask("A", "general_task");
    const b = manager.addTask("B", "general_task", [a]);
    manager.updateTaskStatus(a, "in_progress");
    manager.updateTaskStatus(a, "failed", { success: false, error: "boom", artifacts: {} });
    expect(manager.getTask(b)?.status).toBe("blocked");
    expect(manager.getExecutableTasks()).toEqual([]);
  });

  it("only moves tasks forward", () => {
    const a = manager.addTask("A", "general_task");
    const b = manager.addTask("B", "general_task", [a]);
    expect(() => manager.updateTaskStatus(a, "completed")).toThrow(InvalidTransitionError);
    expect(() => manager.updateTaskStatus(b, "in_progress")).toThrow(InvalidTransitionError);
    complete(manager, a);
    expect(() => manager.updateTaskStatus(a, "in_progress")).toThrow(InvalidTransitionError);
    expect(() => manager.updateTaskStatus("nope", "in_progress")).toThrow(TaskNotFoundError);
  });

  it("stamps start and completion times in order", () => {
    const a = manager.addTask("A", "general_task");
    complete(manager, a);
    const task = manager.getTask(a);
    expect(task?.startedAt).toBeDefined();
    expect(task?.completedAt).toBeGreaterThanOrEqual(task?.startedAt ?? Infinity);
    expect(task?.result).toEqual({ success: true, result: "ok", artifacts: {} });
  });

  it("leaves a task untouched when its update cannot be stored", () => {
    const a = manager.addTask("A", "general_task");
    const b = manager.addTask("B", "general_task", [a]);
    manager.updateTaskStatus(a, "in_progress");
    const loop: Record<string, unknown> = {};
    loop.self = loop;

    expect(() => manager.updateTaskStatus(a, "completed", { success: true, result: loop, artifacts: {} })).toThrow(
      StoreError,
    );

    expect(manager.getTask(a)?.status).toBe("in_progress");
    expect(manager.getTask(a)?.result).toBeUndefined();
    expect(manager.getTask(a)?.completedAt).toBeUndefined();
    expect(manager.getTask(b)?.status).toBe("blocked");
  });

  it("writes every change through to the store", () => {
    const a = manager.addTask("A", "general_task");
    const b = manager.addTask("B", "web_browsing", [a]);
    complete(manager, a);

    const reloaded = new TaskManager({ store });
    expect(reloaded.loadWorkflow(manager.workflowId)).toBe(true);
    expect(reloaded.getAllTasks().map((t) => [t.id, t.status])).toEqual([
      [a, "completed"],
      [b, "pending"],
    ]);
    expect(reloaded.getExecutableTasks().map((t) => t.id)).toEqual([b]);
  });

  it("returns false when loading an unknown workflow", () => {
    expect(new TaskManager({ store }).loadWorkflow("missing")).toBe(false);
  });

  describe("addTasks", () => {
    it("inserts a batch in dependency order and maps keys to ids", () => {
      const ids = manager.addTasks([
        { key: "c", description: "C", taskType: "general_task", dependsOn: ["a"] },
        { key: "a", description: "A", taskType: "general_task", dependsOn: [] },
        { key: "b", description: "B", taskType: "general_task", dependsOn: ["a", "c"] },
      ]);

      expect(manager.getAllTasks().map((t) => t.description)).toEqual(["A", "C", "B"]);
      expect(manager.getTask(ids.get("b") ?? "")?.dependencies).toEqual([ids.get("a"), ids.get("c")]);
      expect(manager.getTask(ids.get("a") ?? "")?.status).toBe("pending");
      expect(manager.getTask(ids.get("c") ?? "")?.status).toBe("blocked");
    });

    it("rejects a cyclic batch without creating any task", () => {
      expect(() =>
        manager.addTasks([
          { key: "a", description: "A", taskType: "general_task", dependsOn: ["b"] },
          { key: "b", description: "B", taskType: "general_task", dependsOn: ["a"] },
        ]),
      ).toThrow("Task dependencies contain a cycle: a -> b");
      expect(manager.getAllTasks()).toEqual([]);
    });

    it("rejects duplicate keys, self edges and unknown keys", () => {
      expect(() =>
        manager.addTasks([
          { key: "a", description: "A", taskType: "general_task", dependsOn: [] },
          { key: "a", description: "A2", taskType: "general_task", dependsOn: [] },
        ]),
      ).toThrow('Duplicate task key "a"');
      expect(() =>
        manager.addTasks([{ key: "a", description: "A", taskType: "general_task", dependsOn: ["a"] }]),
      ).toThrow('Task "a" depends on itself');
      expect(() =>
        manager.addTasks([{ key: "a", description: "A", taskType: "general_task", dependsOn: ["z"] }]),
      ).toThrow(PlanValidationError);
      expect(manager.getAllTasks()).toEqual([]);
    });
  });

  describe("setTaskDependencies", () => {
    it("re-gates a task and can wire a mutual wait", () => {
      const a = manager.addTask("A", "general_task");
      const b = manager.addTask("B", "general_task");
      manager.setTaskDependencies(a, [b]);
      manager.setTaskDependencies(b, [a]);

      expect(manager.getTask(a)?.status).toBe("blocked");
      expect(manager.getTask(b)?.status).toBe("blocked");
      expect(manager.getExecutableTasks()).toEqual([]);
      expect(manager.getWorkflowStatus().pendingTasks).toBe(2);
    });

    it("keeps a task pending when its new dependencies already completed", () => {
      const a = manager.addTask("A", "general_task");
      const b = manager.addTask("B", "general_task");
      complete(manager, a);
      manager.setTaskDependencies(b, [a]);
      expect(manager.getTask(b)?.status).toBe("pending");
    });

    it("refuses tasks that already started", () => {
      const a = manager.addTask("A", "general_task");
      manager.updateTaskStatus(a, "in_progress");
      expect(() => manager.setTaskDependencies(a, [])).toThrow(InvalidTransitionError);
    });
  });

  it("keeps the first original type when reclassifying", () => {
    const a = manager.addTask("A", "web_browsing");
    manager.reclassifyTask(a, "file_creation", "first");
    manager.reclassifyTask(a, "general_task", "second");

    const task = manager.getTask(a);
    expect(task?.taskType).toBe("general_task");
    expect(task?.metadata.reclassified_from).toBe("web_browsing");
    expect(task?.metadata.reclassification_reason).toBe("second");
  });

  it("merges dependency artifacts in dependency order", () => {
    const a = manager.addTask("A", "general_task");
    const b = manager.addTask("B", "general_task");
    const c = manager.addTask("C", "general_task", [a, b]);
    complete(manager, a, { x: 1, y: 1 });
    complete(manager, b, { y: 2 });

    expect(manager.collectDependencyArtifacts(c)).toEqual({ x: 1, y: 2 });
    expect(manager.getTaskArtifacts(c)).toEqual({});
  });
});
