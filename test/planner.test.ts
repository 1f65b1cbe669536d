import { beforeEach, describe, expect, it } from "vitest";
import { CompletionError, PlanParseError, PlanValidationError } from "../src/errors.js";
import { TaskStore } from "../src/persistence/store.js";
import { FunctionCompletionService } from "../src/planner/completion.js";
import { TaskPlanner, extractPlanJson } from "../src/planner/planner.js";
import type { TaskPlannerOptions } from "../src/planner/planner.js";

const PLAN = {
  main_task: "Research and write",
  subtasks: [
    { id: 1, description: "Find news about rivers", task_type: "web_browsing", dependencies: [] },
    { id: 2, description: "Write a summary to rivers.md", task_type: "file_creation", dependencies: [1] },
  ],
};

function plannerReturning(
  store: TaskStore,
  text: string,
  opts: Partial<TaskPlannerOptions> = {},
): TaskPlanner {
  return new TaskPlanner({ store, completion: new FunctionCompletionService(async () => text), ...opts });
}

describe("extractPlanJson", () => {
  it("prefers a fenced json block", () => {
    const text = 'Sure! {"ignored": true}\n```json\n{"a": 1}\n```\nDone.';
    expect(extractPlanJson(text)).toEqual({ a: 1 });
  });

  it("falls back to the outermost braces", () => {
    expect(extractPlanJson('Plan follows {"a": {"b": 2}} hope it helps')).toEqual({ a: { b: 2 } });
  });

  it("fails when there is no object", () => {
    expect(() => extractPlanJson("no plan here")).toThrow("No JSON object found in planner response");
  });

  it("fails on invalid JSON", () => {
    expect(() => extractPlanJson("{ main_task: 'x' }")).toThrow(PlanParseError);
  });
});

describe("TaskPlanner", () => {
  let store: TaskStore;

  beforeEach(() => {
    store = new TaskStore(":memory:");
  });

  it("turns a fenced plan into a workflow", async () => {
    const planner = plannerReturning(store, `Here you go:\n\`\`\`json\n${JSON.stringify(PLAN)}\n\`\`\``);
    const { workflowId, manager, taskIds } = await planner.plan("rivers");

    expect(store.getWorkflow(workflowId)?.description).toBe("Research and write");
    const tasks = manager.getAllTasks();
    expect(tasks.map((t) => [t.description, t.taskType, t.status])).toEqual([
      ["Find news about rivers", "web_browsing", "pending"],
      ["Write a summary to rivers.md", "file_creation", "blocked"],
    ]);
    expect(tasks[1]?.dependencies).toEqual([taskIds.get("1")]);
    expect(tasks.map((t) => t.metadata.plan_id)).toEqual(["1", "2"]);
  });

  it("accepts bare JSON and falls back to the request as the description", async () => {
    const { main_task: _mainTask, ...plan } = PLAN;
    const planner = plannerReturning(store, `The plan: ${JSON.stringify(plan)}`);
    const workflowId = await planner.planTask("rivers");
    expect(store.getWorkflow(workflowId)?.description).toBe("rivers");
  });

  it("sends the request in the prompt and the task types in the system prompt", async () => {
    const seen: Array<[string, string | undefined]> = [];
    const planner = new TaskPlanner({
      store,
      completion: new FunctionCompletionService(async (prompt, system) => {
        seen.push([prompt, system]);
        return JSON.stringify(PLAN);
      }),
    });
    await planner.planTask("clean the attic");

    const [prompt, system] = seen[0] ?? ["", undefined];
    expect(prompt.startsWith("I need to break down this task into subtasks: clean the attic\n\n")).toBe(true);
    expect(system).toContain("- file_deletion: Deleting files");
    expect(system).toContain('"main_task"');
  });

  it("maps unknown task types to general_task", async () => {
    const plan = { subtasks: [{ id: "a", description: "Dance", task_type: "interpretive_dance" }] };
    const { manager } = await plannerReturning(store, JSON.stringify(plan)).plan("dance");
    expect(manager.getAllTasks()[0]?.taskType).toBe("general_task");
  });

  it("keeps custom types it was told about", async () => {
    const plan = { subtasks: [{ id: "a", description: "Send it", task_type: "email" }] };
    const { manager } = await plannerReturning(store, JSON.stringify(plan), {
      taskTypes: ["general_task", "email"],
    }).plan("mail");
    expect(manager.getAllTasks()[0]?.taskType).toBe("email");
  });

  it("raises CompletionError when the completion fails", async () => {
    const planner = new TaskPlanner({
      store,
      completion: new FunctionCompletionService(async () => {
        throw new Error("offline");
      }),
    });
    await expect(planner.planTask("x")).rejects.toThrow(CompletionError);
    await expect(planner.planTask("x")).rejects.toThrow("Failed to generate task plan: offline");
    expect(store.listWorkflows()).toEqual([]);
  });

  it("rejects a plan without subtasks", async () => {
    const planner = plannerReturning(store, '{"main_task": "nothing", "subtasks": []}');
    await expect(planner.planTask("x")).rejects.toThrow("Invalid plan: subtasks: plan contains no subtasks");
    await expect(planner.planTask("x")).rejects.toThrow(PlanParseError);
  });

  it("rejects a cyclic plan before creating a workflow", async () => {
    const plan = {
      subtasks: [
        { id: "1", description: "A", dependencies: ["2"] },
        { id: "2", description: "B", dependencies: ["1"] },
      ],
    };
    const planner = plannerReturning(store, JSON.stringify(plan));
    await expect(planner.planTask("loop")).rejects.toThrow("Task dependencies contain a cycle: 1 -> 2");
    expect(store.listWorkflows()).toEqual([]);
  });

  describe("unresolved dependencies", () => {
    const plan = {
      subtasks: [
        { id: "1", description: "A" },
        { id: "2", description: "B", dependencies: ["1", "9"] },
      ],
    };

    it("rejects them by default", async () => {
      const planner = plannerReturning(store, JSON.stringify(plan));
      await expect(planner.planTask("x")).rejects.toThrow(PlanValidationError);
      await expect(planner.planTask("x")).rejects.toThrow("Subtask 2 depends on unknown subtask 9");
      expect(store.listWorkflows()).toEqual([]);
    });

    it("drops the edge when configured to", async () => {
      const planner = plannerReturning(store, JSON.stringify(plan), { unresolvedDependencies: "drop" });
      const { manager, taskIds } = await planner.plan("x");
      const second = manager.getTask(taskIds.get("2") ?? "");
      expect(second?.dependencies).toEqual([taskIds.get("1")]);
      expect(second?.status).toBe("blocked");
    });
  });
});
