import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { z } from "zod";
import { getConfig } from "../config.js";
import { StoreError } from "../errors.js";
import { TaskRowSchema, WorkflowRowSchema } from "../schemas.js";
import { deserializeTask, serializeTask } from "../workflow/task.js";
import type { Task, WorkflowMeta } from "../workflow/types.js";

export type LoadedWorkflow =
  | { found: false }
  | { found: true; meta: WorkflowMeta; tasks: Task[] };

/**
 * Durable task records, addressed by workflow id + task id.
 *
 * Each save is its own statement; a crash between two saves leaves the
 * earlier tasks at their newer status and the later ones at their older one.
 * Pass ":memory:" for a throwaway database.
 */
export class TaskStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? getConfig().storage.dbPath;
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS workflows (
        workflow_id TEXT PRIMARY KEY,
        description TEXT NOT NULL,
        created_at  INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS tasks (
        workflow_id TEXT NOT NULL REFERENCES workflows(workflow_id) ON DELETE CASCADE,
        task_id     TEXT NOT NULL,
        data        TEXT NOT NULL,
        updated_at  INTEGER NOT NULL,
        PRIMARY KEY (workflow_id, task_id)
      );
      CREATE INDEX IF NOT EXISTS idx_workflows_created ON workflows(created_at DESC);
    `);
  }

  saveWorkflow(meta: WorkflowMeta): void {
    this.db.prepare(`
      INSERT INTO workflows (workflow_id, description, created_at)
      VALUES (?, ?, ?)
      ON CONFLICT(workflow_id) DO UPDATE SET description = excluded.description
    `).run(meta.id, meta.description, meta.createdAt);
  }

  /** Upsert one task. Insertion order survives later updates. */
  saveTask(workflowId: string, task: Task): void {
    this.db.prepare(`
      INSERT INTO tasks (workflow_id, task_id, data, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(workflow_id, task_id) DO UPDATE SET data = excluded.data, updated_at = excluded.updated_at
    `).run(workflowId, task.id, serializeTask(task), Date.now());
  }

  getWorkflow(workflowId: string): WorkflowMeta | undefined {
    const row = this.db.prepare("SELECT * FROM workflows WHERE workflow_id = ?").get(workflowId);
    return row === undefined ? undefined : rowToMeta(row);
  }

  loadWorkflow(workflowId: string): LoadedWorkflow {
    const meta = this.getWorkflow(workflowId);
    if (!meta) return { found: false };

    const rows = this.db
      .prepare("SELECT data FROM tasks WHERE workflow_id = ? ORDER BY rowid")
      .all(workflowId);
    const tasks = rows.map((row) => deserializeTask(parseRow(TaskRowSchema, row).data));
    return { found: true, meta, tasks };
  }

  listWorkflows(limit = 50): WorkflowMeta[] {
    const rows = this.db
      .prepare("SELECT * FROM workflows ORDER BY created_at DESC, rowid DESC LIMIT ?")
      .all(limit);
    return rows.map(rowToMeta);
  }

  /** Delete a workflow and its tasks. Returns true if it existed. */
  deleteWorkflow(workflowId: string): boolean {
    const result = this.db.prepare("DELETE FROM workflows WHERE workflow_id = ?").run(workflowId);
    return result.changes > 0;
  }

  close(): void {
    this.db.close();
  }
}

function parseRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, row: unknown): T {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    throw new StoreError("Unexpected row shape in task store");
  }
  return parsed.data;
}

function rowToMeta(row: unknown): WorkflowMeta {
  const parsed = parseRow(WorkflowRowSchema, row);
  return {
    id: parsed.workflow_id,
    description: parsed.description,
    createdAt: parsed.created_at,
  };
}
