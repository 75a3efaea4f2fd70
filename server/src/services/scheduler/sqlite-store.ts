/**
 * SQLite Task Store
 *
 * TaskStore over the callback_tasks table (see db/migrations.ts).
 * Cursors compare row values, so pages stay disjoint while rows are
 * inserted between calls.
 */

import type Database from "better-sqlite3";
import type { Page, ScanFilter, StateCounts, TagFilter, TaskStore } from "./store.js";
import { taskToRow } from "./task.js";
import { TASK_STATES, type CallbackTask, type TaskKey, type TaskState } from "./types.js";

type Param = string | number;

export const DEFAULT_PAGE_SIZE = 100;

function keyOfRow(row: unknown): TaskKey | undefined {
  if (typeof row !== "object" || row === null) return undefined;
  if (!("trigger_at" in row) || !("tag" in row) || !("unique_id" in row)) return undefined;
  const { trigger_at: triggerAt, tag, unique_id: uniqueId } = row;
  if (typeof triggerAt !== "number" || typeof tag !== "string" || typeof uniqueId !== "string") {
    return undefined;
  }
  return { triggerAt, tag, uniqueId };
}

export class SqliteTaskStore implements TaskStore {
  private readonly getStmt: Database.Statement;
  private readonly putStmt: Database.Statement;
  private readonly claimStmt: Database.Statement;

  constructor(
    private readonly db: Database.Database,
    private readonly pageSize = DEFAULT_PAGE_SIZE,
  ) {
    this.getStmt = db.prepare(`
      SELECT * FROM callback_tasks
      WHERE trigger_at = ? AND tag = ? AND unique_id = ?
    `);
    this.putStmt = db.prepare(`
      INSERT OR REPLACE INTO callback_tasks (
        trigger_at, tag, unique_id, callback_endpoint, callback_method, payload,
        retry, expected_http_status, max_delay, task_state,
        response_status, response_body, executed_at
      ) VALUES (
        @trigger_at, @tag, @unique_id, @callback_endpoint, @callback_method, @payload,
        @retry, @expected_http_status, @max_delay, @task_state,
        @response_status, @response_body, @executed_at
      )
    `);
    this.claimStmt = db.prepare(`
      UPDATE callback_tasks SET task_state = ?
      WHERE trigger_at = ? AND tag = ? AND unique_id = ? AND task_state = ?
    `);
  }

  async get(key: TaskKey): Promise<unknown | null> {
    return this.getStmt.get(key.triggerAt, key.tag, key.uniqueId) ?? null;
  }

  async put(task: CallbackTask): Promise<void> {
    this.putStmt.run(taskToRow(task));
  }

  async claim(key: TaskKey, expectedState: TaskState, nextState: TaskState = "running"): Promise<boolean> {
    const result = this.claimStmt.run(nextState, key.triggerAt, key.tag, key.uniqueId, expectedState);
    return result.changes === 1;
  }

  async queryByTriggerAt(triggerAt: number, cursor?: TaskKey): Promise<Page> {
    const where = ["trigger_at = ?"];
    const params: Param[] = [triggerAt];
    if (cursor) {
      where.push("(tag, unique_id) > (?, ?)");
      params.push(cursor.tag, cursor.uniqueId);
    }
    return this.page(where, params, "tag, unique_id");
  }

  async queryByTag(tag: string, filter: TagFilter, cursor?: TaskKey): Promise<Page> {
    const where = ["tag = ?"];
    const params: Param[] = [tag];
    if (filter.triggerAt !== undefined) {
      where.push("trigger_at = ?");
      params.push(filter.triggerAt);
    }
    if (filter.minTriggerAt !== undefined) {
      where.push("trigger_at >= ?");
      params.push(filter.minTriggerAt);
    }
    if (cursor) {
      where.push("(trigger_at, unique_id) > (?, ?)");
      params.push(cursor.triggerAt, cursor.uniqueId);
    }
    return this.page(where, params, "trigger_at, unique_id");
  }

  async scan(filter: ScanFilter, cursor?: TaskKey): Promise<Page> {
    const where: string[] = [];
    const params: Param[] = [];
    if (filter.minTriggerAt !== undefined) {
      where.push("trigger_at >= ?");
      params.push(filter.minTriggerAt);
    }
    if (filter.maxTriggerAt !== undefined) {
      where.push("trigger_at <= ?");
      params.push(filter.maxTriggerAt);
    }
    if (filter.state !== undefined) {
      where.push("task_state = ?");
      params.push(filter.state);
    }
    if (cursor) {
      where.push("(trigger_at, tag, unique_id) > (?, ?, ?)");
      params.push(cursor.triggerAt, cursor.tag, cursor.uniqueId);
    }
    return this.page(where, params, "trigger_at, tag, unique_id");
  }

  async countByState(): Promise<StateCounts> {
    const counts: StateCounts = { pending: 0, running: 0, successful: 0, failed: 0, skipped: 0 };
    const rows: unknown[] = this.db
      .prepare("SELECT task_state, COUNT(*) AS count FROM callback_tasks GROUP BY task_state")
      .all();

    for (const row of rows) {
      if (typeof row !== "object" || row === null) continue;
      if (!("task_state" in row) || !("count" in row)) continue;
      const { task_state: state, count } = row;
      const known = TASK_STATES.find((s) => s === state);
      if (known && typeof count === "number") counts[known] = count;
    }
    return counts;
  }

  private page(where: string[], params: Param[], orderBy: string): Page {
    const clause = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
    const rows: unknown[] = this.db
      .prepare(`SELECT * FROM callback_tasks ${clause} ORDER BY ${orderBy} LIMIT ?`)
      .all(...params, this.pageSize);

    if (rows.length < this.pageSize) return { rows };
    return { rows, next: keyOfRow(rows[rows.length - 1]) };
  }
}
