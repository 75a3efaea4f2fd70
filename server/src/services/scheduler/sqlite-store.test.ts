/**
 * SQLite Task Store Tests
 *
 * Runs against an in-memory database with the real migrations.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import { runMigrations } from "../../db/migrations.js";
import type { SqliteTaskStore } from "./sqlite-store.js";
import { taskFromRow } from "./task.js";
import { MINUTE, createMemoryStore, makeTask } from "./test-helpers.js";

let db: Database.Database;
let store: SqliteTaskStore;

beforeEach(() => {
  ({ db, store } = createMemoryStore(2));
});

afterEach(() => {
  db.close();
});

function ids(rows: unknown[]): string[] {
  return rows.map((row) => {
    const task = taskFromRow(row);
    return `${task.tag}+${task.uniqueId}@${task.triggerAt}`;
  });
}

describe("SqliteTaskStore: get/put", () => {
  it("stores and returns a task", async () => {
    const task = makeTask({ payload: "a=1", callbackMethod: "POST" });
    await store.put(task);

    expect(taskFromRow(await store.get(task))).toEqual(task);
  });

  it("returns null for an unknown key", async () => {
    expect(await store.get({ triggerAt: MINUTE, tag: "nope", uniqueId: "x" })).toBeNull();
  });

  it("replaces a task stored under the same key", async () => {
    await store.put(makeTask());
    await store.put(makeTask({ taskState: "successful", responseStatus: 200 }));

    const stored = taskFromRow(await store.get(makeTask()));
    expect(stored.taskState).toBe("successful");
    expect(stored.responseStatus).toBe(200);
  });
});

describe("SqliteTaskStore: claim", () => {
  it("moves the observed state to running once", async () => {
    const task = makeTask({ taskState: "failed" });
    await store.put(task);

    expect(await store.claim(task, "failed")).toBe(true);
    expect(await store.claim(task, "failed")).toBe(false);
    expect(taskFromRow(await store.get(task)).taskState).toBe("running");
  });

  it("moves to another state when one is given", async () => {
    const task = makeTask();
    await store.put(task);

    expect(await store.claim(task, "pending", "skipped")).toBe(true);
    expect(taskFromRow(await store.get(task)).taskState).toBe("skipped");
  });

  it("refuses a stale expected state or a missing row", async () => {
    await store.put(makeTask({ taskState: "successful" }));

    expect(await store.claim(makeTask(), "pending")).toBe(false);
    expect(await store.claim(makeTask({ uniqueId: "missing" }), "pending")).toBe(false);
  });
});

describe("SqliteTaskStore: pagination", () => {
  it("pages one trigger minute in disjoint, ordered pages", async () => {
    for (const tag of ["c", "a", "b"]) {
      await store.put(makeTask({ tag }));
    }
    await store.put(makeTask({ tag: "a", triggerAt: MINUTE + 60 }));

    const first = await store.queryByTriggerAt(MINUTE);
    expect(ids(first.rows)).toEqual([`a+u1@${MINUTE}`, `b+u1@${MINUTE}`]);
    expect(first.next).toEqual({ triggerAt: MINUTE, tag: "b", uniqueId: "u1" });

    const second = await store.queryByTriggerAt(MINUTE, first.next);
    expect(ids(second.rows)).toEqual([`c+u1@${MINUTE}`]);
    expect(second.next).toBeUndefined();
  });

  it("ends with an empty page when the last full page was exact", async () => {
    await store.put(makeTask({ uniqueId: "u1" }));
    await store.put(makeTask({ uniqueId: "u2" }));

    const first = await store.queryByTriggerAt(MINUTE);
    expect(first.rows).toHaveLength(2);

    const second = await store.queryByTriggerAt(MINUTE, first.next);
    expect(second).toEqual({ rows: [] });
  });

  it("lists a tag across trigger times", async () => {
    await store.put(makeTask({ tag: "x", triggerAt: MINUTE + 120 }));
    await store.put(makeTask({ tag: "x", triggerAt: MINUTE }));
    await store.put(makeTask({ tag: "x", triggerAt: MINUTE + 60 }));
    await store.put(makeTask({ tag: "y", triggerAt: MINUTE }));

    const first = await store.queryByTag("x", {});
    expect(ids(first.rows)).toEqual([`x+u1@${MINUTE}`, `x+u1@${MINUTE + 60}`]);

    const second = await store.queryByTag("x", {}, first.next);
    expect(ids(second.rows)).toEqual([`x+u1@${MINUTE + 120}`]);

    const later = await store.queryByTag("x", { minTriggerAt: MINUTE + 60 });
    expect(ids(later.rows)).toEqual([`x+u1@${MINUTE + 60}`, `x+u1@${MINUTE + 120}`]);

    const exact = await store.queryByTag("x", { triggerAt: MINUTE + 120 });
    expect(ids(exact.rows)).toEqual([`x+u1@${MINUTE + 120}`]);
  });

  it("scans with time and state filters", async () => {
    await store.put(makeTask({ tag: "a", triggerAt: MINUTE - 60 }));
    await store.put(makeTask({ tag: "b", triggerAt: MINUTE - 60, taskState: "failed" }));
    await store.put(makeTask({ tag: "c", triggerAt: MINUTE }));
    await store.put(makeTask({ tag: "d", triggerAt: MINUTE + 60 }));

    const first = await store.scan({ maxTriggerAt: MINUTE, state: "pending" });
    expect(ids(first.rows)).toEqual([`a+u1@${MINUTE - 60}`, `c+u1@${MINUTE}`]);

    const rest = await store.scan({ maxTriggerAt: MINUTE, state: "pending" }, first.next);
    expect(rest.rows).toEqual([]);

    const future = await store.scan({ minTriggerAt: MINUTE + 1 });
    expect(ids(future.rows)).toEqual([`d+u1@${MINUTE + 60}`]);
  });
});

describe("SqliteTaskStore: countByState", () => {
  it("counts every state, including empty ones", async () => {
    await store.put(makeTask({ uniqueId: "u1" }));
    await store.put(makeTask({ uniqueId: "u2" }));
    await store.put(makeTask({ uniqueId: "u3", taskState: "failed" }));

    expect(await store.countByState()).toEqual({
      pending: 2,
      running: 0,
      successful: 0,
      failed: 1,
      skipped: 0,
    });
  });
});

describe("runMigrations", () => {
  it("is a no-op on an up-to-date database", () => {
    expect(runMigrations(db)).toBe(1);
    const row: unknown = db.prepare("SELECT COUNT(*) AS n FROM schema_version").get();
    expect(row).toEqual({ n: 2 });
  });
});
