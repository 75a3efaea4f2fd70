/**
 * Shared fixtures for the scheduler test suites.
 */

import Database from "better-sqlite3";
import { runMigrations } from "../../db/migrations.js";
import { SqliteTaskStore } from "./sqlite-store.js";
import type { TaskStore } from "./store.js";
import type { CallbackTask } from "./types.js";

/** 2026-01-01T00:00:30Z */
export const NOW_MS = 1_767_225_630_000;
/** The minute containing NOW_MS */
export const MINUTE = 1_767_225_600;

export function makeTask(overrides: Partial<CallbackTask> = {}): CallbackTask {
  return {
    triggerAt: MINUTE,
    tag: "backup",
    uniqueId: "u1",
    callbackEndpoint: "http://hooks.test/run",
    callbackMethod: "GET",
    payload: "",
    retry: 1,
    expectedHttpStatus: 200,
    maxDelay: 10,
    taskState: "pending",
    responseStatus: null,
    responseBody: null,
    executedAt: null,
    ...overrides,
  };
}

export function createMemoryStore(pageSize = 100): { db: Database.Database; store: SqliteTaskStore } {
  const db = new Database(":memory:");
  runMigrations(db);
  return { db, store: new SqliteTaskStore(db, pageSize) };
}

/** A store that forwards to `inner` except for the methods given. */
export function delegatingStore(inner: TaskStore, overrides: Partial<TaskStore>): TaskStore {
  return {
    get: (key) => inner.get(key),
    put: (task) => inner.put(task),
    claim: (key, state, next) => inner.claim(key, state, next),
    queryByTriggerAt: (triggerAt, cursor) => inner.queryByTriggerAt(triggerAt, cursor),
    queryByTag: (tag, filter, cursor) => inner.queryByTag(tag, filter, cursor),
    scan: (filter, cursor) => inner.scan(filter, cursor),
    countByState: () => inner.countByState(),
    ...overrides,
  };
}
