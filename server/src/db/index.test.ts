/**
 * Database Manager Tests
 */

import { describe, it, expect, afterEach } from "vitest";
import { closeDatabase, getDatabase, initDatabase } from "./index.js";
import { runMigrations } from "./migrations.js";

afterEach(() => {
  closeDatabase();
});

function names(type: "table" | "index"): unknown[] {
  return getDatabase()
    .prepare("SELECT name FROM sqlite_master WHERE type = ? AND name NOT LIKE 'sqlite_%' ORDER BY name")
    .all(type);
}

describe("initDatabase", () => {
  it("creates the task table and its indexes", () => {
    initDatabase(":memory:");

    expect(names("table")).toEqual([{ name: "callback_tasks" }, { name: "schema_version" }]);
    expect(names("index")).toEqual([{ name: "idx_callback_tasks_state" }, { name: "idx_callback_tasks_tag" }]);
  });

  it("returns the open connection on a second call", () => {
    const first = initDatabase(":memory:");
    expect(initDatabase(":memory:")).toBe(first);
    expect(getDatabase()).toBe(first);
  });

  it("leaves an up-to-date schema alone", () => {
    const db = initDatabase(":memory:");

    expect(runMigrations(db)).toBe(1);
    expect(db.prepare("SELECT COUNT(*) AS n FROM schema_version").get()).toEqual({ n: 2 });
  });
});

describe("getDatabase", () => {
  it("throws once the database is closed", () => {
    initDatabase(":memory:");
    closeDatabase();

    expect(() => getDatabase()).toThrow("Database not initialized. Call initDatabase() first.");
  });
});
