/**
 * Database Manager
 *
 * SQLite connection holding the callback task table.
 */

import Database from "better-sqlite3";
import * as path from "path";
import * as fs from "fs";
import { createComponentLogger } from "#logging.js";
import { runMigrations } from "./migrations.js";

const log = createComponentLogger("db");

export const DB_FILENAME = "tickcall.db";

let db: Database.Database | null = null;

export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDatabase() first.");
  }
  return db;
}

/**
 * Open (or create) the database under `dbDir` and bring its schema up to
 * date. Pass ":memory:" for a throwaway database.
 */
export function initDatabase(dbDir: string): Database.Database {
  if (db) return db;

  let location = ":memory:";
  if (dbDir !== ":memory:") {
    fs.mkdirSync(dbDir, { recursive: true });
    location = path.join(dbDir, DB_FILENAME);
  }

  const database = new Database(location);
  database.pragma("journal_mode = WAL");

  const version = runMigrations(database);
  db = database;

  log.info("Database initialized", { path: location, schemaVersion: version });
  return database;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
