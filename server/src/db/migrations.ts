/**
 * Database Migrations
 *
 * Sequential, numbered migrations that bring the database schema
 * from any prior version to the current version. Runs at startup
 * after the database file is opened.
 *
 * Rules:
 * - Migrations are append-only. Never edit a shipped migration.
 * - Each migration runs inside a transaction.
 * - To evolve the schema, add a new function to the `migrations` array.
 */

import type Database from "better-sqlite3";
import { createComponentLogger } from "#logging.js";

const log = createComponentLogger("db");

// ============================================
// MIGRATION RUNNER
// ============================================

type Migration = (db: Database.Database) => void;

function readVersion(db: Database.Database): number {
  const row: unknown = db.prepare("SELECT MAX(version) AS v FROM schema_version").get();
  if (typeof row === "object" && row !== null && "v" in row && typeof row.v === "number") {
    return row.v;
  }
  return -1;
}

/**
 * Run all pending migrations against the open database.
 * Already-applied migrations are skipped. Returns the schema version.
 */
export function runMigrations(db: Database.Database): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const currentVersion = readVersion(db);
  const targetVersion = migrations.length - 1;

  if (currentVersion >= targetVersion) {
    return currentVersion;
  }

  log.info(`Schema at v${currentVersion}, target v${targetVersion}`, {
    pending: targetVersion - currentVersion,
  });

  const stamp = db.prepare(
    "INSERT INTO schema_version (version, applied_at) VALUES (?, datetime('now'))",
  );

  migrations.forEach((migrate, version) => {
    if (version <= currentVersion) return;
    const txn = db.transaction(() => {
      migrate(db);
      stamp.run(version);
    });
    txn();
    log.info(`Applied migration ${version}`);
  });

  return targetVersion;
}

// ============================================
// MIGRATIONS
// ============================================

const migrations: Migration[] = [
  // ── v0: Baseline ──────────────────────────────────────────────────
  // Primary key doubles as the trigger-minute partition; the tag index
  // lists every occurrence of a tag without a full scan.
  function v0_baseline(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS callback_tasks (
        trigger_at INTEGER NOT NULL,
        tag TEXT NOT NULL,
        unique_id TEXT NOT NULL,
        callback_endpoint TEXT NOT NULL,
        callback_method TEXT NOT NULL DEFAULT 'GET',
        payload TEXT NOT NULL DEFAULT '',
        retry INTEGER NOT NULL DEFAULT 1,
        expected_http_status INTEGER NOT NULL DEFAULT 200,
        max_delay INTEGER NOT NULL DEFAULT 10,
        task_state TEXT NOT NULL DEFAULT 'pending',
        response_status INTEGER,
        response_body TEXT,
        executed_at INTEGER,
        PRIMARY KEY (trigger_at, tag, unique_id)
      ) WITHOUT ROWID;

      CREATE INDEX IF NOT EXISTS idx_callback_tasks_tag
        ON callback_tasks(tag, trigger_at, unique_id);
    `);
  },

  // ── v1: Catchup index ─────────────────────────────────────────────
  function v1_state_index(db) {
    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_callback_tasks_state
        ON callback_tasks(task_state, trigger_at);
    `);
  },
];
