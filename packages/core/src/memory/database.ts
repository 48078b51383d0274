// packages/core/src/memory/database.ts

import Database from 'better-sqlite3';
import { DatabaseError, errorMessage } from '../utils/errors.js';

const SCHEMA_VERSION = '1';

const MIGRATIONS = [
  // Stored migration plans
  `CREATE TABLE IF NOT EXISTS migration_plans (
    plan_id       TEXT PRIMARY KEY,
    project_dir   TEXT NOT NULL,
    target        TEXT NOT NULL,
    status        TEXT NOT NULL DEFAULT 'draft'
                  CHECK(status IN ('draft','simulated','applied','partially_applied')),
    total_issues  INTEGER NOT NULL DEFAULT 0,
    effort        TEXT NOT NULL,
    plan_json     TEXT NOT NULL,
    created_at    INTEGER NOT NULL,
    updated_at    INTEGER NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_plans_project ON migration_plans(project_dir)',
  'CREATE INDEX IF NOT EXISTS idx_plans_updated ON migration_plans(updated_at DESC)',

  // Execution runs (append-only)
  `CREATE TABLE IF NOT EXISTS migration_runs (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    plan_id         TEXT NOT NULL REFERENCES migration_plans(plan_id) ON DELETE CASCADE,
    mode            TEXT NOT NULL CHECK(mode IN ('simulate','apply')),
    completed_steps INTEGER NOT NULL,
    failed_steps    INTEGER NOT NULL,
    backup_path     TEXT,
    result_json     TEXT NOT NULL,
    created_at      INTEGER NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_runs_plan ON migration_runs(plan_id, id)',

  // Schema meta
  `CREATE TABLE IF NOT EXISTS schema_meta (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,
];

/**
 * Open a SQLite database and run migrations.
 * Pass ':memory:' for in-memory databases (testing).
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    const db = new Database(dbPath);
    configurePragmas(db);
    runMigrations(db);
    return db;
  } catch (err) {
    throw new DatabaseError(`Failed to open database at "${dbPath}": ${errorMessage(err)}`, 'open');
  }
}

function configurePragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
}

/**
 * Run all schema migrations. Idempotent (uses IF NOT EXISTS).
 */
export function runMigrations(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of MIGRATIONS) {
      db.exec(sql);
    }
    db.prepare("INSERT OR REPLACE INTO schema_meta(key, value) VALUES ('version', ?)").run(
      SCHEMA_VERSION,
    );
    db.prepare(
      "INSERT OR IGNORE INTO schema_meta(key, value) VALUES ('created_at', datetime('now'))",
    ).run();
  })();
}

/** Get the current schema version. */
export function getSchemaVersion(db: Database.Database): string | null {
  const row = db
    .prepare<[], { value: string }>("SELECT value FROM schema_meta WHERE key = 'version'")
    .get();
  return row?.value ?? null;
}
