/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied.
 * Migrations are idempotent - safe to run multiple times.
 */

import { z } from 'zod';
import type { Db } from './connection.js';
import { validateRows } from './validation.js';

/**
 * Result of running migrations.
 *
 * Reports failures instead of throwing so callers decide what is fatal.
 */
export interface MigrationResult {
  applied: string[];
  failed: Array<{ name: string; error: string }>;
}

/** Connections already migrated this process. */
let migrated = new WeakSet<Db>();

// Embedded so the compiled output needs no SQL files next to it
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-courses.sql',
    sql: `
-- Course catalog: one row per ingested course document
CREATE TABLE IF NOT EXISTS courses (
  title TEXT PRIMARY KEY,
  link TEXT,
  instructor TEXT,
  source_file TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS lessons (
  course_title TEXT NOT NULL,
  lesson_number INTEGER NOT NULL,
  title TEXT NOT NULL,
  link TEXT,
  PRIMARY KEY (course_title, lesson_number),
  FOREIGN KEY (course_title) REFERENCES courses(title) ON DELETE CASCADE
);
`,
  },
  {
    name: '002-course-content.sql',
    sql: `
-- Retrievable chunks of course text
CREATE TABLE IF NOT EXISTS course_chunks (
  id INTEGER PRIMARY KEY,
  course_title TEXT NOT NULL,
  lesson_number INTEGER,
  chunk_index INTEGER NOT NULL,
  content TEXT NOT NULL,
  FOREIGN KEY (course_title) REFERENCES courses(title) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_course_chunks_course ON course_chunks(course_title, lesson_number);

-- Full-text index over chunk text, ranked with bm25()
CREATE VIRTUAL TABLE IF NOT EXISTS course_chunks_fts USING fts5(
  content,
  content='course_chunks',
  content_rowid='id',
  tokenize='porter unicode61'
);

-- Title index for partial course-name resolution
CREATE VIRTUAL TABLE IF NOT EXISTS course_titles_fts USING fts5(
  title,
  tokenize='unicode61'
);
`,
  },
];

const AppliedMigrationRowSchema = z.object({ name: z.string(), applied_at: z.string() });

function hasMigrationsTable(db: Db): boolean {
  const row = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();
  return row !== undefined;
}

/**
 * Run all pending migrations on a connection.
 *
 * @example
 * ```ts
 * const result = runMigrations(getDb());
 * for (const { name, error } of result.failed) {
 *   console.error(`  - ${name}: ${error}`);
 * }
 * ```
 */
export function runMigrations(db: Db): MigrationResult {
  if (migrated.has(db)) {
    return { applied: [], failed: [] };
  }

  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const alreadyApplied = new Set(getAppliedMigrations(db).map((row) => row.name));

  for (const migration of MIGRATIONS) {
    if (alreadyApplied.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // Only remember success, so a failed run is retried next time
  if (failed.length === 0) {
    migrated.add(db);
  }

  return { applied, failed };
}

/**
 * Names and timestamps of the migrations applied to a connection.
 */
export function getAppliedMigrations(db: Db): Array<{ name: string; applied_at: string }> {
  if (!hasMigrationsTable(db)) {
    return [];
  }

  return validateRows(
    AppliedMigrationRowSchema,
    db.prepare('SELECT name, applied_at FROM _migrations ORDER BY id').all(),
    '_migrations'
  );
}

/**
 * Forget which connections were migrated.
 * FOR TESTING ONLY.
 */
export function resetMigrationState(): void {
  migrated = new WeakSet<Db>();
}
