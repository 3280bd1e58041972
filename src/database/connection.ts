/**
 * Database Connection Module
 *
 * Provides a singleton SQLite connection using better-sqlite3.
 * The database is stored at ~/.course-qa/courses.db unless
 * `database.path` in config.toml says otherwise.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { getDbPath } from '../config/paths.js';

export type Db = Database.Database;

export const IN_MEMORY = ':memory:';

// Module-level singleton instance
let db: Db | null = null;
let exitHookRegistered = false;

/**
 * Open a new connection with the project's pragmas.
 *
 * Tests use this with ':memory:' to get an isolated database.
 */
export function openDatabase(path: string): Db {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const connection = new Database(path);

  // OFF by default in SQLite
  connection.pragma('foreign_keys = ON');

  if (path !== IN_MEMORY) {
    connection.pragma('journal_mode = WAL');
  }

  return connection;
}

/**
 * Get the singleton database instance.
 *
 * Creates the database (and its directory) on first call.
 * Subsequent calls return the same instance, whatever path they pass.
 *
 * @example
 * ```ts
 * const db = getDb(config.database.path);
 * const count = db.prepare('SELECT COUNT(*) AS count FROM courses').get();
 * ```
 */
export function getDb(path?: string): Db {
  if (db) {
    return db;
  }

  db = openDatabase(path ?? getDbPath());

  if (!exitHookRegistered) {
    process.on('exit', () => closeDb());
    exitHookRegistered = true;
  }

  return db;
}

/**
 * Close the database connection.
 *
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
