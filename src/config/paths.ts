/**
 * Centralized Path Definitions
 *
 * Single source of truth for the course-qa data directory.
 *
 * Directory structure:
 * ~/.course-qa/          (or $COURSE_QA_HOME)
 * ├── courses.db      (SQLite course index)
 * └── config.toml     (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

export const DATA_DIR_NAME = '.course-qa';
export const DB_FILE_NAME = 'courses.db';
export const CONFIG_FILE_NAME = 'config.toml';

/**
 * Get the data directory: $COURSE_QA_HOME when set, else ~/.course-qa
 */
export function getDataDir(): string {
  return getEnv('COURSE_QA_HOME') ?? join(homedir(), DATA_DIR_NAME);
}

/**
 * Get the default database file path
 */
export function getDbPath(): string {
  return join(getDataDir(), DB_FILE_NAME);
}

/**
 * Get the config file path
 */
export function getConfigPath(): string {
  return join(getDataDir(), CONFIG_FILE_NAME);
}
