/**
 * Database Module
 *
 * SQLite storage for the course catalog and its full-text index.
 *
 * @example
 * ```ts
 * import { getDb, runMigrations } from './database/index.js';
 *
 * const db = getDb(config.database.path);
 * runMigrations(db);
 * ```
 */

export { getDb, closeDb, openDatabase, IN_MEMORY, type Db } from './connection.js';

export {
  runMigrations,
  getAppliedMigrations,
  resetMigrationState,
  type MigrationResult,
} from './migrate.js';

export type { CourseRow, LessonRow, ChunkMatchRow, CourseSummaryRow, CountRow } from './schema.js';

export {
  CourseRowSchema,
  LessonRowSchema,
  ChunkMatchRowSchema,
  CourseSummaryRowSchema,
  CountRowSchema,
  TitleRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';
