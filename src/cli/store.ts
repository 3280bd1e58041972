import { getDbPath } from '../config/paths.js';
import type { Config } from '../config/schema.js';
import { createCourseStore, type CourseStore } from '../catalog/course-store.js';
import { getDb } from '../database/connection.js';
import type { Logger } from '../utils/logger.js';

/**
 * Open the configured course database for a command.
 */
export function openCourseStore(config: Config, logger: Logger): CourseStore {
  return createCourseStore(getDb(config.database.path ?? getDbPath()), {
    maxResults: config.search.max_results,
    logger,
  });
}
