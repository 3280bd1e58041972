/**
 * Catalog Module
 *
 * Course model and the SQLite-backed course index.
 */

export {
  CourseStore,
  createCourseStore,
  extractTerms,
  toMatchExpression,
  scoreToDistance,
  DEFAULT_MAX_RESULTS,
  type CourseStoreOptions,
} from './course-store.js';

export {
  searchResultSet,
  searchFailure,
  isEmptyResultSet,
  formatCourseOutline,
  type Course,
  type Lesson,
  type CourseChunk,
  type ChunkMetadata,
  type SearchResultSet,
  type SearchHit,
  type SearchOptions,
  type LessonInfo,
  type CourseSummary,
  type CourseCatalog,
} from './types.js';
