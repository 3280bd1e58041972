/**
 * Database Row Types
 *
 * Shapes of the rows the course tables return. The matching zod schemas
 * in validation.ts are checked against these interfaces at compile time.
 */

/** A row of `courses` */
export interface CourseRow {
  title: string;
  link: string | null;
  instructor: string | null;
  source_file: string | null;
  created_at: string;
}

/** A row of `lessons` */
export interface LessonRow {
  course_title: string;
  lesson_number: number;
  title: string;
  link: string | null;
}

/** A full-text hit joined with its chunk row */
export interface ChunkMatchRow {
  content: string;
  course_title: string;
  lesson_number: number | null;
  chunk_index: number;
  /** bm25() score: lower is more relevant */
  score: number;
}

/** A course with its lesson and chunk counts */
export interface CourseSummaryRow {
  title: string;
  instructor: string | null;
  lesson_count: number;
  chunk_count: number;
}

/** Result of a `SELECT COUNT(*) AS count` query */
export interface CountRow {
  count: number;
}
