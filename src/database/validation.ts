/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime.
 * better-sqlite3 returns `unknown` rows; these schemas turn them into
 * typed values and catch schema drift with a clear error.
 *
 * Usage:
 * ```ts
 * const row = db.prepare('SELECT * FROM courses WHERE title = ?').get(title);
 * return row ? validateRow(CourseRowSchema, row, `courses.title=${title}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';
import type { ChunkMatchRow, CountRow, CourseRow, CourseSummaryRow, LessonRow } from './schema.js';

// ============================================================================
// Row Schemas
// ============================================================================

export const CourseRowSchema = z.object({
  title: z.string(),
  link: z.string().nullable(),
  instructor: z.string().nullable(),
  source_file: z.string().nullable(),
  created_at: z.string(),
}) satisfies z.ZodType<CourseRow>;

export const LessonRowSchema = z.object({
  course_title: z.string(),
  lesson_number: z.number().int(),
  title: z.string(),
  link: z.string().nullable(),
}) satisfies z.ZodType<LessonRow>;

export const ChunkMatchRowSchema = z.object({
  content: z.string(),
  course_title: z.string(),
  lesson_number: z.number().int().nullable(),
  chunk_index: z.number().int().nonnegative(),
  score: z.number(),
}) satisfies z.ZodType<ChunkMatchRow>;

export const CourseSummaryRowSchema = z.object({
  title: z.string(),
  instructor: z.string().nullable(),
  lesson_count: z.number().int().nonnegative(),
  chunk_count: z.number().int().nonnegative(),
}) satisfies z.ZodType<CourseSummaryRow>;

export const CountRowSchema = z.object({
  count: z.number().int().nonnegative(),
}) satisfies z.ZodType<CountRow>;

export const TitleRowSchema = z.object({ title: z.string() });

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails schema validation.
 *
 * Usually a failed migration or a database written by another version.
 *
 * Exit code 5: Database error
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const issues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const summary = issues
      .slice(0, 3)
      .map((issue) => `  - ${issue.path}: ${issue.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${summary}` +
      (issues.length > 3 ? `\n  ... and ${issues.length - 3} more` : '') +
      `\n\nRebuild the index with: cqa ingest <folder> --clear`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row.
 *
 * @param context - Used in the error message (e.g. "courses.title=Intro")
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodTypeAny>(schema: T, row: unknown, context: string): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of database rows, throwing on the first invalid one.
 */
export function validateRows<T extends z.ZodTypeAny>(
  schema: T,
  rows: unknown[],
  context: string
): Array<z.output<T>> {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
