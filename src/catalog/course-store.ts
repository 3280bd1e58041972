/**
 * Course Store
 *
 * The course index: catalog tables plus SQLite FTS5 full-text search
 * ranked with bm25(). Course names given by the model are resolved to
 * catalog titles through a prefix-matching title index.
 */

import { DatabaseError } from '../errors/index.js';
import { runMigrations, type Db } from '../database/index.js';
import {
  ChunkMatchRowSchema,
  CountRowSchema,
  CourseRowSchema,
  CourseSummaryRowSchema,
  LessonRowSchema,
  TitleRowSchema,
  validateRow,
  validateRows,
} from '../database/validation.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import {
  formatCourseOutline,
  searchFailure,
  searchResultSet,
  type Course,
  type CourseCatalog,
  type CourseChunk,
  type CourseSummary,
  type LessonInfo,
  type SearchOptions,
  type SearchResultSet,
} from './types.js';

export const DEFAULT_MAX_RESULTS = 5;

export interface CourseStoreOptions {
  /** Results per search when the caller gives no limit */
  maxResults?: number;
  logger?: Logger;
}

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * Split text into lowercase search terms.
 * Terms hold only letters and digits, so quoting them is always safe.
 */
export function extractTerms(text: string): string[] {
  return [...new Set(text.toLowerCase().match(TOKEN_PATTERN) ?? [])];
}

/**
 * FTS5 expression matching any of the query's terms, or null when the
 * query has no searchable terms.
 */
export function toMatchExpression(text: string, prefix = false): string | null {
  const terms = extractTerms(text);
  if (terms.length === 0) {
    return null;
  }
  return terms.map((term) => `"${term}"${prefix ? '*' : ''}`).join(' OR ');
}

/**
 * bm25() scores are negative, lower meaning more relevant.
 * Distances are positive, lower meaning closer.
 */
export function scoreToDistance(score: number): number {
  return 1 / (1 + Math.max(-score, 0));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const SEARCH_SQL = `
  SELECT c.content, c.course_title, c.lesson_number, c.chunk_index,
         bm25(course_chunks_fts) AS score
  FROM course_chunks_fts
  JOIN course_chunks c ON c.id = course_chunks_fts.rowid
  WHERE course_chunks_fts MATCH @match
    AND (@course IS NULL OR c.course_title = @course)
    AND (@lesson IS NULL OR c.lesson_number = @lesson)
  ORDER BY score, c.course_title, c.chunk_index
  LIMIT @limit
`;

export class CourseStore implements CourseCatalog {
  private readonly maxResults: number;
  private readonly logger: Logger;

  constructor(
    private readonly db: Db,
    options: CourseStoreOptions = {}
  ) {
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.logger = options.logger ?? silentLogger;
  }

  // ==========================================================================
  // Retrieval
  // ==========================================================================

  /**
   * Full-text search over course chunks.
   *
   * A course name that resolves to nothing, or any SQLite failure, comes
   * back as an error result rather than a throw.
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResultSet> {
    const { courseName, lessonNumber, limit = this.maxResults } = options;

    try {
      let courseTitle: string | null = null;
      if (courseName !== undefined) {
        courseTitle = await this.resolveCourseName(courseName);
        if (courseTitle === null) {
          return searchFailure(`No course found matching '${courseName}'`);
        }
      }

      const match = toMatchExpression(query);
      if (match === null) {
        return searchResultSet([]);
      }

      const rows = validateRows(
        ChunkMatchRowSchema,
        this.db.prepare(SEARCH_SQL).all({
          match,
          course: courseTitle,
          lesson: lessonNumber ?? null,
          limit,
        }),
        'course_chunks_fts'
      );

      this.logger.debug?.(`[search] "${query}" -> ${rows.length} chunk(s)`);

      return searchResultSet(
        rows.map((row) => ({
          document: row.content,
          metadata: {
            courseTitle: row.course_title,
            lessonNumber: row.lesson_number ?? undefined,
            chunkIndex: row.chunk_index,
          },
          distance: scoreToDistance(row.score),
        }))
      );
    } catch (error) {
      return searchFailure(`Search error: ${errorMessage(error)}`);
    }
  }

  /**
   * Resolve a partial course name to its catalog title.
   *
   * An exact case-insensitive title wins; otherwise the best prefix match
   * on title words. Returns null when nothing matches.
   */
  async resolveCourseName(partialName: string): Promise<string | null> {
    const name = partialName.trim();
    if (name === '') {
      return null;
    }

    const exact = this.db.prepare('SELECT title FROM courses WHERE title = ? COLLATE NOCASE LIMIT 1').get(name);
    if (exact !== undefined) {
      return validateRow(TitleRowSchema, exact, 'courses.title').title;
    }

    const match = toMatchExpression(name, true);
    if (match === null) {
      return null;
    }

    const candidates = validateRows(
      TitleRowSchema,
      this.db
        .prepare(
          `SELECT title FROM course_titles_fts
           WHERE course_titles_fts MATCH ?
           ORDER BY bm25(course_titles_fts), title
           LIMIT 1`
        )
        .all(match),
      'course_titles_fts'
    );

    const [best] = candidates;
    return best === undefined ? null : best.title;
  }

  async getLessonInfo(courseTitle: string, lessonNumber: number): Promise<LessonInfo> {
    const row = this.db
      .prepare('SELECT * FROM lessons WHERE course_title = ? AND lesson_number = ?')
      .get(courseTitle, lessonNumber);

    if (row === undefined) {
      return { title: null, link: null };
    }

    const lesson = validateRow(LessonRowSchema, row, `lessons.course_title=${courseTitle}`);
    return { title: lesson.title, link: lesson.link };
  }

  async getCourseOutline(courseTitle: string): Promise<string | null> {
    const course = this.getCourse(courseTitle);
    return course === null ? null : formatCourseOutline(course);
  }

  // ==========================================================================
  // Catalog
  // ==========================================================================

  getCourse(courseTitle: string): Course | null {
    const row = this.db.prepare('SELECT * FROM courses WHERE title = ?').get(courseTitle);
    if (row === undefined) {
      return null;
    }

    const course = validateRow(CourseRowSchema, row, `courses.title=${courseTitle}`);
    const lessons = validateRows(
      LessonRowSchema,
      this.db.prepare('SELECT * FROM lessons WHERE course_title = ? ORDER BY lesson_number').all(courseTitle),
      'lessons'
    );

    return {
      title: course.title,
      link: course.link ?? undefined,
      instructor: course.instructor ?? undefined,
      lessons: lessons.map((lesson) => ({
        lessonNumber: lesson.lesson_number,
        title: lesson.title,
        link: lesson.link ?? undefined,
      })),
    };
  }

  getCourseTitles(): string[] {
    return validateRows(TitleRowSchema, this.db.prepare('SELECT title FROM courses ORDER BY title').all(), 'courses').map(
      (row) => row.title
    );
  }

  getCourseCount(): number {
    return validateRow(CountRowSchema, this.db.prepare('SELECT COUNT(*) AS count FROM courses').get(), 'courses').count;
  }

  hasCourse(courseTitle: string): boolean {
    return this.db.prepare('SELECT 1 FROM courses WHERE title = ?').get(courseTitle) !== undefined;
  }

  listCourses(): CourseSummary[] {
    const rows = validateRows(
      CourseSummaryRowSchema,
      this.db
        .prepare(
          `SELECT c.title, c.instructor,
                  (SELECT COUNT(*) FROM lessons l WHERE l.course_title = c.title) AS lesson_count,
                  (SELECT COUNT(*) FROM course_chunks k WHERE k.course_title = c.title) AS chunk_count
           FROM courses c
           ORDER BY c.title`
        )
        .all(),
      'courses'
    );

    return rows.map((row) => ({
      title: row.title,
      instructor: row.instructor,
      lessonCount: row.lesson_count,
      chunkCount: row.chunk_count,
    }));
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Add a course with its lessons.
   *
   * @throws DatabaseError when a course with that title already exists
   */
  addCourse(course: Course, sourceFile?: string): void {
    const insertCourse = this.db.prepare(
      'INSERT INTO courses (title, link, instructor, source_file) VALUES (?, ?, ?, ?)'
    );
    const insertLesson = this.db.prepare(
      'INSERT OR REPLACE INTO lessons (course_title, lesson_number, title, link) VALUES (?, ?, ?, ?)'
    );
    const insertTitle = this.db.prepare('INSERT INTO course_titles_fts (title) VALUES (?)');

    try {
      this.db.transaction(() => {
        insertCourse.run(course.title, course.link ?? null, course.instructor ?? null, sourceFile ?? null);
        for (const lesson of course.lessons) {
          insertLesson.run(course.title, lesson.lessonNumber, lesson.title, lesson.link ?? null);
        }
        insertTitle.run(course.title);
      })();
    } catch (error) {
      throw new DatabaseError(
        `Failed to add course '${course.title}': ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Add chunks to the full-text index. Their course must already exist.
   */
  addChunks(chunks: readonly CourseChunk[]): number {
    const insertChunk = this.db.prepare(
      'INSERT INTO course_chunks (course_title, lesson_number, chunk_index, content) VALUES (?, ?, ?, ?)'
    );
    const insertText = this.db.prepare('INSERT INTO course_chunks_fts (rowid, content) VALUES (?, ?)');

    try {
      this.db.transaction(() => {
        for (const chunk of chunks) {
          const { lastInsertRowid } = insertChunk.run(
            chunk.courseTitle,
            chunk.lessonNumber ?? null,
            chunk.chunkIndex,
            chunk.content
          );
          insertText.run(lastInsertRowid, chunk.content);
        }
      })();
    } catch (error) {
      throw new DatabaseError(`Failed to add chunks: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
    }

    return chunks.length;
  }

  /**
   * Add a course and its chunks together. Nothing is kept when either
   * write fails, so a later ingest can retry the course.
   */
  addCourseWithChunks(course: Course, chunks: readonly CourseChunk[], sourceFile?: string): number {
    return this.db.transaction(() => {
      this.addCourse(course, sourceFile);
      return this.addChunks(chunks);
    })();
  }

  /**
   * Remove every course, lesson and chunk.
   */
  clear(): void {
    this.db.transaction(() => {
      this.db.prepare('DELETE FROM course_chunks').run();
      this.db.prepare("INSERT INTO course_chunks_fts (course_chunks_fts) VALUES ('delete-all')").run();
      this.db.prepare('DELETE FROM course_titles_fts').run();
      this.db.prepare('DELETE FROM lessons').run();
      this.db.prepare('DELETE FROM courses').run();
    })();
  }
}

/**
 * Migrate a connection and wrap it in a store.
 *
 * @throws DatabaseError if any migration fails
 */
export function createCourseStore(db: Db, options: CourseStoreOptions = {}): CourseStore {
  const result = runMigrations(db);

  if (result.failed.length > 0) {
    const details = result.failed.map(({ name, error }) => `${name}: ${error}`).join('; ');
    throw new DatabaseError(`Database migration failed: ${details}`);
  }

  return new CourseStore(db, options);
}
