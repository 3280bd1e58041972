/**
 * Course Catalog Types
 *
 * The course model shared by ingestion, the store and the retrieval tools,
 * plus the three-state search result.
 */

export interface Lesson {
  lessonNumber: number;
  title: string;
  link?: string;
}

export interface Course {
  /** Unique; used as the course identifier everywhere */
  title: string;
  link?: string;
  instructor?: string;
  lessons: Lesson[];
}

/** A retrievable unit of course text */
export interface CourseChunk {
  courseTitle: string;
  /** Absent for course-level text outside any lesson */
  lessonNumber?: number;
  /** Zero-based position within the course */
  chunkIndex: number;
  content: string;
}

export interface ChunkMetadata {
  courseTitle: string;
  lessonNumber?: number;
  chunkIndex: number;
}

/**
 * Outcome of a content search.
 *
 * Three observable states:
 * - error set: the other arrays are empty and must be ignored
 * - no error, no documents: nothing matched
 * - documents present: positionally aligned with metadata and distances
 */
export interface SearchResultSet {
  readonly documents: readonly string[];
  readonly metadata: readonly ChunkMetadata[];
  readonly distances: readonly number[];
  readonly error: string | null;
}

export interface SearchHit {
  document: string;
  metadata: ChunkMetadata;
  distance: number;
}

export interface SearchOptions {
  /** Partial course name, resolved to a catalog title first */
  courseName?: string;
  lessonNumber?: number;
  limit?: number;
}

export interface LessonInfo {
  title: string | null;
  link: string | null;
}

export interface CourseSummary {
  title: string;
  instructor: string | null;
  lessonCount: number;
  chunkCount: number;
}

/**
 * The read side of the course index the retrieval tools depend on.
 */
export interface CourseCatalog {
  search(query: string, options?: SearchOptions): Promise<SearchResultSet>;
  /** Canonical title for a partial name, or null when nothing matches */
  resolveCourseName(partialName: string): Promise<string | null>;
  getLessonInfo(courseTitle: string, lessonNumber: number): Promise<LessonInfo>;
  /** Formatted outline text, or null for an unknown title */
  getCourseOutline(courseTitle: string): Promise<string | null>;
}

export function searchResultSet(hits: readonly SearchHit[]): SearchResultSet {
  return {
    documents: hits.map((hit) => hit.document),
    metadata: hits.map((hit) => hit.metadata),
    distances: hits.map((hit) => hit.distance),
    error: null,
  };
}

export function searchFailure(message: string): SearchResultSet {
  return { documents: [], metadata: [], distances: [], error: message };
}

export function isEmptyResultSet(set: SearchResultSet): boolean {
  return set.error === null && set.documents.length === 0;
}

/**
 * Render a course outline. Tools return this text verbatim.
 */
export function formatCourseOutline(course: Course): string {
  const lines = [`Course: ${course.title}`, `Link: ${course.link ?? 'not available'}`];

  if (course.instructor) {
    lines.push(`Instructor: ${course.instructor}`);
  }

  lines.push('', `Lessons (${course.lessons.length}):`);
  for (const lesson of course.lessons) {
    lines.push(`- Lesson ${lesson.lessonNumber}: ${lesson.title}`);
  }

  return lines.join('\n');
}
