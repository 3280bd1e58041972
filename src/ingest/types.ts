/**
 * Ingestion Types
 */

import type { Course, CourseChunk } from '../catalog/types.js';
import type { CourseStore } from '../catalog/course-store.js';
import type { Logger } from '../utils/logger.js';

export interface ChunkingOptions {
  /** Maximum characters per chunk */
  chunkSize: number;
  /** Maximum characters of trailing sentences repeated in the next chunk */
  chunkOverlap: number;
}

export const DEFAULT_CHUNKING: ChunkingOptions = {
  chunkSize: 800,
  chunkOverlap: 100,
};

/** A course document split into catalog entries and retrievable chunks */
export interface ParsedCourse {
  course: Course;
  chunks: CourseChunk[];
}

/** The part of the store ingestion writes to */
export type IngestTarget = Pick<CourseStore, 'hasCourse' | 'addCourseWithChunks' | 'clear'>;

export type IngestEvent =
  | { status: 'added'; file: string; title: string; chunks: number }
  | { status: 'skipped'; file: string; title: string }
  | { status: 'failed'; file: string; reason: string };

export interface IngestOptions {
  store: IngestTarget;
  chunking?: ChunkingOptions;
  /** Wipe the store before ingesting */
  clearExisting?: boolean;
  logger?: Logger;
  /** Called once per document, in file order */
  onCourse?: (event: IngestEvent) => void;
}

export interface IngestResult {
  coursesAdded: number;
  chunksAdded: number;
  /** Documents whose course was already in the store */
  skipped: number;
  /** Unreadable or empty documents */
  failed: number;
}
