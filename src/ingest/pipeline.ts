/**
 * Ingest Pipeline
 *
 * Scan -> Parse -> Chunk -> Store, one course document at a time.
 *
 * Non-fatal problems (unreadable or empty documents) are logged as
 * warnings and counted, never thrown. Courses already in the store are
 * skipped, so re-running over the same folder only adds new documents.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { relative, resolve } from 'node:path';
import fg from 'fast-glob';
import { FileNotFoundError } from '../errors/index.js';
import { silentLogger } from '../utils/logger.js';
import { parseCourseDocument } from './parser.js';
import { DEFAULT_CHUNKING, type IngestOptions, type IngestResult } from './types.js';

export const COURSE_FILE_PATTERNS = ['**/*.txt', '**/*.md'];

/**
 * Find course documents under a folder, sorted for a stable order.
 */
export async function findCourseFiles(folder: string): Promise<string[]> {
  const files = await fg(COURSE_FILE_PATTERNS, {
    cwd: folder,
    absolute: true,
    onlyFiles: true,
    dot: false,
    suppressErrors: true,
  });
  return files.sort();
}

/**
 * Ingest every course document in a folder.
 *
 * @example
 * ```ts
 * const result = await ingestCourseFolder('./docs', {
 *   store,
 *   chunking: { chunkSize: 800, chunkOverlap: 100 },
 *   onCourse: (event) => spinner.text = event.file,
 * });
 * console.log(`Added ${result.coursesAdded} courses`);
 * ```
 */
export async function ingestCourseFolder(folder: string, options: IngestOptions): Promise<IngestResult> {
  const { store, chunking = DEFAULT_CHUNKING, clearExisting = false, logger = silentLogger, onCourse } = options;
  const root = resolve(folder);

  if (!existsSync(root)) {
    throw new FileNotFoundError(root);
  }

  const files = await findCourseFiles(root);
  logger.debug?.(`[ingest] ${files.length} document(s) under ${root}`);

  if (clearExisting) {
    store.clear();
    logger.debug?.('[ingest] Cleared existing courses');
  }

  const result: IngestResult = { coursesAdded: 0, chunksAdded: 0, skipped: 0, failed: 0 };

  const fail = (file: string, reason: string): void => {
    logger.warn(`Skipping ${file}: ${reason}`);
    result.failed++;
    onCourse?.({ status: 'failed', file, reason });
  };

  for (const path of files) {
    const file = relative(root, path);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      fail(file, error instanceof Error ? error.message : String(error));
      continue;
    }

    const { course, chunks } = parseCourseDocument(content, file, chunking);

    if (course.lessons.length === 0 && chunks.length === 0) {
      fail(file, 'no course content');
      continue;
    }

    if (store.hasCourse(course.title)) {
      logger.debug?.(`[ingest] Course already indexed: ${course.title}`);
      result.skipped++;
      onCourse?.({ status: 'skipped', file, title: course.title });
      continue;
    }

    try {
      store.addCourseWithChunks(course, chunks, file);
    } catch (error) {
      fail(file, error instanceof Error ? error.message : String(error));
      continue;
    }

    result.coursesAdded++;
    result.chunksAdded += chunks.length;
    onCourse?.({ status: 'added', file, title: course.title, chunks: chunks.length });
  }

  return result;
}
