/**
 * Ingest Module
 *
 * Turns a folder of course documents into catalog entries and chunks.
 */

export { ingestCourseFolder, findCourseFiles, COURSE_FILE_PATTERNS } from './pipeline.js';
export { parseCourseDocument, titleFromFileName } from './parser.js';
export { chunkText, splitSentences } from './chunker.js';
export {
  DEFAULT_CHUNKING,
  type ChunkingOptions,
  type ParsedCourse,
  type IngestTarget,
  type IngestEvent,
  type IngestOptions,
  type IngestResult,
} from './types.js';
