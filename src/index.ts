/**
 * course-qa - Library Entry Point
 *
 * The CLI (`cqa`) covers everyday use:
 * ```bash
 * cqa ingest ./docs                       # Index course documents
 * cqa ask "What does lesson 2 cover?"     # One question with sources
 * cqa chat                                # Multi-turn conversation
 * ```
 *
 * The same pieces are exported here for embedding the assistant elsewhere.
 *
 * @example Answer a question from configuration
 * ```typescript
 * import { loadConfig, createCourseQueryEngine } from 'course-qa';
 *
 * const engine = createCourseQueryEngine(loadConfig());
 * const session = engine.createSession();
 * const { answer, sources } = await engine.query('What is MCP?', session);
 * await engine.shutdown();
 * ```
 *
 * @example Bring your own catalog and model client
 * ```typescript
 * import { CourseQueryEngine } from 'course-qa';
 *
 * const engine = new CourseQueryEngine({ catalog: myCatalog, client: myClient });
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

export * from './agent/index.js';
export * from './catalog/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './ingest/index.js';
export * from './observability/index.js';
export * from './providers/index.js';
export * from './session/index.js';
export * from './utils/index.js';

export { getDb, closeDb, openDatabase, runMigrations, type Db } from './database/index.js';
