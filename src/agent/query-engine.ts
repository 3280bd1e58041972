/**
 * Course Query Engine
 *
 * The single entry point for asking questions:
 *
 * ```
 * query(text, sessionId?)
 *   ├── session history (when a session id is given)
 *   ├── ToolOrchestrator.generate(prompt, history, registry)
 *   ├── registry.takeCitations()      (always, even on failure)
 *   └── session.addExchange(prompt, answer)
 * ```
 *
 * One engine owns one registry, so queries against the same engine must
 * not run concurrently; citations would mix.
 */

import type { Config } from '../config/schema.js';
import { getDbPath } from '../config/paths.js';
import { getDb } from '../database/connection.js';
import { createCourseStore } from '../catalog/course-store.js';
import type { CourseCatalog } from '../catalog/types.js';
import { createAnthropicModelClient } from '../providers/anthropic.js';
import { createTracer } from '../observability/factory.js';
import { createNoopTracer } from '../observability/noop-tracer.js';
import type { Tracer } from '../observability/types.js';
import { SessionStore } from '../session/session-store.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { ToolOrchestrator } from './orchestrator.js';
import { CourseOutlineTool } from './tools/course-outline-tool.js';
import { CourseSearchTool } from './tools/course-search-tool.js';
import { ToolRegistry } from './tools/registry.js';
import type { Citation, GenerationSettings, ModelClient, QueryResult } from './types.js';

/** Catalog plus the listing used for analytics */
export type QueryCatalog = CourseCatalog & { getCourseTitles(): string[] };

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}

export interface CourseQueryEngineOptions {
  catalog: QueryCatalog;
  client: ModelClient;
  sessions?: SessionStore;
  tracer?: Tracer;
  settings?: Partial<GenerationSettings>;
  logger?: Logger;
}

export function buildPrompt(text: string): string {
  return `Answer this question about course materials: ${text}`;
}

export class CourseQueryEngine {
  readonly registry: ToolRegistry;
  readonly sessions: SessionStore;
  private readonly catalog: QueryCatalog;
  private readonly orchestrator: ToolOrchestrator;
  private readonly tracer: Tracer;

  constructor(options: CourseQueryEngineOptions) {
    this.catalog = options.catalog;
    this.sessions = options.sessions ?? new SessionStore();
    this.tracer = options.tracer ?? createNoopTracer();
    this.registry = new ToolRegistry([new CourseSearchTool(options.catalog), new CourseOutlineTool(options.catalog)]);
    this.orchestrator = new ToolOrchestrator({
      client: options.client,
      settings: options.settings,
      logger: options.logger ?? silentLogger,
    });
  }

  async query(text: string, sessionId?: string): Promise<QueryResult> {
    const prompt = buildPrompt(text);
    const history = sessionId !== undefined ? this.sessions.getHistory(sessionId) : null;
    const trace = this.tracer.trace({ name: 'cqa-query', input: text, sessionId });

    let answer: string;
    let sources: Citation[];
    try {
      answer = await this.orchestrator.generate({ query: prompt, history, registry: this.registry, trace });
      trace.update({ output: answer });
    } finally {
      sources = this.registry.takeCitations();
      trace.end();
    }

    if (sessionId !== undefined) {
      this.sessions.addExchange(sessionId, prompt, answer);
    }

    return { answer, sources };
  }

  createSession(): string {
    return this.sessions.createSession();
  }

  getCourseAnalytics(): CourseAnalytics {
    const courseTitles = this.catalog.getCourseTitles();
    return { totalCourses: courseTitles.length, courseTitles };
  }

  /** Whether queries are traced to a remote backend */
  get tracingEnabled(): boolean {
    return this.tracer.isRemote;
  }

  /** Send traces recorded so far; tracing carries on afterwards */
  async flush(): Promise<void> {
    if (this.tracer.isRemote) {
      await this.tracer.flush();
    }
  }

  /** Send pending traces; call before the process exits */
  async shutdown(): Promise<void> {
    await this.tracer.shutdown();
  }
}

/**
 * Wire an engine from configuration. Anything in `overrides` replaces the
 * collaborator that would otherwise be built.
 *
 * @throws APIKeyError when no client is given and the Anthropic key is missing
 */
export function createCourseQueryEngine(
  config: Config,
  overrides: Partial<CourseQueryEngineOptions> = {}
): CourseQueryEngine {
  const logger = overrides.logger ?? silentLogger;

  return new CourseQueryEngine({
    catalog:
      overrides.catalog ??
      createCourseStore(getDb(config.database.path ?? getDbPath()), {
        maxResults: config.search.max_results,
        logger,
      }),
    client:
      overrides.client ??
      createAnthropicModelClient({
        model: config.model.name,
        maxRetries: config.model.max_retries,
        timeout: config.model.timeout_ms,
      }),
    sessions: overrides.sessions ?? new SessionStore({ maxHistory: config.session.max_history }),
    tracer: overrides.tracer ?? createTracer(config),
    settings: {
      maxRounds: config.agent.max_tool_rounds,
      maxTokens: config.agent.max_tokens,
      temperature: config.agent.temperature,
      ...overrides.settings,
    },
    logger,
  });
}
