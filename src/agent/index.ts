/**
 * Agent Module
 *
 * Question answering over the course catalog: the query engine, the
 * tool orchestration loop behind it, and the tools it offers the model.
 *
 * @example
 * ```typescript
 * const engine = createCourseQueryEngine(loadConfig());
 * const session = engine.createSession();
 * const { answer, sources } = await engine.query('What does lesson 2 cover?', session);
 * ```
 */

export {
  CourseQueryEngine,
  createCourseQueryEngine,
  buildPrompt,
  type CourseAnalytics,
  type CourseQueryEngineOptions,
  type QueryCatalog,
} from './query-engine.js';
export { ToolOrchestrator, NO_RESPONSE, type GenerateRequest, type ToolOrchestratorOptions } from './orchestrator.js';
export { buildSystemPrompt, buildSystemContext, HISTORY_HEADER } from './system-prompt.js';
export {
  AgentError,
  DEFAULT_GENERATION,
  type AgentErrorCode,
  type Citation,
  type ConversationTurn,
  type GenerationSettings,
  type ModelClient,
  type ModelRequest,
  type ModelTurn,
  type ModelUsage,
  type QueryResult,
  type ToolCallRequest,
  type ToolResult,
} from './types.js';
export * from './tools/index.js';
