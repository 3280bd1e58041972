/**
 * Observability Module
 *
 * @example
 * ```typescript
 * const tracer = createTracer(config);
 * const trace = tracer.trace({ name: 'cqa-ask', input: question });
 * // ...
 * trace.end();
 * await tracer.shutdown();
 * ```
 */

export type {
  Tracer,
  TraceHandle,
  SpanHandle,
  GenerationHandle,
  TraceOptions,
  SpanOptions,
  GenerationOptions,
  TokenUsage,
  UpdateData,
} from './types.js';
export { createTracer } from './factory.js';
export { createNoopTracer, NOOP_TRACE } from './noop-tracer.js';
export { createLangfuseTracer, type LangfuseTracerConfig } from './langfuse-tracer.js';
