/**
 * No-op tracer, used when observability is off or unconfigured.
 *
 * Every trace shares the same frozen handles.
 */

import type { GenerationHandle, SpanHandle, TraceHandle, Tracer } from './types.js';

const NOOP_SPAN: SpanHandle = Object.freeze({
  update: (): SpanHandle => NOOP_SPAN,
  end: (): void => undefined,
});

const NOOP_GENERATION: GenerationHandle = Object.freeze({
  update: (): GenerationHandle => NOOP_GENERATION,
  end: (): void => undefined,
});

export const NOOP_TRACE: TraceHandle = Object.freeze({
  span: (): SpanHandle => NOOP_SPAN,
  generation: (): GenerationHandle => NOOP_GENERATION,
  update: (): TraceHandle => NOOP_TRACE,
  end: (): void => undefined,
});

export function createNoopTracer(): Tracer {
  return {
    trace: (): TraceHandle => NOOP_TRACE,
    flush: async (): Promise<void> => undefined,
    shutdown: async (): Promise<void> => undefined,
    isRemote: false,
  };
}
