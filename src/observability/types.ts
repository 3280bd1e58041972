/**
 * Observability Types
 *
 * A query produces one trace. Inside it, each model call is a generation
 * and each tool call is a span. Two implementations exist: a no-op tracer
 * and a Langfuse tracer. Callers never know which one they hold.
 */

export interface TraceOptions {
  /** Trace name, e.g. 'cqa-ask' or 'cqa-chat-turn' */
  name: string;
  input?: unknown;
  metadata?: Record<string, unknown>;
  /** Groups traces of one conversation */
  sessionId?: string;
}

export interface SpanOptions {
  name: string;
  input?: unknown;
  metadata?: Record<string, unknown>;
}

export interface GenerationOptions extends SpanOptions {
  model?: string;
}

export interface TokenUsage {
  input?: number;
  output?: number;
  total?: number;
}

export interface UpdateData {
  output?: unknown;
  /** Only meaningful on generations */
  usage?: TokenUsage;
  metadata?: Record<string, unknown>;
  /** Marks the observation as failed */
  error?: string;
}

export interface SpanHandle {
  update(data: UpdateData): SpanHandle;
  end(): void;
}

export interface GenerationHandle {
  update(data: UpdateData): GenerationHandle;
  end(): void;
}

export interface TraceHandle {
  /** Remote trace id; undefined for the no-op tracer */
  readonly traceId?: string;
  span(options: SpanOptions): SpanHandle;
  generation(options: GenerationOptions): GenerationHandle;
  update(data: UpdateData): TraceHandle;
  end(): void;
}

export interface Tracer {
  trace(options: TraceOptions): TraceHandle;
  /** Send pending observations */
  flush(): Promise<void>;
  /** Flush, then stop accepting observations */
  shutdown(): Promise<void>;
  readonly isRemote: boolean;
}
