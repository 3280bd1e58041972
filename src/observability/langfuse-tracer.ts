/**
 * Langfuse tracer (Langfuse v4, OpenTelemetry based).
 *
 * An OpenTelemetry NodeSDK is started with a LangfuseSpanProcessor; traces
 * are root observations from `startObservation`, and spans and generations
 * are their children.
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { LangfuseSpanProcessor } from '@langfuse/otel';
import { startObservation } from '@langfuse/tracing';
import type {
  GenerationHandle,
  GenerationOptions,
  SpanHandle,
  SpanOptions,
  TraceHandle,
  TraceOptions,
  Tracer,
  UpdateData,
} from './types.js';

export interface LangfuseTracerConfig {
  publicKey: string;
  secretKey: string;
  baseUrl: string;
}

type Observation = ReturnType<typeof startObservation>;

interface ObservationAttributes {
  output?: unknown;
  metadata?: Record<string, unknown>;
  level?: 'ERROR';
  statusMessage?: string;
}

function toAttributes(data: UpdateData): ObservationAttributes {
  return {
    output: data.output,
    metadata: data.metadata,
    ...(data.error !== undefined && { level: 'ERROR' as const, statusMessage: data.error }),
  };
}

function observe(obs: Observation): SpanHandle {
  const handle: SpanHandle = {
    update(data) {
      obs.update(toAttributes(data));
      return handle;
    },
    end() {
      obs.end();
    },
  };
  return handle;
}

function observeGeneration(obs: Observation): GenerationHandle {
  const handle: GenerationHandle = {
    update(data) {
      obs.update({
        ...toAttributes(data),
        ...(data.usage !== undefined && { usageDetails: { ...data.usage } }),
      });
      return handle;
    },
    end() {
      obs.end();
    },
  };
  return handle;
}

function observeTrace(obs: Observation): TraceHandle {
  const handle: TraceHandle = {
    traceId: obs.traceId,
    span(options: SpanOptions) {
      return observe(obs.startObservation(options.name, { input: options.input, metadata: options.metadata }));
    },
    generation(options: GenerationOptions) {
      return observeGeneration(
        obs.startObservation(
          options.name,
          { model: options.model, input: options.input, metadata: options.metadata },
          { asType: 'generation' }
        )
      );
    },
    update(data) {
      obs.update(toAttributes(data));
      return handle;
    },
    end() {
      obs.end();
    },
  };
  return handle;
}

export function createLangfuseTracer(config: LangfuseTracerConfig): Tracer {
  const processor = new LangfuseSpanProcessor({
    publicKey: config.publicKey,
    secretKey: config.secretKey,
    baseUrl: config.baseUrl,
  });
  const sdk = new NodeSDK({ spanProcessors: [processor] });
  sdk.start();

  return {
    trace(options: TraceOptions): TraceHandle {
      const root = startObservation(options.name, { input: options.input, metadata: options.metadata });
      if (options.sessionId !== undefined) {
        // Session id is a trace attribute in v4, not a span attribute
        root.updateTrace({ sessionId: options.sessionId });
      }
      return observeTrace(root);
    },
    async flush() {
      await processor.forceFlush();
    },
    async shutdown() {
      await sdk.shutdown();
    },
    isRemote: true,
  };
}
