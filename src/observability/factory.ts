/**
 * Tracer Factory
 *
 * Langfuse is used only when observability is enabled and both keys are
 * known. Keys and host from the environment win over config.toml.
 */

import type { ObservabilityConfig } from '../config/schema.js';
import { loadEnv } from '../config/env.js';
import type { Tracer } from './types.js';
import { createNoopTracer } from './noop-tracer.js';
import { createLangfuseTracer } from './langfuse-tracer.js';

export function createTracer(config: { observability: ObservabilityConfig }): Tracer {
  const { observability } = config;
  if (!observability.enabled) {
    return createNoopTracer();
  }

  const env = loadEnv();
  const publicKey = env.LANGFUSE_PUBLIC_KEY ?? observability.langfuse_public_key;
  const secretKey = env.LANGFUSE_SECRET_KEY ?? observability.langfuse_secret_key;

  if (publicKey === undefined || secretKey === undefined) {
    return createNoopTracer();
  }

  return createLangfuseTracer({
    publicKey,
    secretKey,
    baseUrl: env.LANGFUSE_BASE_URL ?? observability.langfuse_host,
  });
}
