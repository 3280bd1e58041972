import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mocks = vi.hoisted(() => ({
  createLangfuseTracer: vi.fn(() => ({
    trace: vi.fn(),
    flush: vi.fn(),
    shutdown: vi.fn(),
    isRemote: true,
  })),
}));

vi.mock('../langfuse-tracer.js', () => ({
  createLangfuseTracer: mocks.createLangfuseTracer,
}));

import { createTracer } from '../factory.js';
import { _clearEnvCache } from '../../config/env.js';
import type { ObservabilityConfig } from '../../config/schema.js';

function observability(overrides: Partial<ObservabilityConfig> = {}): { observability: ObservabilityConfig } {
  return {
    observability: {
      enabled: true,
      langfuse_host: 'https://cloud.langfuse.com',
      ...overrides,
    },
  };
}

describe('createTracer', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubEnv('LANGFUSE_PUBLIC_KEY', '');
    vi.stubEnv('LANGFUSE_SECRET_KEY', '');
    vi.stubEnv('LANGFUSE_BASE_URL', '');
    _clearEnvCache();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
  });

  it('returns a no-op tracer when disabled', () => {
    const tracer = createTracer(
      observability({ enabled: false, langfuse_public_key: 'pk-test', langfuse_secret_key: 'test-secret' })
    );

    expect(tracer.isRemote).toBe(false);
    expect(mocks.createLangfuseTracer).not.toHaveBeenCalled();
  });

  it('returns a no-op tracer without both keys', () => {
    const tracer = createTracer(observability({ langfuse_public_key: 'pk-test' }));

    expect(tracer.isRemote).toBe(false);
    expect(mocks.createLangfuseTracer).not.toHaveBeenCalled();
  });

  it('uses the keys from config.toml', () => {
    const tracer = createTracer(observability({ langfuse_public_key: 'pk-test', langfuse_secret_key: 'test-secret' }));

    expect(tracer.isRemote).toBe(true);
    expect(mocks.createLangfuseTracer).toHaveBeenCalledWith({
      publicKey: 'pk-test',
      secretKey: 'test-secret',
      baseUrl: 'https://cloud.langfuse.com',
    });
  });

  it('prefers environment keys and host', () => {
    vi.stubEnv('LANGFUSE_PUBLIC_KEY', 'pk-env');
    vi.stubEnv('LANGFUSE_SECRET_KEY', 'env-secret');
    vi.stubEnv('LANGFUSE_BASE_URL', 'https://langfuse.example.com');
    _clearEnvCache();

    createTracer(observability({ langfuse_public_key: 'pk-test', langfuse_secret_key: 'test-secret' }));

    expect(mocks.createLangfuseTracer).toHaveBeenCalledWith({
      publicKey: 'pk-env',
      secretKey: 'env-secret',
      baseUrl: 'https://langfuse.example.com',
    });
  });
});
