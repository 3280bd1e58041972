import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { validateAnthropicKey, AnthropicKeySchema } from '../validation.js';
import { _clearEnvCache, SETUP_INSTRUCTIONS } from '../../config/env.js';

describe('validateAnthropicKey', () => {
  beforeEach(() => {
    _clearEnvCache();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
  });

  it('accepts a key with the sk-ant- prefix', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'sk-ant-test-key');

    expect(validateAnthropicKey()).toEqual({ valid: true, apiKey: 'sk-ant-test-key' });
  });

  it('reports a missing key with setup instructions', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');

    expect(validateAnthropicKey()).toEqual({
      valid: false,
      error: 'ANTHROPIC_API_KEY environment variable is not set',
      setupInstructions: SETUP_INSTRUCTIONS,
    });
  });

  it('rejects a key with the wrong prefix', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');

    const result = validateAnthropicKey();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('Invalid Anthropic API key format (should start with "sk-ant-")');
    }
  });
});

describe('AnthropicKeySchema', () => {
  it('rejects an empty string', () => {
    const result = AnthropicKeySchema.safeParse('');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('API key cannot be empty');
    }
  });
});
