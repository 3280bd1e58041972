/**
 * API Key Validation
 *
 * Checks presence and format of the Anthropic API key without exposing
 * its value. Only presence and format validity are ever reported.
 */

import { z } from 'zod';
import { getEnv, SETUP_INSTRUCTIONS } from '../config/env.js';

export type ValidationResult =
  | { valid: true; apiKey: string }
  | { valid: false; error: string; setupInstructions: string };

/**
 * Anthropic keys share the `sk-ant-` prefix across key versions.
 */
export const AnthropicKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine((key) => key.startsWith('sk-ant-'), 'Invalid Anthropic API key format (should start with "sk-ant-")');

export function validateAnthropicKey(): ValidationResult {
  const key = getEnv('ANTHROPIC_API_KEY');

  if (key === undefined) {
    return {
      valid: false,
      error: 'ANTHROPIC_API_KEY environment variable is not set',
      setupInstructions: SETUP_INSTRUCTIONS,
    };
  }

  const result = AnthropicKeySchema.safeParse(key);
  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid API key format',
      setupInstructions: SETUP_INSTRUCTIONS,
    };
  }

  return { valid: true, apiKey: result.data };
}
