/**
 * Environment Variable Handler
 *
 * Loads the Anthropic API key, Langfuse credentials and the data
 * directory override. Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even in verbose mode
 * - Keys are NEVER included in error messages
 * - Only key presence/absence and format validity are reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/** Blank values count as unset. */
const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

/**
 * Environment variable schema.
 * Nothing is required at load time - keys are validated when used.
 */
export const EnvSchema = z.object({
  ANTHROPIC_API_KEY: optionalString,
  LANGFUSE_PUBLIC_KEY: optionalString,
  LANGFUSE_SECRET_KEY: optionalString,
  LANGFUSE_BASE_URL: optionalString,
  COURSE_QA_HOME: optionalString,
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 * Does NOT validate key presence.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY,
    LANGFUSE_PUBLIC_KEY: process.env.LANGFUSE_PUBLIC_KEY,
    LANGFUSE_SECRET_KEY: process.env.LANGFUSE_SECRET_KEY,
    LANGFUSE_BASE_URL: process.env.LANGFUSE_BASE_URL,
    COURSE_QA_HOME: process.env.COURSE_QA_HOME,
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check whether the Anthropic API key is configured.
 * Returns true/false WITHOUT exposing the key value.
 */
export function hasApiKey(): boolean {
  return loadEnv().ANTHROPIC_API_KEY !== undefined;
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown when the Anthropic API key is missing or malformed.
 */
export const SETUP_INSTRUCTIONS = `
To ask questions about your courses you need an Anthropic API key:

1. Get your API key from https://console.anthropic.com/
2. Set the environment variable:

   # macOS/Linux (add to ~/.bashrc or ~/.zshrc)
   export ANTHROPIC_API_KEY="sk-ant-..."

   # Windows (PowerShell)
   $env:ANTHROPIC_API_KEY="sk-ant-..."

   Or add it to a .env file in the directory you run cqa from.

3. Restart your terminal or run: source ~/.bashrc
`.trim();
