/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the data directory
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import type { ZodError } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

/** Keys without a default value that may still be set. */
const OPTIONAL_KEYS = [
  'database.path',
  'observability.langfuse_public_key',
  'observability.langfuse_secret_key',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function isJsonMap(value: TOML.AnyJson | undefined): value is TOML.JsonMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function ensureConfigDir(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
}

function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Deep merge two objects, with source values overriding target.
 * Nested objects are merged, arrays and primitives replaced.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function readConfigFile(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: cqa config reset`
    );
  }
}

/**
 * Load and parse the config file.
 * Returns the merged config (defaults + user overrides).
 *
 * @param createIfMissing - Write the commented template on first run
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureConfigDir(configPath);
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return ConfigSchema.parse(DEFAULT_CONFIG);
  }

  const partial = PartialConfigSchema.safeParse(readConfigFile(configPath));
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error)}`,
      'Run: cqa config reset  to restore defaults'
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, partial.data));
  if (!merged.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(merged.error)}`,
      'Run: cqa config reset  to restore defaults'
    );
  }

  return merged.data;
}

/**
 * Flatten a config object into dot-notation entries.
 */
function flatten(obj: Record<string, unknown>, prefix = ''): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;
    if (isRecord(value)) {
      entries.push(...flatten(value, fullKey));
    } else if (value !== undefined) {
      entries.push([fullKey, value]);
    }
  }

  return entries;
}

/**
 * Every key `cqa config set` accepts
 */
export function getConfigKeys(): string[] {
  const keys = flatten(DEFAULT_CONFIG).map(([key]) => key);
  return [...new Set([...keys, ...OPTIONAL_KEYS])].sort();
}

/**
 * Get a specific config value by dot-notation path.
 * Example: getConfigValue('agent.max_tool_rounds') => 2
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();

  for (const part of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Parse a command-line string into a boolean, number or string
 */
export function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a config value by dot-notation path and write it back to the file.
 * The complete config is validated before anything is written.
 */
export function setConfigValue(key: string, value: string): void {
  if (!getConfigKeys().includes(key)) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }

  const configPath = getConfigPath();
  const config: TOML.JsonMap = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  const parts = key.split('.');
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isJsonMap(next)) {
      current = next;
    } else {
      const created: TOML.JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  const validation = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, config));
  if (!validation.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validation.error)}`,
      'Run: cqa config list  to see current values and types'
    );
  }

  ensureConfigDir(configPath);
  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * List all config values in a flat format.
 * Returns entries like ['model.name', 'claude-sonnet-4-20250514']
 */
export function listConfig(): Array<[string, unknown]> {
  return flatten(loadConfig());
}

/**
 * Overwrite the config file with the default template
 */
export function resetConfig(): string {
  const configPath = getConfigPath();
  ensureConfigDir(configPath);
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  return configPath;
}
