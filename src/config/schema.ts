/**
 * Configuration Schema
 *
 * Defines the shape of ~/.course-qa/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Generative model settings
 */
export const ModelConfigSchema = z.object({
  name: z.string().min(1).describe('Anthropic model used to answer questions'),
  max_retries: z
    .number()
    .int()
    .min(0)
    .max(10)
    .describe('SDK-level retries for a failed model call (0-10)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout for a single model call in milliseconds'),
});

/**
 * Tool orchestration settings
 */
export const AgentConfigSchema = z.object({
  max_tool_rounds: z
    .number()
    .int()
    .min(1)
    .max(10)
    .describe('Rounds in which the model may call tools before a forced final answer'),
  max_tokens: z.number().int().min(1).max(8192).describe('Output token budget per model call'),
  temperature: z.number().min(0).max(1).describe('Sampling temperature (0 = deterministic)'),
});

/**
 * Search configuration
 */
export const SearchConfigSchema = z.object({
  max_results: z.number().int().min(1).max(50).describe('Chunks returned per search'),
});

/**
 * Chunking used when ingesting course documents
 */
export const ChunkingConfigSchema = z
  .object({
    chunk_size: z.number().int().min(100).max(10000).describe('Maximum characters per chunk'),
    chunk_overlap: z.number().int().min(0).describe('Characters shared by consecutive chunks'),
  })
  .refine((chunking) => chunking.chunk_overlap < chunking.chunk_size, {
    message: 'chunk_overlap must be smaller than chunk_size',
    path: ['chunk_overlap'],
  });

/**
 * Conversation memory
 */
export const SessionConfigSchema = z.object({
  max_history: z
    .number()
    .int()
    .min(0)
    .max(50)
    .describe('Exchanges remembered per session'),
});

/**
 * Database location (defaults to the data directory)
 */
export const DatabaseConfigSchema = z.object({
  path: z.string().min(1).optional().describe('SQLite database file'),
});

/**
 * Langfuse tracing
 */
export const ObservabilityConfigSchema = z.object({
  enabled: z.boolean().describe('Send traces to Langfuse when credentials are available'),
  langfuse_host: z.string().url().describe('Langfuse host URL'),
  langfuse_public_key: z.string().optional().describe('Langfuse public key (or LANGFUSE_PUBLIC_KEY)'),
  langfuse_secret_key: z.string().optional().describe('Langfuse secret key (or LANGFUSE_SECRET_KEY)'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  model: ModelConfigSchema,
  agent: AgentConfigSchema,
  search: SearchConfigSchema,
  chunking: ChunkingConfigSchema,
  session: SessionConfigSchema,
  database: DatabaseConfigSchema,
  observability: ObservabilityConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type ObservabilityConfig = z.infer<typeof ObservabilityConfigSchema>;

/**
 * Partial config as read from the file.
 * Every section and field is optional, allowing sparse config files.
 */
export const PartialConfigSchema = z.object({
  model: ModelConfigSchema.partial().optional(),
  agent: AgentConfigSchema.partial().optional(),
  search: SearchConfigSchema.partial().optional(),
  chunking: z
    .object({
      chunk_size: z.number().int().min(100).max(10000),
      chunk_overlap: z.number().int().min(0),
    })
    .partial()
    .optional(),
  session: SessionConfigSchema.partial().optional(),
  database: DatabaseConfigSchema.partial().optional(),
  observability: ObservabilityConfigSchema.partial().optional(),
});

export type PartialConfig = z.infer<typeof PartialConfigSchema>;
