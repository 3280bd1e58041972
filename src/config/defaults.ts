/**
 * Default Configuration Values
 *
 * Used when no config.toml exists (first run) and for any fields the
 * user's file leaves out. The loader merges user config ON TOP of these.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  model: {
    name: 'claude-sonnet-4-20250514',
    max_retries: 2,
    timeout_ms: 60000,
  },

  // Two rounds allow a "search, then refine" pattern
  agent: {
    max_tool_rounds: 2,
    max_tokens: 800,
    temperature: 0,
  },

  search: {
    max_results: 5,
  },

  chunking: {
    chunk_size: 800,
    chunk_overlap: 100,
  },

  session: {
    max_history: 2,
  },

  // Path resolved from the data directory at runtime
  database: {},

  // No-op unless Langfuse credentials are present
  observability: {
    enabled: true,
    langfuse_host: 'https://cloud.langfuse.com',
  },
};

/**
 * Config file template (TOML format)
 * Written to the data directory on first run
 */
export const CONFIG_TEMPLATE = `# course-qa Configuration
# Location: ~/.course-qa/config.toml (or $COURSE_QA_HOME/config.toml)

# Anthropic model used to answer questions
[model]
name = "${DEFAULT_CONFIG.model.name}"
max_retries = ${DEFAULT_CONFIG.model.max_retries}
timeout_ms = ${DEFAULT_CONFIG.model.timeout_ms}

# Tool orchestration
# The model may search course content for up to max_tool_rounds rounds,
# then answers without tools.
[agent]
max_tool_rounds = ${DEFAULT_CONFIG.agent.max_tool_rounds}
max_tokens = ${DEFAULT_CONFIG.agent.max_tokens}
temperature = ${DEFAULT_CONFIG.agent.temperature}

[search]
max_results = ${DEFAULT_CONFIG.search.max_results}

# Applied when ingesting course documents
[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}

# Exchanges remembered per chat session
[session]
max_history = ${DEFAULT_CONFIG.session.max_history}

[database]
# path = "/path/to/courses.db"

# Langfuse tracing is active only when both keys are available
[observability]
enabled = ${DEFAULT_CONFIG.observability.enabled}
langfuse_host = "${DEFAULT_CONFIG.observability.langfuse_host}"
# langfuse_public_key = "pk-lf-..."  # or set LANGFUSE_PUBLIC_KEY env var
# langfuse_secret_key = "sk-lf-..."  # or set LANGFUSE_SECRET_KEY env var
`;
