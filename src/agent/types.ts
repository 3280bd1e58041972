/**
 * Agent Types
 *
 * Conversation turns, model turns and the model client seam used by the
 * tool orchestration loop.
 */

import type { ToolSchema } from './tools/types.js';

// ============================================================================
// Errors
// ============================================================================

export type AgentErrorCode = 'TOOL_INPUT_INVALID' | 'MODEL_RESPONSE_INVALID';

/**
 * Agent-level failure.
 *
 * Thrown inside tools and model adapters; the orchestration loop turns it
 * into text, so it never reaches the CLI on its own.
 */
export class AgentError extends Error {
  readonly code: AgentErrorCode;

  constructor(message: string, code: AgentErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AgentError';
    this.code = code;
  }

  static toolInputInvalid(toolName: string, issues: readonly string[]): AgentError {
    return new AgentError(`Invalid arguments for ${toolName}: ${issues.join('; ')}`, 'TOOL_INPUT_INVALID');
  }

  static modelResponseInvalid(reason: string): AgentError {
    return new AgentError(`Invalid model response: ${reason}`, 'MODEL_RESPONSE_INVALID');
  }
}

// ============================================================================
// Conversation
// ============================================================================

export interface ToolCallRequest {
  /** Opaque id assigned by the model; results must echo it */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolResult {
  toolCallId: string;
  content: string;
}

export type ConversationTurn =
  | { type: 'user_message'; text: string }
  | { type: 'assistant_message'; text: string; toolCalls: ToolCallRequest[] }
  | { type: 'tool_results'; results: ToolResult[] };

// ============================================================================
// Model client
// ============================================================================

export interface ModelUsage {
  inputTokens: number;
  outputTokens: number;
}

/** What one model call produced, decided right after the call returns */
export type ModelTurn =
  | { kind: 'completed'; text: string; usage?: ModelUsage }
  | { kind: 'tool_calls'; text: string; calls: ToolCallRequest[]; usage?: ModelUsage }
  | { kind: 'failed'; message: string };

export interface ModelRequest {
  messages: readonly ConversationTurn[];
  system: string;
  temperature: number;
  maxTokens: number;
  /** Offered tools; omitted on the forced final call */
  tools?: ToolSchema[];
  toolChoice?: 'auto';
}

export interface ModelClient {
  /** Model identifier, for tracing */
  readonly model: string;
  /** Resolves with a completed or tool_calls turn; throws on call failure */
  create(request: ModelRequest): Promise<ModelTurn>;
}

// ============================================================================
// Orchestration
// ============================================================================

export interface GenerationSettings {
  /** Tool-bearing rounds before the forced final call (default: 2) */
  maxRounds: number;
  maxTokens: number;
  temperature: number;
}

export const DEFAULT_GENERATION: GenerationSettings = {
  maxRounds: 2,
  maxTokens: 800,
  temperature: 0,
};

/** Sources shown next to an answer */
export interface Citation {
  text: string;
  url?: string;
}

export interface QueryResult {
  answer: string;
  sources: Citation[];
}
