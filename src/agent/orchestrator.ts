/**
 * Tool Orchestrator
 *
 * Drives the model through bounded rounds of tool use:
 *
 * ```
 * round n (tools offered)
 *   ├── completed      → return text
 *   ├── failed         → return "Error: <message>"
 *   └── tool_calls     → run each call in order, append call + results
 *         ├── n < maxRounds  → round n + 1
 *         └── n = maxRounds  → forced final call without tools → return text
 * ```
 *
 * At most `maxRounds + 1` model calls are made per query. Every exit is a
 * string; tool failures become tool results and model failures become the
 * returned text, so nothing thrown by a tool or the model escapes.
 */

import { NOOP_TRACE } from '../observability/noop-tracer.js';
import type { TraceHandle } from '../observability/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { buildSystemContext, buildSystemPrompt } from './system-prompt.js';
import type { ToolRegistry } from './tools/registry.js';
import type { ToolSchema } from './tools/types.js';
import {
  DEFAULT_GENERATION,
  type ConversationTurn,
  type GenerationSettings,
  type ModelClient,
  type ModelTurn,
  type ToolCallRequest,
  type ToolResult,
} from './types.js';

export const NO_RESPONSE = 'No response generated';

export interface ToolOrchestratorOptions {
  client: ModelClient;
  settings?: Partial<GenerationSettings>;
  /** Replaces the built-in instructions */
  systemPrompt?: string;
  logger?: Logger;
}

export interface GenerateRequest {
  query: string;
  /** Formatted prior exchanges, appended to the system text */
  history?: string | null;
  /** Without a registry (or with an empty one) no tools are offered */
  registry?: ToolRegistry;
  trace?: TraceHandle;
}

/** Loop-local state; never shared between queries */
interface ConversationState {
  messages: ConversationTurn[];
  roundCount: number;
  maxRounds: number;
  tools: ToolSchema[] | undefined;
  registry: ToolRegistry | undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ToolOrchestrator {
  private readonly client: ModelClient;
  private readonly settings: GenerationSettings;
  private readonly systemPrompt: string;
  private readonly logger: Logger;

  constructor(options: ToolOrchestratorOptions) {
    this.client = options.client;
    this.settings = { ...DEFAULT_GENERATION, ...options.settings };
    this.systemPrompt = options.systemPrompt ?? buildSystemPrompt(this.settings.maxRounds);
    this.logger = options.logger ?? silentLogger;
  }

  async generate(request: GenerateRequest): Promise<string> {
    const registry = request.registry !== undefined && request.registry.size > 0 ? request.registry : undefined;
    const state: ConversationState = {
      messages: [{ type: 'user_message', text: request.query }],
      roundCount: 0,
      maxRounds: this.settings.maxRounds,
      tools: registry?.getSchemas(),
      registry,
    };
    const system = buildSystemContext(this.systemPrompt, request.history);
    const trace = request.trace ?? NOOP_TRACE;

    for (;;) {
      const offerTools = state.tools !== undefined && state.roundCount < state.maxRounds;
      const round = state.roundCount + 1;
      const turn = await this.callModel(state, system, offerTools, round, trace);

      switch (turn.kind) {
        case 'failed':
          this.logger.debug?.(`[agent] Round ${round}: model call failed: ${turn.message}`);
          return `Error: ${turn.message}`;

        case 'completed':
          this.logger.debug?.(`[agent] Round ${round}: completed`);
          return turn.text || NO_RESPONSE;

        case 'tool_calls': {
          if (!offerTools || state.registry === undefined) {
            // Forced final call (or no tools at all): take whatever text came back
            this.logger.debug?.(`[agent] Round ${round}: tool calls ignored, no tools offered`);
            return turn.text || NO_RESPONSE;
          }

          this.logger.debug?.(
            `[agent] Round ${round}: ${turn.calls.length} tool call(s): ${turn.calls.map((c) => c.name).join(', ')}`
          );
          const results = await this.executeToolCalls(turn.calls, state.registry, trace);
          state.messages.push(
            { type: 'assistant_message', text: turn.text, toolCalls: turn.calls },
            { type: 'tool_results', results }
          );
          state.roundCount++;

          if (state.roundCount >= state.maxRounds) {
            this.logger.debug?.(`[agent] Round limit (${state.maxRounds}) reached, forcing final answer`);
          }
          break;
        }
      }
    }
  }

  private async callModel(
    state: ConversationState,
    system: string,
    offerTools: boolean,
    round: number,
    trace: TraceHandle
  ): Promise<ModelTurn> {
    const generation = trace.generation({
      name: offerTools ? `model-round-${round}` : 'model-final',
      model: this.client.model,
      input: { messages: state.messages.length, toolsOffered: offerTools },
      metadata: { round },
    });

    let turn: ModelTurn;
    try {
      turn = await this.client.create({
        messages: [...state.messages],
        system,
        temperature: this.settings.temperature,
        maxTokens: this.settings.maxTokens,
        ...(offerTools && state.tools !== undefined && { tools: state.tools, toolChoice: 'auto' as const }),
      });
    } catch (error) {
      turn = { kind: 'failed', message: errorMessage(error) };
    }

    if (turn.kind === 'failed') {
      generation.update({ error: turn.message });
    } else {
      generation.update({
        output: turn.text,
        metadata: { stop: turn.kind },
        ...(turn.usage !== undefined && {
          usage: {
            input: turn.usage.inputTokens,
            output: turn.usage.outputTokens,
            total: turn.usage.inputTokens + turn.usage.outputTokens,
          },
        }),
      });
    }
    generation.end();

    return turn;
  }

  /**
   * Run calls one at a time, in request order. Each call yields exactly
   * one result carrying the call's id.
   */
  private async executeToolCalls(
    calls: readonly ToolCallRequest[],
    registry: ToolRegistry,
    trace: TraceHandle
  ): Promise<ToolResult[]> {
    const results: ToolResult[] = [];

    for (const call of calls) {
      const span = trace.span({ name: `tool:${call.name}`, input: call.arguments });
      let content: string;

      try {
        content = await registry.execute(call.name, call.arguments);
        span.update({ metadata: { outputLength: content.length, failed: false } });
      } catch (error) {
        content = `Tool execution failed: ${errorMessage(error)}`;
        this.logger.debug?.(`[agent] ${call.name} threw: ${errorMessage(error)}`);
        span.update({ error: errorMessage(error), metadata: { failed: true } });
      }

      span.end();
      results.push({ toolCallId: call.id, content });
    }

    return results;
  }
}
