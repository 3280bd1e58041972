/**
 * Anthropic Model Client
 *
 * Adapts `messages.create` from @anthropic-ai/sdk to the ModelClient seam.
 * Conversation turns are mapped to message params on the way out, and the
 * response is decided into a ModelTurn on the way back.
 *
 * SECURITY: the API key is read only after validation passes and is never
 * logged or placed in an error message.
 */

import Anthropic from '@anthropic-ai/sdk';
import { APIKeyError } from '../errors/index.js';
import { AgentError, type ConversationTurn, type ModelClient, type ModelRequest, type ModelTurn, type ToolCallRequest } from '../agent/types.js';
import { validateAnthropicKey } from './validation.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';

/** The response fields the client reads */
export interface MessageResponse {
  content: ReadonlyArray<{ type: string; text?: string; id?: string; name?: string; input?: unknown }>;
  stop_reason: string | null;
  usage: { input_tokens: number; output_tokens: number };
}

/** The slice of the SDK client used here; tests pass a fake */
export interface MessagesApi {
  create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<MessageResponse>;
}

export interface AnthropicModelClientOptions {
  /** @default 'claude-sonnet-4-20250514' */
  model?: string;
  /** Request timeout in milliseconds. @default 60000 */
  timeout?: number;
  /** SDK-level retries. @default 2 */
  maxRetries?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toMessageParams(turns: readonly ConversationTurn[]): Anthropic.MessageParam[] {
  return turns.map((turn): Anthropic.MessageParam => {
    switch (turn.type) {
      case 'user_message':
        return { role: 'user', content: turn.text };

      case 'assistant_message': {
        const content: Anthropic.ContentBlockParam[] = [];
        // The API rejects empty text blocks
        if (turn.text !== '') {
          content.push({ type: 'text', text: turn.text });
        }
        for (const call of turn.toolCalls) {
          content.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
        }
        return { role: 'assistant', content };
      }

      case 'tool_results':
        return {
          role: 'user',
          content: turn.results.map(
            (result): Anthropic.ToolResultBlockParam => ({
              type: 'tool_result',
              tool_use_id: result.toolCallId,
              content: result.content,
            })
          ),
        };
    }
  });
}

export function toModelTurn(response: MessageResponse): ModelTurn {
  const text: string[] = [];
  const calls: ToolCallRequest[] = [];

  for (const block of response.content) {
    if (block.type === 'text' && block.text !== undefined) {
      text.push(block.text);
    } else if (block.type === 'tool_use') {
      if (block.id === undefined || block.name === undefined) {
        throw AgentError.modelResponseInvalid('tool_use block without id or name');
      }
      if (!isRecord(block.input)) {
        throw AgentError.modelResponseInvalid(`input of tool_use block ${block.id} is not an object`);
      }
      calls.push({ id: block.id, name: block.name, arguments: block.input });
    }
  }

  const usage = {
    inputTokens: response.usage.input_tokens,
    outputTokens: response.usage.output_tokens,
  };

  if (response.stop_reason === 'tool_use' && calls.length > 0) {
    return { kind: 'tool_calls', text: text.join(''), calls, usage };
  }
  return { kind: 'completed', text: text.join(''), usage };
}

export class AnthropicModelClient implements ModelClient {
  constructor(
    private readonly messages: MessagesApi,
    readonly model: string = DEFAULT_ANTHROPIC_MODEL
  ) {}

  async create(request: ModelRequest): Promise<ModelTurn> {
    const response = await this.messages.create({
      model: this.model,
      system: request.system,
      messages: toMessageParams(request.messages),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      ...(request.tools !== undefined && { tools: request.tools }),
      ...(request.toolChoice !== undefined && { tool_choice: { type: request.toolChoice } }),
    });
    return toModelTurn(response);
  }
}

/**
 * Create a client backed by the Anthropic API.
 *
 * @throws APIKeyError when ANTHROPIC_API_KEY is missing or malformed
 *
 * @example
 * ```typescript
 * const client = createAnthropicModelClient({ model: config.model.name });
 * const turn = await client.create({ messages, system, temperature: 0, maxTokens: 800 });
 * ```
 */
export function createAnthropicModelClient(options: AnthropicModelClientOptions = {}): ModelClient {
  const validation = validateAnthropicKey();
  if (!validation.valid) {
    throw new APIKeyError('anthropic', validation.error, validation.setupInstructions);
  }

  const sdk = new Anthropic({
    apiKey: validation.apiKey,
    timeout: options.timeout ?? 60_000,
    maxRetries: options.maxRetries ?? 2,
  });

  return new AnthropicModelClient(
    { create: (params) => sdk.messages.create(params) },
    options.model ?? DEFAULT_ANTHROPIC_MODEL
  );
}
