/**
 * Providers Module
 *
 * The generative model behind the orchestration loop.
 *
 * ```typescript
 * const client = createAnthropicModelClient({ model: config.model.name });
 * ```
 */

export {
  AnthropicModelClient,
  createAnthropicModelClient,
  toMessageParams,
  toModelTurn,
  DEFAULT_ANTHROPIC_MODEL,
  type AnthropicModelClientOptions,
  type MessageResponse,
  type MessagesApi,
} from './anthropic.js';
export { validateAnthropicKey, AnthropicKeySchema, type ValidationResult } from './validation.js';
