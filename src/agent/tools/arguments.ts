import type { z } from 'zod';
import { AgentError } from '../types.js';

/**
 * Validate model-supplied tool arguments against a zod schema.
 *
 * @throws AgentError (TOOL_INPUT_INVALID) listing every bad field
 */
export function parseToolArguments<T extends z.ZodTypeAny>(
  toolName: string,
  schema: T,
  args: Record<string, unknown>
): z.output<T> {
  const result = schema.safeParse(args);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw AgentError.toolInputInvalid(toolName, issues);
  }
  return result.data;
}
