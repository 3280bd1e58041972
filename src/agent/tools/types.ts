/**
 * Tool Types
 *
 * A tool is a named capability the model can call with JSON arguments.
 * Its schema is an Anthropic tool definition as-is.
 */

import type { Citation } from '../types.js';

export interface JsonSchemaProperty {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description: string;
}

export interface ToolSchema {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

export interface Tool {
  readonly name: string;
  schema(): ToolSchema;
  /** Returns text for the model. May throw; the orchestrator reports it. */
  execute(args: Record<string, unknown>): Promise<string>;
}

/** A tool whose executions produce citations for the answer */
export interface CitingTool extends Tool {
  /** Citations from the most recent execution */
  peekCitations(): readonly Citation[];
  /** Return the current citations and clear them */
  takeCitations(): Citation[];
}

export function isCitingTool(tool: Tool): tool is CitingTool {
  return 'takeCitations' in tool && typeof tool.takeCitations === 'function';
}
