/**
 * Tool Registry
 *
 * Name-keyed tools, kept in registration order. Re-registering a name
 * replaces the tool in its original slot.
 */

import type { Citation } from '../types.js';
import { isCitingTool, type Tool, type ToolSchema } from './types.js';

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  constructor(tools: readonly Tool[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: Tool): void {
    this.tools.set(tool.name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  getSchemas(): ToolSchema[] {
    return [...this.tools.values()].map((tool) => tool.schema());
  }

  /**
   * Run a tool by name. An unknown name is reported as text, not thrown.
   */
  async execute(name: string, args: Record<string, unknown>): Promise<string> {
    const tool = this.tools.get(name);
    if (tool === undefined) {
      return `Tool '${name}' not found`;
    }
    return tool.execute(args);
  }

  collectCitations(): Citation[] {
    return this.citingTools().flatMap((tool) => [...tool.peekCitations()]);
  }

  clearCitations(): void {
    for (const tool of this.citingTools()) {
      tool.takeCitations();
    }
  }

  /** Collect and clear in one step */
  takeCitations(): Citation[] {
    return this.citingTools().flatMap((tool) => tool.takeCitations());
  }

  private citingTools() {
    return [...this.tools.values()].filter(isCitingTool);
  }
}
