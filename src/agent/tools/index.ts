/**
 * Agent Tools
 *
 * Tools the model may call during a query, and the registry that
 * dispatches those calls by name.
 */

export { ToolRegistry } from './registry.js';
export { CourseSearchTool } from './course-search-tool.js';
export { CourseOutlineTool } from './course-outline-tool.js';
export { parseToolArguments } from './arguments.js';
export { isCitingTool, type Tool, type CitingTool, type ToolSchema, type JsonSchemaProperty } from './types.js';
