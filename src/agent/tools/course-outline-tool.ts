/**
 * Course Outline Tool
 *
 * Returns a course's title, link and lesson list. The text comes from the
 * catalog already formatted and is passed through untouched.
 */

import { z } from 'zod';
import type { CourseCatalog } from '../../catalog/types.js';
import { parseToolArguments } from './arguments.js';
import type { Tool, ToolSchema } from './types.js';

const OutlineArgumentsSchema = z.object({
  course_name: z.string().trim().min(1),
});

export class CourseOutlineTool implements Tool {
  readonly name = 'get_course_outline';

  constructor(private readonly catalog: CourseCatalog) {}

  schema(): ToolSchema {
    return {
      name: this.name,
      description: 'Get the outline of a course: its title, link and numbered list of lessons',
      input_schema: {
        type: 'object',
        properties: {
          course_name: {
            type: 'string',
            description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
          },
        },
        required: ['course_name'],
      },
    };
  }

  async execute(args: Record<string, unknown>): Promise<string> {
    const { course_name } = parseToolArguments(this.name, OutlineArgumentsSchema, args);

    const title = await this.catalog.resolveCourseName(course_name);
    const outline = title === null ? null : await this.catalog.getCourseOutline(title);

    return outline ?? `No course found matching '${course_name}'`;
  }
}
