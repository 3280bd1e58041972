/**
 * Course Search Tool
 *
 * Lets the model search course content, optionally narrowed to one course
 * (fuzzy name) and one lesson. Each execution replaces the tool's
 * citations with the sources of its own results.
 */

import { z } from 'zod';
import type { CourseCatalog, SearchResultSet } from '../../catalog/types.js';
import { isEmptyResultSet } from '../../catalog/types.js';
import type { Citation } from '../types.js';
import { parseToolArguments } from './arguments.js';
import type { CitingTool, ToolSchema } from './types.js';

const SearchArgumentsSchema = z.object({
  query: z.string().trim(),
  course_name: z
    .string()
    .nullish()
    .transform((value) => value ?? undefined),
  lesson_number: z
    .number()
    .int()
    .nullish()
    .transform((value) => value ?? undefined),
});

export class CourseSearchTool implements CitingTool {
  readonly name = 'search_course_content';
  private citations: Citation[] = [];

  constructor(private readonly catalog: CourseCatalog) {}

  schema(): ToolSchema {
    return {
      name: this.name,
      description: 'Search course materials with smart course name matching and lesson filtering',
      input_schema: {
        type: 'object',
        properties: {
          query: {
            type: 'string',
            description: 'What to search for in the course content',
          },
          course_name: {
            type: 'string',
            description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
          },
          lesson_number: {
            type: 'integer',
            description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
          },
        },
        required: ['query'],
      },
    };
  }

  async execute(args: Record<string, unknown>): Promise<string> {
    this.citations = [];
    const { query, course_name, lesson_number } = parseToolArguments(this.name, SearchArgumentsSchema, args);

    const results = await this.catalog.search(query, {
      courseName: course_name,
      lessonNumber: lesson_number,
    });

    if (results.error !== null) {
      return results.error;
    }

    if (isEmptyResultSet(results)) {
      let message = 'No relevant content found';
      if (course_name !== undefined) message += ` in course '${course_name}'`;
      if (lesson_number !== undefined) message += ` in lesson ${lesson_number}`;
      return `${message}.`;
    }

    const { blocks, citations } = await this.formatResults(results);
    this.citations = citations;
    return blocks.join('\n\n');
  }

  peekCitations(): readonly Citation[] {
    return this.citations;
  }

  takeCitations(): Citation[] {
    const taken = this.citations;
    this.citations = [];
    return taken;
  }

  private async formatResults(results: SearchResultSet): Promise<{ blocks: string[]; citations: Citation[] }> {
    const blocks: string[] = [];
    const citations: Citation[] = [];

    for (const [i, document] of results.documents.entries()) {
      const meta = results.metadata[i];
      const courseTitle = meta?.courseTitle ?? 'unknown';
      const lessonNumber = meta?.lessonNumber;

      if (lessonNumber === undefined) {
        blocks.push(`[${courseTitle}]\n${document}`);
        citations.push({ text: courseTitle });
        continue;
      }

      blocks.push(`[${courseTitle} - Lesson ${lessonNumber}]\n${document}`);
      const lesson = await this.catalog.getLessonInfo(courseTitle, lessonNumber);
      citations.push({
        text: lesson.title !== null ? `Lesson ${lessonNumber}: ${lesson.title}` : `Lesson ${lessonNumber}`,
        ...(lesson.link !== null && { url: lesson.link }),
      });
    }

    return { blocks, citations };
  }
}
