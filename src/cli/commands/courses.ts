/**
 * Courses Command
 *
 *   cqa courses               - Table of indexed courses
 *   cqa courses "mcp"         - Outline of one course (partial names resolve)
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../config/loader.js';
import { CLIError } from '../../errors/index.js';
import { formatCourseOutline } from '../../catalog/types.js';
import { formatTable, type Column } from '../../utils/table.js';
import { openCourseStore } from '../store.js';
import type { CommandContext } from '../types.js';

const COURSE_COLUMNS: Column[] = [
  { header: 'Title', key: 'title', maxWidth: 48 },
  { header: 'Instructor', key: 'instructor', maxWidth: 24 },
  { header: 'Lessons', key: 'lessons', align: 'right' },
  { header: 'Chunks', key: 'chunks', align: 'right' },
];

export function createCoursesCommand(getContext: () => CommandContext): Command {
  return new Command('courses')
    .description('List indexed courses, or show the outline of one')
    .argument('[name]', 'Course name (partial names are resolved)')
    .action(async (name: string | undefined) => {
      const ctx = getContext();
      const store = openCourseStore(loadConfig(), ctx);

      if (name !== undefined) {
        const title = await store.resolveCourseName(name);
        const course = title === null ? null : store.getCourse(title);
        if (course === null) {
          throw new CLIError(`No course found matching '${name}'`, 'Run: cqa courses  to see indexed courses');
        }

        if (ctx.options.json) {
          console.log(JSON.stringify(course, null, 2));
        } else {
          ctx.log(formatCourseOutline(course));
        }
        return;
      }

      const courses = store.listCourses();

      if (ctx.options.json) {
        console.log(JSON.stringify(courses, null, 2));
        return;
      }

      if (courses.length === 0) {
        ctx.log('No courses indexed yet.');
        ctx.log(`Run ${chalk.cyan('cqa ingest <folder>')} to add some.`);
        return;
      }

      ctx.log(
        formatTable(
          COURSE_COLUMNS,
          courses.map((course) => ({
            title: course.title,
            instructor: course.instructor,
            lessons: course.lessonCount,
            chunks: course.chunkCount,
          }))
        )
      );
      ctx.log('');
      ctx.log(chalk.dim(`${courses.length} course(s)`));
    });
}
