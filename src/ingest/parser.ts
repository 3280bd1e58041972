/**
 * Course Document Parser
 *
 * Document layout:
 *
 * ```
 * Course Title: <title>
 * Course Link: <url>
 * Course Instructor: <name>
 *
 * Lesson <n>: <lesson title>
 * Lesson Link: <url>
 * <lesson body ...>
 * ```
 *
 * Only the title is expected; it falls back to the file name. Text between
 * the header and the first lesson becomes course-level content.
 */

import { basename, extname } from 'node:path';
import type { CourseChunk, Lesson } from '../catalog/types.js';
import { chunkText } from './chunker.js';
import { DEFAULT_CHUNKING, type ChunkingOptions, type ParsedCourse } from './types.js';

const COURSE_TITLE = /^Course Title:\s*(.+)$/i;
const COURSE_LINK = /^Course Link:\s*(.+)$/i;
const COURSE_INSTRUCTOR = /^Course Instructor:\s*(.+)$/i;
const LESSON_MARKER = /^Lesson\s+(\d+)\s*:\s*(.+)$/i;
const LESSON_LINK = /^Lesson Link:\s*(.+)$/i;

interface LessonSection {
  lesson: Lesson;
  body: string[];
}

function capture(pattern: RegExp, line: string): string | undefined {
  return pattern.exec(line)?.[1]?.trim();
}

export function titleFromFileName(fileName: string): string {
  return basename(fileName, extname(fileName)).trim();
}

export function parseCourseDocument(
  content: string,
  fileName: string,
  chunking: ChunkingOptions = DEFAULT_CHUNKING
): ParsedCourse {
  let title: string | undefined;
  let link: string | undefined;
  let instructor: string | undefined;
  const preamble: string[] = [];
  const sections: LessonSection[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    const current = sections[sections.length - 1];

    const marker = LESSON_MARKER.exec(line);
    if (marker?.[1] !== undefined && marker[2] !== undefined) {
      sections.push({
        lesson: { lessonNumber: Number.parseInt(marker[1], 10), title: marker[2].trim() },
        body: [],
      });
      continue;
    }

    if (current === undefined) {
      const courseTitle = title === undefined ? capture(COURSE_TITLE, line) : undefined;
      const courseLink = capture(COURSE_LINK, line);
      const courseInstructor = capture(COURSE_INSTRUCTOR, line);

      if (courseTitle !== undefined) title = courseTitle;
      else if (courseLink !== undefined) link = courseLink;
      else if (courseInstructor !== undefined) instructor = courseInstructor;
      else preamble.push(line);
      continue;
    }

    // A link line directly under the marker belongs to the lesson
    const lessonLink = capture(LESSON_LINK, line);
    if (lessonLink !== undefined && current.lesson.link === undefined && current.body.every((l) => l === '')) {
      current.lesson.link = lessonLink;
      continue;
    }

    current.body.push(line);
  }

  const courseTitle = title ?? titleFromFileName(fileName);
  const chunks: CourseChunk[] = [];

  const addChunks = (text: string, lessonNumber?: number): void => {
    for (const piece of chunkText(text, chunking)) {
      chunks.push({ courseTitle, lessonNumber, chunkIndex: chunks.length, content: piece });
    }
  };

  addChunks(preamble.join('\n'));
  for (const section of sections) {
    addChunks(section.body.join('\n'), section.lesson.lessonNumber);
  }

  return {
    course: {
      title: courseTitle,
      link,
      instructor,
      lessons: sections.map((section) => section.lesson),
    },
    chunks,
  };
}
