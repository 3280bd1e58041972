/**
 * Validation Module Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ChunkMatchRowSchema,
  CountRowSchema,
  CourseRowSchema,
  LessonRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
} from '../validation.js';

describe('Row schemas', () => {
  it('accepts a course row with nullable fields', () => {
    const result = CourseRowSchema.safeParse({
      title: 'Introduction to Machine Learning',
      link: null,
      instructor: null,
      source_file: 'course1.txt',
      created_at: '2026-01-05 10:00:00',
    });

    expect(result.success).toBe(true);
  });

  it('rejects a lesson row with a fractional lesson number', () => {
    const result = LessonRowSchema.safeParse({
      course_title: 'Intro',
      lesson_number: 1.5,
      title: 'Basics',
      link: null,
    });

    expect(result.success).toBe(false);
  });

  it('allows chunks without a lesson', () => {
    const result = ChunkMatchRowSchema.safeParse({
      content: 'Course overview',
      course_title: 'Intro',
      lesson_number: null,
      chunk_index: 0,
      score: -1.25,
    });

    expect(result.success).toBe(true);
  });
});

describe('validateRow', () => {
  it('returns the typed row', () => {
    const row = validateRow(
      LessonRowSchema,
      { course_title: 'Intro', lesson_number: 2, title: 'Regression', link: 'https://example.com/2' },
      'lessons'
    );

    expect(row.title).toBe('Regression');
  });

  it('throws SchemaValidationError with the context and issues', () => {
    let caught: unknown;
    try {
      validateRow(LessonRowSchema, { course_title: 'Intro' }, 'lessons.course_title=Intro');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaValidationError);
    if (caught instanceof SchemaValidationError) {
      expect(caught.message).toBe('Database schema mismatch in lessons.course_title=Intro');
      expect(caught.code).toBe(5);
      expect(caught.issues.map((issue) => issue.path)).toEqual(['lesson_number', 'title', 'link']);
      expect(caught.hint).toContain('cqa ingest <folder> --clear');
    }
  });
});

describe('validateRows', () => {
  it('names the index of the first invalid row', () => {
    const rows = [
      { course_title: 'Intro', lesson_number: 1, title: 'One', link: null },
      { course_title: 'Intro', lesson_number: 'two', title: 'Two', link: null },
    ];

    expect(() => validateRows(LessonRowSchema, rows, 'lessons')).toThrow(
      'Database schema mismatch in lessons[1]'
    );
  });

  it('returns every row when all are valid', () => {
    expect(validateRows(CountRowSchema, [{ count: 3 }, { count: 0 }], 'counts')).toEqual([
      { count: 3 },
      { count: 0 },
    ]);
  });
});
