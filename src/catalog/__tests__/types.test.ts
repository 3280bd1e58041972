/**
 * Search Result Set and Outline Helper Tests
 */

import { describe, expect, it } from 'vitest';
import { formatCourseOutline, isEmptyResultSet, searchFailure, searchResultSet } from '../types.js';

describe('SearchResultSet helpers', () => {
  it('aligns hits positionally', () => {
    const set = searchResultSet([
      { document: 'first', metadata: { courseTitle: 'A', lessonNumber: 1, chunkIndex: 0 }, distance: 0.2 },
      { document: 'second', metadata: { courseTitle: 'B', chunkIndex: 4 }, distance: 0.5 },
    ]);

    expect(set).toEqual({
      documents: ['first', 'second'],
      metadata: [
        { courseTitle: 'A', lessonNumber: 1, chunkIndex: 0 },
        { courseTitle: 'B', chunkIndex: 4 },
      ],
      distances: [0.2, 0.5],
      error: null,
    });
  });

  it('keeps empty, error and populated sets distinct', () => {
    const empty = searchResultSet([]);
    const failed = searchFailure('Index unavailable');
    const populated = searchResultSet([
      { document: 'x', metadata: { courseTitle: 'A', chunkIndex: 0 }, distance: 0.1 },
    ]);

    expect(isEmptyResultSet(empty)).toBe(true);
    expect(isEmptyResultSet(failed)).toBe(false);
    expect(isEmptyResultSet(populated)).toBe(false);
    expect(failed).toEqual({ documents: [], metadata: [], distances: [], error: 'Index unavailable' });
  });
});

describe('formatCourseOutline', () => {
  it('prints a course without lessons', () => {
    expect(formatCourseOutline({ title: 'Empty Course', link: 'https://example.com/empty', lessons: [] })).toBe(
      'Course: Empty Course\nLink: https://example.com/empty\n\nLessons (0):'
    );
  });
});
