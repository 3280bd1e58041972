/**
 * Table Formatting Utility
 *
 * Box-drawn tables for the `cqa courses` listing.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column {
  header: string;
  /** Data key to look up in rows */
  key: string;
  align?: Alignment;
  /** Truncate longer cells with an ellipsis */
  maxWidth?: number;
}

export type Row = Record<string, string | number | null | undefined>;

const BOX = {
  top: ['┌', '┬', '┐'],
  middle: ['├', '┼', '┤'],
  bottom: ['└', '┴', '┘'],
  horizontal: '─',
  vertical: '│',
} as const;

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

function cellText(row: Row, column: Column): string {
  const value = row[column.key];
  const text = value === null || value === undefined ? '' : String(value);

  if (column.maxWidth !== undefined && text.length > column.maxWidth) {
    return text.slice(0, Math.max(column.maxWidth - 1, 0)) + '…';
  }
  return text;
}

function pad(text: string, width: number, align: Alignment): string {
  const padding = ' '.repeat(Math.max(width - visibleLength(text), 0));
  return align === 'right' ? padding + text : text + padding;
}

/**
 * Format rows as a table.
 *
 * @example
 * ```ts
 * formatTable(
 *   [{ header: 'Course', key: 'title' }, { header: 'Lessons', key: 'lessons', align: 'right' }],
 *   [{ title: 'Intro to Testing', lessons: 4 }]
 * );
 * // ┌──────────────────┬─────────┐
 * // │ Course           │ Lessons │
 * // ├──────────────────┼─────────┤
 * // │ Intro to Testing │       4 │
 * // └──────────────────┴─────────┘
 * ```
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const cells = rows.map((row) => columns.map((column) => cellText(row, column)));
  const widths = columns.map((column, i) =>
    Math.max(visibleLength(column.header), ...cells.map((rowCells) => visibleLength(rowCells[i] ?? '')))
  );

  const rule = ([left, join, right]: readonly [string, string, string]): string =>
    left + widths.map((width) => BOX.horizontal.repeat(width + 2)).join(join) + right;

  const line = (values: string[], header = false): string =>
    BOX.vertical +
    columns
      .map((column, i) => {
        const padded = pad(values[i] ?? '', widths[i] ?? 0, column.align ?? 'left');
        return ` ${header ? chalk.bold(padded) : padded} `;
      })
      .join(BOX.vertical) +
    BOX.vertical;

  return [
    rule(BOX.top),
    line(columns.map((column) => column.header), true),
    rule(BOX.middle),
    ...cells.map((rowCells) => line(rowCells)),
    rule(BOX.bottom),
  ].join('\n');
}
