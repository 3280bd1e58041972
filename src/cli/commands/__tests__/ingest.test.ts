/**
 * Tests for ingest command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { join } from 'node:path';
import { createIngestCommand } from '../ingest.js';
import { createTempHome, createTestContext, removeTempHome, type TempHome, type TestContext } from './setup.js';

function run(test: TestContext, ...args: string[]): Promise<Command> {
  return new Command().addCommand(createIngestCommand(() => test.ctx)).parseAsync(['node', 'test', 'ingest', ...args]);
}

describe('createIngestCommand', () => {
  let temp: TempHome;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    temp = createTempHome();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    // ora writes to stderr
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeTempHome(temp);
  });

  it('has name and description', () => {
    const cmd = createIngestCommand(() => createTestContext().ctx);
    expect(cmd.name()).toBe('ingest');
    expect(cmd.description()).toBe('Index a folder of course documents');
  });

  it('reports counts as JSON', async () => {
    const test = createTestContext({ json: true });
    await run(test, temp.courses);

    const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output).toEqual({ coursesAdded: 1, chunksAdded: 2, skipped: 0, failed: 0, totalCourses: 1 });
  });

  it('skips courses already indexed on a second run', async () => {
    await run(createTestContext(), temp.courses);

    const test = createTestContext({ json: true });
    await run(test, temp.courses);

    const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output).toEqual({ coursesAdded: 0, chunksAdded: 0, skipped: 1, failed: 0, totalCourses: 1 });
  });

  it('re-adds everything with --clear', async () => {
    await run(createTestContext(), temp.courses);

    const test = createTestContext({ json: true });
    await run(test, temp.courses, '--clear');

    const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output).toEqual({ coursesAdded: 1, chunksAdded: 2, skipped: 0, failed: 0, totalCourses: 1 });
  });

  it('logs the total in text mode', async () => {
    const test = createTestContext();
    await run(test, temp.courses);

    expect(test.logs).toHaveLength(1);
    expect(test.logs[0]).toContain('1 course(s) indexed in total');
  });

  it('rejects a folder that does not exist', async () => {
    const missing = join(temp.home, 'nowhere');
    await expect(run(createTestContext(), missing)).rejects.toThrow(`Path does not exist: ${missing}`);
  });
});
