/**
 * Tests for chat command
 *
 * The REPL reads from an in-memory stream; answers come from a scripted
 * model client.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { PassThrough, Readable } from 'node:stream';
import { createChatCommand, parseReplCommand } from '../chat.js';
import { createAnthropicModelClient } from '../../../providers/anthropic.js';
import { HISTORY_HEADER } from '../../../agent/system-prompt.js';
import { completed, scriptedClient } from '../../../test-utils/fakes.js';
import { createTempHome, createTestContext, removeTempHome, type TempHome, type TestContext } from './setup.js';

vi.mock('../../../providers/anthropic.js', () => ({
  createAnthropicModelClient: vi.fn(),
}));

function run(test: TestContext, lines: string[]): Promise<Command> {
  const input = Readable.from(lines.map((line) => `${line}\n`));
  const output = new PassThrough();
  output.resume();

  return new Command()
    .addCommand(createChatCommand(() => test.ctx, { input, output }))
    .parseAsync(['node', 'test', 'chat']);
}

describe('parseReplCommand', () => {
  it.each([
    ['/exit', 'exit'],
    ['exit', 'exit'],
    ['QUIT', 'exit'],
    ['/quit', 'exit'],
    ['/clear', 'clear'],
    [' /help ', 'help'],
  ])('parses %j as %s', (input, expected) => {
    expect(parseReplCommand(input)).toBe(expected);
  });

  it('treats unknown slash commands and text as questions', () => {
    expect(parseReplCommand('/focus mcp')).toBeNull();
    expect(parseReplCommand('What is lesson 1 about?')).toBeNull();
  });
});

describe('createChatCommand', () => {
  let temp: TempHome;

  beforeEach(() => {
    temp = createTempHome();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.mocked(createAnthropicModelClient).mockReset();
    removeTempHome(temp);
  });

  it('answers each question in order', async () => {
    vi.mocked(createAnthropicModelClient).mockReturnValue(
      scriptedClient(completed('First answer.'), completed('Second answer.'))
    );
    const test = createTestContext();

    await run(test, ['Question one?', 'Question two?', '/exit']);

    const answers = test.logs.filter((line) => line.endsWith('answer.'));
    expect(answers).toEqual(['First answer.', 'Second answer.']);
  });

  it('carries the previous exchange into the next request', async () => {
    const client = scriptedClient(completed('First answer.'), completed('Second answer.'));
    vi.mocked(createAnthropicModelClient).mockReturnValue(client);

    await run(createTestContext(), ['Question one?', 'Question two?', '/exit']);

    const second = client.create.mock.calls[1]?.[0];
    expect(second?.system.endsWith(
      `${HISTORY_HEADER}User: Answer this question about course materials: Question one?\nAssistant: First answer.`
    )).toBe(true);
  });

  it('forgets the conversation on /clear', async () => {
    const client = scriptedClient(completed('First answer.'), completed('Second answer.'));
    vi.mocked(createAnthropicModelClient).mockReturnValue(client);
    const test = createTestContext();

    await run(test, ['Question one?', '/clear', 'Question two?', '/exit']);

    const second = client.create.mock.calls[1]?.[0];
    expect(second?.system).not.toContain(HISTORY_HEADER);
    expect(test.logs.some((line) => line.includes('Conversation cleared.'))).toBe(true);
    expect(test.debugs).toContain('Clearing 2 message(s)');
  });

  it('keeps the same session across /clear', async () => {
    vi.mocked(createAnthropicModelClient).mockReturnValue(
      scriptedClient(completed('First answer.'), completed('Second answer.'))
    );
    const test = createTestContext();

    await run(test, ['Question one?', '/clear', 'Question two?', '/exit']);

    expect(test.debugs.filter((line) => line.startsWith('Session: '))).toHaveLength(1);
    expect(test.debugs.some((line) => line.startsWith('New session'))).toBe(false);
  });

  it('reports tracing as disabled without Langfuse keys', async () => {
    vi.mocked(createAnthropicModelClient).mockReturnValue(scriptedClient());
    const test = createTestContext();

    await run(test, ['/exit']);

    expect(test.debugs).toContain('Tracing disabled');
  });

  it('ignores lines after /exit', async () => {
    const client = scriptedClient(completed('First answer.'));
    vi.mocked(createAnthropicModelClient).mockReturnValue(client);

    await run(createTestContext(), ['/exit', 'Question one?']);

    expect(client.create).not.toHaveBeenCalled();
  });

  it('finishes at end of input without /exit', async () => {
    vi.mocked(createAnthropicModelClient).mockReturnValue(scriptedClient(completed('First answer.')));
    const test = createTestContext();

    await run(test, ['Question one?']);

    expect(test.logs).toContain('First answer.');
  });

  it('reports a failed question and keeps going', async () => {
    vi.mocked(createAnthropicModelClient).mockReturnValue(scriptedClient(completed('Only answer.')));
    const test = createTestContext();

    await run(test, ['Question one?', 'Question two?', '/exit']);

    // The second question runs out of scripted turns; the model error becomes the answer text
    expect(test.logs).toContain('Only answer.');
    expect(test.logs).toContain('Error: No scripted model turn left');
    expect(test.errors).toEqual([]);
  });

  it('warns when nothing is indexed', async () => {
    vi.mocked(createAnthropicModelClient).mockReturnValue(scriptedClient());
    const test = createTestContext();

    await run(test, ['/exit']);

    expect(test.warnings).toEqual(['No courses indexed yet. Run: cqa ingest <folder>']);
  });
});
