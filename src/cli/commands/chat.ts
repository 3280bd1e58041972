/**
 * Chat Command
 *
 * Interactive REPL over one conversation session:
 *   cqa chat
 *
 * REPL commands: /clear empties the session history, /exit (or exit, quit) leaves.
 */

import * as readline from 'node:readline';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../config/loader.js';
import { createCourseQueryEngine, type CourseQueryEngine } from '../../agent/query-engine.js';
import { openCourseStore } from '../store.js';
import type { CommandContext } from '../types.js';
import { formatSources } from './ask.js';

export type ReplCommand = 'clear' | 'exit' | 'help';

export interface ChatStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const PROMPT = chalk.cyan('you> ');

const HELP_LINES = [
  chalk.bold('Commands:'),
  `  ${chalk.cyan('/clear')}  Forget the conversation so far`,
  `  ${chalk.cyan('/help')}   Show this help`,
  `  ${chalk.cyan('/exit')}   Leave the chat`,
];

/**
 * Recognize a REPL command. Anything else, including unknown slash
 * commands, is a question.
 */
export function parseReplCommand(input: string): ReplCommand | null {
  const trimmed = input.trim().toLowerCase();

  if (trimmed === 'exit' || trimmed === 'quit' || trimmed === '/exit' || trimmed === '/quit') {
    return 'exit';
  }
  if (trimmed === '/clear') return 'clear';
  if (trimmed === '/help') return 'help';
  return null;
}

interface ChatState {
  engine: CourseQueryEngine;
  readonly sessionId: string;
}

async function handleQuestion(question: string, state: ChatState, ctx: CommandContext): Promise<void> {
  const result = await state.engine.query(question, state.sessionId);
  await state.engine.flush();

  ctx.log('');
  ctx.log(result.answer);
  for (const line of formatSources(result.sources)) {
    ctx.log(line);
  }
  ctx.log('');
}

/**
 * Run the REPL until /exit or end of input.
 *
 * Lines are answered one at a time in arrival order, so piped input
 * behaves like typed input.
 */
async function runChatRepl(state: ChatState, ctx: CommandContext, streams: ChatStreams): Promise<void> {
  const rl = readline.createInterface({
    input: streams.input ?? process.stdin,
    output: streams.output ?? process.stdout,
    prompt: PROMPT,
  });

  let closed = false;
  let exiting = false;
  let pending: Promise<void> = Promise.resolve();

  const prompt = (): void => {
    if (!closed && !exiting) rl.prompt();
  };

  const handleLine = async (line: string): Promise<void> => {
    if (exiting) return;

    const input = line.trim();
    if (input === '') {
      prompt();
      return;
    }

    switch (parseReplCommand(input)) {
      case 'exit':
        exiting = true;
        ctx.log(chalk.dim('Goodbye!'));
        rl.close();
        return;
      case 'clear':
        ctx.debug(`Clearing ${state.engine.sessions.getMessages(state.sessionId).length} message(s)`);
        state.engine.sessions.clearSession(state.sessionId);
        ctx.log(chalk.dim('Conversation cleared.'));
        prompt();
        return;
      case 'help':
        for (const helpLine of HELP_LINES) ctx.log(helpLine);
        prompt();
        return;
      case null:
        break;
    }

    try {
      await handleQuestion(input, state, ctx);
    } catch (error) {
      ctx.error(`Failed to answer: ${error instanceof Error ? error.message : String(error)}`);
    }
    prompt();
  };

  return new Promise((resolve) => {
    rl.on('line', (line) => {
      pending = pending.then(() => handleLine(line));
    });

    rl.on('SIGINT', () => {
      ctx.log('');
      ctx.log(chalk.dim('Goodbye!'));
      exiting = true;
      rl.close();
    });

    rl.on('close', () => {
      closed = true;
      // Answer lines that arrived before end of input
      void pending.then(resolve);
    });

    ctx.log(chalk.bold('Course materials chat'));
    ctx.log(chalk.dim('Ask about your courses. Type /help for commands.'));
    ctx.log('');
    prompt();
  });
}

export function createChatCommand(getContext: () => CommandContext, streams: ChatStreams = {}): Command {
  return new Command('chat')
    .description('Start an interactive conversation about the course materials')
    .action(async () => {
      const ctx = getContext();
      const config = loadConfig();
      const store = openCourseStore(config, ctx);

      if (store.getCourseCount() === 0) {
        ctx.warn('No courses indexed yet. Run: cqa ingest <folder>');
      }

      const engine = createCourseQueryEngine(config, { catalog: store, logger: ctx });
      const state: ChatState = { engine, sessionId: engine.createSession() };
      ctx.debug(`Session: ${state.sessionId}`);
      ctx.debug(engine.tracingEnabled ? 'Tracing queries to Langfuse' : 'Tracing disabled');

      try {
        await runChatRepl(state, ctx, streams);
      } finally {
        await engine.shutdown();
      }
    });
}
