/**
 * Ask Command
 *
 * One question, one answer with its sources:
 *   cqa ask "What does lesson 2 of the MCP course cover?"
 *
 * Each call stands alone; `cqa chat` keeps a conversation.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../config/loader.js';
import { ValidationError } from '../../errors/index.js';
import { createCourseQueryEngine } from '../../agent/query-engine.js';
import type { Citation } from '../../agent/types.js';
import { openCourseStore } from '../store.js';
import type { CommandContext } from '../types.js';

export function formatSource(source: Citation): string {
  return source.url !== undefined ? `${source.text} (${source.url})` : source.text;
}

/**
 * Lines printed under an answer; empty when there are no sources.
 */
export function formatSources(sources: readonly Citation[]): string[] {
  if (sources.length === 0) {
    return [];
  }
  return ['', chalk.bold('Sources:'), ...sources.map((source) => `  - ${formatSource(source)}`)];
}

export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .description('Ask a question about the indexed course materials')
    .argument('<question>', 'The question to answer')
    .action(async (question: string) => {
      const ctx = getContext();
      const text = question.trim();

      if (text === '') {
        throw new ValidationError('Question cannot be empty', ['question: expected text, e.g. cqa ask "What is lesson 1 about?"']);
      }

      const config = loadConfig();
      const store = openCourseStore(config, ctx);

      if (store.getCourseCount() === 0) {
        ctx.warn('No courses indexed yet. Run: cqa ingest <folder>');
      }

      const engine = createCourseQueryEngine(config, { catalog: store, logger: ctx });
      ctx.debug(engine.tracingEnabled ? 'Tracing queries to Langfuse' : 'Tracing disabled');

      try {
        const result = await engine.query(text);

        if (ctx.options.json) {
          console.log(JSON.stringify({ question: text, answer: result.answer, sources: result.sources }, null, 2));
          return;
        }

        ctx.log(result.answer);
        for (const line of formatSources(result.sources)) {
          ctx.log(line);
        }
      } finally {
        await engine.shutdown();
      }
    });
}
