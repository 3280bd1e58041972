/**
 * Ingest Command
 *
 * Indexes a folder of course documents:
 *   cqa ingest ./docs
 *   cqa ingest ./docs --clear
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../../config/loader.js';
import { CLIError } from '../../errors/index.js';
import { ingestCourseFolder, type IngestEvent, type IngestResult } from '../../ingest/index.js';
import { validateCourseFolder } from '../../utils/path-validation.js';
import { openCourseStore } from '../store.js';
import type { CommandContext } from '../types.js';

interface IngestCommandOptions {
  clear: boolean;
}

function describeEvent(event: IngestEvent): string {
  switch (event.status) {
    case 'added':
      return `Added ${event.title} (${event.chunks} chunks) from ${event.file}`;
    case 'skipped':
      return `Already indexed: ${event.title}`;
    case 'failed':
      return `Failed: ${event.file}`;
  }
}

export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .description('Index a folder of course documents')
    .argument('<folder>', 'Folder containing .txt or .md course documents')
    .option('--clear', 'Remove every indexed course before ingesting', false)
    .action(async (folder: string, cmdOptions: IngestCommandOptions) => {
      const ctx = getContext();

      const validation = validateCourseFolder(folder);
      if (!validation.valid) {
        throw new CLIError(validation.error, validation.hint);
      }
      for (const warning of validation.warnings) {
        ctx.warn(warning);
      }

      const config = loadConfig();
      const store = openCourseStore(config, ctx);

      ctx.debug(`Ingesting: ${validation.normalizedPath}`);
      ctx.debug(`Chunking: size ${config.chunking.chunk_size}, overlap ${config.chunking.chunk_overlap}`);

      const spinner = ora({
        text: 'Scanning course documents...',
        isSilent: ctx.options.json,
      }).start();

      let result: IngestResult;
      try {
        result = await ingestCourseFolder(validation.normalizedPath, {
          store,
          chunking: {
            chunkSize: config.chunking.chunk_size,
            chunkOverlap: config.chunking.chunk_overlap,
          },
          clearExisting: cmdOptions.clear,
          logger: ctx,
          onCourse: (event) => {
            spinner.text = describeEvent(event);
            ctx.debug(describeEvent(event));
          },
        });
      } catch (error) {
        spinner.fail('Ingestion failed');
        throw error;
      }

      const totalCourses = store.getCourseCount();

      if (ctx.options.json) {
        console.log(JSON.stringify({ ...result, totalCourses }, null, 2));
        return;
      }

      spinner.succeed(
        `Added ${result.coursesAdded} course(s) with ${result.chunksAdded} chunk(s)` +
          (result.skipped > 0 ? `, ${result.skipped} already indexed` : '') +
          (result.failed > 0 ? `, ${result.failed} failed` : '')
      );
      ctx.log(chalk.dim(`${totalCourses} course(s) indexed in total`));
    });
}
