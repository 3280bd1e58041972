/**
 * Root program: global options, subcommands and the API key check.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { createCoursesCommand } from './commands/courses.js';
import { createIngestCommand } from './commands/ingest.js';
import { APIKeyError, CLIError } from '../errors/index.js';
import { validateAnthropicKey } from '../providers/validation.js';

/** Commands that call the model and need the Anthropic key up front */
export const MODEL_COMMANDS: ReadonlySet<string> = new Set(['ask', 'chat']);

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    const parsed = PackageJsonSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
export function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Build the root program. Kept apart from the entry point so tests can
 * parse arguments without process-level error handling.
 */
export function createProgram(): Command {
  const program = new Command();

  const getGlobalOptions = (): GlobalOptions => {
    const opts = program.opts<Partial<GlobalOptions>>();
    return {
      verbose: opts.verbose ?? false,
      json: opts.json ?? false,
    };
  };
  const getContext = (): CommandContext => createContext(getGlobalOptions());

  program
    .name('cqa')
    .description('Course materials assistant - ask questions about indexed course documents')
    .version(readVersion(), '-v, --version', 'Display version number')
    .option('--verbose', 'Enable verbose output for debugging', false)
    .option('--json', 'Output results as JSON', false)
    .addHelpText(
      'after',
      `
${chalk.dim('Examples:')}
  ${chalk.cyan('cqa ingest ./docs')}                       Index a folder of course documents
  ${chalk.cyan('cqa courses')}                             List indexed courses
  ${chalk.cyan('cqa ask "What is covered in lesson 3?"')}  Ask a single question
  ${chalk.cyan('cqa chat')}                                Start a conversation
  ${chalk.cyan('cqa config set agent.max_tool_rounds 3')}  Change a setting
`
    );

  program.addCommand(createIngestCommand(getContext));
  program.addCommand(createCoursesCommand(getContext));
  program.addCommand(createAskCommand(getContext));
  program.addCommand(createChatCommand(getContext));
  program.addCommand(createConfigCommand(getContext));

  program.on('command:*', (operands: string[]) => {
    throw new CLIError(`Unknown command: ${operands[0] ?? ''}`, 'Run: cqa --help  to see available commands');
  });

  // Fail before any work when the model cannot be reached
  program.hook('preAction', (_thisCommand, actionCommand) => {
    if (!MODEL_COMMANDS.has(actionCommand.name())) {
      return;
    }

    const validation = validateAnthropicKey();
    if (!validation.valid) {
      throw new APIKeyError('anthropic', validation.error, validation.setupInstructions);
    }
  });

  return program;
}
