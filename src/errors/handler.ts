/**
 * Error handler for CLI error formatting and display
 *
 * This module provides:
 * - Colored error output for terminal
 * - JSON output for programmatic use
 * - Verbose mode for debugging with stack traces
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  stack?: string;
}

const VERBOSE_HINT = 'Run with --verbose for more details';

/**
 * Normalize any thrown value into the structured output shape.
 *
 * Plain Errors get the generic --verbose hint unless verbose is already on.
 */
export function toErrorOutput(error: unknown, verbose = false): ErrorOutput {
  if (error instanceof CLIError) {
    return {
      error: error.message,
      code: error.code,
      hint: error.hint,
      stack: verbose ? error.stack : undefined,
    };
  }

  if (error instanceof Error) {
    return {
      error: error.message,
      code: 1,
      hint: verbose ? undefined : VERBOSE_HINT,
      stack: verbose ? error.stack : undefined,
    };
  }

  return { error: String(error), code: 1 };
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so it can be tested without process.exit.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;
  const output = toErrorOutput(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }

  const lines = [chalk.red('Error: ') + output.error];

  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  }

  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }

  return lines.join('\n');
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Handle an error by formatting it, writing it to stderr and exiting
 * with the error's exit code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a global error handler that can be attached to process events.
 *
 * Usage:
 *   const handler = createGlobalErrorHandler({ verbose: true });
 *   process.on('uncaughtException', handler);
 *   process.on('unhandledRejection', handler);
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
