#!/usr/bin/env node
/**
 * course-qa CLI Entry Point
 *
 * This is the main entry point for the `cqa` command.
 */

import { createGlobalErrorHandler, handleError } from '../errors/index.js';
import type { GlobalOptions } from './types.js';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  const program = createProgram();

  const getErrorOptions = (): { verbose: boolean; json: boolean } => {
    const opts = program.opts<Partial<GlobalOptions>>();
    return { verbose: opts.verbose ?? false, json: opts.json ?? false };
  };

  // Errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

main().catch((error: unknown) => handleError(error));
