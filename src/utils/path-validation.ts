/**
 * Path Validation Utilities
 *
 * Checks the folder handed to `cqa ingest` before anything is scanned.
 */

import { resolve } from 'node:path';
import { existsSync, statSync, realpathSync, accessSync, constants } from 'node:fs';

/**
 * Discriminated union so callers handle both outcomes.
 * Warnings are returned even on success for non-fatal issues.
 */
export type PathValidationResult =
  | { valid: true; normalizedPath: string; warnings: string[] }
  | { valid: false; error: string; hint: string };

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Validate a course folder:
 * it must exist, resolve without symlink loops, be a directory and be readable.
 */
export function validateCourseFolder(inputPath: string): PathValidationResult {
  const warnings: string[] = [];
  const absolutePath = resolve(inputPath);

  if (!existsSync(absolutePath)) {
    return {
      valid: false,
      error: `Path does not exist: ${absolutePath}`,
      hint: 'Check the path and try again. Use an absolute path to avoid ambiguity.',
    };
  }

  let realPath: string;
  try {
    realPath = realpathSync(absolutePath);
  } catch (error) {
    if (errorCode(error) === 'ELOOP') {
      return {
        valid: false,
        error: `Symlink loop detected at: ${absolutePath}`,
        hint: 'The path contains circular symlinks. Remove or fix the symlink loop.',
      };
    }
    return {
      valid: false,
      error: `Cannot resolve path: ${absolutePath}`,
      hint: `System error: ${errorMessage(error)}`,
    };
  }

  if (!statSync(realPath).isDirectory()) {
    return {
      valid: false,
      error: `Path is not a directory: ${realPath}`,
      hint: 'cqa ingest takes the folder that holds your course documents.',
    };
  }

  try {
    accessSync(realPath, constants.R_OK);
  } catch {
    return {
      valid: false,
      error: `Permission denied: cannot read ${realPath}`,
      hint: 'Check file permissions. You may need to run: chmod +r <path>',
    };
  }

  if (absolutePath !== realPath) {
    warnings.push(`Symlink resolved: ${absolutePath} -> ${realPath}`);
  }

  return { valid: true, normalizedPath: realPath, warnings };
}
