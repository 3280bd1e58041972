/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { formatTable, type Column, type Alignment, type Row } from './table.js';

export { consoleLogger, silentLogger, type Logger } from './logger.js';

export { validateCourseFolder, type PathValidationResult } from './path-validation.js';
