/**
 * Logger Interface for Library Code
 *
 * The catalog, ingestion pipeline and orchestrator accept a Logger by
 * injection. The CLI passes its CommandContext (which satisfies Logger),
 * tests pass silent or spy loggers.
 */

export interface Logger {
  warn: (message: string) => void;
  /** Optional - only verbose contexts print debug output */
  debug?: (message: string) => void;
}

/**
 * Used when no logger is injected.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
