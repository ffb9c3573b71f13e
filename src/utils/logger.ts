/**
 * Logger interface for library code.
 *
 * Library modules (retriever, reasoning loop, QA service) accept a Logger
 * by injection. The CLI passes its CommandContext, which satisfies this
 * shape; tests pass silentLogger or a vi.fn() pair.
 */

export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default logger when none is injected. Warnings only; debug output is
 * opt-in through an injected logger.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
};

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
