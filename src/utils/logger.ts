/**
 * Logger Interface for Library Code
 *
 * The chunking engine never writes to the console on its own. Callers
 * inject a Logger: the CLI passes its CommandContext (which satisfies
 * this interface), the file layer passes a collecting logger, and tests
 * pass silentLogger or a mock.
 */

/**
 * Generic logger interface for library code
 *
 * Compatible with CommandContext so you can pass ctx directly.
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Console-backed logger for scripts that use the library directly.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger, the default for the chunking core.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};

/**
 * Logger that keeps warnings in memory and forwards everything to an
 * optional inner logger. Used to turn engine warnings into per-file
 * result entries.
 */
export interface CollectingLogger extends Logger {
  readonly warnings: string[];
}

export function createCollectingLogger(inner: Logger = silentLogger): CollectingLogger {
  const warnings: string[] = [];
  return {
    warnings,
    warn: (message: string) => {
      warnings.push(message);
      inner.warn(message);
    },
    debug: (message: string) => inner.debug?.(message),
  };
}
