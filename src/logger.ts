/**
 * Logging used by the transports, the client and the acquisition loops.
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggingOptions {
  /** Enable verbose/debug logging. Default: false */
  verbose?: boolean;
  /** Custom logger instance */
  logger?: Logger;
}

export const nullLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export function createConsoleLogger(): Logger {
  return {
    debug: (...args: unknown[]) => console.debug("[mercury-itc]", ...args),
    info: (...args: unknown[]) => console.info("[mercury-itc]", ...args),
    warn: (...args: unknown[]) => console.warn("[mercury-itc]", ...args),
    error: (...args: unknown[]) => console.error("[mercury-itc]", ...args),
  };
}

/** Pick the logger for a set of options: explicit logger, console, or silence. */
export function resolveLogger(options: LoggingOptions): Logger {
  if (options.logger) {
    return options.logger;
  }
  return options.verbose ? createConsoleLogger() : nullLogger;
}
