export type LogContext = Record<string, unknown>;

/**
 * Minimal logger accepted by the dispatcher and the transports.
 * Anything with these four methods works (console, pino, winston child loggers...).
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
