/**
 * Logger Interface
 * Abstraction for logging to allow different implementations
 */

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARNING = "warning",
  ERROR = "error",
}

/**
 * Severity order used to filter out messages below a logger's minimum level
 */
export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARNING]: 30,
  [LogLevel.ERROR]: 40,
};

export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  error(
    message: string,
    error?: Error | unknown,
    context?: Record<string, unknown>
  ): void;
}
