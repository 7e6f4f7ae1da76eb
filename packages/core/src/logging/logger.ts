import type { Logger } from 'pino';
import { rootLogger } from './pino-setup.js';

/**
 * Logging abstraction used by the loader.
 *
 * Lets callers route loader events into their own logging without the core
 * depending on anything beyond this interface.
 * @public
 */
export interface ILogger {
  /**
   * Log a debug message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  debug(message: string, context?: Record<string, unknown>): void;

  /**
   * Log an info message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  info(message: string, context?: Record<string, unknown>): void;

  /**
   * Log a warning message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  warn(message: string, context?: Record<string, unknown>): void;

  /**
   * Log an error message.
   * @param message - The log message
   * @param error - Optional error object
   * @param context - Optional context object for structured logging
   */
  error(
    message: string,
    error?: Error | unknown,
    context?: Record<string, unknown>,
  ): void;
}

/**
 * ILogger backed by a pino child logger.
 * @public
 */
export class PinoLogger implements ILogger {
  public constructor(private readonly logger: Logger = rootLogger) {}

  public debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context ?? {}, message);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context ?? {}, message);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context ?? {}, message);
  }

  public error(
    message: string,
    error?: Error | unknown,
    context?: Record<string, unknown>,
  ): void {
    this.logger.error({ ...context, err: error }, message);
  }
}

/**
 * No-op logger implementation for testing or when logging is disabled.
 * @public
 */
export class NoOpLogger implements ILogger {
  public debug(): void {}
  public info(): void {}
  public warn(): void {}
  public error(): void {}
}

/**
 * Creates a logger whose entries carry the given scope.
 * @param scope - The scope recorded on every entry
 * @public
 */
export function createScopedLogger(scope: string): ILogger {
  return new PinoLogger(rootLogger.child({ scope }));
}
