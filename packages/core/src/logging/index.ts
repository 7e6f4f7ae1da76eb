/**
 * Logging infrastructure exports
 */

export { rootLogger, resolveLogLevel } from './pino-setup.js';
export type { RootLogLevel } from './pino-setup.js';
export { PinoLogger, NoOpLogger, createScopedLogger } from './logger.js';
export type { ILogger } from './logger.js';
