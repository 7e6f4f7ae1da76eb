/**
 * Pino logger setup with redaction of variable values.
 *
 * Loader events carry variable names only. Values and secrets that reach a
 * log context are censored.
 */

import pino from 'pino';

const LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

export type RootLogLevel = (typeof LEVELS)[number];

function isRootLogLevel(value: string): value is RootLogLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * Reads the log level from ENVLINE_LOG_LEVEL. Defaults to 'silent'.
 * @internal
 */
export function resolveLogLevel(
  env: Record<string, string | undefined> = process.env,
): RootLogLevel {
  const level = (env.ENVLINE_LOG_LEVEL || '').trim().toLowerCase();
  return isRootLogLevel(level) ? level : 'silent';
}

/**
 * Root logger instance.
 *
 * Silent unless ENVLINE_LOG_LEVEL says otherwise; the level can also be
 * changed at runtime.
 * @example
 * ```typescript
 * rootLogger.level = 'debug';
 * rootLogger.debug({ key: 'API_URL', value: 'x' }, 'set'); // value: '[REDACTED]'
 * ```
 * @public
 */
const rootLogger = pino({
  name: 'envline',
  level: resolveLogLevel(),
  redact: {
    paths: [
      'value',
      '*.value',
      'values',
      '*.values',
      'secret',
      '*.secret',
      'token',
      '*.token',
      'password',
      '*.password',
    ],
    censor: '[REDACTED]',
    remove: false,
  },
  serializers: {
    ...pino.stdSerializers,
    err: pino.stdSerializers.err,
  },
});

export { rootLogger };
