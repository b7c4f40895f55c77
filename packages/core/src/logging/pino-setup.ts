/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Uses fast-redact for path-based redaction of sensitive fields.
 * All console.* calls can be routed through this logger.
 */

import pino from 'pino';

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Reads the initial level from DRIVEBRIDGE_LOG_LEVEL, defaulting to 'info'.
 * @internal
 */
function initialLevel(): string {
  const env = (process.env.DRIVEBRIDGE_LOG_LEVEL || '').toLowerCase();
  return LEVELS.includes(env) ? env : 'info';
}

/**
 * Paths censored in every log line. Event payloads are spread at the top
 * level by {@link logEvent}, so both bare and one-level-nested keys matter.
 * @public
 */
export const REDACTED_PATHS = [
  // Outbound identity
  'access_token',
  '*.access_token',
  'accessToken',
  '*.accessToken',
  'client_secret',
  '*.client_secret',
  'clientSecret',
  '*.clientSecret',
  'refresh_token',
  '*.refresh_token',

  // Inbound credentials
  'token',
  '*.token',
  'apiKey',
  '*.apiKey',
  'api_key',
  '*.api_key',
  'authorization',
  '*.authorization',
  'headers.authorization',
  'headers.Authorization',
  'headers["x-api-key"]',
  'headers["X-API-Key"]',

  // Generic sensitive patterns
  'password',
  '*.password',
  '*.secret',
  '*.key',
];

/**
 * Root logger instance with automatic redaction of sensitive data.
 *
 * @example
 * ```typescript
 * rootLogger.info({ clientSecret: 'secret' }); // Logs: { clientSecret: '[REDACTED]' }
 * ```
 *
 * @public
 * @see {@link setupConsoleLogging} - Monkey-patch console methods
 */
const rootLogger = pino({
  name: 'drivebridge',
  level: initialLevel(),
  redact: {
    paths: REDACTED_PATHS,
    censor: '[REDACTED]',
    remove: false, // Keep the keys, just redact values
  },
  serializers: {
    ...pino.stdSerializers,
    err: pino.stdSerializers.err,
  },
});

/**
 * Routes all console.* calls through pino with automatic redaction.
 *
 * Call this once at the process entry point before any logging occurs.
 *
 * @public
 * @see {@link rootLogger} - The underlying logger instance
 */
export function setupConsoleLogging(): void {
  (['debug', 'info', 'warn', 'error', 'log'] as const).forEach((name) => {
    // eslint-disable-next-line no-console
    console[name] = (...args: unknown[]) => {
      rootLogger[name === 'log' ? 'debug' : name]({ args });
    };
  });
}

export { rootLogger };
