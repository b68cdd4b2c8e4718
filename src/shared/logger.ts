/**
 * Structured JSON logger with token redaction.
 * Must be imported before any logging occurs so bot tokens never reach the output.
 */

import pino from 'pino';

const logLevel = process.env['LOG_LEVEL'] ?? 'info';

// Determine if pretty logging should be used:
// - Explicit LOG_FORMAT=pretty → use pretty
// - Explicit LOG_FORMAT=json → use JSON
// - Otherwise in non-production → use pretty (default dev experience)
// - Production → use JSON
const usePretty =
  process.env['LOG_FORMAT'] === 'pretty' ||
  (process.env['NODE_ENV'] !== 'production' &&
    process.env['NODE_ENV'] !== 'test' &&
    process.env['LOG_FORMAT'] !== 'json');

/** Paths censored in every log line. Shared with tests so they exercise the same list. */
export const REDACT_PATHS = [
  'headers.authorization',
  '*.authorization',
  '*.token',
  'd.token',
  '*.d.token',
];

export const logger = pino({
  name: 'chatwire',
  level: logLevel,
  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
  },
  ...(usePretty && {
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        colorize: true,
      },
    },
  }),
});

export type Logger = typeof logger;
