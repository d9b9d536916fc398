/**
 * Structured JSON logger with credential redaction.
 * Must be imported before any logging occurs to ensure secrets are never leaked.
 */

import pino from 'pino';

const logLevel = process.env['LOG_LEVEL'] ?? 'info';

// Pretty output unless explicitly asked for JSON or running in production.
const usePretty =
  process.env['LOG_FORMAT'] === 'pretty' ||
  (process.env['NODE_ENV'] !== 'production' && process.env['LOG_FORMAT'] !== 'json');

/** Paths scrubbed from every log line. Exported so tests build an identical logger. */
export const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers["x-api-key"]',
  '*.secret',
  '*.apiKey',
  '*.apiKeys',
];

export const logger = pino({
  name: 'quota-relay',
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
