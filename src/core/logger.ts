/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per line in production; piped through `pino-pretty` in
 * development. Company names count as business data in this system, so the
 * redaction list censors them (and the salt) wherever they end up in a log
 * object. Resolver code logs counts only; the redaction is the backstop.
 *
 * The exported `Logger` type lets services declare "I need a logger" without
 * coupling to Pino's construction, so tests can inject a silent instance.
 */
import pino from 'pino';
import { config } from './config';

export const REDACTED_LOG_PATHS = [
  'salt',
  '*.salt',
  'rawName',
  '*.rawName',
  'normalizedName',
  '*.normalizedName',
  'companyName',
  '*.companyName',
];

export const logger = pino({
  level: config.log.level,
  redact: {
    paths: REDACTED_LOG_PATHS,
    censor: '[REDACTED]',
  },
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
