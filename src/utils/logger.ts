/**
 * Logging with Pino - credentials are redacted
 */

import pino from 'pino';

const redactPaths = [
  'apiKey',
  'api_key',
  'apikey',
  'openaiApiKey',
  'alphaVantageApiKey',
  'smtpUrl',
  'smtpPassword',
  'authorization',
  'Authorization',
  'password',
  'secret',
  'token',
  '*.apiKey',
  '*.apikey',
  '*.openaiApiKey',
  '*.alphaVantageApiKey',
  '*.smtpUrl',
  'headers.authorization',
  'headers.Authorization',
];

const nodeEnv = process.env.NODE_ENV || 'development';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'fundamentals-buy-score', pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport:
    nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export type Logger = pino.Logger;

export function createChildLogger(name: string): Logger {
  return logger.child({ module: name });
}

/** Binds a run id so worker and aggregator lines can be joined per run. */
export function createRunLogger(parent: Logger, runId: string, chunkId?: string): Logger {
  return parent.child(chunkId ? { runId, chunkId } : { runId });
}
