import pino from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const isLogLevel = (value: string | undefined): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

const envLevel = process.env.LOG_LEVEL;

// an unknown LOG_LEVEL is reported by loadConfig; until then log at info
export const logger = pino({
  name: 'integration-service',
  level: isLogLevel(envLevel) ? envLevel : 'info',
});
