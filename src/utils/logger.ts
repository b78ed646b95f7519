import pino from 'pino';
import { randomUUID } from 'crypto';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);

export const defaultLogLevel = (nodeEnv: string | undefined): LogLevel => {
  if (nodeEnv === 'test') return 'silent';
  if (nodeEnv === 'production') return 'info';
  return 'debug';
};

// Runs at import, before configuration is validated; a bad value is reported by loadConfig instead
export const resolveLogLevel = (value: string | undefined, nodeEnv: string | undefined): LogLevel => {
  const level = value?.trim().toLowerCase();
  return level && isLogLevel(level) ? level : defaultLogLevel(nodeEnv);
};

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isDev = nodeEnv === 'development';

export const logger = pino({
  level: resolveLogLevel(process.env.LOG_LEVEL, nodeEnv),
  transport: isDev ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
  base: { service: 'zip-build-runner' },
  redact: {
    paths: ['req.headers.authorization', 'req.headers["x-api-key"]', '*.password', '*.token', '*.apiKey'],
    censor: '[REDACTED]',
  },
});

export type Logger = pino.Logger;

export const generateRequestId = (): string => randomUUID();

export const createChildLogger = (requestId: string): Logger =>
  logger.child({ requestId });
