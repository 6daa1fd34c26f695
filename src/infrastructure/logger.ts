import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { config } from '../config/env';

// Shared between Fastify's request logger and the services / cron jobs.
export const loggerOptions: LoggerOptions = {
  level: config.LOG_LEVEL,
  transport:
    config.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  redact: ['req.headers.authorization', 'req.headers.cookie'],
};

export const logger = pino(loggerOptions);

export type Logger = PinoLogger;
