// Shared pino logger for services
// Mirrors the Fastify request logger options so service and request logs read alike

import { pino, type LoggerOptions } from 'pino';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';
const isDevelopment = (process.env.NODE_ENV || 'development') === 'development';

const loggerOptions: LoggerOptions = {
  level: isTest ? 'silent' : process.env.LOG_LEVEL || 'info',
  ...(isDevelopment && !isTest
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }
    : {}),
};

export const logger = pino(loggerOptions);
