// Shared pino logger
// Fastify is handed this instance, so request and service logs share one destination

import pino from 'pino';
import { env } from './env.js';

const usePretty = env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test';

const loggerOptions = {
  level: env.LOG_LEVEL,
  ...(usePretty
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
