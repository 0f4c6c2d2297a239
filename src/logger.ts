// Structured logging shared by services
// Mirrors the Fastify server logger (same level, pino-pretty in development)

import { pino, type Logger } from 'pino';
import { env } from './env.js';

export const logger: Logger = pino({
  level: env.LOG_LEVEL,
  ...(env.LOG_PRETTY
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
});

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}

export type { Logger };
