import pino from 'pino';
import { env } from './env';

// Shared application logger. Fastify builds its own instance from the same options.
export const loggerOptions: pino.LoggerOptions = {
  level: env.LOG_LEVEL,
  transport:
    env.NODE_ENV === 'development'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
};

export const logger = pino(loggerOptions);
