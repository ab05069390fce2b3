import pino, { type Logger } from 'pino';

/**
 * Module logger. Pretty output only in development; JSON everywhere else.
 */
export function createLogger(name: string): Logger {
  const level = process.env.LOG_LEVEL || 'info';

  if (process.env.NODE_ENV === 'development') {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ name, level });
}

export type { Logger };
