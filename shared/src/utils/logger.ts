import pino, { Logger } from 'pino';

/**
 * Build the structured logger for one service.
 *
 * Pretty printing is only used in development, and can be switched off there
 * with DISABLE_PRETTY_PRINT_LOGGING=true.
 */
export function createLogger(service: string): Logger {
  const environment = process.env.NODE_ENV || 'development';
  const disablePrettyPrint = process.env.DISABLE_PRETTY_PRINT_LOGGING === 'true';
  const usePrettyPrint = environment === 'development' && !disablePrettyPrint;

  return pino({
    level: process.env.LOG_LEVEL || 'info',
    formatters: {
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service,
      environment,
    },
    ...(usePrettyPrint
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : {}),
  });
}

export type { Logger };
