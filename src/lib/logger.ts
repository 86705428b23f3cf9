import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
  ...(isProduction
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, destination: 2 },
        },
      }),
});

export type Logger = pino.Logger;

/**
 * Creates a child logger scoped to one subject's pipeline session.
 */
export function createSessionLogger(
  subjectId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ subject: subjectId, ...extra });
}

export default logger;
