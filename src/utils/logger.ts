import pino from 'pino';

let correlationId: string | undefined;

export function setCorrelationId(id: string): void {
  correlationId = id;
}

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

function buildBaseLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');
  const loggerOptions: pino.LoggerOptions =
    process.env.NODE_ENV === 'development'
      ? {
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : { level };

  return pino(loggerOptions);
}

const baseLogger = buildBaseLogger();

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return baseLogger.child({ ...context });
}

/** Logger for a single request or user action, tagged with the active correlation id. */
export function createRequestLogger(context?: Record<string, unknown>): pino.Logger {
  const id = correlationId ?? generateCorrelationId();
  return baseLogger.child({ correlationId: id, ...context });
}
