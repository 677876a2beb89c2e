import pino from 'pino';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

// Development pipes plain JSON to stdout; production relies on the default sync destination.
export const logger = pino({
  name: 'prism',
  level: resolveLogLevel(process.env['LOG_LEVEL']),
  serializers: { err: pino.stdSerializers.err },
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
});

/** Loggers are tagged with an `area:module` component, e.g. `retrieval:federator`. */
export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}
