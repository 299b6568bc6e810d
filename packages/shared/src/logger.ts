import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

/** Credential fields, at the top level or nested one or two objects down. */
export const REDACTED_PATHS: readonly string[] = [
  'password',
  '*.password',
  '*.auth.password',
  'ES_PASSWORD',
  '*.ES_PASSWORD',
  'headers.authorization',
  '*.headers.authorization',
];

export const REDACTION_CENSOR = '[redacted]';

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function getLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL'];
  return isLogLevel(envLevel) ? envLevel : 'info';
}

/** Builds a root logger; tests pass their own destination to read the lines back. */
export function createLogger(
  destination?: pino.DestinationStream,
  level: LogLevel = getLogLevel(),
): pino.Logger {
  const options: pino.LoggerOptions = {
    name: 'logloom',
    level,
    redact: { paths: [...REDACTED_PATHS], censor: REDACTION_CENSOR },
    serializers: { err: pino.stdSerializers.err },
  };

  if (destination) {
    return pino(options, destination);
  }
  return pino({
    ...options,
    transport:
      process.env['NODE_ENV'] === 'development'
        ? { target: 'pino/file', options: { destination: 1 } }
        : undefined,
  });
}

export const logger = createLogger();

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}
