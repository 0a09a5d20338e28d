import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function getLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL'];
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env['VITEST'] ? 'silent' : 'info';
}

// Logs go to stderr; stdout is reserved for the answer
export const prettyTransport = {
  target: 'pino-pretty',
  options: {
    translateTime: 'HH:MM:ss Z',
    ignore: 'pid,hostname',
    destination: 2,
  },
};

const usePretty = process.env['NODE_ENV'] !== 'production' && !process.env['VITEST'];

export const logger = usePretty
  ? pino({ name: 'askweb', level: getLogLevel(), transport: prettyTransport })
  : pino({ name: 'askweb', level: getLogLevel() }, pino.destination(2));

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}
