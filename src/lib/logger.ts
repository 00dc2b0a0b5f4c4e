import pino, { type LevelWithSilent, type Logger, stdTimeFunctions } from 'pino';

export type { Logger };

export const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export type LoggerOptions = {
  level?: LevelWithSilent;
  service?: string;
};

export function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', service } = options;
  return pino({
    level,
    base: service ? { service } : {},
    timestamp: stdTimeFunctions.isoTime,
    redact: {
      remove: true,
      paths: ['req.headers.authorization', 'req.headers.cookie'],
    },
  });
}

function defaultLevel(): LevelWithSilent {
  if (process.env.NODE_ENV === 'test') return 'silent';
  const fromEnv = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/** Fallback for components constructed without an explicit logger. */
export const logger = createLogger({ level: defaultLevel() });
