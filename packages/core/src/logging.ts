import type { JsonifibleObject } from '#json';

/** logging levels in order of severity from lowest to highest */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** formats log messages */
export type Log = (
  level: LogLevel,
  message: string,
  meta?: JsonifibleObject,
) => void;

/** severity rank of each log level */
const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

/**
 * wraps a log function so that messages below a minimum level are dropped
 * @param log log function to forward accepted messages to
 * @param minimum lowest level that is forwarded
 * @returns filtered log function
 */
export function filterLog(log: Log, minimum: LogLevel): Log {
  return (level, message, meta) => {
    if (LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[minimum]) {
      log(level, message, meta);
    }
  };
}
