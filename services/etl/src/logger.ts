import pino, { stdTimeFunctions } from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

/** Logs to stderr so report output on stdout stays machine-readable. */
export const createLogger = (level: string): Logger =>
  pino(createLoggerOptions(level), pino.destination({ dest: 2, sync: true }));

export const createSilentLogger = (): Logger => pino({ level: 'silent' });
