import pino, { type DestinationStream, type Logger } from 'pino';

export type { Logger };

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export interface LogConfig {
  level: LogLevel;
  /** JSON lines are appended here; stderr when absent */
  file?: string;
}

/**
 * Create the root logger. Writes are synchronous so that a CLI invocation
 * never exits with log lines still buffered.
 */
export function createLogger(config: LogConfig, destination?: DestinationStream): Logger {
  const dest = destination
    ?? (config.file
      ? pino.destination({ dest: config.file, mkdir: true, sync: true })
      : pino.destination({ dest: 2, sync: true }));

  return pino({ level: config.level, base: { app: 'taskkeeper' } }, dest);
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
