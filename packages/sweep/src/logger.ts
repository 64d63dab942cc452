import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

/**
 * JSON logger on stdout
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'qsweep',
    level: options.level ?? 'info',
  });
}

/**
 * Logger that discards everything
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
