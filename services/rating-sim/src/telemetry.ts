import pino, { type Logger, type LoggerOptions } from 'pino';

export interface LoggerSettings {
  level?: string;
  /** Pretty-print through pino-pretty. Defaults to on outside production and test runs. */
  pretty?: boolean;
}

function prettyByDefault(): boolean {
  const inTest = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
  return process.env.NODE_ENV !== 'production' && !inTest;
}

export function createLogger(name: string, settings: LoggerSettings = {}): Logger {
  const options: LoggerOptions = {
    name,
    level: settings.level ?? process.env.LOG_LEVEL ?? 'info'
  };
  if (settings.pretty ?? prettyByDefault()) {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard' }
    };
  }
  return pino(options);
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

export type { Logger };
