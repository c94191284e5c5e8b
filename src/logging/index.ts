import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface LoggingOptions {
  level: LogLevel;
  file?: string;
  console?: boolean;
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function getLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL'];
  return isLogLevel(envLevel) ? envLevel : 'warn';
}

let rootLogger: pino.Logger = pino({ name: 'factweave', level: getLogLevel() }, pino.destination(2));

/**
 * Rebuilds the root logger. Child loggers created before this call keep
 * writing to the previous destination, so components create theirs at
 * construction time.
 */
export function configureLogging(options: LoggingOptions): pino.Logger {
  const streams: pino.StreamEntry[] = [];
  if (options.file) {
    streams.push({
      level: options.level === 'silent' ? 'fatal' : options.level,
      stream: pino.destination({ dest: options.file, mkdir: true, sync: true }),
    });
  }
  if (options.console || streams.length === 0) {
    streams.push({
      level: options.level === 'silent' ? 'fatal' : options.level,
      stream: pino.destination(2),
    });
  }
  rootLogger = pino({ name: 'factweave', level: options.level }, pino.multistream(streams));
  return rootLogger;
}

export function createChildLogger(component: string): pino.Logger {
  return rootLogger.child({ component });
}

export type Logger = pino.Logger;
