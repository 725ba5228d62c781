/**
 * Tagged console logging.
 *
 * Every line goes to stderr as `[tag] message`, followed by an optional
 * context object, so stdout stays free for anything piped out of the process.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let _threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  _threshold = level;
}

export function getLogLevel(): LogLevel {
  return _threshold;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export function createLogger(tag: string): Logger {
  const write = (level: LogLevel, message: string, context?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[_threshold]) return;
    const line = level === 'info' ? `[${tag}] ${message}` : `[${tag}] ${level}: ${message}`;
    if (context && Object.keys(context).length > 0) {
      console.error(line, context);
    } else {
      console.error(line);
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}

/** Normalise anything thrown into a printable message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
