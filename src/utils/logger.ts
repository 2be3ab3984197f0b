/**
 * Structured logging to stderr, one JSON object per line.
 * stdout is reserved for the conversation itself.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

let debugEnabled = false;

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, fields?: LogFields) => {
    if (level === 'debug' && !debugEnabled) {
      return;
    }
    console.error(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        scope,
        message,
        ...fields,
      })
    );
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
  };
}
