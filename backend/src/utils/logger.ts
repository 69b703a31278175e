type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
}

export interface LoggerSettings {
  /** One JSON object per line instead of `[Tag] message`. */
  json: boolean;
  debug: boolean;
}

const settings: LoggerSettings = { json: false, debug: false };

/** Set once at startup from the loaded config. */
export function configureLogger(next: Partial<LoggerSettings>): void {
  Object.assign(settings, next);
}

export function loggerSettingsFor(nodeEnv: string): LoggerSettings {
  return { json: nodeEnv === 'production', debug: nodeEnv === 'development' };
}

/**
 * Tagged console logger. Readable `[Tag] message` lines in development,
 * one JSON object per line in production.
 */
export function createLogger(tag: string): Logger {
  return {
    info: (message, meta) => log('info', tag, message, meta),
    warn: (message, meta) => log('warn', tag, message, meta),
    error: (message, meta) => log('error', tag, message, meta),
    debug: (message, meta) => {
      if (settings.debug) {
        log('debug', tag, message, meta);
      }
    },
  };
}

function log(level: LogLevel, tag: string, message: string, meta?: LogMeta): void {
  const write = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;

  if (settings.json) {
    write(JSON.stringify({ timestamp: new Date().toISOString(), level, tag, message, ...meta }));
    return;
  }

  const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
  write(`[${tag}] ${message}${metaStr}`);
}
