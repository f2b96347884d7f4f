type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug: LoggerFn;
  info: LoggerFn;
  warn: LoggerFn;
  error: LoggerFn;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function parseLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error' ? value : 'info';
}

let minimumLevel: LogLevel = parseLevel(process.env.MARQUEE_LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) return;
  // stdout is left to the host process (bot transport, JSON output); all logs go to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);

/**
 * Logger whose messages carry a `[component]` prefix.
 */
export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    debug: (message, context) => emit('debug', `${prefix} ${message}`, context),
    info: (message, context) => emit('info', `${prefix} ${message}`, context),
    warn: (message, context) => emit('warn', `${prefix} ${message}`, context),
    error: (message, context) => emit('error', `${prefix} ${message}`, context),
  };
}
