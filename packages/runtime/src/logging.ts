// Logging
//
// The runtime logs through this small interface so hosts can plug in their
// own logger. Defaults to silentLogger.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Logger interface for runtime operations
 */
export type Logger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

/**
 * Console logger that drops entries below a minimum level.
 */
export function createConsoleLogger(options: { level?: LogLevel } = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const enabled = (level: LogLevel) => LOG_LEVELS.indexOf(level) >= threshold;

  return {
    debug(message, data) {
      if (enabled('debug')) console.debug(`[DEBUG] ${message}`, data ?? '');
    },
    info(message, data) {
      if (enabled('info')) console.info(`[INFO] ${message}`, data ?? '');
    },
    warn(message, data) {
      if (enabled('warn')) console.warn(`[WARN] ${message}`, data ?? '');
    },
    error(message, data) {
      if (enabled('error')) console.error(`[ERROR] ${message}`, data ?? '');
    },
  };
}

/**
 * Silent logger for testing
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
