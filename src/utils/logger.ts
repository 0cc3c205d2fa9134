/**
 * Unified Logging Utility
 *
 * Console-backed logger with component/action prefixes, trailing key=value
 * fields and a process-wide minimum level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
  component?: string;
  action?: string;
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let minimumLevel: LogLevel = 'info';

/**
 * Set the minimum level written to the console. Applies to every logger.
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

function isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minimumLevel];
}

function formatValue(value: unknown): string {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : value.toFixed(3);
  }
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * Format a log message with context prefix and extra fields.
 */
function formatMessage(context: LogContext, message: string): string {
  const { component, action, ...fields } = context;
  const parts: string[] = [];

  if (component) {
    parts.push(`[${component}]`);
  }
  if (action) {
    parts.push(`(${action})`);
  }
  parts.push(message);

  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      parts.push(`${key}=${formatValue(value)}`);
    }
  }

  return parts.join(' ');
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
}

/**
 * Create a logger instance with optional default context.
 *
 * @example
 * const log = createLogger({ component: 'SessionAggregator' });
 * log.info('Exercise locked', { action: 'analyzeRecording', votes: 5 });
 * // Output: [SessionAggregator] (analyzeRecording) Exercise locked votes=5
 */
export function createLogger(defaultContext: LogContext = {}): Logger {
  return {
    debug(message, context = {}) {
      if (!isEnabled('debug')) return;
      console.debug(formatMessage({ ...defaultContext, ...context }, message));
    },

    info(message, context = {}) {
      if (!isEnabled('info')) return;
      console.info(formatMessage({ ...defaultContext, ...context }, message));
    },

    warn(message, context = {}) {
      if (!isEnabled('warn')) return;
      console.warn(formatMessage({ ...defaultContext, ...context }, message));
    },

    error(message, error, context = {}) {
      if (!isEnabled('error')) return;
      const formattedMessage = formatMessage(
        { ...defaultContext, ...context },
        message
      );

      if (error) {
        console.error(formattedMessage, error);
      } else {
        console.error(formattedMessage);
      }
    },
  };
}

/**
 * Default logger instance for quick logging without context.
 */
export const log = createLogger();
