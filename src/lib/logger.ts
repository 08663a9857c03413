/**
 * Module-scoped logging over the console.
 * The starting level comes from LOG_LEVEL (DEBUG, INFO, WARN, ERROR, NONE).
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.NONE]: 'NONE',
};

export interface LoggerConfig {
  minLevel: LogLevel;
  timestamps: boolean;
}

export interface Logger {
  debug(message: string, ...data: unknown[]): void;
  info(message: string, ...data: unknown[]): void;
  warn(message: string, ...data: unknown[]): void;
  error(message: string, ...data: unknown[]): void;
}

/**
 * Parse a level name such as "warn" into a LogLevel
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch (value?.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'NONE':
    case 'SILENT':
      return LogLevel.NONE;
    default:
      return fallback;
  }
}

let config: LoggerConfig = {
  minLevel: parseLogLevel(process.env['LOG_LEVEL']),
  timestamps: true,
};

export function configureLogger(newConfig: Partial<LoggerConfig>): void {
  config = { ...config, ...newConfig };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...config };
}

export function formatMessage(level: LogLevel, module: string, message: string, at: Date = new Date()): string {
  const parts: string[] = [];
  if (config.timestamps) {
    parts.push(`[${at.toISOString()}]`);
  }
  parts.push(`[${LOG_LEVEL_NAMES[level]}]`);
  parts.push(`[${module}]`);
  parts.push(message);
  return parts.join(' ');
}

/**
 * Mask credentials before they reach the console
 */
export function sanitize(data: unknown): unknown {
  if (Array.isArray(data)) {
    return data.map(sanitize);
  }
  if (data instanceof Error) {
    return data;
  }
  if (data !== null && typeof data === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();
      if (lowerKey.includes('credential') || lowerKey.includes('password') || lowerKey.includes('secret')) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitize(value);
      }
    }
    return sanitized;
  }
  return data;
}

function log(level: LogLevel, module: string, message: string, data: unknown[]): void {
  if (level < config.minLevel) {
    return;
  }

  const formatted = formatMessage(level, module, message);
  const sanitized = data.map(sanitize);

  switch (level) {
    case LogLevel.DEBUG:
    case LogLevel.INFO:
      console.log(formatted, ...sanitized);
      break;
    case LogLevel.WARN:
      console.warn(formatted, ...sanitized);
      break;
    case LogLevel.ERROR:
      console.error(formatted, ...sanitized);
      break;
  }
}

export function createLogger(module: string): Logger {
  return {
    debug: (message, ...data) => log(LogLevel.DEBUG, module, message, data),
    info: (message, ...data) => log(LogLevel.INFO, module, message, data),
    warn: (message, ...data) => log(LogLevel.WARN, module, message, data),
    error: (message, ...data) => log(LogLevel.ERROR, module, message, data),
  };
}
