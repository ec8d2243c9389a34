/**
 * Logging for direct uploads
 * @module dataverse-direct-upload/observability/logging
 */

/**
 * Log level enumeration.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'off';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  off: 5,
};

/**
 * Logging configuration.
 */
export interface LogConfig {
  /** Minimum log level. */
  level: LogLevel;
  /** Whether to include timestamps. */
  includeTimestamps: boolean;
  /** Whether to redact credentials from messages and context. */
  redactSensitive: boolean;
  /** Prefix prepended to every line. */
  prefix?: string;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: 'info',
  includeTimestamps: true,
  redactSensitive: true,
};

/**
 * Context keys whose values never reach a log line
 */
const SENSITIVE_KEYS = ['apitoken', 'api_key', 'apikey', 'x-dataverse-key', 'authorization', 'password', 'secret', 'token'];

const SENSITIVE_TEXT_PATTERN =
  /(x-dataverse-key|apiToken|api_key|apiKey|authorization|password|secret|token)([=:]\s*)["']?[^"'\s,}]*/gi;

/**
 * Logger interface.
 */
export interface Logger {
  log(level: LogLevel, message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Replaces credential values in free text.
 */
export function redactText(text: string): string {
  return text.replace(SENSITIVE_TEXT_PATTERN, '$1$2[REDACTED]');
}

/**
 * Returns a copy of a context object with credential values replaced.
 */
export function redactContext(context: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(context)) {
    const lower = key.toLowerCase();
    if (SENSITIVE_KEYS.some((sk) => lower.includes(sk))) {
      redacted[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      redacted[key] = redactContext(value);
    } else {
      redacted[key] = value;
    }
  }

  return redacted;
}

/**
 * Default console logger.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;

  constructor(config: Partial<LogConfig> = {}) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
  }

  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    console[consoleMethod(level)](this.format(level, message, context));
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  /**
   * Renders a log line without writing it.
   */
  format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];

    if (this.config.includeTimestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }
    if (this.config.prefix) {
      parts.push(`[${this.config.prefix}]`);
    }

    parts.push(`[${level.toUpperCase()}]`);
    parts.push(this.config.redactSensitive ? redactText(message) : message);

    if (context) {
      parts.push(JSON.stringify(this.config.redactSensitive ? redactContext(context) : context));
    }

    return parts.join(' ');
  }

  private shouldLog(level: LogLevel): boolean {
    return level !== 'off' && LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }
}

function consoleMethod(level: LogLevel): 'error' | 'warn' | 'debug' | 'log' {
  switch (level) {
    case 'error':
      return 'error';
    case 'warn':
      return 'warn';
    case 'debug':
    case 'trace':
      return 'debug';
    default:
      return 'log';
  }
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoopLogger implements Logger {
  log(_level: LogLevel, _message: string, _context?: Record<string, unknown>): void {}
  trace(_message: string, _context?: Record<string, unknown>): void {}
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}

export function createLogger(config?: Partial<LogConfig>): Logger {
  return new ConsoleLogger(config);
}
