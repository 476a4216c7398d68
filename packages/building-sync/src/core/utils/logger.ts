/**
 * Structured logging utility for the building sync engine
 *
 * Levels, ISO timestamps and contextual metadata. Human-readable single
 * lines during development, one JSON object per line in production.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface LoggerConfig {
  /** Fixed level; follows the process-wide default when omitted */
  readonly level?: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function parseLogLevel(value: string | undefined): LogLevel | null {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return null;
}

let defaultLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

/**
 * Change the level of every logger created without a fixed one
 */
export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

export function getDefaultLogLevel(): LogLevel {
  return defaultLevel;
}

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  get service(): string {
    return this.config.service;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.config.level ?? defaultLevel];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(hasMetadata ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

const isPretty = (): boolean => process.env.NODE_ENV !== 'production';

// Default logger instance
export const logger = new Logger({
  service: 'building-sync',
  pretty: isPretty(),
});

/**
 * Create a child logger scoped to a module
 */
export function createLogger(context: { readonly module: string; readonly level?: LogLevel }): Logger {
  return new Logger({
    level: context.level,
    service: `building-sync:${context.module}`,
    pretty: isPretty(),
  });
}
