// src/observability/Logger.ts

import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  level?: LogLevel;
  format?: 'json' | 'pretty';
  silent?: boolean;
}

const SENSITIVE_KEYS = ['authorization', 'cookie', 'set-cookie', 'proxy-authorization'];
const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'json'
        ? winston.format.json()
        : winston.format.combine(winston.format.colorize(), winston.format.simple());

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      silent: config.silent ?? false,
      // stdout belongs to the CLI's own output
      transports: [new winston.transports.Console({ stderrLevels: LEVELS })],
    });
  }

  private redactSensitive(obj: unknown): unknown {
    if (!obj || typeof obj !== 'object' || Array.isArray(obj)) return obj;

    const redacted: Record<string, unknown> = { ...(obj as Record<string, unknown>) };

    for (const key of Object.keys(redacted)) {
      if (SENSITIVE_KEYS.includes(key.toLowerCase())) {
        redacted[key] = '[REDACTED]';
      }
    }

    // Request/response header bags
    if (redacted.headers && typeof redacted.headers === 'object') {
      redacted.headers = this.redactSensitive(redacted.headers);
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.debug(message, sanitized);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.info(message, sanitized);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.warn(message, sanitized);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.error(message, sanitized);
  }
}
