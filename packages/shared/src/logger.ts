// ============================================================================
// STEM Tutor - Logger
// ============================================================================

import winston from 'winston';
import type { Logger } from './types.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface WinstonLoggerOptions {
  level?: LogLevel;

  /** Service label printed with every line */
  service?: string;

  /** Write every level to stderr (keeps stdout free for the CLI) */
  stderr?: boolean;

  /** Drop all output; defaults to LOG_SILENT=true at construction */
  silent?: boolean;
}

/**
 * winston-backed implementation of the shared Logger interface
 */
export class WinstonLogger implements Logger {
  private logger: winston.Logger;
  readonly silent: boolean;

  constructor(options: WinstonLoggerOptions = {}) {
    const { level = 'info', service = 'stem-tutor', stderr = false } = options;
    this.silent = options.silent ?? process.env.LOG_SILENT === 'true';

    this.logger = winston.createLogger({
      level,
      format: winston.format.combine(
        winston.format.timestamp({
          format: 'YYYY-MM-DD HH:mm:ss'
        }),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: { service },
      transports: [
        new winston.transports.Console({
          silent: this.silent,
          stderrLevels: stderr ? ['error', 'warn', 'info', 'debug'] : ['error'],
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.printf(({ timestamp, level, message, service, ...metadata }) => {
              let msg = `${timestamp} [${service}] ${level}: ${message}`;
              if (Object.keys(metadata).length > 0) {
                msg += ` ${JSON.stringify(metadata)}`;
              }
              return msg;
            })
          )
        })
      ]
    });

    // File output in production
    if (process.env.NODE_ENV === 'production') {
      this.logger.add(new winston.transports.File({ filename: 'logs/error.log', level: 'error' }));
      this.logger.add(new winston.transports.File({ filename: 'logs/combined.log' }));
    }
  }

  private shouldLog(): boolean {
    return !this.silent;
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog()) {
      this.logger.info(message, metadata);
    }
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog()) {
      this.logger.warn(message, metadata);
    }
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog()) {
      this.logger.error(message, metadata);
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog()) {
      this.logger.debug(message, metadata);
    }
  }
}

/**
 * Create a logger
 */
export function createLogger(options?: WinstonLoggerOptions): WinstonLogger {
  return new WinstonLogger(options);
}
