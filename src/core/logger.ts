import winston from 'winston';
import path from 'path';
import fs from 'fs';
import type { LogLevel } from '../config.js';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level: LogLevel;
  /** Directory for scraper.log / error.log; console only when omitted or empty. */
  logDir?: string;
  silent?: boolean;
}

export function createLogger(options: LoggerOptions): Logger {
  const logDir = options.silent ? undefined : options.logDir;

  // Ensure logs directory exists
  if (logDir && !fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const fileTransports = logDir
    ? [
        new winston.transports.File({
          filename: path.join(logDir, 'scraper.log'),
          maxsize: 5 * 1024 * 1024, // 5MB
          maxFiles: 5,
        }),
        // Error-only file
        new winston.transports.File({
          filename: path.join(logDir, 'error.log'),
          level: 'error',
          maxsize: 5 * 1024 * 1024,
          maxFiles: 3,
        }),
      ]
    : [];

  return winston.createLogger({
    level: options.level,
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    transports: [
      // Console output with colors
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ level, message, timestamp, ...meta }) => {
            const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
            return `${timestamp} [${level}]: ${message}${metaStr}`;
          })
        ),
      }),
      ...fileTransports,
    ],
  });
}
