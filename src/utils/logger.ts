import winston from 'winston';
import dayjs from 'dayjs';
import duration from 'dayjs/plugin/duration.js';
import type { LogLevel } from '../types/config.js';

dayjs.extend(duration);

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function initialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === fromEnv) ?? 'info';
}

export class Logger {
  private static instance: winston.Logger | undefined;

  static getInstance(): winston.Logger {
    if (!Logger.instance) {
      Logger.instance = winston.createLogger({
        level: initialLevel(),
        silent: process.env.NODE_ENV === 'test',
        format: winston.format.combine(
          winston.format.timestamp({
            format: 'YYYY-MM-DD HH:mm:ss',
          }),
          winston.format.errors({ stack: true }),
          winston.format.printf(({ timestamp, level, message, ...meta }) => {
            const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
            return `${timestamp} [${level.toUpperCase()}] ${message}${metaStr}`;
          })
        ),
        transports: Logger.transports(),
      });
    }

    return Logger.instance;
  }

  private static transports() {
    // stdout carries the tracklist JSON, so logs go to stderr
    const consoleTransport = new winston.transports.Console({
      stderrLevels: [...LOG_LEVELS],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
          return `${timestamp} [${level}] ${message}${metaStr}`;
        })
      ),
    });

    return process.env.LOG_FILE
      ? [consoleTransport, new winston.transports.File({ filename: process.env.LOG_FILE })]
      : [consoleTransport];
  }

  static info(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().info(message, meta);
  }

  static warn(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().warn(message, meta);
  }

  static error(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().error(message, meta);
  }

  static debug(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().debug(message, meta);
  }

  static setLevel(level: LogLevel): void {
    Logger.getInstance().level = level;
  }
}

/** Formats a mix offset as HH:mm:ss for log lines. */
export function formatOffset(seconds: number): string {
  return dayjs.duration(Math.max(0, Math.floor(seconds)), 'seconds').format('HH:mm:ss');
}
