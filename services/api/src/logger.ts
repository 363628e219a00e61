import path from 'node:path';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  name: string;
  level?: LogLevel;
  /** Directory for the rotating log file; empty disables file output. */
  dir?: string;
}

const lineFormat = winston.format.printf((info) => {
  const level = info.level.toUpperCase().padEnd(7);
  const line = `${String(info.timestamp)} ${level}: ${String(info.message)}`;
  return typeof info.stack === 'string' ? `${line}\n${info.stack}` : line;
});

export function createLogger({ name, level = 'debug', dir = '' }: LoggerOptions): winston.Logger {
  const format = winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.timestamp({ format: 'YYYY/MM/DD HH:mm:ss.SSS' }),
    lineFormat,
  );
  const transports: winston.transport[] = [new winston.transports.Console()];
  if (dir) {
    transports.push(
      new DailyRotateFile({
        dirname: dir,
        filename: `${name}-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxFiles: 7,
      }),
    );
  }
  return winston.createLogger({
    level,
    format,
    transports,
    silent: process.env.NODE_ENV === 'test',
  });
}

// Module-level logger used until the server configures its own
export let logger = createLogger({ name: 'erddap-covjson' });

/**
 * Replaces the shared logger with one writing to `{dir}/{name}-<date>.log`
 * as well as the console, and writes a banner line.
 */
export function setupLog(name: string, dir: string, level: LogLevel): winston.Logger {
  if (!name.trim()) throw new Error(`log name "${name}" not valid`);
  logger = createLogger({ name: path.basename(name), level, dir });
  logger.info(`===== ${name} =====`);
  return logger;
}
