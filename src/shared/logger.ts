/**
 * Leveled logger with structured fields
 * stderr + optional file output
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

let globalLogLevel: LogLevel = 'info';
let logFilePath: string | null = null;
let logFileStream: fs.WriteStream | null = null;

export function configureLogger(options: {
  level?: LogLevel;
  file?: string | null;
}): void {
  if (options.level) {
    globalLogLevel = options.level;
  }
  if (options.file !== undefined && options.file !== logFilePath) {
    if (logFileStream) {
      logFileStream.end();
      logFileStream = null;
    }
    logFilePath = options.file;
    if (logFilePath) {
      const dir = path.dirname(logFilePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      logFileStream = fs.createWriteStream(logFilePath, { flags: 'a' });
    }
  }
}

export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[globalLogLevel];
}

export function formatLogLine(
  timestamp: string,
  level: LogLevel,
  message: string,
  fields?: LogFields,
): string {
  const levelTag = level.toUpperCase().padEnd(5);
  const extra =
    fields && Object.keys(fields).length > 0 ? ' ' + JSON.stringify(fields) : '';
  return `[${timestamp}] ${levelTag} ${message}${extra}`;
}

function write(level: LogLevel, message: string, fields?: LogFields): void {
  if (!shouldLog(level)) return;
  const formatted = formatLogLine(new Date().toISOString(), level, message, fields);
  process.stderr.write(formatted + '\n');
  if (logFileStream) {
    logFileStream.write(formatted + '\n');
  }
}

export function closeLogger(): void {
  if (logFileStream) {
    logFileStream.end();
    logFileStream = null;
  }
  logFilePath = null;
}

export function createLogger(prefix?: string): Logger {
  const p = prefix ? `[${prefix}] ` : '';
  return {
    debug(message: string, fields?: LogFields) {
      write('debug', p + message, fields);
    },
    info(message: string, fields?: LogFields) {
      write('info', p + message, fields);
    },
    warn(message: string, fields?: LogFields) {
      write('warn', p + message, fields);
    },
    error(message: string, fields?: LogFields) {
      write('error', p + message, fields);
    },
  };
}
