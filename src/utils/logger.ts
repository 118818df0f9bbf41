/**
 * Diagnostic logger
 * Lines go to stderr so they never mix with the build report on stdout.
 */

import { LOG_LEVEL_NAMES, loadSettings, type LogLevel } from '../config/settings.js';

export type LogMethod = (message: string, data?: unknown) => void;
export type Logger = Record<LogLevel, LogMethod>;

export interface LoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
}

const defaultLevel: LogLevel = loadSettings().logLevel;

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

function formatMessage(level: LogLevel, module: string, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  const dataStr = data === undefined ? '' : ` ${JSON.stringify(data)}`;
  return `[${timestamp}] [${level.toUpperCase()}] [${module}] ${message}${dataStr}`;
}

export function createLogger(module: string, options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVEL_NAMES.indexOf(options.level ?? defaultLevel);
  const write = options.write ?? writeStderr;

  const method =
    (level: LogLevel): LogMethod =>
    (message, data) => {
      if (LOG_LEVEL_NAMES.indexOf(level) >= threshold) {
        write(formatMessage(level, module, message, data));
      }
    };

  return {
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
  };
}

export const logger = createLogger('EspixelBuild');
