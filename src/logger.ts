import pino, { Logger } from 'pino';
import { ConfigError, ValidationError } from './types';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel;
  /** Write to this file instead of stderr */
  file?: string;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Accepts any casing and surrounding whitespace
 */
export function parseLogLevel(value: string): LogLevel {
  const level = value.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new ValidationError(
      `Unknown log level "${value}". Use one of: ${LOG_LEVELS.join(', ')}.`
    );
  }
  return level;
}

function openDestination(file?: string) {
  // stdout carries command output, so logs go to stderr or a file
  if (!file) {
    return pino.destination({ fd: 2, sync: true });
  }
  try {
    return pino.destination({ dest: file, sync: true, mkdir: true });
  } catch (error) {
    throw new ConfigError(
      `Cannot open log file ${file}: ${error instanceof Error ? error.message : error}`
    );
  }
}

function createLogger(options: LoggerOptions): Logger {
  const destination = openDestination(options.file);
  return pino({ name: 'tock', level: options.level ?? 'warn' }, destination);
}

/**
 * Level named by TOCK_LOG_LEVEL, if it is a known one
 */
export function envLogLevel(
  env: Record<string, string | undefined> = process.env
): LogLevel | undefined {
  const level = env.TOCK_LOG_LEVEL?.trim().toLowerCase();
  return level && isLogLevel(level) ? level : undefined;
}

let root: Logger = createLogger({ level: envLogLevel() });

/**
 * Replace the root logger. Loggers handed out by getLogger() afterwards
 * use the new settings.
 */
export function initLogger(options: LoggerOptions = {}): Logger {
  root = createLogger(options);
  return root;
}

export function getLogger(name: string): Logger {
  return root.child({ module: name });
}
