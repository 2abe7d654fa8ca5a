/**
 * Leveled logging for the engine and the CLI.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export type LogContext = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function formatContext(context: LogContext | undefined): string {
  if (!context) return '';
  const parts = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`);
  return parts.length > 0 ? ' ' + chalk.gray(parts.join(' ')) : '';
}

/**
 * Console logger. Everything goes to stderr so command output stays clean.
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const threshold = RANK[level];

  function emit(
    at: Exclude<LogLevel, 'silent'>,
    paint: (text: string) => string,
    message: string,
    context?: LogContext
  ): void {
    if (RANK[at] < threshold) return;
    console.error(`${paint(at.toUpperCase().padEnd(5))} ${message}${formatContext(context)}`);
  }

  return {
    debug: (message, context) => emit('debug', chalk.gray, message, context),
    info: (message, context) => emit('info', chalk.cyan, message, context),
    warn: (message, context) => emit('warn', chalk.yellow, message, context),
    error: (message, context) => emit('error', chalk.red, message, context),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
