// packages/core/src/utils/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Derive a logger at the same level whose lines carry a `[scope]` tag. */
  child(scope: string): Logger;
}

/**
 * `toStderr` sends every level to console.error, for processes whose
 * stdout carries data (JSON reports, an MCP stdio transport).
 */
export function createLogger(level: LogLevel = 'info', scope?: string, toStderr = false): Logger {
  const threshold = LOG_LEVELS[level];

  function log(msgLevel: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS[msgLevel] < threshold) return;
    const timestamp = new Date().toISOString();
    const tag = scope ? ` [${scope}]` : '';
    const prefix = `[${timestamp}] ${msgLevel.toUpperCase()}${tag}:`;
    const sink = toStderr ? 'error' : msgLevel === 'debug' ? 'log' : msgLevel;
    if (args.length > 0) {
      console[sink](prefix, message, ...args);
    } else {
      console[sink](prefix, message);
    }
  }

  return {
    level,
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
    child: (childScope) => createLogger(level, scope ? `${scope}:${childScope}` : childScope, toStderr),
  };
}
