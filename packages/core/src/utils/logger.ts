// packages/core/src/utils/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Logger with the same threshold and an extra `[scope]` tag. */
  child(scope: string): Logger;
}

type Emitting = Exclude<LogLevel, 'silent'>;

/**
 * Leveled console logger. Writes to stderr only; stdout belongs to command
 * output and the MCP stdio transport.
 */
export function createLogger(level: LogLevel = 'info', scope?: string): Logger {
  const threshold = LOG_LEVELS[level];

  function log(msgLevel: Emitting, message: string, args: unknown[]): void {
    if (LOG_LEVELS[msgLevel] < threshold) return;
    const timestamp = new Date().toISOString();
    const tag = scope ? ` [${scope}]` : '';
    const prefix = `[${timestamp}] ${msgLevel.toUpperCase()}${tag}:`;
    console.error(prefix, message, ...args);
  }

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
    child: (childScope) => createLogger(level, scope ? `${scope}:${childScope}` : childScope),
  };
}
