export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
  child(scope: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

/**
 * Console-backed logger. Every line is prefixed with an ISO timestamp, the
 * level and the scope, e.g. `2024-01-01T00:00:00.000Z WARN [dispatcher] ...`.
 */
export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_RANK[level];

  const emit = (lineLevel: Exclude<LogLevel, 'silent'>, write: (...args: unknown[]) => void) =>
    (message: string, ...meta: unknown[]) => {
      if (LEVEL_RANK[lineLevel] < threshold) return;
      write(`${new Date().toISOString()} ${lineLevel.toUpperCase()} [${scope}] ${message}`, ...meta);
    };

  return {
    debug: emit('debug', console.debug),
    info: emit('info', console.info),
    warn: emit('warn', console.warn),
    error: emit('error', console.error),
    child: (childScope: string) => createLogger(`${scope}:${childScope}`, level)
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');

/** Error detail for log lines: the stack when there is one. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.stack || error.message;
  return String(error);
}
