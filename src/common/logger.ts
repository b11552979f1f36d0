/**
 * Logger contract shared by services, clients and jobs.
 *
 * Shaped after pino's `(obj, msg)` call style so `app.log` (FastifyBaseLogger)
 * can be passed straight through. Without one, components fall back to
 * console output tagged with their name.
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

/**
 * Console-backed logger that prefixes every line with `[tag]`
 */
export function consoleLogger(tag: string): Logger {
  const write = (level: LogLevel) => (obj: object, msg?: string) => {
    console[level](`[${tag}] ${msg ?? ''}`, obj);
  };

  return {
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    debug: write('debug'),
  };
}
