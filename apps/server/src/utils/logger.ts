/**
 * Service logger.
 *
 * Services receive a Logger through their constructor so tests can record
 * what was logged. HTTP request logging goes through Fastify's pino logger;
 * this one shares its level names so LOG_LEVEL means the same for both.
 */

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, context?: Record<string, unknown>) => void;
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

type Method = keyof Logger;

/**
 * Whether a message at `method` passes a logger set to `level`
 */
export function isLevelEnabled(level: LogLevel, method: Method): boolean {
  return LOG_LEVELS.indexOf(method) <= LOG_LEVELS.indexOf(level);
}

/**
 * Create a console logger with a namespace prefix, dropping messages below level
 */
export function createLogger(namespace: string, level: LogLevel = 'info'): Logger {
  const prefix = `[${namespace}] `;

  const write =
    (method: Method, sink: (...args: unknown[]) => void) =>
    (message: string, context?: Record<string, unknown>): void => {
      if (!isLevelEnabled(level, method)) return;
      sink(prefix + message, context ?? '');
    };

  return {
    debug: write('debug', console.debug),
    info: write('info', console.info),
    warn: write('warn', console.warn),
    error: write('error', console.error),
  };
}

export const plexLogger = createLogger('plex');
export const clipLogger = createLogger('clips');
export const artifactLogger = createLogger('artifacts');
