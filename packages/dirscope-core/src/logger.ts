import { pino, destination, type Logger } from 'pino';

export interface LoggerOptions {
  /** pino level (default: DIRSCOPE_LOG_LEVEL or 'warn') */
  level?: string;
  name?: string;
}

/**
 * Create the engine's default logger. Writes synchronously to stderr so
 * traversal warnings never interleave with tree output on stdout.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? 'dirscope',
      level: options.level ?? process.env['DIRSCOPE_LOG_LEVEL'] ?? 'warn',
    },
    destination({ dest: 2, sync: true }),
  );
}

let defaultLogger: Logger | null = null;

/** Lazily created logger used when a caller does not supply one */
export function getDefaultLogger(): Logger {
  if (defaultLogger === null) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}
