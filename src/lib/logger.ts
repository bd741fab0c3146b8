/**
 * Logger factory
 *
 * All components take a pino `Logger` by injection. Output goes to stderr so test
 * runners keep stdout for their own reporting.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  /** Logger name, added to every record */
  name: string;
  /** Minimum level (default: info) */
  level?: LevelWithSilent;
  /** Extra fields bound to every record */
  bindings?: Record<string, unknown>;
}

export function createLogger(options: LoggerOptions): Logger {
  const logger = pino(
    {
      name: options.name,
      level: options.level ?? 'info',
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
  return options.bindings ? logger.child(options.bindings) : logger;
}

/**
 * Logger that discards everything. Handy default for library callers that do not
 * care about output.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
