/**
 * @fileoverview Logger factory.
 * Creates winston loggers with redaction, run-id injection and
 * console/file/stream transports.
 */

import winston from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { LOG_LEVELS } from './types.js';
import { redactSensitive, standardFields, prettyPrint } from './formats.js';

const { format } = winston;

/**
 * Creates a configured logger.
 *
 * Format chain: redaction, then timestamp/errors/run id, then JSON or
 * pretty-print. The console transport writes every level to stderr.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: false });
 * logger.info('Session opened', { provider: 'baostock' });
 * ```
 *
 * @example
 * ```typescript
 * const providerLogger = logger.child({ component: 'provider-baostock', ticker: 'sh.600000' });
 * providerLogger.debug('Query finished', { operation: 'bars', duration_ms: 42, count: 21 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stream,
  } = config;

  // Order matters: redact before anything is serialized
  const logFormat = format.combine(
    redactSensitive(),
    standardFields,
    json ? format.json() : prettyPrint
  );

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        stderrLevels: [...LOG_LEVELS],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // File output is always JSON lines
        format: format.combine(redactSensitive(), standardFields, format.json()),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(new winston.transports.Stream({ stream, level, format: logFormat }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // errorHandler.ts owns process exit
    exitOnError: false,
    // winston warns when a logger has no transport at all
    silent: transports.length === 0,
  });
}

/**
 * Creates a child logger that adds context fields to every entry.
 *
 * @example
 * ```typescript
 * const cmdLogger = createChildLogger(logger, { component: 'cli', command: 'kline' });
 * cmdLogger.info('Fetching bars'); // includes component=cli command=kline
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
