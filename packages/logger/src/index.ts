/**
 * @fileoverview Public API for @ashare/logger.
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers, closeLogger } from './errorHandler.js';

export { redactSensitive, redactSensitiveFields, isSensitiveFieldName, REDACTED } from './formats.js';

export { generateRunId, getRunId, withRunContext } from './run-context.js';

export { startTimer, measureAsync } from './perf-timer.js';

export { LOG_LEVELS } from './types.js';

export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
export type { RunContext } from './run-context.js';
export type { PerfTimer } from './perf-timer.js';
