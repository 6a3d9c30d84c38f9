/**
 * @fileoverview Type definitions for the logger package.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity written by a logger.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: false,
 *   filePath: './logs/ashare.log',
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Machine-readable JSON lines instead of the colorized pretty format.
   * @default true when NODE_ENV is production
   */
  json?: boolean;

  /** Also append to this file */
  filePath?: string;

  /**
   * Write to the console. Every level goes to stderr so that command output
   * on stdout stays clean.
   * @default true
   */
  console?: boolean;

  /** Extra destination, used by tests to capture output in memory */
  stream?: NodeJS.WritableStream;
}

/**
 * Context fields bound to a child logger.
 *
 * @example
 * ```typescript
 * const providerLogger = logger.child({ component: 'provider-baostock' });
 * ```
 */
export interface ChildLoggerContext {
  component?: string;
  ticker?: string;
  frequency?: string;
  provider?: string;
  command?: string;
  [key: string]: unknown;
}

export type Logger = WinstonLogger;
