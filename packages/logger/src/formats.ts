/**
 * @fileoverview Custom winston formats: sensitive-field redaction, standard
 * fields with run-id injection, and the pretty console format.
 */

import winston from 'winston';
import { getRunId } from './run-context.js';

const { format } = winston;

/**
 * Field-name patterns whose values never reach a log line.
 * Matched case-insensitively against every key at every depth.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /^pwd$/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /private[_-]?key/i,
];

export const REDACTED = '[REDACTED]';

/** Winston's own fields, never redacted. */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveFieldName(name: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * Returns a copy of `value` with every sensitive key replaced by REDACTED.
 * Errors become plain `{ name, message, stack }` objects so they survive JSON.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ user_id: 'anonymous', password: 'test-secret' });
 * // { user_id: 'anonymous', password: '[REDACTED]' }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactSensitiveFields(item));
  }

  if (value instanceof Error) {
    const copy: Record<string, unknown> = {
      name: value.name,
      message: value.message,
      stack: value.stack,
    };
    for (const [key, child] of Object.entries(value)) {
      copy[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(child);
    }
    return copy;
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  const copy: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    copy[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(child);
  }
  return copy;
}

/**
 * Winston format that redacts sensitive metadata. Must run first in the chain.
 *
 * @example
 * ```typescript
 * logger.info('Login', { user_id: 'anonymous', password: 'test-secret' });
 * // {"level":"info","message":"Login","user_id":"anonymous","password":"[REDACTED]"}
 * ```
 */
export const redactSensitive = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(info[key]);
  }
  return info;
});

/**
 * Timestamp, error stacks and the current run id.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const runId = getRunId();
    if (runId && !info['run_id']) {
      info['run_id'] = runId;
    }
    return info;
  })()
);

/**
 * Human-readable console format.
 *
 * @example
 * ```typescript
 * // [2024-03-01T09:30:00.000+08:00] info: Query finished component=provider-baostock ticker=sh.600000 count=21
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, command, ticker, frequency, run_id, stack, ...rest } =
      info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (command) context.push(`command=${String(command)}`);
    if (ticker) context.push(`ticker=${String(ticker)}`);
    if (frequency) context.push(`frequency=${String(frequency)}`);
    if (run_id) context.push(`run_id=${String(run_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const line = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    return typeof stack === 'string' ? `${line}\n${stack}` : line;
  })
);
