/**
 * @fileoverview Run context for one CLI invocation, kept in AsyncLocalStorage
 * so every log line of the run carries the same run_id.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RunContext {
  /** UUID v4 */
  run_id: string;

  /** CLI command being run */
  command?: string;

  [key: string]: unknown;
}

const runContextStorage = new AsyncLocalStorage<RunContext>();

export function generateRunId(): string {
  return randomUUID();
}

export function getRunId(): string | undefined {
  return runContextStorage.getStore()?.run_id;
}

/**
 * Runs `fn` inside a fresh run context.
 *
 * @example
 * ```typescript
 * await withRunContext('kline', async () => {
 *   logger.info('Fetching'); // carries run_id
 * }, { ticker: 'sz.000001' });
 * ```
 */
export async function withRunContext<T>(
  command: string,
  fn: () => Promise<T> | T,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RunContext = {
    ...additionalContext,
    run_id: generateRunId(),
    command,
  };

  return runContextStorage.run(context, fn);
}
