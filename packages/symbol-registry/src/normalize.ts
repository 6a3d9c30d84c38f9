/**
 * Ticker normalization
 * Converts user input to the provider's exchange-qualified form
 */

import { EmptyInputError, UnrecognizedFormatError } from '@ashare/contracts';
import type { Ticker } from '@ashare/contracts';
import { inferExchange, isTicker } from './exchange.js';
import type { NormalizeResult } from './types.js';

/**
 * Human-readable list of accepted input shapes
 */
export const SUPPORTED_FORMATS: readonly string[] = [
  'sz.000001 / sh.600000 (exchange-qualified)',
  '000001, 002594, 300750 (0/3 prefix → Shenzhen)',
  '600000, 601398 (6 prefix → Shanghai)',
];

/**
 * Normalize raw input to a canonical ticker
 *
 * Already-qualified input is returned as-is. Bare codes get their exchange
 * from the first character. Digit count is not checked.
 *
 * @param raw - User-supplied code
 * @returns Ticker on success, or the typed failure
 *
 * @example
 * ```typescript
 * normalizeTicker('000001')     // → { ok: true, ticker: 'sz.000001' }
 * normalizeTicker(' 600000 ')   // → { ok: true, ticker: 'sh.600000' }
 * normalizeTicker('sz.000001')  // → { ok: true, ticker: 'sz.000001' }
 * normalizeTicker('abc')        // → { ok: false, error: UnrecognizedFormatError }
 * ```
 */
export function normalizeTicker(raw: string): NormalizeResult {
  const trimmed = raw.trim();

  if (trimmed.length === 0) {
    return { ok: false, error: new EmptyInputError() };
  }

  if (isTicker(trimmed)) {
    return { ok: true, ticker: trimmed };
  }

  const exchange = inferExchange(trimmed);
  if (!exchange) {
    return { ok: false, error: new UnrecognizedFormatError(raw) };
  }

  const ticker: Ticker = `${exchange}.${trimmed}`;
  return { ok: true, ticker };
}
