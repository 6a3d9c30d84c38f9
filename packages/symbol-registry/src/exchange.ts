/**
 * Exchange table and ticker helpers
 */

import type { Exchange, Ticker } from '@ashare/contracts';
import type { ExchangeInfo } from './types.js';

/**
 * Supported exchanges. Leading digit of a bare code decides the exchange:
 * 0/3 → Shenzhen, 6 → Shanghai.
 */
export const EXCHANGES: Readonly<Record<Exchange, ExchangeInfo>> = {
  sz: {
    prefix: 'sz',
    name: 'SZSE',
    fullName: 'Shenzhen Stock Exchange',
    leadingDigits: ['0', '3'],
  },
  sh: {
    prefix: 'sh',
    name: 'SSE',
    fullName: 'Shanghai Stock Exchange',
    leadingDigits: ['6'],
  },
};

const PREFIXES: readonly Exchange[] = ['sz', 'sh'];

/**
 * True when the string already carries an exchange prefix. The part after
 * the dot is not validated.
 */
export function isTicker(value: string): value is Ticker {
  return PREFIXES.some((prefix) => value.startsWith(`${prefix}.`));
}

/**
 * Exchange inferred from the first character of a bare code
 */
export function inferExchange(code: string): Exchange | undefined {
  const first = code.charAt(0);
  return PREFIXES.find((prefix) => EXCHANGES[prefix].leadingDigits.includes(first));
}

/**
 * Exchange of a ticker or provider code such as "sh.600000"
 *
 * @example
 * ```typescript
 * exchangeOf('sz.000001') // → 'sz'
 * exchangeOf('bj.430047') // → undefined
 * ```
 */
export function exchangeOf(value: string): Exchange | undefined {
  return PREFIXES.find((prefix) => value.startsWith(`${prefix}.`));
}

/**
 * Removes the exchange prefix: "sh.600000" → "600000"
 */
export function stripExchange(ticker: Ticker): string {
  return ticker.slice(ticker.indexOf('.') + 1);
}
