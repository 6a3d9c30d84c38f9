/**
 * @fileoverview Market data types: tickers, K-line bars and series.
 *
 * All types are pure data structures with no I/O or business logic.
 *
 * @module @ashare/contracts/market
 */

import type { Frequency } from './frequency.js';

/** Exchange prefixes accepted by the provider. */
export type Exchange = 'sz' | 'sh';

/**
 * Canonical ticker, `<exchange>.<code>`.
 *
 * @example
 * ```typescript
 * const ticker: Ticker = 'sz.000001';
 * ```
 */
export type Ticker = `${Exchange}.${string}`;

/**
 * Price adjustment applied by the provider.
 * - none: raw prices
 * - forward: 前复权, history scaled to today's price level
 * - backward: 后复权, today scaled from the listing price
 */
export type AdjustPolicy = 'none' | 'forward' | 'backward';

/** Provider `adjustflag` values per policy. */
export const ADJUST_FLAGS: Readonly<Record<AdjustPolicy, string>> = {
  none: '3',
  forward: '2',
  backward: '1',
};

export const ADJUST_POLICIES: readonly AdjustPolicy[] = ['none', 'forward', 'backward'];

export function isAdjustPolicy(value: string): value is AdjustPolicy {
  return ADJUST_POLICIES.some((policy) => policy === value);
}

/**
 * A single K-line bar.
 *
 * @invariant volume >= 0
 * @invariant amount >= 0
 *
 * @example
 * ```typescript
 * const bar: Bar = {
 *   period: '2024-03-01',
 *   date: '2024-03-01',
 *   open: 10.2,
 *   high: 10.6,
 *   low: 10.1,
 *   close: 10.5,
 *   volume: 1200000,
 *   amount: 12480000,
 *   pctChange: 2.94,
 * };
 * ```
 */
export interface Bar {
  /** Display label: the date, or `date time` for intraday bars */
  period: string;

  /** Trading date, YYYY-MM-DD */
  date: string;

  /** Provider time stamp for intraday bars (YYYYMMDDHHmmssSSS) */
  time?: string;

  /** Absent when the provider left the field empty */
  open?: number;
  high?: number;
  low?: number;
  close: number;

  /** Shares traded */
  volume: number;

  /** Turnover in CNY */
  amount: number;

  /** Previous close (daily only) */
  preClose?: number;

  /** Percent change vs previous close, as reported (daily only) */
  pctChange?: number;

  /** Turnover rate in percent (daily only) */
  turnover?: number;

  /** 1 = traded, 0 = suspended (daily only) */
  tradeStatus?: number;

  /** Special-treatment flag (daily only) */
  isST?: boolean;

  /** Provider adjust flag the bar was produced with */
  adjustFlag?: string;
}

/**
 * Bars for one ticker at one frequency, ordered by non-decreasing period.
 */
export interface Series {
  readonly ticker: Ticker;
  readonly frequency: Frequency;
  readonly adjust: AdjustPolicy;
  /** Requested range start, YYYY-MM-DD */
  readonly start: string;
  /** Requested range end, YYYY-MM-DD */
  readonly end: string;
  readonly bars: readonly Bar[];
}

/**
 * Parameters for a history query.
 *
 * @invariant start <= end
 */
export interface BarQuery {
  ticker: Ticker;
  frequency: Frequency;
  start: string;
  end: string;
  adjust?: AdjustPolicy;
}
