/**
 * @fileoverview Output shape of the K-line statistics engine.
 *
 * Renderers read these fields directly; they never re-derive values from bars.
 *
 * @module @ashare/contracts/summary
 */

import type { Frequency } from './frequency.js';
import type { Ticker } from './market.js';

/** Principal used by the buy-and-hold simulation, in CNY. */
export const NOTIONAL_INVESTMENT = 10_000;

/**
 * @invariant up + down + flat === total
 */
export interface TrendDistribution {
  up: number;
  down: number;
  flat: number;
  total: number;
}

export interface PeriodCount {
  /** Number of bars */
  bars: number;
  /** Distinct trading dates; only set for minute frequencies */
  distinctDates?: number;
}

/**
 * First-to-last close change. When `available` is false (single bar) the
 * numeric fields are 0.
 */
export interface PriceChange {
  available: boolean;
  firstClose: number;
  lastClose: number;
  absolute: number;
  percent: number;
}

export interface VolumeStats {
  /** Population mean */
  average: number;
  max: number;
}

/**
 * Buy at the first close, hold to the last close. When `executed` is false
 * the simulation is a no-op: shares 0 and finalValue equal to the principal.
 */
export interface InvestmentSimulation {
  executed: boolean;
  principal: number;
  shares: number;
  finalValue: number;
  profit: number;
  profitPercent: number;
}

export interface KlineSummary {
  ticker: Ticker;
  frequency: Frequency;
  trend: TrendDistribution;
  periods: PeriodCount;
  priceChange: PriceChange;
  volume: VolumeStats;
  investment: InvestmentSimulation;
  /** Per-bar percent change used for classification, same order as the bars */
  changes: readonly number[];
}

/** Exchange distribution of an index's constituents. */
export interface ConstituentBreakdown {
  total: number;
  byExchange: {
    sh: number;
    sz: number;
    other: number;
  };
}
