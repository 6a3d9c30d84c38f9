/**
 * K-line statistics engine
 */

import { EmptySeriesError, FREQUENCY_TABLE } from '@ashare/contracts';
import type { Frequency, KlineSummary, Series } from '@ashare/contracts';
import { classifyTrend, percentChanges } from './changes.js';
import { countPeriods, priceChange, volumeStats } from './aggregates.js';
import { simulateInvestment } from './investment.js';

/**
 * Summarize a series
 *
 * **Algorithm:**
 * 1. Per-bar percent change, using the frequency's change strategy
 * 2. Up/down/flat counts from those changes
 * 3. Bar count, and distinct dates for minute frequencies
 * 4. First-to-last price change
 * 5. Volume mean and max
 * 6. Buy-and-hold simulation of NOTIONAL_INVESTMENT
 *
 * The frequency argument decides the strategy; `series.frequency` is not consulted.
 *
 * @throws EmptySeriesError when the series has no bars; callers report
 *   "no data" before getting here
 *
 * @example
 * ```typescript
 * const summary = summarize(series, Frequency.D1);
 * summary.trend;       // { up: 1, down: 1, flat: 1, total: 3 }
 * summary.priceChange; // { available: true, absolute: -0.2, percent: -2, ... }
 * ```
 */
export function summarize(series: Series, frequency: Frequency): KlineSummary {
  const { bars } = series;

  if (bars.length === 0) {
    throw new EmptySeriesError({ ticker: series.ticker, frequency });
  }

  const spec = FREQUENCY_TABLE[frequency];
  const changes = percentChanges(bars, spec.changeStrategy);

  return {
    ticker: series.ticker,
    frequency,
    trend: classifyTrend(changes),
    periods: countPeriods(bars, spec.kind === 'minute'),
    priceChange: priceChange(bars),
    volume: volumeStats(bars),
    investment: simulateInvestment(bars),
    changes,
  };
}
