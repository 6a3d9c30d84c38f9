/**
 * Per-bar percent change and trend classification
 */

import type { Bar, ChangeStrategy, TrendDistribution } from '@ashare/contracts';

/**
 * Percent change of each bar, one value per bar
 *
 * **Strategies:**
 * - `provided`: the bar's own pctChange; missing or non-finite values count as 0
 * - `derived`: (close[i] - close[i-1]) / close[i-1] * 100; the first bar is 0,
 *   and so is any bar whose previous close is 0
 * - `none`: all zeros
 *
 * @example
 * ```typescript
 * percentChanges(weeklyBars, 'derived'); // closes [100, 110, 99] → [0, 10, -10]
 * ```
 */
export function percentChanges(bars: readonly Bar[], strategy: ChangeStrategy): number[] {
  switch (strategy) {
    case 'provided':
      return bars.map((bar) =>
        bar.pctChange !== undefined && Number.isFinite(bar.pctChange) ? bar.pctChange : 0
      );

    case 'derived':
      return bars.map((bar, i) => {
        const previous = bars[i - 1];
        if (!previous || previous.close === 0) {
          return 0;
        }
        return ((bar.close - previous.close) / previous.close) * 100;
      });

    case 'none':
      return bars.map(() => 0);
  }
}

/**
 * Counts up/down/flat values. Anything not strictly positive or negative is flat.
 */
export function classifyTrend(changes: readonly number[]): TrendDistribution {
  let up = 0;
  let down = 0;

  for (const change of changes) {
    if (change > 0) {
      up++;
    } else if (change < 0) {
      down++;
    }
  }

  return {
    up,
    down,
    flat: changes.length - up - down,
    total: changes.length,
  };
}
