/**
 * Price, volume and period aggregates over a bar sequence
 */

import type { Bar, PeriodCount, PriceChange, VolumeStats } from '@ashare/contracts';

/**
 * First-to-last close change
 *
 * **Edge cases:**
 * - Single bar: `available` false, every number 0
 * - First close 0: absolute change kept, percent 0
 */
export function priceChange(bars: readonly Bar[]): PriceChange {
  const first = bars[0];
  const last = bars[bars.length - 1];

  if (bars.length < 2 || !first || !last) {
    return { available: false, firstClose: 0, lastClose: 0, absolute: 0, percent: 0 };
  }

  const absolute = last.close - first.close;

  return {
    available: true,
    firstClose: first.close,
    lastClose: last.close,
    absolute,
    percent: first.close === 0 ? 0 : (absolute / first.close) * 100,
  };
}

/**
 * Population mean and max of volume
 */
export function volumeStats(bars: readonly Bar[]): VolumeStats {
  if (bars.length === 0) {
    return { average: 0, max: 0 };
  }

  let total = 0;
  let max = 0;
  for (const bar of bars) {
    total += bar.volume;
    if (bar.volume > max) {
      max = bar.volume;
    }
  }

  return { average: total / bars.length, max };
}

/**
 * Bar count, plus the number of distinct dates when `countDates` is set
 */
export function countPeriods(bars: readonly Bar[], countDates: boolean): PeriodCount {
  if (!countDates) {
    return { bars: bars.length };
  }

  return {
    bars: bars.length,
    distinctDates: new Set(bars.map((bar) => bar.date)).size,
  };
}
