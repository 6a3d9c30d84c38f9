import { Frequency } from '@ashare/contracts';
import type { Bar, Series } from '@ashare/contracts';

export function bar(date: string, close: number, extra: Partial<Bar> = {}): Bar {
  return {
    period: extra.time ? `${date} ${extra.time}` : date,
    date,
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000,
    amount: close * 1000,
    ...extra,
  };
}

export function series(bars: Bar[], frequency: Frequency = Frequency.D1): Series {
  return {
    ticker: 'sz.000001',
    frequency,
    adjust: 'none',
    start: bars[0]?.date ?? '2024-01-01',
    end: bars[bars.length - 1]?.date ?? '2024-01-01',
    bars,
  };
}
