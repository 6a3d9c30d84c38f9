/**
 * Deterministic bar generation for the fixture provider
 */

import moment from 'moment-timezone';
import { ADJUST_FLAGS, FREQUENCY_TABLE } from '@ashare/contracts';
import type { Bar, BarQuery } from '@ashare/contracts';

const DATE_FORMAT = 'YYYY-MM-DD';

/** Morning and afternoon sessions, minutes after midnight */
const SESSIONS: ReadonlyArray<readonly [number, number]> = [
  [9 * 60 + 30, 11 * 60 + 30],
  [13 * 60, 15 * 60],
];

/**
 * Seeded random number generator for deterministic fixtures
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return function () {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

/** FNV-1a hash, used to seed one walk per ticker */
export function seedFor(text: string): number {
  let hash = 2166136261;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 16777619) >>> 0;
  }
  return hash;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Weekdays in [start, end]; holidays are not modelled
 */
export function tradingDates(start: string, end: string): string[] {
  const cursor = moment.utc(start, DATE_FORMAT, true);
  const last = moment.utc(end, DATE_FORMAT, true);
  if (!cursor.isValid() || !last.isValid()) {
    return [];
  }

  const dates: string[] = [];
  while (!cursor.isAfter(last)) {
    if (cursor.isoWeekday() <= 5) {
      dates.push(cursor.format(DATE_FORMAT));
    }
    cursor.add(1, 'day');
  }
  return dates;
}

interface Walk {
  random: () => number;
  previous: number;
}

function startWalk(ticker: string): Walk {
  const random = seededRandom(seedFor(ticker));
  return { random, previous: round2(5 + random() * 45) };
}

/** Next OHLC step; `scale` shrinks moves for intraday bars */
function step(walk: Walk, scale: number): { open: number; high: number; low: number; close: number } {
  const { random } = walk;
  const open = round2(walk.previous * (1 + (random() - 0.5) * 0.02 * scale));
  const close = round2(Math.max(0.01, open * (1 + (random() - 0.5) * 0.05 * scale)));
  const high = round2(Math.max(open, close) * (1 + random() * 0.01 * scale));
  const low = round2(Math.min(open, close) * (1 - random() * 0.01 * scale));
  return { open, high, low, close };
}

function dailyBars(ticker: string, dates: readonly string[], adjustFlag: string): Bar[] {
  const walk = startWalk(ticker);

  return dates.map((date) => {
    const { open, high, low, close } = step(walk, 1);
    const volume = Math.floor(1_000_000 + walk.random() * 9_000_000);
    const bar: Bar = {
      period: date,
      date,
      open,
      high,
      low,
      close,
      volume,
      amount: round2((volume * (open + close)) / 2),
      preClose: walk.previous,
      pctChange: round2(((close - walk.previous) / walk.previous) * 100),
      turnover: round2(walk.random() * 3),
      tradeStatus: 1,
      isST: false,
      adjustFlag,
    };
    walk.previous = close;
    return bar;
  });
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

function minuteBars(ticker: string, dates: readonly string[], minutes: number, adjustFlag: string): Bar[] {
  const walk = startWalk(ticker);
  const bars: Bar[] = [];

  for (const date of dates) {
    for (const [open, close] of SESSIONS) {
      for (let at = open + minutes; at <= close; at += minutes) {
        const hh = pad2(Math.floor(at / 60));
        const mm = pad2(at % 60);
        const prices = step(walk, Math.sqrt(minutes / 240));
        const volume = Math.floor(10_000 + walk.random() * 190_000);

        bars.push({
          period: `${date} ${hh}:${mm}`,
          date,
          time: `${date.replace(/-/g, '')}${hh}${mm}00000`,
          ...prices,
          volume,
          amount: round2((volume * (prices.open + prices.close)) / 2),
          adjustFlag,
        });
        walk.previous = prices.close;
      }
    }
  }

  return bars;
}

/** Max or min of the prices that are present */
function extreme(values: ReadonlyArray<number | undefined>, pick: (...values: number[]) => number): number | undefined {
  const known = values.filter((value): value is number => value !== undefined);
  return known.length > 0 ? pick(...known) : undefined;
}

/**
 * Rolls daily bars up into one bar per ISO week or calendar month, dated by
 * the last trading day of the period
 */
export function aggregateBars(daily: readonly Bar[], unit: 'week' | 'month'): Bar[] {
  const groups = new Map<string, Bar[]>();

  for (const bar of daily) {
    const day = moment.utc(bar.date, DATE_FORMAT);
    const key = unit === 'week' ? `${day.isoWeekYear()}-W${day.isoWeek()}` : bar.date.slice(0, 7);
    const group = groups.get(key);
    if (group) {
      group.push(bar);
    } else {
      groups.set(key, [bar]);
    }
  }

  const result: Bar[] = [];
  for (const group of groups.values()) {
    const first = group[0];
    const last = group[group.length - 1];
    if (!first || !last) continue;

    const bar: Bar = {
      period: last.date,
      date: last.date,
      close: last.close,
      volume: group.reduce((sum, b) => sum + b.volume, 0),
      amount: round2(group.reduce((sum, b) => sum + b.amount, 0)),
    };
    const high = extreme(group.map((b) => b.high), Math.max);
    const low = extreme(group.map((b) => b.low), Math.min);
    if (first.open !== undefined) bar.open = first.open;
    if (high !== undefined) bar.high = high;
    if (low !== undefined) bar.low = low;
    if (last.adjustFlag !== undefined) bar.adjustFlag = last.adjustFlag;
    result.push(bar);
  }
  return result;
}

/**
 * Bars for a query, the same on every call for the same query
 */
export function generateFixtureBars(query: BarQuery): Bar[] {
  const spec = FREQUENCY_TABLE[query.frequency];
  const adjustFlag = ADJUST_FLAGS[query.adjust ?? 'none'];
  const dates = tradingDates(query.start, query.end);

  switch (spec.kind) {
    case 'minute':
      return minuteBars(query.ticker, dates, Number(spec.providerCode), adjustFlag);
    case 'daily':
      return dailyBars(query.ticker, dates, adjustFlag);
    case 'period':
      return aggregateBars(dailyBars(query.ticker, dates, adjustFlag), spec.periodUnit === 'week' ? 'week' : 'month');
  }
}
