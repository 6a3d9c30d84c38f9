/**
 * Tests for Fixture Generation
 */

import { describe, it, expect } from 'vitest';
import { Frequency } from '@ashare/contracts';
import { aggregateBars, generateFixtureBars, seededRandom, seedFor, tradingDates } from '../src/fixtures/index.js';
import { makeBar } from './helpers.js';

describe('Fixture Generation', () => {
  describe('tradingDates', () => {
    it('should list weekdays only', () => {
      expect(tradingDates('2024-03-01', '2024-03-05')).toEqual(['2024-03-01', '2024-03-04', '2024-03-05']);
    });

    it('should return nothing for invalid input', () => {
      expect(tradingDates('2024-13-01', '2024-03-05')).toEqual([]);
    });
  });

  describe('seededRandom', () => {
    it('should repeat a sequence for the same seed', () => {
      const a = seededRandom(seedFor('sz.000001'));
      const b = seededRandom(seedFor('sz.000001'));

      expect([a(), a(), a()]).toEqual([b(), b(), b()]);
    });

    it('should stay in [0, 1)', () => {
      const random = seededRandom(42);
      for (let i = 0; i < 100; i++) {
        const value = random();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });
  });

  describe('generateFixtureBars', () => {
    const query = { ticker: 'sz.000001' as const, frequency: Frequency.D1, start: '2024-03-01', end: '2024-03-29' };

    it('should produce one daily bar per weekday', () => {
      const bars = generateFixtureBars(query);

      expect(bars).toHaveLength(21);
      expect(bars[0]?.date).toBe('2024-03-01');
      expect(bars[20]?.date).toBe('2024-03-29');
    });

    it('should be deterministic', () => {
      expect(generateFixtureBars(query)).toEqual(generateFixtureBars(query));
    });

    it('should generate valid OHLC data', () => {
      for (const bar of generateFixtureBars(query)) {
        expect(bar.high ?? Number.NaN).toBeGreaterThanOrEqual(Math.max(bar.open ?? Number.NaN, bar.close));
        expect(bar.low ?? Number.NaN).toBeLessThanOrEqual(Math.min(bar.open ?? Number.NaN, bar.close));
        expect(bar.volume).toBeGreaterThan(0);
      }
    });

    it('should chain previous closes', () => {
      const bars = generateFixtureBars(query);

      expect(bars[1]?.preClose).toBe(bars[0]?.close);
      expect(bars[0]?.adjustFlag).toBe('3');
    });

    it('should tag the adjust flag', () => {
      const bars = generateFixtureBars({ ...query, adjust: 'backward' });

      expect(bars[0]?.adjustFlag).toBe('1');
    });

    it('should fill both trading sessions with minute bars', () => {
      const bars = generateFixtureBars({ ...query, frequency: Frequency.M30, end: '2024-03-01' });

      expect(bars).toHaveLength(8);
      expect(bars[0]?.period).toBe('2024-03-01 10:00');
      expect(bars[0]?.time).toBe('20240301100000000');
      expect(bars[3]?.period).toBe('2024-03-01 11:30');
      expect(bars[4]?.period).toBe('2024-03-01 13:30');
      expect(bars[7]?.period).toBe('2024-03-01 15:00');
    });

    it('should roll days up into weeks and months', () => {
      expect(generateFixtureBars({ ...query, frequency: Frequency.W1 }).map((bar) => bar.date)).toEqual([
        '2024-03-01',
        '2024-03-08',
        '2024-03-15',
        '2024-03-22',
        '2024-03-29',
      ]);
      expect(generateFixtureBars({ ...query, frequency: Frequency.MN1 })).toHaveLength(1);
    });
  });

  describe('aggregateBars', () => {
    it('should take the first open, extremes, the last close and summed volume', () => {
      const [week] = aggregateBars(
        [
          makeBar('2024-03-04', { open: 10, high: 10.5, low: 9.8, close: 10.2 }),
          makeBar('2024-03-05', { open: 10.2, high: 11, low: 10, close: 10.8 }),
          makeBar('2024-03-06', { open: 10.8, high: 10.9, low: 9.5, close: 9.9 }),
        ],
        'week'
      );

      expect(week).toEqual({
        period: '2024-03-06',
        date: '2024-03-06',
        open: 10,
        high: 11,
        low: 9.5,
        close: 9.9,
        volume: 3_000_000,
        amount: 30_000_000,
      });
    });

    it('should skip missing prices when rolling up', () => {
      const [week] = aggregateBars(
        [
          { period: '2024-03-04', date: '2024-03-04', close: 10.1, volume: 500_000, amount: 5_000_000 },
          makeBar('2024-03-05', { open: 10.1, high: 10.4, low: 9.9, close: 10.3 }),
        ],
        'week'
      );

      expect(week).not.toHaveProperty('open');
      expect(week?.high).toBe(10.4);
      expect(week?.low).toBe(9.9);
      expect(week?.close).toBe(10.3);
    });
  });
});
