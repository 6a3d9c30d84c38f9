import { describe, it, expect } from 'vitest';
import { classifyTrend, percentChanges } from '../src/changes.js';
import { simulateInvestment } from '../src/investment.js';
import { summarizeConstituents } from '../src/constituents.js';
import { bar } from './fixtures.js';

describe('percentChanges', () => {
  it('should treat non-finite provided values as 0', () => {
    const bars = [bar('2024-03-01', 1, { pctChange: Number.NaN }), bar('2024-03-04', 1, { pctChange: 2 })];
    expect(percentChanges(bars, 'provided')).toEqual([0, 2]);
  });

  it('should return 0 after a zero close', () => {
    const bars = [bar('2024-03-01', 5), bar('2024-03-04', 0), bar('2024-03-05', 4)];
    expect(percentChanges(bars, 'derived')).toEqual([0, -100, 0]);
  });

  it('should return zeros for the none strategy', () => {
    expect(percentChanges([bar('2024-03-01', 5), bar('2024-03-01', 6)], 'none')).toEqual([0, 0]);
  });

  it('should return an empty list for no bars', () => {
    expect(percentChanges([], 'derived')).toEqual([]);
  });
});

describe('classifyTrend', () => {
  it('should count negative zero as flat', () => {
    expect(classifyTrend([-0, 0, 1])).toEqual({ up: 1, down: 0, flat: 2, total: 3 });
  });
});

describe('simulateInvestment', () => {
  it('should accept a custom principal', () => {
    const result = simulateInvestment([bar('2024-03-01', 20), bar('2024-03-04', 25)], 1000);

    expect(result.shares).toBe(50);
    expect(result.finalValue).toBe(1250);
    expect(result.profit).toBe(250);
    expect(result.profitPercent).toBe(25);
  });

  it('should be a no-op without bars', () => {
    expect(simulateInvestment([]).finalValue).toBe(10000);
  });
});

describe('summarizeConstituents', () => {
  it('should count constituents per exchange', () => {
    const breakdown = summarizeConstituents([
      { code: 'sh.600000', name: 'A', updateDate: '2024-03-04' },
      { code: 'sh.601398', name: 'B', updateDate: '2024-03-04' },
      { code: 'sz.000001', name: 'C', updateDate: '2024-03-04' },
      { code: 'bj.430047', name: 'D', updateDate: '2024-03-04' },
    ]);

    expect(breakdown).toEqual({ total: 4, byExchange: { sh: 2, sz: 1, other: 1 } });
  });

  it('should handle an empty list', () => {
    expect(summarizeConstituents([])).toEqual({ total: 0, byExchange: { sh: 0, sz: 0, other: 0 } });
  });
});
