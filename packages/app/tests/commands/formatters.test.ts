/**
 * Tests for the console formatters
 *
 * Colors are switched off through the theme, so assertions see plain text.
 */

import { Chalk } from 'chalk';
import { describe, it, expect } from 'vitest';
import { Frequency, INDEX_TABLE } from '@ashare/contracts';
import type { Bar, Series } from '@ashare/contracts';
import { summarize } from '@ashare/analysis-kit';
import { KlineFormatter } from '../../src/formatters/kline-formatter.js';
import { ReferenceFormatter } from '../../src/formatters/reference-formatter.js';
import { FinanceFormatter, formatPeriod } from '../../src/formatters/finance-formatter.js';
import { IndexFormatter } from '../../src/formatters/index-formatter.js';
import { createTheme } from '../../src/formatters/theme.js';
import {
  formatAmount,
  formatInteger,
  formatMoney,
  formatPercent,
  formatPrice,
  formatStatementAmount,
  formatVolume,
} from '../../src/formatters/number-format.js';
import { makeBar, plainTheme, THREE_DAYS } from '../helpers.js';

function series(bars: Bar[], frequency: Frequency = Frequency.D1): Series {
  return { ticker: 'sz.000001', frequency, adjust: 'none', start: '2024-03-25', end: '2024-03-29', bars };
}

describe('number formatting', () => {
  it('should format prices with two decimals', () => {
    expect(formatPrice(10.5)).toBe('10.50');
    expect(formatPrice(undefined)).toBe('-');
    expect(formatPrice(Number.NaN)).toBe('-');
  });

  it('should sign percent changes', () => {
    expect(formatPercent(0)).toBe('0.00%');
    expect(formatPercent(1.5)).toBe('+1.50%');
    expect(formatPercent(-2)).toBe('-2.00%');
  });

  it('should group volumes and show zero as a dash', () => {
    expect(formatVolume(1_234_567)).toBe('1,234,567');
    expect(formatVolume(0)).toBe('-');
    expect(formatInteger(1234.9)).toBe('1,234');
  });

  it('should scale bar amounts above the thresholds', () => {
    expect(formatAmount(250_000_000)).toBe('2.50亿');
    expect(formatAmount(50_000)).toBe('5.00万');
    expect(formatAmount(10_000)).toBe('10000');
    expect(formatAmount(512)).toBe('512');
  });

  it('should scale statement amounts on the absolute value, inclusive', () => {
    expect(formatStatementAmount(10_000)).toBe('1.00万');
    expect(formatStatementAmount(-250_000_000)).toBe('-2.50亿');
    expect(formatStatementAmount(undefined)).toBe('-');
  });

  it('should keep two decimals for statement amounts below 1万', () => {
    expect(formatStatementAmount(1234.56)).toBe('1234.56');
    expect(formatStatementAmount(0.87)).toBe('0.87');
    expect(formatStatementAmount(-512)).toBe('-512.00');
    expect(formatStatementAmount(9_999.99)).toBe('9999.99');
  });

  it('should format money with grouping and fixed decimals', () => {
    expect(formatMoney(10_500)).toBe('10,500.00');
    expect(formatMoney(10_000, 0)).toBe('10,000');
  });
});

describe('Theme', () => {
  it('should paint rises red and falls green', () => {
    const theme = createTheme(new Chalk({ level: 1 }));

    expect(theme.bySign(1)('x')).toBe('\u001b[31mx\u001b[39m');
    expect(theme.bySign(-1)('x')).toBe('\u001b[32mx\u001b[39m');
  });

  it('should leave text unchanged at color level 0', () => {
    expect(plainTheme().up('x')).toBe('x');
  });
});

describe('KlineFormatter', () => {
  const formatter = new KlineFormatter(plainTheme());

  it('should title the table with ticker, frequency and range', () => {
    expect(formatter.formatTitle(series(THREE_DAYS))).toBe('sz.000001 daily bars (2024-03-25 ~ 2024-03-29)');
    expect(formatter.formatTitle(series(THREE_DAYS, Frequency.M15))).toBe(
      'sz.000001 15-minute bars (2024-03-25 ~ 2024-03-29)'
    );
  });

  it('should add a change column for daily bars only', () => {
    const daily = formatter.formatBars(series(THREE_DAYS));
    expect(daily).toContain('Change');
    expect(daily).toContain('+0.50%');
    expect(daily).toContain('-2.00%');
    expect(daily).toContain('1960.00万');
    expect(daily).toContain('2,000,000');

    const weekly = formatter.formatBars(series(THREE_DAYS, Frequency.W1));
    expect(weekly).not.toContain('Change');
  });

  it('should print a dash for prices the provider left empty', () => {
    const bars: Bar[] = [{ period: '2024-03-04', date: '2024-03-04', close: 10.1, volume: 500_000, amount: 5_000_000 }];
    const row = formatter
      .formatBars(series(bars, Frequency.W1))
      .split('\n')
      .find((line) => line.includes('2024-03-04'));
    const cells = (row ?? '').split('│').map((cell) => cell.trim());

    expect(cells.slice(1, 6)).toEqual(['2024-03-04', '-', '-', '-', '10.10']);
  });

  it('should summarize a rising series', () => {
    const text = formatter.formatSummary(summarize(series(THREE_DAYS), Frequency.D1));

    expect(text).toContain('Total trading days: 3 days');
    expect(text).toContain('Change: +0.50 (+5.00%)');
    expect(text).toContain('Start price: 10.00');
    expect(text).toContain('End price: 10.50');
    expect(text).toContain('Shares: 1000');
    expect(text).toContain('Final value: ¥10,500.00');
    expect(text).toContain('Max volume: 3,000,000');
  });

  it('should show a loss and a flat count', () => {
    const bars = [makeBar('2024-03-28', { pctChange: 0 }), makeBar('2024-03-29', { close: 9.5, pctChange: -5 })];
    const text = formatter.formatSummary(summarize(series(bars), Frequency.D1));

    expect(text).toContain('Flat: 1 (50.0%)');
    expect(text).toContain('Loss: ¥-500.00 (-5.00%)');
  });

  it('should count weeks for weekly bars', () => {
    const text = formatter.formatSummary(summarize(series(THREE_DAYS, Frequency.W1), Frequency.W1));

    expect(text).toContain('Total trading weeks: 3 weeks');
  });

  it('should keep only the principal for a single bar', () => {
    const text = formatter.formatSummary(summarize(series([makeBar('2024-03-29')]), Frequency.D1));

    expect(text).toContain('Needs two or more bars');
    expect(text).toContain('Principal: ¥10,000');
    expect(text).not.toContain('Shares:');
  });
});

describe('ReferenceFormatter', () => {
  const formatter = new ReferenceFormatter(plainTheme());

  it('should mark a company without delisting date as listed', () => {
    const text = formatter.formatInfo('sh.600000', {
      code: 'sh.600000',
      name: 'SPD Bank',
      ipoDate: '1999-11-10',
      type: 'stock',
      status: 'listed',
    });

    expect(text.split('\n')[0]).toBe('sh.600000 company info');
    expect(text).toContain('SPD Bank');
    expect(text).toContain('Stock');
    expect(text).not.toContain('Delisted');
  });

  it('should show delisted companies', () => {
    const text = formatter.formatInfo('sz.000003', {
      code: 'sz.000003',
      name: 'Test Co',
      outDate: '2002-06-14',
      type: 'stock',
      status: 'delisted',
    });

    expect(text).toContain('2002-06-14');
    expect(text).toContain('Delisted');
  });

  it('should render the quote links', () => {
    const text = formatter.formatLinks('sh.600000');

    expect(text).toContain('More');
    expect(text).toContain('Baidu quote:  https://gushitong.baidu.com/stock/ab-600000');
    expect(text).toContain('Eastmoney:    https://quote.eastmoney.com/concept/SH600000.html?from=data');
    expect(text).toContain('Baidu search: https://www.baidu.com/s?wd=600000');
  });
});

describe('FinanceFormatter', () => {
  const formatter = new FinanceFormatter(plainTheme());

  it('should label report periods', () => {
    expect(formatPeriod({ year: 2023, quarter: 4 })).toBe('2023Q4');
  });

  it('should render only the statements that are present', () => {
    const text = formatter.format({
      period: { year: 2023, quarter: 2 },
      profit: { code: 'sz.000001', netProfit: 25_000_000, basicEarningsPerShare: 0.4 },
      balance: null,
      cashFlow: null,
    });

    expect(text).toContain('Income statement (2023Q2)');
    expect(text).toContain('2500.00万');
    expect(text).toContain('0.40');
    expect(text).not.toContain('Balance sheet');
    expect(text).not.toContain('Cash flow statement');
  });

  it('should print small statement figures with two decimals', () => {
    const lines = formatter
      .format({
        period: { year: 2023, quarter: 4 },
        profit: null,
        balance: null,
        cashFlow: { code: 'sz.000001', operatingCashFlow: 0.87, netIncreaseInCash: 1234.56 },
      })
      .split('\n');

    expect(lines.find((line) => line.includes('Operating cash flow'))).toContain('0.87');
    expect(lines.find((line) => line.includes('Net change in cash'))).toContain('1234.56');
  });
});

describe('IndexFormatter', () => {
  const formatter = new IndexFormatter(plainTheme());

  it('should number the constituents', () => {
    const text = formatter.formatConstituents(INDEX_TABLE.sz50, [
      { code: 'sh.600000', name: 'SPD Bank', updateDate: '2024-06-17' },
    ]);

    expect(text.split('\n')[0]).toBe('SSE 50 constituents (1 total)');
    expect(text).toContain('SPD Bank');
  });

  it('should list other exchanges only when present', () => {
    const text = formatter.formatBreakdown(INDEX_TABLE.zz500, { total: 3, byExchange: { sh: 1, sz: 1, other: 1 } });

    expect(text).toContain('Name: CSI 500');
    expect(text).toContain('Other: 1');
  });
});
