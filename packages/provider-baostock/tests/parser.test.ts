import { describe, it, expect } from 'vitest';
import { Frequency, FREQUENCY_TABLE } from '@ashare/contracts';
import { RowReader, formatIntradayTime, parseBar } from '../src/parser.js';

describe('RowReader', () => {
  const reader = new RowReader(['code', 'close', 'note'], ['sz.000001', ' 10.5 ', '']);

  it('should read trimmed text by field name', () => {
    expect(reader.text('code')).toBe('sz.000001');
    expect(reader.text('close')).toBe('10.5');
  });

  it('should treat empty and missing cells as undefined', () => {
    expect(reader.text('note')).toBeUndefined();
    expect(reader.text('missing')).toBeUndefined();
  });

  it('should parse finite numbers only', () => {
    expect(reader.number('close')).toBe(10.5);
    expect(reader.number('code')).toBeUndefined();
    expect(reader.number('note')).toBeUndefined();
  });
});

describe('formatIntradayTime', () => {
  it('should keep hours and minutes', () => {
    expect(formatIntradayTime('20240301143000000')).toBe('14:30');
  });

  it('should return unknown shapes unchanged', () => {
    expect(formatIntradayTime('14:30')).toBe('14:30');
  });
});

describe('parseBar', () => {
  it('should leave missing prices unset and default volume to 0', () => {
    const row = new RowReader(['date', 'open', 'high', 'close', 'volume'], ['2024-03-01', '', '9.1', '8.8', '']);
    const bar = parseBar(row, FREQUENCY_TABLE[Frequency.W1]);

    expect(bar?.close).toBe(8.8);
    expect(bar?.high).toBe(9.1);
    expect(bar).not.toHaveProperty('open');
    expect(bar).not.toHaveProperty('low');
    expect(bar?.volume).toBe(0);
    expect(bar?.amount).toBe(0);
  });

  it('should ignore time on non-minute frequencies', () => {
    const row = new RowReader(['date', 'time', 'close'], ['2024-03-01', '20240301093500000', '1']);
    expect(parseBar(row, FREQUENCY_TABLE[Frequency.D1])?.period).toBe('2024-03-01');
  });

  it('should flag ST shares', () => {
    const row = new RowReader(['date', 'close', 'isST'], ['2024-03-01', '3.1', '1']);
    expect(parseBar(row, FREQUENCY_TABLE[Frequency.D1])?.isST).toBe(true);
  });
});
