/**
 * Tests for argument parsing and date-range resolution
 */

import { describe, it, expect } from 'vitest';
import { Frequency } from '@ashare/contracts';
import {
  parseAdjustOption,
  parseFrequencyOption,
  parseIndexOption,
  parsePositiveInt,
  parseReportPeriod,
  parseTickerArg,
} from '../../src/commands/arguments.js';
import { resolveDateRange } from '../../src/commands/date-range.js';
import { CommandError, ErrorCode } from '../../src/commands/errors.js';

function invalidArgs(fn: () => unknown): CommandError {
  try {
    fn();
  } catch (error) {
    if (error instanceof CommandError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a CommandError');
}

describe('parseTickerArg', () => {
  it('should normalize bare codes', () => {
    expect(parseTickerArg('000001')).toBe('sz.000001');
    expect(parseTickerArg('600000')).toBe('sh.600000');
  });

  it('should list the accepted formats on failure', () => {
    const error = invalidArgs(() => parseTickerArg('abc'));

    expect(error.code).toBe(ErrorCode.INVALID_ARGS);
    expect(error.hints).toHaveLength(4);
    expect(error.context).toEqual({ input: 'abc' });
  });

  it('should treat a missing argument as empty input', () => {
    expect(invalidArgs(() => parseTickerArg(undefined)).message).toBe('Ticker input is empty');
  });
});

describe('option parsing', () => {
  it('should fall back to defaults', () => {
    expect(parseFrequencyOption(undefined)).toBe(Frequency.D1);
    expect(parseAdjustOption(undefined)).toBe('none');
    expect(parsePositiveInt(undefined, 'days', 30)).toBe(30);
  });

  it('should accept every frequency token', () => {
    expect(parseFrequencyOption('5m')).toBe(Frequency.M5);
    expect(parseFrequencyOption('M')).toBe(Frequency.MN1);
  });

  it('should reject unknown values', () => {
    expect(invalidArgs(() => parseAdjustOption('both')).message).toBe('Unknown adjust policy "both"');
    expect(invalidArgs(() => parseIndexOption('csi1000')).code).toBe(ErrorCode.INVALID_ARGS);
    expect(invalidArgs(() => parsePositiveInt('1.5', 'days', 30)).message).toBe(
      '--days must be a positive integer, got "1.5"'
    );
    expect(invalidArgs(() => parsePositiveInt('-3', 'days', 30)).code).toBe(ErrorCode.INVALID_ARGS);
  });
});

describe('parseReportPeriod', () => {
  it('should default to Q4 of the previous year', () => {
    expect(parseReportPeriod(undefined, undefined, '2024-03-29')).toEqual({ year: 2023, quarter: 4 });
  });

  it('should parse explicit values', () => {
    expect(parseReportPeriod('2021', '3', '2024-03-29')).toEqual({ year: 2021, quarter: 3 });
  });

  it('should reject out-of-range years', () => {
    expect(invalidArgs(() => parseReportPeriod('23', undefined, '2024-03-29')).message).toBe(
      '--year must be a four-digit year, got "23"'
    );
  });
});

describe('resolveDateRange', () => {
  const today = '2024-03-29';

  it('should count back from today when no bound is given', () => {
    expect(resolveDateRange({ days: 30 }, today)).toEqual({ start: '2024-02-28', end: '2024-03-29' });
  });

  it('should count back from the end date', () => {
    expect(resolveDateRange({ end: '2024-01-31', days: 10 }, today)).toEqual({ start: '2024-01-21', end: '2024-01-31' });
  });

  it('should run from the start date to today', () => {
    expect(resolveDateRange({ start: '2024-03-01', days: 30 }, today)).toEqual({ start: '2024-03-01', end: '2024-03-29' });
  });

  it('should keep both bounds as given', () => {
    expect(resolveDateRange({ start: '2023-01-03', end: '2023-12-29', days: 30 }, today)).toEqual({
      start: '2023-01-03',
      end: '2023-12-29',
    });
  });

  it('should reject malformed dates', () => {
    const error = invalidArgs(() => resolveDateRange({ start: '2024/03/01', days: 30 }, today));

    expect(error.code).toBe(ErrorCode.INVALID_ARGS);
    expect(error.message).toBe('Invalid start date "2024/03/01", expected YYYY-MM-DD');
    expect(invalidArgs(() => resolveDateRange({ end: '2024-02-30', days: 30 }, today)).code).toBe(ErrorCode.INVALID_ARGS);
  });

  it('should reject a start after the end', () => {
    expect(invalidArgs(() => resolveDateRange({ start: '2024-03-10', end: '2024-03-01', days: 30 }, today)).message).toBe(
      'Start date 2024-03-10 is after end date 2024-03-01'
    );
  });
});
