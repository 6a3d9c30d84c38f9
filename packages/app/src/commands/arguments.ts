/**
 * Argument and option validation shared by the commands. Every failure is a
 * CommandError with code INVALID_ARGS.
 */

import {
  ADJUST_POLICIES,
  Frequency,
  INDEX_KEYS,
  getAllFrequencies,
  isAdjustPolicy,
  isIndexKey,
  parseFrequency,
} from '@ashare/contracts';
import type { AdjustPolicy, IndexKey, ReportPeriod, Ticker } from '@ashare/contracts';
import { SUPPORTED_FORMATS, normalizeTicker } from '@ashare/symbol-registry';
import { CommandError, ErrorCode } from './errors.js';

function invalid(message: string, context?: Record<string, unknown>, hints?: readonly string[]): CommandError {
  return new CommandError(ErrorCode.INVALID_ARGS, message, { context, hints });
}

/**
 * Normalizes a ticker argument; unrecognized input lists the accepted formats
 */
export function parseTickerArg(raw: string | undefined): Ticker {
  const result = normalizeTicker(raw ?? '');
  if (result.ok) {
    return result.ticker;
  }
  throw new CommandError(ErrorCode.INVALID_ARGS, result.error.message, {
    context: { input: raw ?? '' },
    cause: result.error,
    hints: ['Supported formats:', ...SUPPORTED_FORMATS.map((format) => `  ${format}`)],
  });
}

export function parsePositiveInt(raw: string | number | undefined, option: string, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = typeof raw === 'number' ? raw : Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0) {
    throw invalid(`--${option} must be a positive integer, got "${raw}"`, { [option]: raw });
  }
  return value;
}

export function parseFrequencyOption(raw: string | undefined): Frequency {
  if (raw === undefined) {
    return Frequency.D1;
  }
  const frequency = parseFrequency(raw);
  if (frequency === undefined) {
    throw invalid(`Unknown frequency "${raw}"`, { frequency: raw }, [
      `Expected one of: ${getAllFrequencies().join(', ')}`,
    ]);
  }
  return frequency;
}

export function parseAdjustOption(raw: string | undefined): AdjustPolicy {
  if (raw === undefined) {
    return 'none';
  }
  if (!isAdjustPolicy(raw)) {
    throw invalid(`Unknown adjust policy "${raw}"`, { adjust: raw }, [`Expected one of: ${ADJUST_POLICIES.join(', ')}`]);
  }
  return raw;
}

export function parseIndexOption(raw: string | undefined): IndexKey {
  if (raw === undefined || !isIndexKey(raw)) {
    throw invalid(raw === undefined ? 'Missing --index' : `Unknown index "${raw}"`, { index: raw }, [
      `Expected one of: ${INDEX_KEYS.join(', ')}`,
    ]);
  }
  return raw;
}

/**
 * Year defaults to last year, since current-year statements are usually not
 * published yet; quarter defaults to 4, the annual report.
 */
export function parseReportPeriod(
  rawYear: string | undefined,
  rawQuarter: string | undefined,
  today: string
): ReportPeriod {
  const year = parsePositiveInt(rawYear, 'year', Number(today.slice(0, 4)) - 1);
  if (year < 1990 || year > 9999) {
    throw invalid(`--year must be a four-digit year, got "${rawYear}"`, { year: rawYear });
  }

  const quarter = parsePositiveInt(rawQuarter, 'quarter', 4);
  if (quarter !== 1 && quarter !== 2 && quarter !== 3 && quarter !== 4) {
    throw invalid(`--quarter must be between 1 and 4, got "${rawQuarter}"`, { quarter: rawQuarter });
  }

  return { year, quarter };
}
