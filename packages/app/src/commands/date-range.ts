/**
 * Query date ranges, resolved against "today" in the market time zone
 */

import moment from 'moment-timezone';
import { CommandError, ErrorCode } from './errors.js';

export const DATE_FORMAT = 'YYYY-MM-DD';

export interface DateRange {
  start: string;
  end: string;
}

export interface DateRangeInput {
  start?: string;
  end?: string;
  days: number;
}

/**
 * Today's date in `timezone`
 */
export function todayIn(timezone: string): string {
  return moment.tz(timezone).format(DATE_FORMAT);
}

function parseDate(value: string, option: string): moment.Moment {
  const parsed = moment.utc(value, DATE_FORMAT, true);
  if (!parsed.isValid()) {
    throw new CommandError(ErrorCode.INVALID_ARGS, `Invalid ${option} date "${value}", expected ${DATE_FORMAT}`, {
      context: { [option]: value },
    });
  }
  return parsed;
}

/**
 * - neither bound: [today - days, today]
 * - end only: [end - days, end]
 * - start only: [start, today]
 * - both: as given
 *
 * @throws CommandError INVALID_ARGS for malformed dates or start after end
 */
export function resolveDateRange(input: DateRangeInput, today: string): DateRange {
  const end = input.end !== undefined ? parseDate(input.end, 'end') : parseDate(today, 'today');
  const start =
    input.start !== undefined ? parseDate(input.start, 'start') : end.clone().subtract(input.days, 'days');

  if (start.isAfter(end)) {
    throw new CommandError(
      ErrorCode.INVALID_ARGS,
      `Start date ${start.format(DATE_FORMAT)} is after end date ${end.format(DATE_FORMAT)}`
    );
  }

  return { start: start.format(DATE_FORMAT), end: end.format(DATE_FORMAT) };
}
