/**
 * CSV export of bar series and index constituents.
 *
 * Files start with a UTF-8 byte-order mark so spreadsheet tools pick the
 * right encoding; column headers are the provider field names.
 */

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { FREQUENCY_TABLE } from '@ashare/contracts';
import type { Bar, IndexConstituent, Series } from '@ashare/contracts';

export const BOM = '\uFEFF';

/** Header of the constituents export */
export const CONSTITUENT_FIELDS = ['updateDate', 'code', 'code_name'] as const;

/**
 * Quotes a field containing a comma, quote or line break; embedded quotes are doubled
 */
export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(header: readonly string[], rows: ReadonlyArray<readonly string[]>): string {
  const lines = [header, ...rows].map((row) => row.map(escapeCsvField).join(','));
  return `${BOM}${lines.join('\n')}\n`;
}

function numberCell(value: number | undefined): string {
  return value !== undefined && Number.isFinite(value) ? String(value) : '';
}

/** Value of one provider field of a bar */
function barField(bar: Bar, field: string, series: Series): string {
  switch (field) {
    case 'date':
      return bar.date;
    case 'time':
      return bar.time ?? '';
    case 'code':
      return series.ticker;
    case 'open':
      return numberCell(bar.open);
    case 'high':
      return numberCell(bar.high);
    case 'low':
      return numberCell(bar.low);
    case 'close':
      return numberCell(bar.close);
    case 'preclose':
      return numberCell(bar.preClose);
    case 'volume':
      return numberCell(bar.volume);
    case 'amount':
      return numberCell(bar.amount);
    case 'adjustflag':
      return bar.adjustFlag ?? '';
    case 'turn':
      return numberCell(bar.turnover);
    case 'tradestatus':
      return numberCell(bar.tradeStatus);
    case 'pctChg':
      return numberCell(bar.pctChange);
    case 'isST':
      return bar.isST === undefined ? '' : bar.isST ? '1' : '0';
    default:
      return '';
  }
}

export function barsToCsv(series: Series): string {
  const fields = FREQUENCY_TABLE[series.frequency].fields;
  const rows = series.bars.map((bar) => fields.map((field) => barField(bar, field, series)));
  return toCsv(fields, rows);
}

export function constituentsToCsv(constituents: readonly IndexConstituent[]): string {
  return toCsv(
    CONSTITUENT_FIELDS,
    constituents.map((item) => [item.updateDate, item.code, item.name])
  );
}

/**
 * Writes the file and returns its absolute path
 */
export async function writeCsv(path: string, content: string): Promise<string> {
  const absolutePath = resolve(path);
  await writeFile(absolutePath, content, 'utf-8');
  return absolutePath;
}
