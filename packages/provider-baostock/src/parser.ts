/**
 * @fileoverview Maps gateway result sets into typed records.
 *
 * Rows are positional; `fields` names the columns. This is the only place
 * provider field names appear. Empty cells become `undefined`.
 *
 * @module @ashare/provider-baostock/parser
 */

import { LISTING_STATUS_CODES, SECURITY_TYPE_CODES } from '@ashare/contracts';
import type {
  BalanceStatement,
  Bar,
  CashFlowStatement,
  FrequencySpec,
  IndexConstituent,
  IndustryInfo,
  ProfitStatement,
  ReferenceInfo,
} from '@ashare/contracts';
import type { ResultSet } from './types.js';

/**
 * Read access to one row by field name.
 */
export class RowReader {
  private readonly index: ReadonlyMap<string, number>;

  constructor(
    fields: readonly string[],
    private readonly row: readonly string[]
  ) {
    this.index = new Map(fields.map((field, i) => [field, i]));
  }

  /** Trimmed cell text, undefined when the field is absent or empty */
  text(field: string): string | undefined {
    const position = this.index.get(field);
    if (position === undefined) {
      return undefined;
    }
    const value = this.row[position]?.trim();
    return value ? value : undefined;
  }

  /** Numeric cell, undefined when absent, empty or not a finite number */
  number(field: string): number | undefined {
    const value = this.text(field);
    if (value === undefined) {
      return undefined;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
}

export function readRows(resultSet: ResultSet): RowReader[] {
  return resultSet.rows.map((row) => new RowReader(resultSet.fields, row));
}

/**
 * "20240301093500000" → "09:35". Other shapes are returned unchanged.
 */
export function formatIntradayTime(time: string): string {
  const match = /^\d{8}(\d{2})(\d{2})/.exec(time);
  return match ? `${match[1]}:${match[2]}` : time;
}

/**
 * Maps one history row. Rows without a date or close are skipped by the caller.
 */
export function parseBar(row: RowReader, spec: FrequencySpec): Bar | undefined {
  const date = row.text('date');
  const close = row.number('close');
  if (date === undefined || close === undefined) {
    return undefined;
  }

  const time = spec.kind === 'minute' ? row.text('time') : undefined;

  const bar: Bar = {
    period: time ? `${date} ${formatIntradayTime(time)}` : date,
    date,
    close,
    volume: Math.trunc(row.number('volume') ?? 0),
    amount: row.number('amount') ?? 0,
  };

  const open = row.number('open');
  const high = row.number('high');
  const low = row.number('low');
  if (open !== undefined) bar.open = open;
  if (high !== undefined) bar.high = high;
  if (low !== undefined) bar.low = low;
  if (time !== undefined) bar.time = time;

  const adjustFlag = row.text('adjustflag');
  if (adjustFlag !== undefined) bar.adjustFlag = adjustFlag;

  if (spec.kind === 'daily') {
    const preClose = row.number('preclose');
    const pctChange = row.number('pctChg');
    const turnover = row.number('turn');
    const tradeStatus = row.number('tradestatus');
    const isST = row.text('isST');

    if (preClose !== undefined) bar.preClose = preClose;
    if (pctChange !== undefined) bar.pctChange = pctChange;
    if (turnover !== undefined) bar.turnover = turnover;
    if (tradeStatus !== undefined) bar.tradeStatus = tradeStatus;
    if (isST !== undefined) bar.isST = isST === '1';
  }

  return bar;
}

export function parseBars(resultSet: ResultSet, spec: FrequencySpec): Bar[] {
  const bars: Bar[] = [];
  for (const row of readRows(resultSet)) {
    const bar = parseBar(row, spec);
    if (bar) {
      bars.push(bar);
    }
  }
  return bars;
}

export function parseReferenceInfo(row: RowReader): ReferenceInfo | undefined {
  const code = row.text('code');
  if (code === undefined) {
    return undefined;
  }

  const info: ReferenceInfo = {
    code,
    name: row.text('code_name') ?? '',
    type: SECURITY_TYPE_CODES[row.text('type') ?? ''] ?? 'unknown',
    status: LISTING_STATUS_CODES[row.text('status') ?? ''] ?? 'unknown',
  };

  const ipoDate = row.text('ipoDate');
  const outDate = row.text('outDate');
  if (ipoDate !== undefined) info.ipoDate = ipoDate;
  if (outDate !== undefined) info.outDate = outDate;

  return info;
}

export function parseIndustry(row: RowReader): IndustryInfo | undefined {
  const code = row.text('code');
  if (code === undefined) {
    return undefined;
  }

  const info: IndustryInfo = { code };
  const name = row.text('code_name');
  const industry = row.text('industry');
  const classification = row.text('industryClassification');
  const updateDate = row.text('updateDate');

  if (name !== undefined) info.name = name;
  if (industry !== undefined) info.industry = industry;
  if (classification !== undefined) info.classification = classification;
  if (updateDate !== undefined) info.updateDate = updateDate;

  return info;
}

/**
 * Copies the listed numeric fields that are present onto `target`.
 */
function assignNumbers<T extends object>(target: T, row: RowReader, fields: ReadonlyArray<keyof T & string>): T {
  const values: Partial<Record<keyof T & string, number>> = {};
  for (const field of fields) {
    const value = row.number(field);
    if (value !== undefined) {
      values[field] = value;
    }
  }
  return Object.assign(target, values);
}

function statementBase(row: RowReader): { code: string; pubDate?: string; statDate?: string } | undefined {
  const code = row.text('code');
  if (code === undefined) {
    return undefined;
  }
  const base: { code: string; pubDate?: string; statDate?: string } = { code };
  const pubDate = row.text('pubDate');
  const statDate = row.text('statDate');
  if (pubDate !== undefined) base.pubDate = pubDate;
  if (statDate !== undefined) base.statDate = statDate;
  return base;
}

export function parseProfit(row: RowReader): ProfitStatement | undefined {
  const base = statementBase(row);
  if (!base) return undefined;
  return assignNumbers<ProfitStatement>(base, row, [
    'totalOperatingRevenue',
    'operatingCost',
    'operatingProfit',
    'totalProfit',
    'netProfit',
    'basicEarningsPerShare',
  ]);
}

export function parseBalance(row: RowReader): BalanceStatement | undefined {
  const base = statementBase(row);
  if (!base) return undefined;
  return assignNumbers<BalanceStatement>(base, row, [
    'totalAssets',
    'totalLiabilities',
    'totalShareholderEquity',
    'totalCurrentAssets',
    'totalCurrentLiabilities',
  ]);
}

export function parseCashFlow(row: RowReader): CashFlowStatement | undefined {
  const base = statementBase(row);
  if (!base) return undefined;
  return assignNumbers<CashFlowStatement>(base, row, [
    'operatingCashFlow',
    'investingCashFlow',
    'financingCashFlow',
    'netIncreaseInCash',
  ]);
}

export function parseConstituent(row: RowReader): IndexConstituent | undefined {
  const code = row.text('code');
  if (code === undefined) {
    return undefined;
  }
  return {
    code,
    name: row.text('code_name') ?? '',
    updateDate: row.text('updateDate') ?? '',
  };
}

/**
 * First mappable row of a result set, or null.
 */
export function firstRecord<T>(resultSet: ResultSet, map: (row: RowReader) => T | undefined): T | null {
  for (const row of readRows(resultSet)) {
    const record = map(row);
    if (record !== undefined) {
      return record;
    }
  }
  return null;
}

export function allRecords<T>(resultSet: ResultSet, map: (row: RowReader) => T | undefined): T[] {
  const records: T[] = [];
  for (const row of readRows(resultSet)) {
    const record = map(row);
    if (record !== undefined) {
      records.push(record);
    }
  }
  return records;
}
