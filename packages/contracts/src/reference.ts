/**
 * @fileoverview Reference records: company info, industry, financial
 * statements and index constituents.
 *
 * Provider rows are mapped into these shapes once, at the provider boundary.
 * Optional fields are absent when the provider returned an empty value.
 *
 * @module @ashare/contracts/reference
 */

import type { Ticker } from './market.js';

export type SecurityType = 'stock' | 'index' | 'other' | 'convertible-bond' | 'etf' | 'unknown';

export type ListingStatus = 'listed' | 'delisted' | 'unknown';

/** Provider `type` codes. */
export const SECURITY_TYPE_CODES: Readonly<Record<string, SecurityType>> = {
  '1': 'stock',
  '2': 'index',
  '3': 'other',
  '4': 'convertible-bond',
  '5': 'etf',
};

/** Provider `status` codes. */
export const LISTING_STATUS_CODES: Readonly<Record<string, ListingStatus>> = {
  '1': 'listed',
  '0': 'delisted',
};

export interface ReferenceInfo {
  code: string;
  name: string;
  ipoDate?: string;
  outDate?: string;
  type: SecurityType;
  status: ListingStatus;
}

export interface IndustryInfo {
  code: string;
  name?: string;
  industry?: string;
  classification?: string;
  updateDate?: string;
}

/**
 * Fiscal quarter selector for statement queries.
 *
 * @invariant quarter in 1..4
 */
export interface ReportPeriod {
  year: number;
  quarter: 1 | 2 | 3 | 4;
}

interface StatementBase {
  code: string;
  /** Publication date */
  pubDate?: string;
  /** Statement period end date */
  statDate?: string;
}

export interface ProfitStatement extends StatementBase {
  totalOperatingRevenue?: number;
  operatingCost?: number;
  operatingProfit?: number;
  totalProfit?: number;
  netProfit?: number;
  basicEarningsPerShare?: number;
}

export interface BalanceStatement extends StatementBase {
  totalAssets?: number;
  totalLiabilities?: number;
  totalShareholderEquity?: number;
  totalCurrentAssets?: number;
  totalCurrentLiabilities?: number;
}

export interface CashFlowStatement extends StatementBase {
  operatingCashFlow?: number;
  investingCashFlow?: number;
  financingCashFlow?: number;
  netIncreaseInCash?: number;
}

export interface IndexConstituent {
  code: string;
  name: string;
  updateDate: string;
}

export type IndexKey = 'sz50' | 'hs300' | 'zz500';

export interface IndexSpec {
  key: IndexKey;
  ticker: Ticker;
  name: string;
}

export const INDEX_TABLE: Readonly<Record<IndexKey, IndexSpec>> = {
  sz50: { key: 'sz50', ticker: 'sh.000016', name: 'SSE 50' },
  hs300: { key: 'hs300', ticker: 'sh.000300', name: 'CSI 300' },
  zz500: { key: 'zz500', ticker: 'sh.000905', name: 'CSI 500' },
};

export const INDEX_KEYS: readonly IndexKey[] = ['sz50', 'hs300', 'zz500'];

export function isIndexKey(value: string): value is IndexKey {
  return INDEX_KEYS.some((key) => key === value);
}
