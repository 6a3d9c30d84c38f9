/**
 * Reference records served by the fixture provider when none are supplied
 */

import type {
  BalanceStatement,
  CashFlowStatement,
  IndexConstituent,
  IndexKey,
  IndustryInfo,
  ProfitStatement,
  ReferenceInfo,
} from '@ashare/contracts';

export interface FixtureData {
  referenceInfo: Record<string, ReferenceInfo>;
  industry: Record<string, IndustryInfo>;
  profit: Record<string, ProfitStatement>;
  balance: Record<string, BalanceStatement>;
  cashFlow: Record<string, CashFlowStatement>;
  constituents: Partial<Record<IndexKey, IndexConstituent[]>>;
}

const COMPANIES: ReadonlyArray<readonly [string, string, string]> = [
  ['sh.600000', 'SPD Bank', '1999-11-10'],
  ['sz.000001', 'Ping An Bank', '1991-04-03'],
  ['sz.000002', 'Vanke A', '1991-01-29'],
  ['sh.601398', 'ICBC', '2006-10-27'],
];

const UPDATED = '2024-06-17';

function byCode<T extends { code: string }>(records: readonly T[]): Record<string, T> {
  return Object.fromEntries(records.map((record) => [record.code, record]));
}

export const SAMPLE_DATA: FixtureData = {
  referenceInfo: byCode(
    COMPANIES.map(([code, name, ipoDate]) => ({ code, name, ipoDate, type: 'stock' as const, status: 'listed' as const }))
  ),
  industry: byCode(
    COMPANIES.map(([code, name]) => ({
      code,
      name,
      industry: code === 'sz.000002' ? 'K70 Real Estate' : 'J66 Monetary Finance',
      classification: 'CSRC industry classification',
      updateDate: UPDATED,
    }))
  ),
  profit: byCode(
    COMPANIES.map(([code], i) => ({
      code,
      pubDate: '2024-03-15',
      statDate: '2023-12-31',
      totalOperatingRevenue: 164_699_000_000 * (i + 1),
      operatingCost: 91_300_000_000 * (i + 1),
      operatingProfit: 58_600_000_000 * (i + 1),
      totalProfit: 58_200_000_000 * (i + 1),
      netProfit: 46_455_000_000 * (i + 1),
      basicEarningsPerShare: 2.25 + i * 0.3,
    }))
  ),
  balance: byCode(
    COMPANIES.map(([code], i) => ({
      code,
      pubDate: '2024-03-15',
      statDate: '2023-12-31',
      totalAssets: 5_587_000_000_000 * (i + 1),
      totalLiabilities: 5_112_000_000_000 * (i + 1),
      totalShareholderEquity: 475_000_000_000 * (i + 1),
    }))
  ),
  cashFlow: byCode(
    COMPANIES.map(([code], i) => ({
      code,
      pubDate: '2024-03-15',
      statDate: '2023-12-31',
      operatingCashFlow: 12_800_000_000 * (i + 1),
      investingCashFlow: -3_400_000_000 * (i + 1),
      financingCashFlow: -9_000_000 * (i + 1),
      netIncreaseInCash: 400_000_000 * (i + 1),
    }))
  ),
  constituents: {
    sz50: [
      { code: 'sh.600000', name: 'SPD Bank', updateDate: UPDATED },
      { code: 'sh.601398', name: 'ICBC', updateDate: UPDATED },
    ],
    hs300: COMPANIES.map(([code, name]) => ({ code, name, updateDate: UPDATED })),
    zz500: [{ code: 'sz.000002', name: 'Vanke A', updateDate: UPDATED }],
  },
};
