/**
 * @fileoverview Data provider contracts.
 *
 * A provider hands out sessions; a session is the only way to query. Callers
 * release sessions with `logout()` on every exit path (see `withSession` in
 * the app package).
 *
 * @module @ashare/contracts/provider
 */

import type { BarQuery, Series, Ticker } from './market.js';
import type {
  BalanceStatement,
  CashFlowStatement,
  IndexConstituent,
  IndexKey,
  IndustryInfo,
  ProfitStatement,
  ReferenceInfo,
  ReportPeriod,
} from './reference.js';

/**
 * An authenticated provider session.
 *
 * Query methods throw QueryFailedError when the provider reports an error.
 * Lookups that find nothing resolve to null (or an empty list), never throw.
 */
export interface MarketDataSession {
  queryBars(query: BarQuery): Promise<Series>;

  queryReferenceInfo(ticker: Ticker): Promise<ReferenceInfo | null>;

  queryIndustry(ticker: Ticker): Promise<IndustryInfo | null>;

  queryProfit(ticker: Ticker, period: ReportPeriod): Promise<ProfitStatement | null>;

  queryBalance(ticker: Ticker, period: ReportPeriod): Promise<BalanceStatement | null>;

  queryCashFlow(ticker: Ticker, period: ReportPeriod): Promise<CashFlowStatement | null>;

  /**
   * @param asOfDate - YYYY-MM-DD
   */
  queryIndexConstituents(index: IndexKey, asOfDate: string): Promise<IndexConstituent[]>;

  logout(): Promise<void>;
}

export interface MarketDataProvider {
  /** Provider identifier used in logs */
  readonly name: string;

  /**
   * Opens a session.
   *
   * @throws ProviderUnavailableError when the provider cannot be reached or rejects the login
   */
  login(): Promise<MarketDataSession>;
}
