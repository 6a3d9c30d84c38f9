/**
 * @fileoverview Public API for @ashare/contracts.
 *
 * Shared types, the frequency table and the error taxonomy. No I/O.
 *
 * @module @ashare/contracts
 */

export {
  Frequency,
  FREQUENCY_TABLE,
  isFrequency,
  parseFrequency,
  getAllFrequencies,
} from './frequency.js';
export type { FrequencySpec, FrequencyKind, ChangeStrategy, PeriodUnit } from './frequency.js';

export { ADJUST_FLAGS, ADJUST_POLICIES, isAdjustPolicy } from './market.js';
export type { Exchange, Ticker, AdjustPolicy, Bar, Series, BarQuery } from './market.js';

export {
  SECURITY_TYPE_CODES,
  LISTING_STATUS_CODES,
  INDEX_TABLE,
  INDEX_KEYS,
  isIndexKey,
} from './reference.js';
export type {
  SecurityType,
  ListingStatus,
  ReferenceInfo,
  IndustryInfo,
  ReportPeriod,
  ProfitStatement,
  BalanceStatement,
  CashFlowStatement,
  IndexConstituent,
  IndexKey,
  IndexSpec,
} from './reference.js';

export { NOTIONAL_INVESTMENT } from './summary.js';
export type {
  TrendDistribution,
  PeriodCount,
  PriceChange,
  VolumeStats,
  InvestmentSimulation,
  KlineSummary,
  ConstituentBreakdown,
} from './summary.js';

export type { MarketDataSession, MarketDataProvider } from './provider.js';

export {
  ErrorCodes,
  MarketDataError,
  EmptyInputError,
  UnrecognizedFormatError,
  EmptySeriesError,
  ProviderUnavailableError,
  QueryFailedError,
  NoDataInRangeError,
  NoReferenceDataError,
  isMarketDataError,
  isEmptyInputError,
  isUnrecognizedFormatError,
  isEmptySeriesError,
  isProviderUnavailableError,
  isQueryFailedError,
  isNoDataInRangeError,
  isNoReferenceDataError,
} from './errors.js';
