/**
 * Fixture-based provider for offline use and deterministic tests
 */

import { ProviderUnavailableError, QueryFailedError } from '@ashare/contracts';
import type {
  BalanceStatement,
  Bar,
  BarQuery,
  CashFlowStatement,
  IndexConstituent,
  IndexKey,
  IndustryInfo,
  MarketDataProvider,
  MarketDataSession,
  ProfitStatement,
  ReferenceInfo,
  ReportPeriod,
  Series,
  Ticker,
} from '@ashare/contracts';
import type { Logger } from '@ashare/logger';
import { generateFixtureBars } from '../../fixtures/index.js';
import { SAMPLE_DATA, type FixtureData } from '../../fixtures/sample-data.js';

export type FixtureOperation =
  | 'bars'
  | 'referenceInfo'
  | 'industry'
  | 'profit'
  | 'balance'
  | 'cashFlow'
  | 'constituents';

export interface FixtureProviderConfig {
  logger?: Logger;
  /** Reference records; defaults to the built-in sample data */
  data?: Partial<FixtureData>;
  /** Explicit bars per ticker, filtered by the query range */
  bars?: Record<string, Bar[]>;
  /** Generate bars for tickers without explicit bars */
  generateBars?: boolean;
  /** Reject every login with this message */
  loginError?: string;
  /** Reject these operations with QueryFailedError */
  failingOperations?: readonly FixtureOperation[];
  /** Tickers whose queries fail, e.g. to exercise batch error handling */
  failingTickers?: readonly string[];
}

export interface ProviderStats {
  logins: number;
  logouts: number;
  queries: number;
}

const PROVIDER_NAME = 'fixture';

/**
 * Provider that returns fixture data
 */
export class FixtureProvider implements MarketDataProvider {
  readonly name = PROVIDER_NAME;

  private readonly logger: Logger | undefined;
  private readonly data: FixtureData;
  private readonly stats: ProviderStats = { logins: 0, logouts: 0, queries: 0 };

  constructor(private readonly config: FixtureProviderConfig = {}) {
    this.logger = config.logger;
    this.data = { ...SAMPLE_DATA, ...config.data };
  }

  async login(): Promise<MarketDataSession> {
    if (this.config.loginError !== undefined) {
      throw new ProviderUnavailableError(`Login failed: ${this.config.loginError}`, {
        provider: PROVIDER_NAME,
        operation: 'login',
        reason: this.config.loginError,
      });
    }

    this.stats.logins++;
    this.logger?.debug('Fixture session opened');
    return new FixtureSession(this);
  }

  getStats(): ProviderStats {
    return { ...this.stats };
  }

  /** @internal */
  recordLogout(): void {
    this.stats.logouts++;
  }

  /** @internal */
  run<T>(operation: FixtureOperation, subject: string, produce: (data: FixtureData) => T): T {
    this.stats.queries++;

    if (this.config.failingOperations?.includes(operation) || this.config.failingTickers?.includes(subject)) {
      throw new QueryFailedError(`Query ${operation} failed: fixture rejection for ${subject}`, {
        provider: PROVIDER_NAME,
        operation,
      });
    }

    const result = produce(this.data);
    this.logger?.debug('Fixture query', { operation, subject });
    return result;
  }

  /** @internal */
  barsFor(query: BarQuery): Bar[] {
    const explicit = this.config.bars?.[query.ticker];
    if (explicit) {
      return explicit.filter((bar) => bar.date >= query.start && bar.date <= query.end);
    }
    return this.config.generateBars === false ? [] : generateFixtureBars(query);
  }
}

class FixtureSession implements MarketDataSession {
  private closed = false;

  constructor(private readonly provider: FixtureProvider) {}

  async queryBars(query: BarQuery): Promise<Series> {
    const bars = this.run('bars', query.ticker, () => this.provider.barsFor(query));
    return {
      ticker: query.ticker,
      frequency: query.frequency,
      adjust: query.adjust ?? 'none',
      start: query.start,
      end: query.end,
      bars,
    };
  }

  async queryReferenceInfo(ticker: Ticker): Promise<ReferenceInfo | null> {
    return this.run('referenceInfo', ticker, (data) => data.referenceInfo[ticker] ?? null);
  }

  async queryIndustry(ticker: Ticker): Promise<IndustryInfo | null> {
    return this.run('industry', ticker, (data) => data.industry[ticker] ?? null);
  }

  async queryProfit(ticker: Ticker, _period: ReportPeriod): Promise<ProfitStatement | null> {
    return this.run('profit', ticker, (data) => data.profit[ticker] ?? null);
  }

  async queryBalance(ticker: Ticker, _period: ReportPeriod): Promise<BalanceStatement | null> {
    return this.run('balance', ticker, (data) => data.balance[ticker] ?? null);
  }

  async queryCashFlow(ticker: Ticker, _period: ReportPeriod): Promise<CashFlowStatement | null> {
    return this.run('cashFlow', ticker, (data) => data.cashFlow[ticker] ?? null);
  }

  async queryIndexConstituents(index: IndexKey, _asOfDate: string): Promise<IndexConstituent[]> {
    return this.run('constituents', index, (data) => [...(data.constituents[index] ?? [])]);
  }

  async logout(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.provider.recordLogout();
  }

  private run<T>(operation: FixtureOperation, subject: string, produce: (data: FixtureData) => T): T {
    if (this.closed) {
      throw new Error(`Session already closed; cannot run ${operation}`);
    }
    return this.provider.run(operation, subject, produce);
  }
}
