/**
 * @fileoverview An open baostock session.
 *
 * @module @ashare/provider-baostock/session
 */

import { ADJUST_FLAGS, FREQUENCY_TABLE } from '@ashare/contracts';
import type {
  BalanceStatement,
  BarQuery,
  CashFlowStatement,
  IndexConstituent,
  IndexKey,
  IndustryInfo,
  MarketDataSession,
  ProfitStatement,
  ReferenceInfo,
  ReportPeriod,
  Series,
  Ticker,
} from '@ashare/contracts';
import { measureAsync } from '@ashare/logger';
import type { Logger } from '@ashare/logger';
import type { BaostockClient, QueryParams } from './client.js';
import type { QueryOperation, ResultSet } from './types.js';
import {
  allRecords,
  firstRecord,
  parseBalance,
  parseBars,
  parseCashFlow,
  parseConstituent,
  parseIndustry,
  parseProfit,
  parseReferenceInfo,
} from './parser.js';

export class BaostockSession implements MarketDataSession {
  private closed = false;

  constructor(
    private readonly client: BaostockClient,
    private readonly token: string,
    private readonly logger?: Logger
  ) {}

  async queryBars(query: BarQuery): Promise<Series> {
    const spec = FREQUENCY_TABLE[query.frequency];
    const adjust = query.adjust ?? 'none';

    const resultSet = await this.run('bars', {
      code: query.ticker,
      fields: spec.fields.join(','),
      start_date: query.start,
      end_date: query.end,
      frequency: spec.providerCode,
      adjustflag: ADJUST_FLAGS[adjust],
    });

    return {
      ticker: query.ticker,
      frequency: query.frequency,
      adjust,
      start: query.start,
      end: query.end,
      bars: parseBars(resultSet, spec),
    };
  }

  async queryReferenceInfo(ticker: Ticker): Promise<ReferenceInfo | null> {
    return firstRecord(await this.run('referenceInfo', { code: ticker }), parseReferenceInfo);
  }

  async queryIndustry(ticker: Ticker): Promise<IndustryInfo | null> {
    return firstRecord(await this.run('industry', { code: ticker }), parseIndustry);
  }

  async queryProfit(ticker: Ticker, period: ReportPeriod): Promise<ProfitStatement | null> {
    return firstRecord(await this.run('profit', statementParams(ticker, period)), parseProfit);
  }

  async queryBalance(ticker: Ticker, period: ReportPeriod): Promise<BalanceStatement | null> {
    return firstRecord(await this.run('balance', statementParams(ticker, period)), parseBalance);
  }

  async queryCashFlow(ticker: Ticker, period: ReportPeriod): Promise<CashFlowStatement | null> {
    return firstRecord(await this.run('cashFlow', statementParams(ticker, period)), parseCashFlow);
  }

  async queryIndexConstituents(index: IndexKey, asOfDate: string): Promise<IndexConstituent[]> {
    return allRecords(await this.run(index, { date: asOfDate }), parseConstituent);
  }

  /**
   * Ends the session. Safe to call more than once.
   */
  async logout(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const rejection = await this.client.logout(this.token);
    if (rejection !== undefined) {
      this.logger?.warn('Logout rejected by provider', { reason: rejection });
    }
  }

  private async run(operation: QueryOperation, params: QueryParams): Promise<ResultSet> {
    if (this.closed) {
      throw new Error(`Session already closed; cannot run ${operation}`);
    }

    const { result, duration_ms } = await measureAsync(() => this.client.query(operation, params, this.token));
    this.logger?.debug('Query finished', { operation, duration_ms, count: result.rows.length });
    return result;
  }
}

function statementParams(ticker: Ticker, period: ReportPeriod): QueryParams {
  return { code: ticker, year: period.year, quarter: period.quarter };
}
