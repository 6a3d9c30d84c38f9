/**
 * finance command - quarterly income, balance sheet and cash flow statements
 */

import { isQueryFailedError } from '@ashare/contracts';
import type { ReportPeriod, Ticker } from '@ashare/contracts';
import { BaseCommand } from './base.command.js';
import type { CommandContext, CommandOptions } from './types.js';
import { CommandError, ErrorCode } from './errors.js';
import { parseReportPeriod, parseTickerArg } from './arguments.js';
import { FinanceFormatter, formatPeriod, type FinanceReport } from '../formatters/finance-formatter.js';
import { ReferenceFormatter } from '../formatters/reference-formatter.js';

export interface FinanceCommandOptions extends CommandOptions {
  year?: string;
  quarter?: string;
}

interface FinanceArgs {
  ticker: Ticker;
  period: ReportPeriod;
}

export class FinanceCommand extends BaseCommand<FinanceCommandOptions, FinanceArgs> {
  override readonly name = 'finance';
  override readonly description = 'Show quarterly financial statements for a ticker';

  private readonly formatter: FinanceFormatter;
  private readonly references: ReferenceFormatter;

  constructor(context: CommandContext) {
    super(context);
    this.formatter = new FinanceFormatter(context.theme);
    this.references = new ReferenceFormatter(context.theme);
  }

  protected override parseArgs(args: string[], options: FinanceCommandOptions): FinanceArgs {
    return {
      ticker: parseTickerArg(args[0]),
      period: parseReportPeriod(options.year, options.quarter, this.today()),
    };
  }

  protected override async run({ ticker, period }: FinanceArgs): Promise<Record<string, unknown>> {
    const label = formatPeriod(period);
    this.print(this.theme.info(`Fetching ${ticker} financial data (${label})...`));

    const report = await this.withSession(async (session): Promise<FinanceReport> => ({
      period,
      profit: await this.statement('profit', () => session.queryProfit(ticker, period)),
      balance: await this.statement('balance', () => session.queryBalance(ticker, period)),
      cashFlow: await this.statement('cashFlow', () => session.queryCashFlow(ticker, period)),
    }));

    if (!report.profit && !report.balance && !report.cashFlow) {
      throw new CommandError(ErrorCode.MISSING_DATA, `No financial data for ${ticker} in ${label}`, {
        context: { ticker, period: label },
        hints: ['Try another year or quarter'],
      });
    }

    this.print(this.formatter.format(report));
    this.print(this.references.formatLinks(ticker));

    return {
      ticker,
      period: label,
      statements: [report.profit, report.balance, report.cashFlow].filter(Boolean).length,
    };
  }

  /**
   * A rejected statement query leaves that statement out; the others still show
   */
  private async statement<T>(name: string, query: () => Promise<T | null>): Promise<T | null> {
    try {
      return await query();
    } catch (error) {
      if (!isQueryFailedError(error)) {
        throw error;
      }
      this.logger.warn('Statement query failed', { statement: name, error: error.message });
      return null;
    }
  }
}
