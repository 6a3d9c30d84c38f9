/**
 * info command - company reference data and industry classification
 */

import { NoReferenceDataError } from '@ashare/contracts';
import type { IndustryInfo, MarketDataSession, Ticker } from '@ashare/contracts';
import { BaseCommand } from './base.command.js';
import type { CommandContext, CommandOptions } from './types.js';
import { parseTickerArg } from './arguments.js';
import { ReferenceFormatter } from '../formatters/reference-formatter.js';

export class InfoCommand extends BaseCommand<CommandOptions, Ticker> {
  override readonly name = 'info';
  override readonly description = 'Show company information for a ticker';

  private readonly formatter: ReferenceFormatter;

  constructor(context: CommandContext) {
    super(context);
    this.formatter = new ReferenceFormatter(context.theme);
  }

  protected override parseArgs(args: string[]): Ticker {
    return parseTickerArg(args[0]);
  }

  protected override async run(ticker: Ticker): Promise<Record<string, unknown>> {
    this.print(this.theme.info(`Fetching ${ticker} company info...`));

    const { info, industry } = await this.withSession(async (session) => {
      const info = await session.queryReferenceInfo(ticker);
      if (!info) {
        throw new NoReferenceDataError({ subject: ticker, dataset: 'company info' });
      }
      return { info, industry: await this.lookupIndustry(session, ticker) };
    });

    this.print(this.formatter.formatInfo(ticker, info));
    if (industry) {
      this.print(this.formatter.formatIndustry(industry));
    }
    this.print(this.formatter.formatLinks(ticker));

    return { ticker, name: info.name, industry: industry?.industry };
  }

  /** Best effort: a failed lookup only costs the industry table */
  private async lookupIndustry(session: MarketDataSession, ticker: Ticker): Promise<IndustryInfo | null> {
    try {
      return await session.queryIndustry(ticker);
    } catch (error) {
      this.logger.warn('Industry lookup failed', {
        ticker,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
