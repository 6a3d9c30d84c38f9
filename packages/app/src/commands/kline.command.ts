/**
 * kline command - bar history with a statistics summary
 */

import { FREQUENCY_TABLE, NoDataInRangeError } from '@ashare/contracts';
import type { AdjustPolicy, BarQuery, MarketDataSession, Series } from '@ashare/contracts';
import { summarize } from '@ashare/analysis-kit';
import { startTimer } from '@ashare/logger';
import type { Logger } from '@ashare/logger';
import { BaseCommand } from './base.command.js';
import type { CommandContext, CommandOptions } from './types.js';
import { parseAdjustOption, parseFrequencyOption, parsePositiveInt, parseTickerArg } from './arguments.js';
import { resolveDateRange } from './date-range.js';
import { exportCsv } from './export.js';
import { KlineFormatter } from '../formatters/kline-formatter.js';
import { ReferenceFormatter } from '../formatters/reference-formatter.js';
import { barsToCsv } from '../export/csv.js';

export const DEFAULT_DAYS = 30;

export interface KlineCommandOptions extends CommandOptions {
  start?: string;
  end?: string;
  days?: string;
  frequency?: string;
  adjust?: string;
  export?: string;
}

interface KlineArgs {
  query: BarQuery & { adjust: AdjustPolicy };
  exportPath: string | undefined;
}

export class KlineCommand extends BaseCommand<KlineCommandOptions, KlineArgs> {
  override readonly name = 'kline';
  override readonly description = 'Show K-line bars and statistics for a ticker';

  private readonly formatter: KlineFormatter;
  private readonly references: ReferenceFormatter;

  constructor(context: CommandContext) {
    super(context);
    this.formatter = new KlineFormatter(context.theme);
    this.references = new ReferenceFormatter(context.theme);
  }

  protected override parseArgs(args: string[], options: KlineCommandOptions): KlineArgs {
    const ticker = parseTickerArg(args[0]);
    const frequency = parseFrequencyOption(options.frequency);
    const adjust = parseAdjustOption(options.adjust);
    const days = parsePositiveInt(options.days, 'days', DEFAULT_DAYS);
    const { start, end } = resolveDateRange({ start: options.start, end: options.end, days }, this.today());

    return {
      query: { ticker, frequency, start, end, adjust },
      exportPath: options.export,
    };
  }

  protected override async run({ query, exportPath }: KlineArgs): Promise<Record<string, unknown>> {
    const spec = FREQUENCY_TABLE[query.frequency];
    this.print(this.theme.info(`Fetching ${query.ticker} ${spec.label} bars from ${query.start} to ${query.end}...`));

    const series = await this.withSession((session) => fetchSeries(session, query, this.logger));

    this.print(this.formatter.formatTitle(series));
    this.print(this.formatter.formatBars(series));
    this.print(this.formatter.formatSummary(summarize(series, query.frequency)));

    let exported: string | undefined;
    if (exportPath !== undefined) {
      exported = await exportCsv(exportPath, barsToCsv(series), this.logger);
      this.print(this.theme.success(`Exported ${series.bars.length} rows to ${exported}`));
    }

    this.print(this.references.formatLinks(query.ticker));

    return {
      ticker: query.ticker,
      frequency: query.frequency,
      adjust: query.adjust,
      start: query.start,
      end: query.end,
      bars: series.bars.length,
      exported,
    };
  }
}

/**
 * Queries bars and rejects an empty result with NoDataInRangeError
 */
export async function fetchSeries(session: MarketDataSession, query: BarQuery, logger: Logger): Promise<Series> {
  const timer = startTimer();
  const series = await session.queryBars(query);

  logger.debug('Bars fetched', {
    ticker: query.ticker,
    frequency: query.frequency,
    count: series.bars.length,
    duration_ms: timer.stop(),
  });

  if (series.bars.length === 0) {
    const { ticker, start, end, frequency } = query;
    throw new NoDataInRangeError({ ticker, start, end, frequency });
  }
  return series;
}
