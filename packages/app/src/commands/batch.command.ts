/**
 * batch command - daily statistics for every ticker in the watchlist
 *
 * Opens one session per ticker, so a failed login or query only costs that
 * ticker. Bars tables are not printed, only the summary panels.
 */

import { Frequency } from '@ashare/contracts';
import type { Ticker } from '@ashare/contracts';
import { summarize } from '@ashare/analysis-kit';
import { normalizeTicker } from '@ashare/symbol-registry';
import { BaseCommand } from './base.command.js';
import type { CommandContext, CommandOptions } from './types.js';
import { CommandError, ErrorCode, wrapError } from './errors.js';
import { parsePositiveInt } from './arguments.js';
import { resolveDateRange } from './date-range.js';
import { DEFAULT_DAYS, fetchSeries } from './kline.command.js';
import { loadWatchlist, type Watchlist } from '../config/watchlist.js';
import { KlineFormatter } from '../formatters/kline-formatter.js';

export interface BatchCommandOptions extends CommandOptions {
  config?: string;
  days?: string;
}

export interface BatchCommandConfig {
  /** Watchlist used when --config is not given */
  watchlistPath: string;
}

interface BatchArgs {
  path: string;
  days: number;
}

interface TickerFailure {
  ticker: Ticker;
  code: ErrorCode;
  message: string;
}

export class BatchCommand extends BaseCommand<BatchCommandOptions, BatchArgs> {
  override readonly name = 'batch';
  override readonly description = 'Summarize recent daily bars for every ticker in a watchlist';

  private readonly formatter: KlineFormatter;
  private readonly watchlistPath: string;

  constructor(context: CommandContext, config: BatchCommandConfig) {
    super(context);
    this.formatter = new KlineFormatter(context.theme);
    this.watchlistPath = config.watchlistPath;
  }

  protected override parseArgs(_args: string[], options: BatchCommandOptions): BatchArgs {
    return {
      path: options.config ?? this.watchlistPath,
      days: parsePositiveInt(options.days, 'days', DEFAULT_DAYS),
    };
  }

  protected override async run({ path, days }: BatchArgs): Promise<Record<string, unknown>> {
    const watchlist = await this.readWatchlist(path);
    const tickers = this.normalizeEntries(watchlist);

    if (tickers.length === 0) {
      throw new CommandError(ErrorCode.CONFIG_ERROR, `Watchlist ${watchlist.path} has no valid tickers`, {
        context: { path: watchlist.path },
      });
    }

    this.print(this.theme.info(`Batch summary, reading watchlist: ${watchlist.path}`));

    const { start, end } = resolveDateRange({ days }, this.today());
    const failures: TickerFailure[] = [];

    for (const ticker of tickers) {
      try {
        const query = { ticker, frequency: Frequency.D1, start, end, adjust: 'none' as const };
        const series = await this.withSession((session) => fetchSeries(session, query, this.logger));

        this.print('');
        this.print(this.theme.success(`Summary: ${ticker}`));
        this.print(this.formatter.formatSummary(summarize(series, Frequency.D1)));
      } catch (error) {
        const failure = wrapError(error, ErrorCode.INTERNAL_ERROR, { ticker });
        const paint = failure.code === ErrorCode.MISSING_DATA ? this.theme.warn : this.theme.error;
        this.print(paint(`${ticker}: ${failure.message}`));
        failures.push({ ticker, code: failure.code, message: failure.message });
      }
    }

    if (failures.length > 0) {
      throw new CommandError(batchFailureCode(failures), `${failures.length} of ${tickers.length} tickers failed`, {
        context: { failed: failures.map((failure) => failure.ticker) },
      });
    }

    return { path: watchlist.path, start, end, tickers: tickers.length, created: watchlist.created };
  }

  private async readWatchlist(path: string): Promise<Watchlist> {
    let watchlist: Watchlist;
    try {
      watchlist = await loadWatchlist(path);
    } catch (error) {
      throw new CommandError(ErrorCode.CONFIG_ERROR, `Cannot read watchlist ${path}`, {
        context: { path },
        cause: error instanceof Error ? error : new Error(String(error)),
      });
    }

    if (watchlist.created) {
      this.print(this.theme.warn(`Created ${watchlist.path} with sample tickers`));
    }
    return watchlist;
  }

  /** Unrecognized entries are reported and skipped */
  private normalizeEntries(watchlist: Watchlist): Ticker[] {
    const tickers: Ticker[] = [];
    for (const entry of watchlist.entries) {
      const result = normalizeTicker(entry);
      if (result.ok) {
        tickers.push(result.ticker);
      } else {
        this.print(this.theme.error(`Skipping ${entry}: ${result.error.message}`));
      }
    }
    return tickers;
  }
}

/**
 * Provider and missing-data failures stay soft; anything else is internal
 */
function batchFailureCode(failures: readonly TickerFailure[]): ErrorCode {
  if (failures.every((failure) => failure.code === ErrorCode.MISSING_DATA)) {
    return ErrorCode.MISSING_DATA;
  }
  if (failures.every((failure) => failure.code === ErrorCode.MISSING_DATA || failure.code === ErrorCode.PROVIDER_ERROR)) {
    return ErrorCode.PROVIDER_ERROR;
  }
  return ErrorCode.INTERNAL_ERROR;
}
