/**
 * realtime command
 *
 * Placeholder: the provider has no live quote feed, so the table carries the
 * normalized tickers and '-' in every price column.
 */

import type { Ticker } from '@ashare/contracts';
import { BaseCommand } from './base.command.js';
import type { CommandOptions } from './types.js';
import { CommandError, ErrorCode, formatCommandError } from './errors.js';
import { parseTickerArg } from './arguments.js';
import { renderGrid } from '../formatters/layout.js';

export const REALTIME_NOTICE = 'Note: realtime quotes need a realtime data source; none is configured.';

interface RealtimeArgs {
  tickers: Ticker[];
  rejected: CommandError[];
}

export class RealtimeCommand extends BaseCommand<CommandOptions, RealtimeArgs> {
  override readonly name = 'realtime';
  override readonly description = 'Show realtime quotes (not yet backed by a data source)';

  protected override parseArgs(args: string[]): RealtimeArgs {
    const tickers: Ticker[] = [];
    const rejected: CommandError[] = [];

    for (const arg of args) {
      try {
        tickers.push(parseTickerArg(arg));
      } catch (error) {
        if (!(error instanceof CommandError)) {
          throw error;
        }
        rejected.push(error);
      }
    }

    if (tickers.length === 0) {
      throw rejected[0] ?? new CommandError(ErrorCode.INVALID_ARGS, 'At least one ticker is required');
    }
    return { tickers, rejected };
  }

  protected override async run({ tickers, rejected }: RealtimeArgs): Promise<Record<string, unknown>> {
    for (const error of rejected) {
      this.print(this.theme.error(formatCommandError(error)));
    }

    this.print(this.theme.info('Fetching realtime quotes...'));
    this.print(this.theme.heading('Realtime quotes'));
    this.print(
      renderGrid(
        [{ header: 'Code', align: 'left' }, { header: 'Name', align: 'left' }, { header: 'Price' }, { header: 'Change' }, { header: 'Change %' }],
        tickers.map((ticker) => [ticker, '-', '-', '-', '-'])
      )
    );
    this.print(this.theme.warn(REALTIME_NOTICE));

    return { tickers, skipped: rejected.length };
  }
}
