/**
 * index command - constituents of a major index with an exchange breakdown
 */

import { INDEX_TABLE, NoReferenceDataError } from '@ashare/contracts';
import type { IndexKey } from '@ashare/contracts';
import { summarizeConstituents } from '@ashare/analysis-kit';
import { startTimer } from '@ashare/logger';
import { BaseCommand } from './base.command.js';
import type { CommandContext, CommandOptions } from './types.js';
import { parseIndexOption } from './arguments.js';
import { exportCsv } from './export.js';
import { IndexFormatter } from '../formatters/index-formatter.js';
import { constituentsToCsv } from '../export/csv.js';

export interface IndexCommandOptions extends CommandOptions {
  index?: string;
  export?: string;
}

interface IndexArgs {
  index: IndexKey;
  exportPath: string | undefined;
}

export class IndexCommand extends BaseCommand<IndexCommandOptions, IndexArgs> {
  override readonly name = 'index';
  override readonly description = 'List index constituents (sz50, hs300, zz500)';

  private readonly formatter: IndexFormatter;

  constructor(context: CommandContext) {
    super(context);
    this.formatter = new IndexFormatter(context.theme);
  }

  protected override parseArgs(_args: string[], options: IndexCommandOptions): IndexArgs {
    return { index: parseIndexOption(options.index), exportPath: options.export };
  }

  protected override async run({ index, exportPath }: IndexArgs): Promise<Record<string, unknown>> {
    const spec = INDEX_TABLE[index];
    const asOfDate = this.today();
    this.print(this.theme.info(`Fetching ${spec.name} constituents...`));

    const constituents = await this.withSession(async (session) => {
      const timer = startTimer();
      const result = await session.queryIndexConstituents(index, asOfDate);
      this.logger.debug('Constituents fetched', { index, count: result.length, duration_ms: timer.stop() });
      return result;
    });

    if (constituents.length === 0) {
      throw new NoReferenceDataError({ subject: spec.name, dataset: 'constituents', asOfDate });
    }

    this.print(this.formatter.formatConstituents(spec, constituents));
    this.print(this.formatter.formatBreakdown(spec, summarizeConstituents(constituents)));

    let exported: string | undefined;
    if (exportPath !== undefined) {
      exported = await exportCsv(exportPath, constituentsToCsv(constituents), this.logger);
      this.print(this.theme.success(`Exported ${constituents.length} rows to ${exported}`));
    }

    return { index, asOfDate, constituents: constituents.length, exported };
  }
}
