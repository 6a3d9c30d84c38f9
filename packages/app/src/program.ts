/**
 * commander program wiring the commands to the CLI
 */

import { Command as Program, CommanderError } from 'commander';
import {
  attachGlobalHandlers,
  closeLogger,
  createChildLogger,
  createLogger,
  withRunContext,
} from '@ashare/logger';
import { getAllFrequencies, ADJUST_POLICIES, INDEX_KEYS } from '@ashare/contracts';
import { getConfigSummary, loadConfig, type Config } from './config/index.js';
import { CommandError, ErrorCode, exitCodeFor, formatCommandError } from './commands/errors.js';
import type { Command, CommandContext, CommandOptions } from './commands/types.js';
import { KlineCommand, DEFAULT_DAYS, type KlineCommandOptions } from './commands/kline.command.js';
import { InfoCommand } from './commands/info.command.js';
import { RealtimeCommand } from './commands/realtime.command.js';
import { FinanceCommand, type FinanceCommandOptions } from './commands/finance.command.js';
import { IndexCommand, type IndexCommandOptions } from './commands/index.command.js';
import { BatchCommand, type BatchCommandOptions } from './commands/batch.command.js';
import { todayIn } from './commands/date-range.js';
import { createTheme } from './formatters/theme.js';
import { createStdoutSink, type OutputSink } from './output/sink.js';
import { createProvider } from './services/providers/factory.js';

export const VERSION = '1.0.0';

export interface ProgramDeps {
  context: CommandContext;
  /** Receives error messages; stdout stays for command output */
  errorSink: OutputSink;
  watchlistPath: string;
  /** Exit 1 instead of 0 on provider failures and empty results */
  strictExit?: boolean;
  verbose?: boolean;
}

type GlobalOptions = {
  verbose?: boolean;
  strict?: boolean;
};

/**
 * Builds the program and runs `argv` through it
 *
 * @returns the process exit code
 */
export async function runProgram(argv: readonly string[], deps: ProgramDeps): Promise<number> {
  const { context, errorSink } = deps;
  let exitCode = 0;

  const program = new Program();

  program
    .name('ashare')
    .description('A-share market data: K-line history, company info, financials and index constituents')
    .version(VERSION)
    .option('-v, --verbose', 'Show error codes, context and causes')
    .option('--strict', 'Exit 1 when the provider fails or returns no data')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => context.sink.write(text.trimEnd()),
      writeErr: (text) => errorSink.write(text.trimEnd()),
    });

  const run = async <TOptions extends CommandOptions>(
    command: Command<TOptions>,
    args: string[],
    options: TOptions
  ): Promise<void> => {
    const globals = program.opts<GlobalOptions>();
    const verbose = Boolean(globals.verbose ?? deps.verbose);
    const strict = Boolean(globals.strict ?? deps.strictExit);

    const result = await withRunContext(command.name, () => command.execute(args, { ...options, verbose }));

    if (!result.success && result.error) {
      errorSink.write(context.theme.error(result.error.format(verbose)));
      exitCode = exitCodeFor(result.error, strict);
    }
  };

  program
    .command('kline')
    .description('Show K-line bars and statistics for a ticker')
    .argument('<code>', 'ticker, e.g. sz.000001 or 600000')
    .option('-s, --start <date>', 'start date (YYYY-MM-DD)')
    .option('-e, --end <date>', 'end date (YYYY-MM-DD)')
    .option('-d, --days <n>', `days back from the end date (default ${DEFAULT_DAYS})`)
    .option('-f, --frequency <freq>', `bar frequency: ${getAllFrequencies().join(', ')} (default d)`)
    .option('-a, --adjust <policy>', `price adjustment: ${ADJUST_POLICIES.join(', ')} (default none)`)
    .option('--export <path>', 'write the bars to a CSV file')
    .action((code: string, options: KlineCommandOptions) => run(new KlineCommand(context), [code], options));

  program
    .command('info')
    .description('Show company information for a ticker')
    .argument('<code>', 'ticker')
    .action((code: string) => run(new InfoCommand(context), [code], {}));

  program
    .command('realtime')
    .description('Show realtime quotes (placeholder, no live data source)')
    .argument('<codes...>', 'one or more tickers')
    .action((codes: string[]) => run(new RealtimeCommand(context), codes, {}));

  program
    .command('finance')
    .description('Show quarterly financial statements for a ticker')
    .argument('<code>', 'ticker')
    .option('-y, --year <year>', 'report year (default last year)')
    .option('-q, --quarter <quarter>', 'report quarter 1-4 (default 4)')
    .action((code: string, options: FinanceCommandOptions) => run(new FinanceCommand(context), [code], options));

  program
    .command('index')
    .description('List index constituents')
    .requiredOption('-i, --index <index>', `index: ${INDEX_KEYS.join(', ')}`)
    .option('--export <path>', 'write the constituents to a CSV file')
    .action((options: IndexCommandOptions) => run(new IndexCommand(context), [], options));

  program
    .command('batch')
    .description('Summarize recent daily bars for every ticker in a watchlist')
    .option('--config <path>', `watchlist file (default ${deps.watchlistPath})`)
    .option('-d, --days <n>', `days back from today (default ${DEFAULT_DAYS})`)
    .action((options: BatchCommandOptions) =>
      run(new BatchCommand(context, { watchlistPath: deps.watchlistPath }), [], options)
    );

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version exit 0; usage errors were already printed
      return error.exitCode === 0 ? 0 : 2;
    }
    throw error;
  }

  return exitCode;
}

/**
 * CLI entry: loads configuration, sets up logging and runs the program
 */
export async function main(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const theme = createTheme();
  const errorSink = createStdoutSink(process.stderr);

  let config: Config;
  try {
    config = loadConfig(env);
  } catch (error) {
    const configError = new CommandError(ErrorCode.CONFIG_ERROR, error instanceof Error ? error.message : String(error));
    errorSink.write(theme.error(formatCommandError(configError)));
    return 1;
  }

  const logger = createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });
  attachGlobalHandlers(logger);
  logger.debug('Configuration loaded', getConfigSummary(config));

  try {
    return await runProgram(argv, {
      context: {
        provider: createProvider(config.provider, createChildLogger(logger, { component: 'provider' })),
        logger: createChildLogger(logger, { component: 'cli' }),
        sink: createStdoutSink(process.stdout),
        theme,
        today: () => todayIn(config.market.timezone),
      },
      errorSink,
      watchlistPath: config.watchlist.path,
      strictExit: config.app.strictExit,
      verbose: config.app.verbose,
    });
  } finally {
    await closeLogger(logger);
  }
}
