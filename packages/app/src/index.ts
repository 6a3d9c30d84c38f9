/**
 * Main exports for @ashare/app package
 */

// Program
export { main, runProgram, VERSION } from './program.js';
export type { ProgramDeps } from './program.js';

// Configuration exports
export { loadConfig, getConfigSummary } from './config/index.js';
export type { Config } from './config/schema.js';
export { loadWatchlist, parseWatchlist, SAMPLE_WATCHLIST } from './config/watchlist.js';
export type { Watchlist } from './config/watchlist.js';

// Provider exports
export { FixtureProvider } from './services/providers/fixture-provider.js';
export type { FixtureProviderConfig, FixtureOperation, ProviderStats } from './services/providers/fixture-provider.js';
export { createProvider } from './services/providers/factory.js';
export { withSession } from './services/session-scope.js';

// Command exports
export { BaseCommand } from './commands/base.command.js';
export { KlineCommand } from './commands/kline.command.js';
export { InfoCommand } from './commands/info.command.js';
export { RealtimeCommand } from './commands/realtime.command.js';
export { FinanceCommand } from './commands/finance.command.js';
export { IndexCommand } from './commands/index.command.js';
export { BatchCommand } from './commands/batch.command.js';
export { CommandError, ErrorCode, exitCodeFor, formatCommandError, wrapError } from './commands/errors.js';
export type { Command, CommandContext, CommandOptions, CommandResult } from './commands/types.js';

// Output exports
export { createTheme } from './formatters/theme.js';
export type { Theme } from './formatters/theme.js';
export { createStdoutSink } from './output/sink.js';
export type { OutputSink } from './output/sink.js';
export { barsToCsv, constituentsToCsv, writeCsv } from './export/csv.js';

// Fixture exports
export { generateFixtureBars, seededRandom, tradingDates } from './fixtures/index.js';
