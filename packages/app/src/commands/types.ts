/**
 * Command types and interfaces
 */

import type { MarketDataProvider } from '@ashare/contracts';
import type { Logger } from '@ashare/logger';
import type { OutputSink } from '../output/sink.js';
import type { Theme } from '../formatters/theme.js';
import type { CommandError } from './errors.js';

/**
 * Base command interface
 */
export interface Command<TOptions = CommandOptions> {
  name: string;
  description: string;
  execute(args: string[], options: TOptions): Promise<CommandResult>;
}

/**
 * Options shared by every command
 */
export interface CommandOptions {
  verbose?: boolean;
}

/**
 * Command execution result
 */
export interface CommandResult {
  success: boolean;
  error?: CommandError;
  duration: number;
  metadata?: Record<string, unknown>;
}

/**
 * Collaborators handed to every command
 */
export interface CommandContext {
  provider: MarketDataProvider;
  logger: Logger;
  sink: OutputSink;
  theme: Theme;
  /** Today's date in the market time zone, YYYY-MM-DD */
  today: () => string;
}
