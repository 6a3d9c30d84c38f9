/**
 * Base command class
 *
 * Implements the template method pattern: parse arguments, run against the
 * provider, and turn any failure into a CommandError on the result.
 */

import type { MarketDataProvider, MarketDataSession } from '@ashare/contracts';
import type { Logger } from '@ashare/logger';
import type { OutputSink } from '../output/sink.js';
import type { Theme } from '../formatters/theme.js';
import { withSession } from '../services/session-scope.js';
import type { Command, CommandContext, CommandOptions, CommandResult } from './types.js';
import { ErrorCode, wrapError } from './errors.js';

/**
 * Abstract base class for all commands
 *
 * Subclasses implement:
 * - parseArgs: validate arguments and options, throwing INVALID_ARGS
 * - run: do the work and write to the sink; the returned record becomes
 *   the result metadata
 */
export abstract class BaseCommand<TOptions extends CommandOptions, TParsed> implements Command<TOptions> {
  abstract readonly name: string;
  abstract readonly description: string;

  protected readonly provider: MarketDataProvider;
  protected readonly logger: Logger;
  protected readonly sink: OutputSink;
  protected readonly theme: Theme;
  protected readonly today: () => string;

  constructor(context: CommandContext) {
    this.provider = context.provider;
    this.logger = context.logger;
    this.sink = context.sink;
    this.theme = context.theme;
    this.today = context.today;
  }

  async execute(args: string[], options: TOptions): Promise<CommandResult> {
    const startTime = Date.now();

    try {
      const parsed = this.parseArgs(args, options);

      this.logger.info(`Executing ${this.name} command`, { args, provider: this.provider.name });

      const metadata = await this.run(parsed, options);

      this.logger.info(`${this.name} command completed`, { duration: Date.now() - startTime });

      return {
        success: true,
        duration: Date.now() - startTime,
        metadata,
      };
    } catch (error) {
      return this.handleError(error, startTime);
    }
  }

  protected abstract parseArgs(args: string[], options: TOptions): TParsed;

  protected abstract run(parsed: TParsed, options: TOptions): Promise<Record<string, unknown>>;

  /**
   * Runs `fn` inside a provider session that is always released
   */
  protected withSession<T>(fn: (session: MarketDataSession) => Promise<T>): Promise<T> {
    return withSession(this.provider, fn, this.logger);
  }

  protected print(text: string): void {
    this.sink.write(text);
  }

  protected handleError(error: unknown, startTime: number): CommandResult {
    const commandError = wrapError(error, ErrorCode.INTERNAL_ERROR, { command: this.name });

    // The message itself reaches the user through the CLI's error output
    this.logger.info(`${this.name} command failed`, {
      code: commandError.code,
      error: commandError.message,
      duration: Date.now() - startTime,
    });
    if (commandError.code === ErrorCode.INTERNAL_ERROR) {
      this.logger.error('Unexpected command failure', { command: this.name, error });
    }

    return {
      success: false,
      error: commandError,
      duration: Date.now() - startTime,
    };
  }
}
