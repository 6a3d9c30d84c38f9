/**
 * Shared test setup: plain-text theme, silent logger, buffered output
 */

import { Chalk } from 'chalk';
import { createLogger } from '@ashare/logger';
import type { Logger } from '@ashare/logger';
import type { Bar } from '@ashare/contracts';
import type { CommandContext } from '../src/commands/types.js';
import { createTheme, type Theme } from '../src/formatters/theme.js';
import type { OutputSink } from '../src/output/sink.js';
import { FixtureProvider } from '../src/services/providers/fixture-provider.js';

export const TODAY = '2024-03-29';

/** Collects command output in memory */
export class BufferSink implements OutputSink {
  readonly chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  /** Everything written so far, one chunk per line */
  text(): string {
    return this.chunks.join('\n');
  }

  lines(): string[] {
    return this.text().split('\n');
  }
}

export function plainTheme(): Theme {
  return createTheme(new Chalk({ level: 0 }));
}

export function quietLogger(): Logger {
  return createLogger({ level: 'error', console: false });
}

export interface TestContext {
  context: CommandContext;
  sink: BufferSink;
  provider: FixtureProvider;
}

export function createTestContext(provider: FixtureProvider = new FixtureProvider()): TestContext {
  const sink = new BufferSink();
  return {
    context: {
      provider,
      logger: quietLogger(),
      sink,
      theme: plainTheme(),
      today: () => TODAY,
    },
    sink,
    provider,
  };
}

export function makeBar(date: string, fields: Partial<Bar> = {}): Bar {
  return {
    period: date,
    date,
    open: 10,
    high: 10,
    low: 10,
    close: 10,
    volume: 1_000_000,
    amount: 10_000_000,
    ...fields,
  };
}

/** Three daily bars: flat open, a dip, then a close 5% above the first */
export const THREE_DAYS: Bar[] = [
  makeBar('2024-03-27', { high: 10.2, low: 9.9, pctChange: 0.5, adjustFlag: '3' }),
  makeBar('2024-03-28', { high: 10.1, low: 9.7, close: 9.8, volume: 2_000_000, amount: 19_600_000, pctChange: -2, adjustFlag: '3' }),
  makeBar('2024-03-29', { open: 9.8, high: 10.6, low: 9.8, close: 10.5, volume: 3_000_000, amount: 31_500_000, pctChange: 7.14, adjustFlag: '3' }),
];
