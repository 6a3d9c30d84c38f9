/**
 * Tests for the CLI program
 */

import { describe, it, expect } from 'vitest';
import { runProgram, VERSION } from '../src/program.js';
import { FixtureProvider } from '../src/services/providers/fixture-provider.js';
import { BufferSink, createTestContext, THREE_DAYS } from './helpers.js';

function setup(provider = new FixtureProvider({ bars: { 'sz.000001': THREE_DAYS } }), strictExit = false) {
  const { context, sink } = createTestContext(provider);
  const errors = new BufferSink();

  const run = (...args: string[]) =>
    runProgram(['node', 'ashare', ...args], { context, errorSink: errors, watchlistPath: 'stocks.txt', strictExit });

  return { run, sink, errors };
}

describe('runProgram', () => {
  it('should run a command and exit 0', async () => {
    const { run, sink, errors } = setup();

    const code = await run('kline', '000001', '-s', '2024-03-25', '-e', '2024-03-29');

    expect(code).toBe(0);
    expect(sink.chunks[0]).toBe('Fetching sz.000001 daily bars from 2024-03-25 to 2024-03-29...');
    expect(errors.chunks).toEqual([]);
  });

  it('should exit 2 on invalid arguments', async () => {
    const { run, errors } = setup();

    const code = await run('kline', '000001', '--frequency', '2h');

    expect(code).toBe(2);
    expect(errors.chunks[0]).toBe('Error: Unknown frequency "2h"\n  Expected one of: 5m, 15m, 30m, 60m, d, w, M');
  });

  it('should exit 0 on missing data unless strict', async () => {
    const lenient = setup();
    expect(await lenient.run('kline', '000001', '-s', '2024-01-02', '-e', '2024-01-05')).toBe(0);
    expect(lenient.errors.chunks[0]).toBe('Error: No data for sz.000001 between 2024-01-02 and 2024-01-05');

    const strict = setup();
    expect(await strict.run('--strict', 'kline', '000001', '-s', '2024-01-02', '-e', '2024-01-05')).toBe(1);

    const strictByConfig = setup(undefined, true);
    expect(await strictByConfig.run('kline', '000001', '-s', '2024-01-02', '-e', '2024-01-05')).toBe(1);
  });

  it('should include the error code with --verbose', async () => {
    const { run, errors } = setup(new FixtureProvider({ loginError: 'user not exists' }));

    expect(await run('info', '000001', '--verbose')).toBe(0);
    expect(errors.chunks[0]?.split('\n').slice(0, 2)).toEqual(['Error: Login failed: user not exists', 'Code: PROVIDER_ERROR']);
  });

  it('should require --index', async () => {
    const { run, errors } = setup();

    expect(await run('index')).toBe(2);
    expect(errors.text()).toContain("required option '-i, --index <index>' not specified");
  });

  it('should reject unknown commands', async () => {
    const { run } = setup();

    expect(await run('quote', '000001')).toBe(2);
  });

  it('should print the version', async () => {
    const { run, sink } = setup();

    expect(await run('--version')).toBe(0);
    expect(sink.chunks).toEqual([VERSION]);
  });

  it('should pass every ticker to realtime', async () => {
    const { run, sink } = setup();

    expect(await run('realtime', '000001', '600000', '000002')).toBe(0);
    expect(sink.text()).toContain('sz.000002');
  });
});
