/**
 * Tests for the index command
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { IndexCommand } from '../../src/commands/index.command.js';
import { ErrorCode } from '../../src/commands/errors.js';
import { FixtureProvider } from '../../src/services/providers/fixture-provider.js';
import { createTestContext } from '../helpers.js';

describe('IndexCommand', () => {
  function setup(provider = new FixtureProvider()) {
    const test = createTestContext(provider);
    return { ...test, command: new IndexCommand(test.context) };
  }

  it('should list constituents with an exchange breakdown', async () => {
    const { command, sink } = setup();

    const result = await command.execute([], { index: 'hs300' });

    expect(result.success).toBe(true);
    expect(result.metadata).toMatchObject({ index: 'hs300', asOfDate: '2024-03-29', constituents: 4 });
    expect(sink.chunks[0]).toBe('Fetching CSI 300 constituents...');
    expect(sink.chunks[1]?.split('\n')[0]).toBe('CSI 300 constituents (4 total)');

    const breakdown = sink.chunks[2] ?? '';
    expect(breakdown).toContain('Code: sh.000300');
    expect(breakdown).toContain('SSE: 2');
    expect(breakdown).toContain('SZSE: 2');
    expect(breakdown).not.toContain('Other:');
  });

  it('should require an index', async () => {
    const { command } = setup();

    const result = await command.execute([], {});

    expect(result.error?.code).toBe(ErrorCode.INVALID_ARGS);
    expect(result.error?.message).toBe('Missing --index');
  });

  it('should reject an unknown index', async () => {
    const { command } = setup();

    const result = await command.execute([], { index: 'csi1000' });

    expect(result.error?.message).toBe('Unknown index "csi1000"');
    expect(result.error?.hints).toEqual(['Expected one of: sz50, hs300, zz500']);
  });

  it('should report an empty constituent list as missing data', async () => {
    const { command } = setup(new FixtureProvider({ data: { constituents: {} } }));

    const result = await command.execute([], { index: 'sz50' });

    expect(result.error?.code).toBe(ErrorCode.MISSING_DATA);
    expect(result.error?.message).toBe('No constituents found for SSE 50');
  });

  it('should export constituents to CSV', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'ashare-index-'));
    try {
      const { command } = setup();
      const path = join(dir, 'sz50.csv');

      const result = await command.execute([], { index: 'sz50', export: path });

      expect(result.metadata?.['exported']).toBe(path);
      expect(await readFile(path, 'utf-8')).toBe(
        '\uFEFFupdateDate,code,code_name\n2024-06-17,sh.600000,SPD Bank\n2024-06-17,sh.601398,ICBC\n'
      );
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
