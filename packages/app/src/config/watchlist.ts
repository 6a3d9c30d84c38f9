/**
 * Watchlist file: one ticker per line, optional trailing `# comment`.
 *
 * ```
 * sh.600000 # SPD Bank
 * 000002
 * # blank and comment-only lines are ignored
 * ```
 */

import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';

/** Written when the watchlist file does not exist yet. */
export const SAMPLE_WATCHLIST = ['sh.600000 # SPD Bank', 'sz.000002 # Vanke A', 'sh.601398 # ICBC', ''].join('\n');

export interface Watchlist {
  /** Absolute path of the file read */
  path: string;
  /** Raw entries in file order, not yet normalized */
  entries: string[];
  /** True when the file was created from the sample */
  created: boolean;
}

/**
 * Extracts the entries of a watchlist file
 */
export function parseWatchlist(content: string): string[] {
  const entries: string[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }
    const code = line.split('#')[0]?.trim();
    if (code) {
      entries.push(code);
    }
  }

  return entries;
}

/**
 * Reads a watchlist, creating it from SAMPLE_WATCHLIST first when missing
 */
export async function loadWatchlist(path: string): Promise<Watchlist> {
  const absolutePath = resolve(path);
  let created = false;

  if (!existsSync(absolutePath)) {
    await writeFile(absolutePath, SAMPLE_WATCHLIST, 'utf-8');
    created = true;
  }

  const content = await readFile(absolutePath, 'utf-8');
  return { path: absolutePath, entries: parseWatchlist(content), created };
}
