import { Writable } from 'node:stream';

/**
 * In-memory destination for the stream transport.
 */
export function captureStream(): { stream: Writable; lines: string[] } {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(...String(chunk).split('\n').filter((line) => line.length > 0));
      callback();
    },
  });
  return { stream, lines };
}

/** Lets winston's internal pipes drain. */
export function flush(ms = 25): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function parseLines(lines: string[]): Record<string, unknown>[] {
  return lines.map((line) => {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`not a JSON object: ${line}`);
    }
    return Object.fromEntries(Object.entries(parsed));
  });
}
