/**
 * Where rendered command output goes. Renderers return strings; commands
 * write them here, so tests can capture output without touching stdout.
 */
export interface OutputSink {
  write(text: string): void;
}

/**
 * Writes each chunk to stdout followed by a newline
 */
export function createStdoutSink(stream: NodeJS.WritableStream = process.stdout): OutputSink {
  return {
    write(text: string): void {
      stream.write(`${text}\n`);
    },
  };
}
