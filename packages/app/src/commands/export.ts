/**
 * CSV export step shared by kline and index
 */

import type { Logger } from '@ashare/logger';
import { writeCsv } from '../export/csv.js';
import { CommandError, ErrorCode } from './errors.js';

/**
 * @returns the absolute path written
 * @throws CommandError EXPORT_ERROR when the file cannot be written
 */
export async function exportCsv(path: string, content: string, logger: Logger): Promise<string> {
  try {
    const written = await writeCsv(path, content);
    logger.info('CSV exported', { path: written, bytes: Buffer.byteLength(content) });
    return written;
  } catch (error) {
    throw new CommandError(ErrorCode.EXPORT_ERROR, `Failed to write ${path}`, {
      context: { path },
      cause: error instanceof Error ? error : new Error(String(error)),
    });
  }
}
