/**
 * Report file output
 *
 * Writes rendered reports, creating parent directories as needed.
 */

import { access, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write one report file. Failures surface as FILE_WRITE_ERROR.
 */
export async function writeReportFile(filePath: string, content: string | Buffer): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    if (typeof content === 'string') {
      await writeFile(filePath, content, 'utf-8');
    } else {
      await writeFile(filePath, content);
    }
  } catch (error) {
    throw errors.fileWriteError(filePath, error instanceof Error ? error.message : String(error));
  }
  logger.debug(`Wrote ${filePath}`);
}
