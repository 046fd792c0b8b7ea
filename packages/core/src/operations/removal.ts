/**
 * Removal executor — moves every path of each record to the recycle bin or
 * deletes it, one path at a time. A failed path fails its record and the
 * aggregate but never stops the run.
 */

import { lstat, rm } from 'node:fs/promises';
import trash from 'trash';
import { RemovalMode } from '@audioshelf/shared';
import type { PluginRecord } from '@audioshelf/shared';
import type { Logger } from '../logging/logger.js';
import { createNoopLogger } from '../logging/logger.js';
import { toErrorCode, toErrorMessage } from '../utils/errors.js';
import { completionMessage, progressOf, type ProgressCallback } from './progress.js';

export interface RemovalItemResult {
  record: PluginRecord;
  success: boolean;
  /** One message per failed path. */
  errors: string[];
}

export interface RemovalReport {
  success: boolean;
  results: RemovalItemResult[];
  message: string;
}

export interface RemovalOptions {
  onProgress?: ProgressCallback;
  logger?: Logger;
}

async function removePath(path: string, mode: RemovalMode): Promise<void> {
  if (mode === RemovalMode.PERMANENT_DELETE) {
    await rm(path, { recursive: true, force: false });
    return;
  }
  // trash() quietly skips missing paths; a missing plugin is a failure here
  await lstat(path);
  await trash(path, { glob: false });
}

export async function removePlugins(
  records: readonly PluginRecord[],
  mode: RemovalMode,
  options: RemovalOptions = {}
): Promise<RemovalReport> {
  const logger = (options.logger ?? createNoopLogger()).child({ component: 'Removal' });
  const results: RemovalItemResult[] = [];

  for (const [index, record] of records.entries()) {
    const errors: string[] = [];

    for (const path of record.paths) {
      try {
        await removePath(path, mode);
        logger.debug('Removed plugin path', { plugin: record.name, path, mode });
      } catch (err) {
        const message = `Failed to remove ${record.name}: ${toErrorMessage(err)}`;
        errors.push(message);
        logger.warn(message, { path, code: toErrorCode(err) });
      }
    }

    const success = errors.length === 0;
    results.push({ record, success, errors });
    options.onProgress?.(
      progressOf(
        index + 1,
        records.length,
        success ? `Removed ${record.name}` : `Failed to remove ${record.name}`
      )
    );
  }

  const success = results.every((result) => result.success);
  const message = completionMessage('removed', records.length, success);
  logger.info(message, { plugins: records.length, mode });
  return { success, results, message };
}
