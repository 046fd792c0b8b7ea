/**
 * Backup executor — copies every path of each record into
 * <destination>/Plugin_Backup_<timestamp>/<FORMAT>/ and writes manifest.txt.
 *
 * Copies run one after another: collision renaming (Foo.vst3, Foo_1.vst3,
 * Foo_2.vst3, ...) depends on seeing the previous copies. Existing files are
 * never overwritten, and a second backup within the same second gets its own
 * Plugin_Backup_<timestamp>_1 folder.
 */

import { access, cp, mkdir, stat, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { PluginFormat } from '@audioshelf/shared';
import type { PluginRecord } from '@audioshelf/shared';
import type { Logger } from '../logging/logger.js';
import { createNoopLogger } from '../logging/logger.js';
import { classifyPath } from '../catalog/formats.js';
import { toErrorCode, toErrorMessage } from '../utils/errors.js';
import { formatBackupManifest, formatTimestamp, type BackedUpItem } from './manifest.js';
import { completionMessage, progressOf, type ProgressCallback } from './progress.js';

export const BACKUP_FOLDER_PREFIX = 'Plugin_Backup_';
export const BACKUP_MANIFEST_FILE = 'manifest.txt';

export interface BackupItemResult {
  record: PluginRecord;
  success: boolean;
  errors: string[];
  /** Copies that landed, including those of a record that partly failed. */
  files: BackedUpItem[];
}

export type BackupReport =
  | {
      status: 'completed';
      success: boolean;
      folder: string;
      results: BackupItemResult[];
      manifestWritten: boolean;
      message: string;
    }
  | {
      status: 'destination-failed';
      success: false;
      error: string;
      message: string;
    };

export interface BackupOptions {
  onProgress?: ProgressCallback;
  logger?: Logger;
  /** Clock for the folder timestamp and manifest header. */
  now?: Date;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Destination is usable when it exists and is a directory. */
export async function validateBackupDestination(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Create a fresh backup folder under destination, suffixing _1, _2, ... when
 * a folder with the same timestamp already exists.
 */
async function createBackupFolder(destination: string, now: Date): Promise<string> {
  await mkdir(destination, { recursive: true });
  const base = `${BACKUP_FOLDER_PREFIX}${formatTimestamp(now)}`;
  for (let counter = 0; ; counter++) {
    const folder = join(destination, counter === 0 ? base : `${base}_${String(counter)}`);
    try {
      await mkdir(folder);
      return folder;
    } catch (err) {
      if (toErrorCode(err) !== 'EEXIST') throw err;
    }
  }
}

/**
 * First free file name in folder: name.ext, then name_1.ext, name_2.ext, ...
 */
export async function uniqueFileName(folder: string, fileName: string): Promise<string> {
  const ext = extname(fileName);
  const stem = basename(fileName, ext);
  let candidate = fileName;
  let counter = 1;
  while (await exists(join(folder, candidate))) {
    candidate = `${stem}_${String(counter)}${ext}`;
    counter++;
  }
  return candidate;
}

export async function backupPlugins(
  records: readonly PluginRecord[],
  destination: string,
  options: BackupOptions = {}
): Promise<BackupReport> {
  const logger = (options.logger ?? createNoopLogger()).child({ component: 'Backup' });
  const now = options.now ?? new Date();

  let folder: string;
  try {
    folder = await createBackupFolder(destination, now);
  } catch (err) {
    const error = `Failed to create backup directory: ${toErrorMessage(err)}`;
    logger.error(error, { path: destination, code: toErrorCode(err) });
    return { status: 'destination-failed', success: false, error, message: error };
  }

  const results: BackupItemResult[] = [];

  for (const [index, record] of records.entries()) {
    const result = await backupRecord(record, folder, logger);
    results.push(result);
    options.onProgress?.(
      progressOf(
        index + 1,
        records.length,
        result.success ? `Backed up ${record.name}` : `Failed to back up ${record.name}`
      )
    );
  }

  const items = results.flatMap((result) => result.files);
  let manifestWritten = true;
  try {
    await writeFile(join(folder, BACKUP_MANIFEST_FILE), formatBackupManifest(items, now), {
      encoding: 'utf-8',
      flag: 'wx',
    });
  } catch (err) {
    manifestWritten = false;
    logger.error('Failed to create backup manifest', { path: folder, error: toErrorMessage(err) });
  }

  const success = results.every((result) => result.success);
  const message = completionMessage('backed up', records.length, success);
  logger.info(message, { plugins: records.length, folder });
  return { status: 'completed', success, folder, results, manifestWritten, message };
}

async function backupRecord(
  record: PluginRecord,
  folder: string,
  logger: Logger
): Promise<BackupItemResult> {
  const errors: string[] = [];
  const files: BackedUpItem[] = [];

  for (const path of record.paths) {
    const format = classifyPath(path) ?? PluginFormat.VST3;
    try {
      const formatFolder = join(folder, format);
      await mkdir(formatFolder, { recursive: true });
      const fileName = await uniqueFileName(formatFolder, basename(path));
      await cp(path, join(formatFolder, fileName), {
        recursive: true,
        errorOnExist: true,
        force: false,
        verbatimSymlinks: true,
      });
      files.push({ format, name: record.name, fileName });
    } catch (err) {
      const message = `Failed to backup ${record.name}: ${toErrorMessage(err)}`;
      errors.push(message);
      logger.warn(message, { path, code: toErrorCode(err) });
    }
  }

  return { record, success: errors.length === 0, errors, files };
}
