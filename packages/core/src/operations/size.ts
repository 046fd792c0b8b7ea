/**
 * On-disk size of plugin files and bundles.
 */

import type { Stats } from 'node:fs';
import { lstat, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { PluginRecord } from '@audioshelf/shared';

/** Total bytes under a path; bundles are walked, symlinks counted as links. Unreadable paths count 0. */
export async function measurePath(path: string): Promise<number> {
  let info: Stats;
  try {
    info = await lstat(path);
  } catch {
    return 0;
  }
  if (!info.isDirectory()) return info.size;

  let names: string[];
  try {
    names = await readdir(path);
  } catch {
    return 0;
  }

  let total = 0;
  for (const name of names) {
    total += await measurePath(join(path, name));
  }
  return total;
}

export async function measureRecord(record: PluginRecord): Promise<number> {
  let total = 0;
  for (const path of record.paths) {
    total += await measurePath(path);
  }
  return total;
}

export async function calculateBackupSize(records: readonly PluginRecord[]): Promise<number> {
  let total = 0;
  for (const record of records) {
    total += await measureRecord(record);
  }
  return total;
}

const UNITS = ['KB', 'MB', 'GB', 'TB'] as const;

/**
 * Decimal byte count for display: "Zero KB", "1 byte", "512 bytes",
 * "1 KB", "1.2 MB", "15 GB".
 */
export function formatByteCount(bytes: number): string {
  if (bytes <= 0) return 'Zero KB';
  if (bytes === 1) return '1 byte';
  if (bytes < 1000) return `${String(bytes)} bytes`;

  let value = bytes / 1000;
  let unit: (typeof UNITS)[number] = 'KB';
  for (const next of UNITS.slice(1)) {
    if (value < 1000) break;
    value /= 1000;
    unit = next;
  }

  // One decimal below 10 units for MB and up, whole numbers otherwise
  const rounded = unit !== 'KB' && value < 10 ? Math.round(value * 10) / 10 : Math.round(value);
  return `${String(rounded)} ${unit}`;
}
