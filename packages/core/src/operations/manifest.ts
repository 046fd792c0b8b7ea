/**
 * Plain-text manifests: the catalog export and the backup manifest.
 *
 * Both group by format under an upper-cased heading with a count and a
 * 50-character `=` underline.
 */

import { writeFile } from 'node:fs/promises';
import type { PluginFormat, PluginRecord } from '@audioshelf/shared';
import { toErrorMessage } from '../utils/errors.js';
import { formatList } from '../catalog/formats.js';
import { sortByName } from '../catalog/query.js';
import { formatByteCount, measureRecord } from './size.js';

const HEADER_RULE = '='.repeat(32);
const SECTION_RULE = '='.repeat(50);
const BULLET = '•';

export interface CatalogManifestEntry {
  record: PluginRecord;
  sizeBytes: number;
}

export interface BackedUpItem {
  format: PluginFormat;
  /** Display name of the plugin. */
  name: string;
  /** Final on-disk file name inside the format folder. */
  fileName: string;
}

function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function groupBy<T>(items: readonly T[], keyOf: (item: T) => PluginFormat): [PluginFormat, T[]][] {
  const groups = new Map<PluginFormat, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return [...groups.entries()].sort(([a], [b]) => compareCodeUnits(a, b));
}

/** A multi-format plugin is listed once, under its first format in sorted order. */
function primaryFormat(record: PluginRecord): PluginFormat {
  const [first] = [...record.formats].sort(compareCodeUnits);
  // formats is never empty for a resolved record
  return first ?? 'VST3';
}

export function formatCatalogManifest(
  entries: readonly CatalogManifestEntry[],
  generatedAt: Date
): string {
  let content =
    'Audio Plugin Manifest\n' +
    `Generated: ${generatedAt.toISOString()}\n` +
    `${HEADER_RULE}\n\n` +
    `Total Plugins: ${String(entries.length)}\n`;

  const sizes = new Map(entries.map((entry) => [entry.record.id, entry.sizeBytes]));

  for (const [format, group] of groupBy(entries, (entry) => primaryFormat(entry.record))) {
    content += `\n${format.toUpperCase()} PLUGINS (${String(group.length)})\n`;
    content += `${SECTION_RULE}\n\n`;

    for (const record of sortByName(group.map((entry) => entry.record))) {
      content += `  ${BULLET} ${record.name}\n`;
      if (record.manufacturer) content += `    Manufacturer: ${record.manufacturer}\n`;
      if (record.version) content += `    Version: ${record.version}\n`;
      content += `    Size: ${formatByteCount(sizes.get(record.id) ?? 0)}\n`;
      content += `    Formats: ${formatList(record)}\n`;

      if (record.paths.length === 1) {
        content += `    Location: ${record.paths[0] ?? ''}\n`;
      } else {
        content += `    Locations (${String(record.paths.length)}):\n`;
        record.paths.forEach((path, index) => {
          content += `      ${String(index + 1)}. ${path}\n`;
        });
      }
      content += '\n';
    }
  }

  return content;
}

export function formatBackupManifest(items: readonly BackedUpItem[], generatedAt: Date): string {
  let content =
    'Audio Plugin Backup Manifest\n' +
    `Generated: ${generatedAt.toISOString()}\n` +
    `${HEADER_RULE}\n`;

  for (const [format, group] of groupBy(items, (item) => item.format)) {
    content += `\n${format.toUpperCase()} PLUGINS (${String(group.length)} files)\n`;
    content += `${SECTION_RULE}\n\n`;

    // Stable sort keeps copy order among equal names
    for (const item of [...group].sort((a, b) => compareCodeUnits(a.name, b.name))) {
      content += `  ${BULLET} ${item.name}\n`;
      content += `    File: ${item.fileName}\n`;
    }
    content += '\n';
  }

  return content;
}

export type ExportResult = { success: true; path: string } | { success: false; error: string };

/** Measure every record and write the catalog manifest to filePath. */
export async function exportCatalogManifest(
  records: readonly PluginRecord[],
  filePath: string,
  now: Date = new Date()
): Promise<ExportResult> {
  const entries: CatalogManifestEntry[] = [];
  for (const record of records) {
    entries.push({ record, sizeBytes: await measureRecord(record) });
  }

  try {
    await writeFile(filePath, formatCatalogManifest(entries, now), 'utf-8');
    return { success: true, path: filePath };
  } catch (err) {
    return { success: false, error: toErrorMessage(err) };
  }
}

/** Default export file name, e.g. plugins_manifest_2026-10-19_142233.txt */
export function defaultExportFileName(now: Date = new Date()): string {
  return `plugins_manifest_${formatTimestamp(now)}.txt`;
}

/** Local time as yyyy-MM-dd_HHmmss. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
