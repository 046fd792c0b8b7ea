/**
 * Grouping & query projections over a catalog snapshot. All pure; the input
 * array is never mutated.
 */

import { UNKNOWN_MANUFACTURER } from '@audioshelf/shared';
import type { PluginFormat, PluginGroup, PluginRecord } from '@audioshelf/shared';
import { hasMultipleFormats } from './formats.js';

function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortByName(records: readonly PluginRecord[]): PluginRecord[] {
  return [...records].sort((a, b) => compareCodeUnits(a.name, b.name));
}

export function groupByManufacturer(records: readonly PluginRecord[]): PluginGroup[] {
  const buckets = new Map<string, PluginRecord[]>();
  for (const record of records) {
    const label = record.manufacturer ?? UNKNOWN_MANUFACTURER;
    const bucket = buckets.get(label);
    if (bucket) {
      bucket.push(record);
    } else {
      buckets.set(label, [record]);
    }
  }

  return [...buckets.entries()]
    .map(([name, plugins]): PluginGroup => ({ name, plugins: sortByName(plugins) }))
    .sort((a, b) => compareCodeUnits(a.name, b.name));
}

/** Identity when format is null or undefined. */
export function filterByFormat(
  records: readonly PluginRecord[],
  format?: PluginFormat | null
): PluginRecord[] {
  if (!format) return [...records];
  return records.filter((record) => record.formats.includes(format));
}

export function multiFormat(records: readonly PluginRecord[]): PluginRecord[] {
  return records.filter(hasMultipleFormats);
}

/** Case-insensitive substring match on name; empty text matches all. */
export function search(records: readonly PluginRecord[], text: string): PluginRecord[] {
  const needle = text.toLowerCase();
  if (!needle) return [...records];
  return records.filter((record) => record.name.toLowerCase().includes(needle));
}
