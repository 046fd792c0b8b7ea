/**
 * Plugin format table and extension classification.
 */

import { extname } from 'node:path';
import { PluginFormat } from '@audioshelf/shared';
import type { PluginRecord } from '@audioshelf/shared';

export interface FormatInfo {
  format: PluginFormat;
  /** Lower-case, with leading dot. */
  extension: string;
}

export const FORMAT_INFO: Record<PluginFormat, FormatInfo> = {
  VST2: { format: PluginFormat.VST2, extension: '.vst' },
  VST3: { format: PluginFormat.VST3, extension: '.vst3' },
  AU: { format: PluginFormat.AU, extension: '.component' },
  CLAP: { format: PluginFormat.CLAP, extension: '.clap' },
};

const FORMAT_BY_EXTENSION = new Map<string, PluginFormat>(
  Object.values(FORMAT_INFO).map((info) => [info.extension, info.format])
);

/**
 * Classify a path by its extension alone. Unknown or missing extensions
 * yield null.
 */
export function classifyPath(path: string): PluginFormat | null {
  const ext = extname(path).toLowerCase();
  if (!ext) return null;
  return FORMAT_BY_EXTENSION.get(ext) ?? null;
}

export function hasMultipleFormats(record: PluginRecord): boolean {
  return record.formats.length > 1;
}

/** Format names sorted and joined, e.g. "AU, VST3". */
export function formatList(record: PluginRecord): string {
  return [...record.formats].sort().join(', ');
}
