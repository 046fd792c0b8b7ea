/**
 * Identity Resolver — walks the search roots, classifies entries by
 * extension and merges entries that name the same plugin into one record.
 *
 * Merge key is the derived name, case-insensitive. Name, manufacturer and
 * version are first-writer-wins across the merge sequence, so the walk is
 * sorted by default to keep repeated scans in agreement.
 */

import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import type { PluginFormat, PluginRecord } from '@audioshelf/shared';
import type { Logger } from '../logging/logger.js';
import { createNoopLogger } from '../logging/logger.js';
import { toErrorCode } from '../utils/errors.js';
import { uuidv7 } from '../utils/id.js';
import { classifyPath } from './formats.js';
import { MetadataExtractor } from './metadata.js';
import type { ManufacturerNormalizer } from './normalizer.js';
import { expandPath } from './search-roots.js';

export const PLACEHOLDER_PLUGIN_NAME = 'Untitled Plugin';

// Trailing plugin-format tags such as "[VST3]" or "(AU)". Channel and
// architecture tags name distinct builds and stay part of the name.
const FORMAT_TAG_SUFFIX = /\s*[[(](?:vst|vst2|vst3|au|aax|clap|component)[\])]\s*$/i;

export interface ResolveOptions {
  logger?: Logger;
  normalizer?: ManufacturerNormalizer;
  /** Sort directory entries by name before processing (default true). */
  deterministicOrder?: boolean;
  signal?: AbortSignal;
}

export interface DiscoveredEntry {
  path: string;
  format: PluginFormat;
}

interface RecordDraft {
  id: string;
  name: string;
  formats: PluginFormat[];
  paths: string[];
  manufacturer: string | null;
  version: string | null;
}

export class ScanAbortedError extends Error {
  constructor() {
    super('Scan aborted');
    this.name = 'ScanAbortedError';
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new ScanAbortedError();
}

/** Strip trailing format tags from a file stem. */
export function stripFormatTags(stem: string): string {
  let current = stem.trim();
  let previous: string;
  do {
    previous = current;
    current = current.replace(FORMAT_TAG_SUFFIX, '').trim();
  } while (current !== previous);
  return current;
}

/**
 * Name from the file alone: stem without format tags, else the first
 * dot-delimited segment of the parent directory, else a placeholder.
 */
export function nameFromPath(path: string): string {
  const stem = stripFormatTags(basename(path, extname(path)));
  if (stem && stem.toLowerCase() !== 'plugin') return stem;

  const parent = basename(dirname(path)).split('.')[0]?.trim();
  return parent ? parent : PLACEHOLDER_PLUGIN_NAME;
}

/**
 * Recursively list classified entries under one root. Recognized plugin
 * entries are not descended into: a bundle is one unit. Unreadable
 * directories are skipped.
 */
export async function* walkRoot(
  root: string,
  options: Pick<ResolveOptions, 'logger' | 'deterministicOrder' | 'signal'> = {}
): AsyncGenerator<DiscoveredEntry> {
  const logger = options.logger ?? createNoopLogger();
  const sorted = options.deterministicOrder ?? true;
  const pending: string[] = [root];

  while (pending.length > 0) {
    throwIfAborted(options.signal);
    const directory = pending.shift();
    if (directory === undefined) break;

    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (err) {
      if (directory !== root) {
        logger.debug('Skipping unreadable directory', { path: directory, code: toErrorCode(err) });
      }
      continue;
    }

    if (sorted) {
      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    }

    const children: string[] = [];
    for (const entry of entries) {
      const path = join(directory, entry.name);
      const format = classifyPath(entry.name);
      if (format) {
        yield { path, format };
      } else if (entry.isDirectory()) {
        children.push(path);
      }
    }
    // Depth-first, in listing order
    pending.unshift(...children);
  }
}

/**
 * Resolve every plugin under the given roots into records sorted by name.
 * Missing roots are skipped silently.
 */
export async function resolvePlugins(
  roots: readonly string[],
  options: ResolveOptions = {}
): Promise<PluginRecord[]> {
  const logger = options.logger ?? createNoopLogger();
  const extractor = new MetadataExtractor({ normalizer: options.normalizer, logger });
  const drafts = new Map<string, RecordDraft>();

  for (const root of roots) {
    const directory = expandPath(root);
    for await (const entry of walkRoot(directory, { ...options, logger })) {
      throwIfAborted(options.signal);
      await mergeEntry(drafts, entry, extractor);
    }
  }

  const records = [...drafts.values()].map(
    (draft): PluginRecord =>
      Object.freeze({
        id: draft.id,
        name: draft.name,
        formats: Object.freeze([...draft.formats]),
        paths: Object.freeze([...draft.paths]),
        manufacturer: draft.manufacturer,
        version: draft.version,
        isSelected: false,
      })
  );

  records.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  logger.debug('Resolved plugin catalog', { roots: roots.length, plugins: records.length });
  return records;
}

async function mergeEntry(
  drafts: Map<string, RecordDraft>,
  entry: DiscoveredEntry,
  extractor: MetadataExtractor
): Promise<void> {
  const name = (await extractor.displayName(entry.path)) ?? nameFromPath(entry.path);
  const key = name.toLowerCase();
  let draft = drafts.get(key);

  if (!draft) {
    draft = {
      id: uuidv7(),
      name,
      formats: [],
      paths: [],
      manufacturer: null,
      version: null,
    };
    drafts.set(key, draft);
  }

  if (!draft.formats.includes(entry.format)) draft.formats.push(entry.format);
  if (!draft.paths.includes(entry.path)) draft.paths.push(entry.path);

  if (draft.manufacturer === null || draft.version === null) {
    const metadata = await extractor.extract(entry.path, entry.format);
    draft.manufacturer ??= metadata.manufacturer;
    draft.version ??= metadata.version;
  }
}
