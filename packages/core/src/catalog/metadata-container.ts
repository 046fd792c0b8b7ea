/**
 * Typed read-only view over a parsed property list or JSON descriptor.
 *
 * Accessors return null on absence or type mismatch; nothing here throws
 * once a container has been constructed.
 */

import { readFile } from 'node:fs/promises';
import plist from 'plist';
import type { Logger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';

type Entries = Readonly<Record<string, unknown>>;

function isEntries(value: unknown): value is Entries {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date) && !Buffer.isBuffer(value);
}

export class MetadataContainer {
  private readonly entries: Entries;

  constructor(entries: Entries) {
    this.entries = entries;
  }

  /** Wrap an arbitrary parsed value; non-objects yield null. */
  static from(value: unknown): MetadataContainer | null {
    return isEntries(value) ? new MetadataContainer(value) : null;
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.entries, key);
  }

  /** Trimmed, non-empty string value, or null. */
  getString(key: string): string | null {
    const value = this.entries[key];
    if (typeof value !== 'string') return null;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }

  getContainer(key: string): MetadataContainer | null {
    return MetadataContainer.from(this.entries[key]);
  }

  /** Object elements of an array value; other elements are skipped. */
  getContainers(key: string): MetadataContainer[] {
    const value = this.entries[key];
    if (!Array.isArray(value)) return [];
    const containers: MetadataContainer[] = [];
    for (const item of value) {
      const container = MetadataContainer.from(item);
      if (container) containers.push(container);
    }
    return containers;
  }
}

/** First non-null result of the probe list, evaluated left to right. */
export function firstOf<T>(probes: ReadonlyArray<() => T | null>): T | null {
  for (const probe of probes) {
    const result = probe();
    if (result !== null) return result;
  }
  return null;
}

const BINARY_PLIST_MAGIC = 'bplist';
const PLIST_ROOT = /<plist[\s>]/;

async function readText(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch {
    // Missing or unreadable container — expected absence
    return null;
  }
}

/**
 * Read an XML property list. Missing files, binary property lists and
 * malformed XML all come back as null.
 */
export async function readPropertyList(
  path: string,
  logger?: Logger
): Promise<MetadataContainer | null> {
  const text = await readText(path);
  if (text === null) return null;

  if (text.startsWith(BINARY_PLIST_MAGIC)) {
    logger?.debug('Skipping binary property list', { path });
    return null;
  }

  // The XML parser reports fatal errors on stderr itself
  if (!PLIST_ROOT.test(text)) {
    logger?.debug('Not a property list', { path });
    return null;
  }

  try {
    return MetadataContainer.from(plist.parse(text));
  } catch (err) {
    logger?.debug('Malformed property list', { path, error: toErrorMessage(err) });
    return null;
  }
}

/** Read a JSON descriptor; missing or malformed files come back as null. */
export async function readJsonDescriptor(
  path: string,
  logger?: Logger
): Promise<MetadataContainer | null> {
  const text = await readText(path);
  if (text === null) return null;

  try {
    return MetadataContainer.from(JSON.parse(text) as unknown);
  } catch (err) {
    logger?.debug('Malformed JSON descriptor', { path, error: toErrorMessage(err) });
    return null;
  }
}
