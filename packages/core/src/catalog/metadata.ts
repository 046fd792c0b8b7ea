/**
 * Metadata Extractor — best-effort manufacturer, version and display name
 * for one plugin file or bundle.
 *
 * Each field is resolved by an ordered probe list (see firstOf); a probe
 * that finds nothing yields null and the next one runs. Nothing here throws.
 */

import { stat } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { PluginFormat } from '@audioshelf/shared';
import type { Logger } from '../logging/logger.js';
import { createNoopLogger } from '../logging/logger.js';
import {
  MetadataContainer,
  firstOf,
  readJsonDescriptor,
  readPropertyList,
} from './metadata-container.js';
import { getDefaultNormalizer, type ManufacturerNormalizer } from './normalizer.js';
import { FORMAT_BUCKET_DIRECTORIES } from './search-roots.js';

export interface PluginMetadata {
  manufacturer: string | null;
  version: string | null;
}

/** Property list locations inside a bundle, primary first. */
export const INFO_PLIST_CANDIDATES = [
  'Contents/Info.plist',
  'Info.plist',
  'Contents/Resources/Info.plist',
] as const;

/** Locations checked for an explicit display name. */
export const DISPLAY_NAME_CANDIDATES = ['Contents/Info.plist', 'Info.plist'] as const;

export const CLAP_DESCRIPTOR = 'clap.json';

const ORGANIZATION_PREFIXES = new Set(['com', 'net', 'org']);

const MANUFACTURER_KEYS = [
  'Manufacturer',
  'manufacturer',
  'Mfr',
  'Vendor',
  'vendor',
  'Company',
  'company',
] as const;

const VERSION_KEYS = [
  'CFBundleShortVersionString',
  'CFBundleVersion',
  'PluginVersion',
  'Version',
  'version',
] as const;

const DISPLAY_NAME_KEYS = ['CFBundleName', 'CFBundleDisplayName'] as const;

const INFO_STRING_PATTERNS: readonly RegExp[] = [
  // Leading run of capitalized words, after any copyright marks and years
  /^(?:(?:[Cc]opyright|©|\([Cc]\)|\d{4}(?:\s*[-–]\s*\d{4})?)[\s,]*)*([A-Z][\w&'.]*(?:\s+[A-Z][\w&'.]*)*)/,
  /\bby\s+([A-Z][\w&'.]*(?:\s+[A-Z][\w&'.]*)*)/,
];

const DIRECTORY_VENDOR_PATTERN = /^([A-Za-z][A-Za-z0-9&]*(?:-[A-Za-z0-9&]+)*)/;

const FILENAME_VERSION_PATTERN = /^\d+\.\d+/;

export interface MetadataExtractorOptions {
  normalizer?: ManufacturerNormalizer;
  logger?: Logger;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Version from a flat file name: the first space-separated token that starts
 * with <digits>.<digits>.
 */
export function versionFromFilename(path: string): string | null {
  const stem = basename(path, extname(path));
  return stem.split(' ').find((token) => FILENAME_VERSION_PATTERN.test(token)) ?? null;
}

export class MetadataExtractor {
  private readonly normalizer: ManufacturerNormalizer;
  private readonly logger: Logger;
  // Property lists are read at most once per extractor (one scan)
  private readonly plistCache = new Map<string, Promise<MetadataContainer | null>>();

  constructor(options: MetadataExtractorOptions = {}) {
    this.normalizer = options.normalizer ?? getDefaultNormalizer();
    this.logger = options.logger ?? createNoopLogger();
  }

  async extract(path: string, format: PluginFormat): Promise<PluginMetadata> {
    const metadata: PluginMetadata = { manufacturer: null, version: null };
    const bundle = await isDirectory(path);

    if (format === PluginFormat.CLAP) {
      if (bundle) {
        const descriptor = await readJsonDescriptor(join(path, CLAP_DESCRIPTOR), this.logger);
        const manufacturer = descriptor?.getString('manufacturer') ?? null;
        metadata.manufacturer = manufacturer === null ? null : this.normalizer.canonicalize(manufacturer);
        metadata.version = descriptor?.getString('version') ?? null;
      }
    } else if (bundle) {
      await this.probeBundle(path, metadata);
    } else if (format === PluginFormat.VST2) {
      // Flat VST2 files carry only a version, in the file name
      metadata.version = versionFromFilename(path);
    }

    if (metadata.manufacturer === null) {
      metadata.manufacturer = this.manufacturerFromDirectory(path);
    }

    return metadata;
  }

  /**
   * Explicit display name from the bundle's property list, or null.
   */
  async displayName(path: string): Promise<string | null> {
    for (const candidate of DISPLAY_NAME_CANDIDATES) {
      const container = await this.readContainer(join(path, candidate));
      if (!container) continue;
      const name = firstOf(DISPLAY_NAME_KEYS.map((key) => () => container.getString(key)));
      if (name !== null) return name;
    }
    return null;
  }

  private async probeBundle(path: string, metadata: PluginMetadata): Promise<void> {
    for (const candidate of INFO_PLIST_CANDIDATES) {
      const container = await this.readContainer(join(path, candidate));
      if (!container) continue;

      metadata.manufacturer ??= this.manufacturerFrom(container);
      metadata.version ??= firstOf(VERSION_KEYS.map((key) => () => container.getString(key)));

      if (metadata.manufacturer !== null && metadata.version !== null) return;
    }
  }

  private readContainer(plistPath: string): Promise<MetadataContainer | null> {
    let pending = this.plistCache.get(plistPath);
    if (!pending) {
      pending = readPropertyList(plistPath, this.logger);
      this.plistCache.set(plistPath, pending);
    }
    return pending;
  }

  private manufacturerFrom(container: MetadataContainer): string | null {
    return firstOf([
      () => this.fromBundleIdentifier(container),
      () => this.fromExplicitKeys(container),
      () => this.fromAudioComponents(container),
      () => this.fromInfoString(container),
    ]);
  }

  private canonical(raw: string | null): string | null {
    return raw === null ? null : this.normalizer.canonicalize(raw);
  }

  /** com.<vendor>.<product> style identifiers. */
  private fromBundleIdentifier(container: MetadataContainer): string | null {
    const identifier = container.getString('CFBundleIdentifier');
    if (!identifier) return null;

    const [prefix, token] = identifier.split('.');
    if (!prefix || !token || !ORGANIZATION_PREFIXES.has(prefix.toLowerCase())) return null;
    if (token.length <= 2) return null;

    return this.canonical(token);
  }

  private fromExplicitKeys(container: MetadataContainer): string | null {
    return firstOf(MANUFACTURER_KEYS.map((key) => () => this.canonical(container.getString(key))));
  }

  /** Audio Unit component names read "Vendor: Product". */
  private fromAudioComponents(container: MetadataContainer): string | null {
    return firstOf(
      container.getContainers('AudioComponents').map((component) => () => {
        const name = component.getString('name');
        if (!name) return null;
        const separator = name.indexOf(':');
        return separator > 0 ? this.canonical(name.slice(0, separator)) : null;
      })
    );
  }

  private fromInfoString(container: MetadataContainer): string | null {
    const info = container.getString('CFBundleGetInfoString');
    if (!info) return null;
    const bundleName = container.getString('CFBundleName')?.toLowerCase();

    return firstOf(
      INFO_STRING_PATTERNS.map((pattern) => () => {
        const captured = pattern.exec(info)?.[1];
        if (!captured) return null;
        // A leading run that is just the product name says nothing about the vendor
        if (bundleName !== undefined && captured.toLowerCase() === bundleName) return null;
        return this.canonical(captured);
      })
    );
  }

  private manufacturerFromDirectory(path: string): string | null {
    const parent = basename(dirname(path));
    if (!parent || FORMAT_BUCKET_DIRECTORIES.has(parent)) return null;
    return this.canonical(DIRECTORY_VENDOR_PATTERN.exec(parent)?.[1] ?? null);
  }
}
