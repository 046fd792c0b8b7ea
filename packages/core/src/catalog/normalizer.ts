/**
 * Manufacturer Normalizer — turns raw vendor evidence (bundle identifier
 * fragments, info strings, directory slugs) into display names.
 *
 * Alias tables live in data/manufacturer-aliases.json and are read on first
 * use of the default normalizer.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const AliasTablesSchema = z.object({
  /** Lower-case slug → canonical brand name. */
  aliases: z.record(z.string()),
  /** Lower-case single-word company slug → capitalized form. */
  companySlugs: z.record(z.string()),
});

export type AliasTables = z.infer<typeof AliasTablesSchema>;

const ALIAS_TABLES_URL = new URL('./data/manufacturer-aliases.json', import.meta.url);

export function loadAliasTables(source: URL | string = ALIAS_TABLES_URL): AliasTables {
  const raw = JSON.parse(readFileSync(source, 'utf-8')) as unknown;
  return AliasTablesSchema.parse(raw);
}

// Applied in order, repeatedly, until none of them changes the string
const TRAILING_BOILERPLATE: readonly RegExp[] = [
  /[\s,.;-]*all rights reserved\.?$/i,
  /[\s,]*\b(?:ltd|limited|inc|incorporated|gmbh|llc|corp|corporation)\.?$/i,
  /[\s,]*\b\d{4}(?:\s*[-–]\s*\d{4})?$/,
  /[\s,]*(?:\bcopyright|©|\(c\))$/i,
];

const LEADING_BOILERPLATE: readonly RegExp[] = [
  /^(?:copyright\b|©|\(c\))[\s,]*/i,
  /^\d{4}(?:\s*[-–]\s*\d{4})?\b[\s,]*/,
];

const FORMAT_EXTENSION_ECHO = /\.(?:vst3?|component|clap)$/i;

function stripRepeatedly(value: string, patterns: readonly RegExp[]): string {
  let current = value;
  let previous: string;
  do {
    previous = current;
    for (const pattern of patterns) {
      current = current.replace(pattern, '');
    }
  } while (current !== previous);
  return current;
}

/**
 * Remove legal boilerplate and echoes from a raw manufacturer string.
 * Returns null when nothing meaningful remains.
 */
export function cleanManufacturerString(raw: string): string | null {
  let cleaned = raw.trim();
  cleaned = stripRepeatedly(cleaned, LEADING_BOILERPLATE);
  cleaned = stripRepeatedly(cleaned, TRAILING_BOILERPLATE).trim();
  cleaned = cleaned.replace(/^com\s+/i, '');
  cleaned = cleaned.replace(FORMAT_EXTENSION_ECHO, '').trim();

  if (cleaned.length <= 2 || cleaned.toLowerCase() === 'com') {
    return null;
  }
  return cleaned;
}

export class ManufacturerNormalizer {
  private readonly aliases: ReadonlyMap<string, string>;
  private readonly companySlugs: ReadonlyMap<string, string>;

  constructor(tables: AliasTables = loadAliasTables()) {
    this.aliases = new Map(Object.entries(tables.aliases).map(([k, v]) => [k.toLowerCase(), v]));
    this.companySlugs = new Map(
      Object.entries(tables.companySlugs).map(([k, v]) => [k.toLowerCase(), v])
    );
  }

  /**
   * Map a raw token to its display form: alias table first, then per-hyphen
   * capitalization.
   */
  normalize(raw: string): string | null {
    const trimmed = raw.trim();
    if (!trimmed) return null;

    const alias = this.aliases.get(trimmed.toLowerCase());
    if (alias) return alias;

    const words = trimmed
      .split('-')
      .map((token) => token.trim())
      .filter((token) => token.length > 0)
      .map((token) => this.capitalize(token));

    return words.length > 0 ? words.join(' ') : null;
  }

  /** Full pipeline used before a manufacturer is stored. */
  canonicalize(raw: string): string | null {
    const cleaned = cleanManufacturerString(raw);
    return cleaned === null ? null : this.normalize(cleaned);
  }

  private capitalize(token: string): string {
    if (token !== token.toLowerCase()) {
      return token.charAt(0).toUpperCase() + token.slice(1);
    }
    return this.companySlugs.get(token) ?? token.charAt(0).toUpperCase() + token.slice(1);
  }
}

let defaultNormalizer: ManufacturerNormalizer | null = null;

export function getDefaultNormalizer(): ManufacturerNormalizer {
  if (!defaultNormalizer) {
    defaultNormalizer = new ManufacturerNormalizer();
  }
  return defaultNormalizer;
}
