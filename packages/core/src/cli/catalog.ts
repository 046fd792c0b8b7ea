/**
 * Shared setup for catalog commands: config, logger and one completed scan.
 */

import type { Config, PluginFormat, PluginRecord } from '@audioshelf/shared';
import { PluginFormatSchema } from '@audioshelf/shared';
import { CatalogStore, type CatalogSnapshot } from '../catalog/store.js';
import { loadConfig } from '../config/loader.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { Spinner } from './utils.js';

export interface CatalogSession {
  config: Config;
  logger: Logger;
  store: CatalogStore;
  snapshot: CatalogSnapshot;
}

/** Load config, scan every search root and wait for the result. */
export async function openCatalog(
  configPath: string | undefined,
  progress: NodeJS.WritableStream
): Promise<CatalogSession> {
  const config = loadConfig({ configPath });
  const logger = createLogger(config.logging);
  const store = new CatalogStore({ logger, deterministicOrder: config.scan.deterministicOrder });

  const spinner = new Spinner(progress);
  spinner.start('Scanning plugin directories...');
  const snapshot = await store.scan();

  if (store.scanError) {
    spinner.stop(`Scan failed: ${store.scanError}`, false);
    throw new Error(`Scan failed: ${store.scanError}`);
  }
  spinner.stop(`Found ${String(snapshot.records.length)} plugin(s)`);
  return { config, logger, store, snapshot };
}

/**
 * Select records whose name matches one of the given names, ignoring case.
 * Returns the selection and the names that matched nothing.
 */
export function selectByName(
  store: CatalogStore,
  names: readonly string[]
): { selected: PluginRecord[]; missing: string[] } {
  const missing: string[] = [];
  for (const name of names) {
    const wanted = name.toLowerCase();
    const matches = store.current.records.filter((record) => record.name.toLowerCase() === wanted);
    if (matches.length === 0) {
      missing.push(name);
      continue;
    }
    for (const record of matches) store.setSelected(record.id, true);
  }
  return { selected: store.selected(), missing };
}

/** Parse a --format value such as "vst3" or "AU". */
export function parseFormat(value: string): PluginFormat | null {
  const result = PluginFormatSchema.safeParse(value.toUpperCase());
  return result.success ? result.data : null;
}
