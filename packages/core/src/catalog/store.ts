/**
 * CatalogStore — owns the published catalog snapshot.
 *
 * A scan builds a complete replacement off to the side and publishes it by
 * swapping one reference, so readers only ever see a whole catalog. At most
 * one scan runs at a time: scan() joins the running one, refresh() clears
 * the catalog, aborts the running scan and starts over. Selection edits are
 * refused while a scan is running.
 */

import type { PluginFormat, PluginGroup, PluginRecord } from '@audioshelf/shared';
import type { Logger } from '../logging/logger.js';
import { createNoopLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import type { ManufacturerNormalizer } from './normalizer.js';
import { filterByFormat, groupByManufacturer, multiFormat, search } from './query.js';
import { ScanAbortedError, resolvePlugins } from './resolver.js';
import { SEARCH_ROOTS } from './search-roots.js';

export interface CatalogSnapshot {
  readonly records: readonly PluginRecord[];
  readonly groups: readonly PluginGroup[];
  /** Null until the first scan publishes. */
  readonly scannedAt: Date | null;
}

export type CatalogListener = (snapshot: CatalogSnapshot) => void;

export interface CatalogStoreOptions {
  /** Defaults to SEARCH_ROOTS. */
  roots?: readonly string[];
  logger?: Logger;
  normalizer?: ManufacturerNormalizer;
  deterministicOrder?: boolean;
}

const EMPTY_SNAPSHOT: CatalogSnapshot = Object.freeze({
  records: Object.freeze([]),
  groups: Object.freeze([]),
  scannedAt: null,
});

function createSnapshot(records: readonly PluginRecord[], scannedAt: Date | null): CatalogSnapshot {
  return Object.freeze({
    records: Object.freeze([...records]),
    groups: Object.freeze(groupByManufacturer(records)),
    scannedAt,
  });
}

interface RunningScan {
  controller: AbortController;
  promise: Promise<CatalogSnapshot>;
}

export class CatalogStore {
  private readonly roots: readonly string[];
  private readonly logger: Logger;
  private readonly normalizer: ManufacturerNormalizer | undefined;
  private readonly deterministicOrder: boolean;
  private readonly listeners = new Set<CatalogListener>();
  private snapshot: CatalogSnapshot = EMPTY_SNAPSHOT;
  private running: RunningScan | null = null;
  private failure: string | null = null;

  constructor(options: CatalogStoreOptions = {}) {
    this.roots = options.roots ?? SEARCH_ROOTS;
    this.logger = (options.logger ?? createNoopLogger()).child({ component: 'CatalogStore' });
    this.normalizer = options.normalizer;
    this.deterministicOrder = options.deterministicOrder ?? true;
  }

  get current(): CatalogSnapshot {
    return this.snapshot;
  }

  get isScanning(): boolean {
    return this.running !== null;
  }

  /** Message of the last scan that failed unexpectedly, cleared by the next scan. */
  get scanError(): string | null {
    return this.failure;
  }

  subscribe(listener: CatalogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Start a scan, or join the one already running. */
  scan(): Promise<CatalogSnapshot> {
    return this.running?.promise ?? this.startScan();
  }

  /** Discard the published catalog and scan from scratch. */
  refresh(): Promise<CatalogSnapshot> {
    const previous = this.running;
    this.running = null;
    previous?.controller.abort();
    this.publish(EMPTY_SNAPSHOT);
    return this.startScan();
  }

  filterByFormat(format?: PluginFormat | null): PluginRecord[] {
    return filterByFormat(this.snapshot.records, format);
  }

  multiFormat(): PluginRecord[] {
    return multiFormat(this.snapshot.records);
  }

  search(text: string): PluginRecord[] {
    return search(this.snapshot.records, text);
  }

  selected(): PluginRecord[] {
    return this.snapshot.records.filter((record) => record.isSelected);
  }

  /** Returns false while scanning or when the id is not in the catalog. */
  setSelected(id: string, selected: boolean): boolean {
    return this.updateSelection(new Set([id]), selected);
  }

  /** Select every given record (e.g. the currently visible ones). */
  selectAll(visible: readonly PluginRecord[]): boolean {
    return this.updateSelection(new Set(visible.map((record) => record.id)), true);
  }

  deselectAll(visible: readonly PluginRecord[]): boolean {
    return this.updateSelection(new Set(visible.map((record) => record.id)), false);
  }

  private updateSelection(ids: ReadonlySet<string>, selected: boolean): boolean {
    if (this.running) {
      this.logger.debug('Selection change refused during scan');
      return false;
    }
    if (!this.snapshot.records.some((record) => ids.has(record.id))) return false;

    const records = this.snapshot.records.map((record) =>
      ids.has(record.id) && record.isSelected !== selected
        ? Object.freeze({ ...record, isSelected: selected })
        : record
    );
    this.publish(createSnapshot(records, this.snapshot.scannedAt));
    return true;
  }

  private startScan(): Promise<CatalogSnapshot> {
    const controller = new AbortController();
    this.failure = null;
    this.logger.info('Scanning plugin directories', { roots: this.roots.length });

    const promise = resolvePlugins(this.roots, {
      logger: this.logger,
      normalizer: this.normalizer,
      deterministicOrder: this.deterministicOrder,
      signal: controller.signal,
    })
      .then((records) => {
        if (controller.signal.aborted) return this.supersededResult(controller);
        this.publish(createSnapshot(records, new Date()));
        this.logger.info('Scan complete', { plugins: records.length });
        return this.snapshot;
      })
      .catch((err: unknown) => {
        if (err instanceof ScanAbortedError || controller.signal.aborted) {
          return this.supersededResult(controller);
        }
        this.failure = toErrorMessage(err);
        this.logger.error('Scan failed', { error: this.failure });
        return this.snapshot;
      })
      .finally(() => {
        if (this.running?.controller === controller) this.running = null;
      });

    this.running = { controller, promise };
    return promise;
  }

  // Callers of an aborted scan get the result of the scan that replaced it
  private supersededResult(controller: AbortController): Promise<CatalogSnapshot> | CatalogSnapshot {
    const replacement = this.running;
    return replacement && replacement.controller !== controller ? replacement.promise : this.snapshot;
  }

  private publish(snapshot: CatalogSnapshot): void {
    this.snapshot = snapshot;
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (err) {
        this.logger.warn('Catalog listener threw', { error: toErrorMessage(err) });
      }
    }
  }
}
