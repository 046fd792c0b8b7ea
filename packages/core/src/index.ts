/**
 * @audioshelf/core
 *
 * Audio plugin catalog: discovery, manufacturer normalization, grouping,
 * removal and backup.
 */

// Catalog
export { CatalogStore, type CatalogSnapshot, type CatalogListener, type CatalogStoreOptions } from './catalog/store.js';

export {
  resolvePlugins,
  walkRoot,
  nameFromPath,
  stripFormatTags,
  ScanAbortedError,
  PLACEHOLDER_PLUGIN_NAME,
  type ResolveOptions,
  type DiscoveredEntry,
} from './catalog/resolver.js';

export { SEARCH_ROOTS, FORMAT_BUCKET_DIRECTORIES, expandPath } from './catalog/search-roots.js';

export { FORMAT_INFO, classifyPath, hasMultipleFormats, formatList, type FormatInfo } from './catalog/formats.js';

export {
  MetadataExtractor,
  versionFromFilename,
  type PluginMetadata,
  type MetadataExtractorOptions,
} from './catalog/metadata.js';

export {
  ManufacturerNormalizer,
  cleanManufacturerString,
  loadAliasTables,
  getDefaultNormalizer,
  type AliasTables,
} from './catalog/normalizer.js';

export { sortByName, groupByManufacturer, filterByFormat, multiFormat, search } from './catalog/query.js';

// Operations
export {
  removePlugins,
  type RemovalReport,
  type RemovalItemResult,
  type RemovalOptions,
} from './operations/removal.js';

export {
  backupPlugins,
  validateBackupDestination,
  uniqueFileName,
  BACKUP_FOLDER_PREFIX,
  BACKUP_MANIFEST_FILE,
  type BackupReport,
  type BackupItemResult,
  type BackupOptions,
} from './operations/backup.js';

export {
  formatCatalogManifest,
  formatBackupManifest,
  exportCatalogManifest,
  defaultExportFileName,
  formatTimestamp,
  type CatalogManifestEntry,
  type BackedUpItem,
  type ExportResult,
} from './operations/manifest.js';

export { measurePath, measureRecord, calculateBackupSize, formatByteCount } from './operations/size.js';

export { progressOf, completionMessage, type OperationProgress, type ProgressCallback } from './operations/progress.js';

// Configuration
export { loadConfig, DEFAULT_CONFIG_PATHS, type LoadConfigOptions } from './config/loader.js';

// Logging
export {
  createLogger,
  createNoopLogger,
  type Logger,
  type LogContext,
  type LogLevel,
} from './logging/logger.js';

// Utilities
export { toErrorMessage, toErrorCode } from './utils/errors.js';
export { uuidv7 } from './utils/id.js';

export { VERSION } from './version.js';
