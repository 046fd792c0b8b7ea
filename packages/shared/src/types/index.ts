/**
 * Shared Types - Main Export
 *
 * Re-exports all shared types for convenient importing
 */

// Plugin catalog types
export {
  PluginFormat,
  PluginFormatSchema,
  RemovalMode,
  RemovalModeSchema,
  UNKNOWN_MANUFACTURER,
  type PluginRecord,
  type PluginGroup,
} from './plugin.js';

// Configuration types
export {
  LoggingConfigSchema,
  ScanConfigSchema,
  RemovalConfigSchema,
  BackupConfigSchema,
  ConfigSchema,
  PartialConfigSchema,
  type LoggingConfig,
  type ScanConfig,
  type RemovalConfig,
  type BackupConfig,
  type Config,
  type PartialConfig,
} from './config.js';
