/**
 * Configuration Loader for Audioshelf
 *
 * - Config files are validated against strict schemas
 * - Environment variables override file values
 * - Search roots are not configurable
 */

import { readFileSync, existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  ConfigSchema,
  PartialConfigSchema,
  type Config,
  type PartialConfig,
} from '@audioshelf/shared';
import { expandPath } from '../catalog/search-roots.js';
import { toErrorMessage } from '../utils/errors.js';

// Default config file locations (checked in order)
export const DEFAULT_CONFIG_PATHS = [
  './audioshelf.yaml',
  './audioshelf.yml',
  '~/.audioshelf/config.yaml',
];

/**
 * Load configuration from a YAML file
 */
function loadConfigFile(path: string): PartialConfig | null {
  const expandedPath = expandPath(path);

  if (!existsSync(expandedPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(expandedPath, 'utf-8')) as unknown;
  } catch (error) {
    throw new Error(`Failed to load config from ${expandedPath}: ${toErrorMessage(error)}`);
  }

  // An empty file parses to null
  const result = PartialConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new Error(`Invalid configuration in ${expandedPath}: ${result.error.message}`);
  }

  return result.data;
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(): Record<string, unknown> {
  // Values are validated with the merged result
  const config: Record<string, unknown> = {};

  if (process.env.AUDIOSHELF_LOG_LEVEL) {
    config.logging = { level: process.env.AUDIOSHELF_LOG_LEVEL };
  }
  if (process.env.AUDIOSHELF_BACKUP_DIR) {
    config.backup = { destination: process.env.AUDIOSHELF_BACKUP_DIR };
  }
  if (process.env.AUDIOSHELF_REMOVAL_MODE) {
    config.removal = { mode: process.env.AUDIOSHELF_REMOVAL_MODE };
  }

  return config;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two config objects
 * Later values override earlier ones
 */
function mergeConfigs(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const baseValue = result[key];

    if (isPlainObject(value)) {
      result[key] = isPlainObject(baseValue) ? mergeConfigs(baseValue, value) : value;
    } else if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Override config values */
  overrides?: PartialConfig;
  /** Skip environment variable loading */
  skipEnv?: boolean;
  /** Skip auto-discovery of config files */
  skipDiscovery?: boolean;
}

/**
 * Load and validate configuration
 *
 * Loading order (later overrides earlier):
 * 1. Default values from schema
 * 2. Config file (explicit path or auto-discovered)
 * 3. Environment variables
 * 4. Programmatic overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  let fileConfig: PartialConfig = {};

  if (options.configPath) {
    const loaded = loadConfigFile(options.configPath);
    if (!loaded) {
      throw new Error(`Config file not found: ${options.configPath}`);
    }
    fileConfig = loaded;
  } else if (!options.skipDiscovery) {
    for (const path of DEFAULT_CONFIG_PATHS) {
      const loaded = loadConfigFile(path);
      if (loaded) {
        fileConfig = loaded;
        break;
      }
    }
  }

  const envConfig = options.skipEnv ? {} : loadEnvConfig();

  let merged = mergeConfigs(fileConfig, envConfig);
  if (options.overrides) {
    merged = mergeConfigs(merged, options.overrides);
  }

  // Validate and apply defaults
  const result = ConfigSchema.safeParse(merged);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `  ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}
