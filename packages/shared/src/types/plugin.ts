/**
 * Plugin Catalog Types
 *
 * A PluginRecord is one logical plugin, possibly installed in several
 * formats. Records and groups are produced wholesale by a scan and replaced
 * by the next one.
 */

import { z } from 'zod';

export const PluginFormat = {
  VST2: 'VST2',
  VST3: 'VST3',
  AU: 'AU',
  CLAP: 'CLAP',
} as const;

export type PluginFormat = (typeof PluginFormat)[keyof typeof PluginFormat];

export const PluginFormatSchema = z.enum(['VST2', 'VST3', 'AU', 'CLAP']);

export const RemovalMode = {
  MOVE_TO_RECYCLE_BIN: 'moveToRecycleBin',
  PERMANENT_DELETE: 'permanentDelete',
} as const;

export type RemovalMode = (typeof RemovalMode)[keyof typeof RemovalMode];

export const RemovalModeSchema = z.enum(['moveToRecycleBin', 'permanentDelete']);

export interface PluginRecord {
  /** Assigned once per scan; not stable across scans. */
  readonly id: string;
  readonly name: string;
  /** Insertion order of discovery, no duplicates, never empty. */
  readonly formats: readonly PluginFormat[];
  readonly paths: readonly string[];
  readonly manufacturer: string | null;
  readonly version: string | null;
  readonly isSelected: boolean;
}

export interface PluginGroup {
  /** Manufacturer label, or UNKNOWN_MANUFACTURER. */
  readonly name: string;
  readonly plugins: readonly PluginRecord[];
}

export const UNKNOWN_MANUFACTURER = 'Unknown Manufacturer';
