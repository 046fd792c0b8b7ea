/**
 * Configuration Types for Audioshelf
 *
 * Search roots are deliberately absent: they are fixed per platform
 * convention and not configurable at runtime.
 */

import { z } from 'zod';
import { RemovalModeSchema } from './plugin.js';

// Safe path validation (no NUL bytes)
const SafePathSchema = z.string()
  .min(1)
  .max(4096)
  .refine((path) => !path.includes('\0'), { message: 'Path contains forbidden characters' });

// Logging configuration
export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  output: z.array(z.discriminatedUnion('type', [
    z.object({
      type: z.literal('file'),
      path: SafePathSchema,
    }),
    z.object({
      type: z.literal('stdout'),
      format: z.enum(['json', 'pretty']).default('pretty'),
    }),
  ])).default([{ type: 'stdout', format: 'pretty' }]),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const ScanConfigSchema = z.object({
  // Process directory entries in sorted name order so repeated scans agree
  deterministicOrder: z.boolean().default(true),
});

export type ScanConfig = z.infer<typeof ScanConfigSchema>;

export const RemovalConfigSchema = z.object({
  mode: RemovalModeSchema.default('moveToRecycleBin'),
});

export type RemovalConfig = z.infer<typeof RemovalConfigSchema>;

export const BackupConfigSchema = z.object({
  destination: SafePathSchema.optional(),
});

export type BackupConfig = z.infer<typeof BackupConfigSchema>;

export const ConfigSchema = z.object({
  version: z.literal('1.0').default('1.0'),
  logging: LoggingConfigSchema.default({}),
  scan: ScanConfigSchema.default({}),
  removal: RemovalConfigSchema.default({}),
  backup: BackupConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

// Partial config for merging (all fields optional)
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.input<typeof PartialConfigSchema>;
