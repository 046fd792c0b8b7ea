/**
 * Fixed plugin install locations: system-wide, per-user and OS-bundled,
 * one directory per format.
 */

import { homedir } from 'node:os';
import { resolve } from 'node:path';

export const SEARCH_ROOTS: readonly string[] = [
  '/Library/Audio/Plug-Ins/VST',
  '/Library/Audio/Plug-Ins/VST3',
  '/Library/Audio/Plug-Ins/Components',
  '/Library/Audio/Plug-Ins/CLAP',
  '~/Library/Audio/Plug-Ins/VST',
  '~/Library/Audio/Plug-Ins/VST3',
  '~/Library/Audio/Plug-Ins/Components',
  '~/Library/Audio/Plug-Ins/CLAP',
  '/System/Library/Audio/Plug-Ins/VST',
  '/System/Library/Audio/Plug-Ins/VST3',
  '/System/Library/Audio/Plug-Ins/Components',
  '/System/Library/Audio/Plug-Ins/CLAP',
];

/** Directory names that hold plugins of one format and say nothing about the vendor. */
export const FORMAT_BUCKET_DIRECTORIES: ReadonlySet<string> = new Set([
  'VST3',
  'VST',
  'Components',
  'CLAP',
  'AU',
]);

/**
 * Expand ~ to home directory
 */
export function expandPath(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return resolve(path);
}
