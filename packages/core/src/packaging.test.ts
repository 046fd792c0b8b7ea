import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { VERSION } from './version.js';

const repoRoot = fileURLToPath(new URL('../../../', import.meta.url));

const ManifestSchema = z.object({
  version: z.string(),
  bin: z.record(z.string()).optional(),
  workspaces: z.array(z.string()).optional(),
  exports: z
    .object({ '.': z.object({ types: z.string(), default: z.string() }) })
    .optional(),
});

function readManifest(relativePath: string): z.infer<typeof ManifestSchema> {
  return ManifestSchema.parse(JSON.parse(readFileSync(repoRoot + relativePath, 'utf-8')));
}

/** dist/foo/index.js -> src/foo/index.ts */
function sourceOf(builtPath: string): string {
  return builtPath.replace(/(^|\/)dist\//, '$1src/').replace(/\.js$/, '.ts');
}

describe('packaging', () => {
  const root = readManifest('package.json');

  it('keeps the CLI version in step with package.json', () => {
    expect(VERSION).toBe(root.version);
  });

  it('points the binary at the compiled CLI entry point', () => {
    const bin = root.bin?.['audioshelf'];
    expect(bin).toBe('packages/core/dist/cli.js');
    const source = repoRoot + sourceOf(bin ?? '');
    expect(existsSync(source)).toBe(true);
    expect(readFileSync(source, 'utf-8').startsWith('#!/usr/bin/env node\n')).toBe(true);
  });

  it('exports compiled JavaScript from every workspace at run time', () => {
    expect(root.workspaces).toEqual(['packages/shared', 'packages/core']);
    for (const workspace of root.workspaces ?? []) {
      const entry = readManifest(`${workspace}/package.json`).exports?.['.'];
      expect(entry?.default).toMatch(/^\.\/dist\/.*\.js$/);
      expect(entry?.types).toBe(sourceOf(entry?.default ?? ''));
      expect(existsSync(`${repoRoot}${workspace}/${entry?.types ?? ''}`)).toBe(true);
    }
  });
});
