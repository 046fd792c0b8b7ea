import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { PluginFormat, type PluginRecord } from '@audioshelf/shared';
import {
  defaultExportFileName,
  exportCatalogManifest,
  formatBackupManifest,
  formatCatalogManifest,
  formatTimestamp,
} from './manifest.js';

const GENERATED_AT = new Date('2026-10-19T12:00:00.000Z');
const HEADER_RULE = '='.repeat(32);
const SECTION_RULE = '='.repeat(50);

function record(overrides: Partial<PluginRecord> & Pick<PluginRecord, 'name'>): PluginRecord {
  return {
    id: `id-${overrides.name}`,
    formats: [PluginFormat.VST3],
    paths: [],
    manufacturer: null,
    version: null,
    isSelected: false,
    ...overrides,
  };
}

describe('formatCatalogManifest', () => {
  it('lists plugins under their first format with details', () => {
    const verb = record({
      name: 'Verb',
      formats: [PluginFormat.VST3, PluginFormat.AU],
      paths: ['/p/Verb.vst3', '/p/Verb.component'],
      manufacturer: 'Bright Sound',
      version: '1.0',
    });
    const comp = record({ name: 'Comp', formats: [PluginFormat.VST2], paths: ['/p/Comp.vst'] });

    const text = formatCatalogManifest(
      [
        { record: verb, sizeBytes: 2048 },
        { record: comp, sizeBytes: 0 },
      ],
      GENERATED_AT
    );

    expect(text).toBe(
      [
        'Audio Plugin Manifest',
        'Generated: 2026-10-19T12:00:00.000Z',
        HEADER_RULE,
        '',
        'Total Plugins: 2',
        '',
        'AU PLUGINS (1)',
        SECTION_RULE,
        '',
        '  • Verb',
        '    Manufacturer: Bright Sound',
        '    Version: 1.0',
        '    Size: 2 KB',
        '    Formats: AU, VST3',
        '    Locations (2):',
        '      1. /p/Verb.vst3',
        '      2. /p/Verb.component',
        '',
        '',
        'VST2 PLUGINS (1)',
        SECTION_RULE,
        '',
        '  • Comp',
        '    Size: Zero KB',
        '    Formats: VST2',
        '    Location: /p/Comp.vst',
        '',
        '',
      ].join('\n')
    );
  });

  it('sorts plugins by name within a format', () => {
    const text = formatCatalogManifest(
      [
        { record: record({ name: 'Zed', paths: ['/p/Zed.vst3'] }), sizeBytes: 1 },
        { record: record({ name: 'Alpha', paths: ['/p/Alpha.vst3'] }), sizeBytes: 1 },
      ],
      GENERATED_AT
    );
    expect(text.indexOf('  • Alpha')).toBeLessThan(text.indexOf('  • Zed'));
    expect(text).toContain('VST3 PLUGINS (2)\n');
  });

  it('writes only the header for an empty catalog', () => {
    expect(formatCatalogManifest([], GENERATED_AT)).toBe(
      `Audio Plugin Manifest\nGenerated: 2026-10-19T12:00:00.000Z\n${HEADER_RULE}\n\nTotal Plugins: 0\n`
    );
  });
});

describe('formatBackupManifest', () => {
  it('groups copied files by format and sorts names stably', () => {
    const text = formatBackupManifest(
      [
        { format: PluginFormat.VST3, name: 'Verb', fileName: 'Verb.vst3' },
        { format: PluginFormat.AU, name: 'Verb', fileName: 'Verb.component' },
        { format: PluginFormat.VST3, name: 'Alpha', fileName: 'Alpha.vst3' },
        { format: PluginFormat.VST3, name: 'Verb', fileName: 'Verb_1.vst3' },
      ],
      GENERATED_AT
    );

    expect(text).toBe(
      [
        'Audio Plugin Backup Manifest',
        'Generated: 2026-10-19T12:00:00.000Z',
        HEADER_RULE,
        '',
        'AU PLUGINS (1 files)',
        SECTION_RULE,
        '',
        '  • Verb',
        '    File: Verb.component',
        '',
        '',
        'VST3 PLUGINS (3 files)',
        SECTION_RULE,
        '',
        '  • Alpha',
        '    File: Alpha.vst3',
        '  • Verb',
        '    File: Verb.vst3',
        '  • Verb',
        '    File: Verb_1.vst3',
        '',
        '',
      ].join('\n')
    );
  });
});

describe('formatTimestamp', () => {
  it('uses local time with zero padding', () => {
    expect(formatTimestamp(new Date(2026, 0, 5, 3, 4, 5))).toBe('2026-01-05_030405');
  });

  it('names the default export file', () => {
    expect(defaultExportFileName(new Date(2026, 9, 19, 14, 22, 33))).toBe(
      'plugins_manifest_2026-10-19_142233.txt'
    );
  });
});

describe('exportCatalogManifest', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'audioshelf-export-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('measures records and writes the manifest', async () => {
    const pluginPath = join(tmpDir, 'Comp.vst');
    writeFileSync(pluginPath, 'x'.repeat(1500));
    const target = join(tmpDir, 'manifest.txt');

    const result = await exportCatalogManifest(
      [record({ name: 'Comp', formats: [PluginFormat.VST2], paths: [pluginPath] })],
      target,
      GENERATED_AT
    );

    expect(result).toEqual({ success: true, path: target });
    const text = readFileSync(target, 'utf-8');
    expect(text).toContain('    Size: 2 KB\n');
    expect(text).toContain(`    Location: ${pluginPath}\n`);
  });

  it('reports a write failure', async () => {
    const result = await exportCatalogManifest([], join(tmpDir, 'missing', 'manifest.txt'), GENERATED_AT);
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error).toContain('ENOENT');
  });
});
