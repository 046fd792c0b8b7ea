import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import plist from 'plist';
import type { PlistValue } from 'plist';
import { PluginFormat } from '@audioshelf/shared';
import { MetadataExtractor, versionFromFilename } from './metadata.js';

function writePlist(path: string, entries: Record<string, PlistValue>): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, plist.build(entries));
}

describe('versionFromFilename', () => {
  it('takes the first dotted numeric token of the stem', () => {
    expect(versionFromFilename('/Library/Audio/Plug-Ins/VST/Comp 1.2.3.vst')).toBe('1.2.3');
    expect(versionFromFilename('/x/Delay v2 3.0 beta.vst')).toBe('3.0');
  });

  it('returns null when no token looks like a version', () => {
    expect(versionFromFilename('/x/Comp.vst')).toBeNull();
    expect(versionFromFilename('/x/Comp v2.vst')).toBeNull();
  });
});

describe('MetadataExtractor', () => {
  let tmpDir: string;
  let extractor: MetadataExtractor;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'audioshelf-meta-'));
    extractor = new MetadataExtractor();
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reads vendor from the bundle identifier and the short version', async () => {
    const bundle = join(tmpDir, 'VST3', 'Foo.vst3');
    writePlist(join(bundle, 'Contents', 'Info.plist'), {
      CFBundleIdentifier: 'com.Acme.Foo',
      CFBundleShortVersionString: '2.1',
      CFBundleVersion: '2.1.0.44',
    });

    expect(await extractor.extract(bundle, PluginFormat.VST3)).toEqual({
      manufacturer: 'Acme',
      version: '2.1',
    });
  });

  it('reads a CLAP descriptor', async () => {
    const bundle = join(tmpDir, 'CLAP', 'Synth.clap');
    mkdirSync(bundle, { recursive: true });
    writeFileSync(join(bundle, 'clap.json'), JSON.stringify({ manufacturer: 'waves', version: '1.0' }));

    expect(await extractor.extract(bundle, PluginFormat.CLAP)).toEqual({
      manufacturer: 'Waves',
      version: '1.0',
    });
  });

  it('reads only a version from a flat VST2 file name', async () => {
    const file = join(tmpDir, 'VST', 'Comp 1.2.3.vst');
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, 'binary');

    expect(await extractor.extract(file, PluginFormat.VST2)).toEqual({
      manufacturer: null,
      version: '1.2.3',
    });
  });

  it('falls back to the vendor directory name', async () => {
    const bundle = join(tmpDir, 'VST3', 'toontrack', 'Drums.vst3');
    mkdirSync(bundle, { recursive: true });

    expect(await extractor.extract(bundle, PluginFormat.VST3)).toEqual({
      manufacturer: 'Toontrack',
      version: null,
    });
  });

  it('uses explicit manufacturer keys when the identifier has no vendor', async () => {
    const bundle = join(tmpDir, 'Components', 'Kit.component');
    writePlist(join(bundle, 'Contents', 'Info.plist'), {
      CFBundleIdentifier: 'de.drumco.kit',
      Manufacturer: 'DrumCo',
      CFBundleVersion: '4',
    });

    expect(await extractor.extract(bundle, PluginFormat.AU)).toEqual({
      manufacturer: 'DrumCo',
      version: '4',
    });
  });

  it('ignores identifier vendors of two characters or fewer', async () => {
    const bundle = join(tmpDir, 'VST3', 'Tiny.vst3');
    writePlist(join(bundle, 'Contents', 'Info.plist'), {
      CFBundleIdentifier: 'com.ab.tiny',
      Vendor: 'Tiny Works',
    });

    const metadata = await extractor.extract(bundle, PluginFormat.VST3);
    expect(metadata.manufacturer).toBe('Tiny Works');
  });

  it('reads the vendor from Audio Unit component names', async () => {
    const bundle = join(tmpDir, 'Components', 'Verb.component');
    writePlist(join(bundle, 'Contents', 'Info.plist'), {
      AudioComponents: [{ name: 'Bright Sound: Verb', type: 'aufx' }],
    });

    const metadata = await extractor.extract(bundle, PluginFormat.AU);
    expect(metadata.manufacturer).toBe('Bright Sound');
  });

  it('reads the vendor from an info string after the copyright notice', async () => {
    const bundle = join(tmpDir, 'VST3', 'Echo.vst3');
    writePlist(join(bundle, 'Contents', 'Info.plist'), {
      CFBundleGetInfoString: 'Copyright 2019 Acme Audio Ltd',
    });

    const metadata = await extractor.extract(bundle, PluginFormat.VST3);
    expect(metadata.manufacturer).toBe('Acme Audio');
  });

  it('skips an info string that leads with the product name', async () => {
    const bundle = join(tmpDir, 'VST3', 'Verb.vst3');
    writePlist(join(bundle, 'Contents', 'Info.plist'), {
      CFBundleName: 'Verb',
      CFBundleGetInfoString: 'Verb 1.0 by Bright Sound',
    });

    const metadata = await extractor.extract(bundle, PluginFormat.VST3);
    expect(metadata.manufacturer).toBe('Bright Sound');
  });

  it('merges fields from later property list candidates', async () => {
    const bundle = join(tmpDir, 'VST3', 'Split.vst3');
    writePlist(join(bundle, 'Contents', 'Info.plist'), { CFBundleIdentifier: 'com.acme.split' });
    writePlist(join(bundle, 'Contents', 'Resources', 'Info.plist'), { CFBundleVersion: '3.0' });

    expect(await extractor.extract(bundle, PluginFormat.VST3)).toEqual({
      manufacturer: 'Acme',
      version: '3.0',
    });
  });

  it('treats a binary property list as missing', async () => {
    const bundle = join(tmpDir, 'VST3', 'acme', 'Bin.vst3');
    mkdirSync(join(bundle, 'Contents'), { recursive: true });
    writeFileSync(join(bundle, 'Contents', 'Info.plist'), 'bplist00\u0000');

    expect(await extractor.extract(bundle, PluginFormat.VST3)).toEqual({
      manufacturer: 'Acme',
      version: null,
    });
  });

  it('returns the display name from the property list', async () => {
    const bundle = join(tmpDir, 'VST3', 'fv.vst3');
    writePlist(join(bundle, 'Contents', 'Info.plist'), { CFBundleName: 'Fancy Verb' });

    expect(await extractor.displayName(bundle)).toBe('Fancy Verb');
    expect(await extractor.displayName(join(tmpDir, 'VST3', 'missing.vst3'))).toBeNull();
  });
});
