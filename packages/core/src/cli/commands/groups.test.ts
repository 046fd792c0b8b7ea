import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import plist from 'plist';
import { groupsCommand } from './groups.js';

const sandbox = vi.hoisted(() => ({ dir: '' }));

// Home and the system plugin folders resolve inside the per-test sandbox
vi.mock('../../catalog/search-roots.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../catalog/search-roots.js')>();
  const { join: joinPath } = await import('node:path');
  return {
    ...actual,
    expandPath: (path: string): string => {
      if (!sandbox.dir) throw new Error('sandbox directory not set');
      if (path === '~') return joinPath(sandbox.dir, 'home');
      if (path.startsWith('~/')) return joinPath(sandbox.dir, 'home', path.slice(2));
      if (path.startsWith('/Library/') || path.startsWith('/System/')) return joinPath(sandbox.dir, path);
      return actual.expandPath(path);
    },
  };
});

function createStreams() {
  let stdoutBuf = '';
  let stderrBuf = '';
  const stdout = {
    write: (s: string) => {
      stdoutBuf += s;
      return true;
    },
  } as NodeJS.WritableStream;
  const stderr = {
    write: (s: string) => {
      stderrBuf += s;
      return true;
    },
  } as NodeJS.WritableStream;
  return { stdout, stderr, getStdout: () => stdoutBuf, getStderr: () => stderrBuf };
}

function write(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

describe('groups command', () => {
  let home: string;
  const originalEnv = process.env;

  beforeEach(() => {
    sandbox.dir = mkdtempSync(join(tmpdir(), 'audioshelf-groups-'));
    home = join(sandbox.dir, 'home');
    mkdirSync(home);
    process.env = { ...originalEnv, AUDIOSHELF_LOG_LEVEL: 'silent' };
    const plugIns = join(home, 'Library', 'Audio', 'Plug-Ins');
    write(
      join(plugIns, 'VST3', 'Foo.vst3', 'Contents', 'Info.plist'),
      plist.build({ CFBundleIdentifier: 'com.Acme.Foo', CFBundleShortVersionString: '2.1' })
    );
    write(join(plugIns, 'VST', 'Foo.vst'), 'x');
    write(join(plugIns, 'CLAP', 'toontrack', 'Drums.clap'), 'x');
    write(join(plugIns, 'Components', 'Verb.component', 'Contents', 'MacOS', 'Verb'), 'x');
  });

  afterEach(() => {
    process.env = originalEnv;
    rmSync(sandbox.dir, { recursive: true, force: true });
    sandbox.dir = '';
  });

  it('should print help with --help', async () => {
    const { stdout, stderr, getStdout } = createStreams();
    const code = await groupsCommand.run({ argv: ['--help'], stdout, stderr });
    expect(code).toBe(0);
    expect(getStdout()).toContain('audioshelf groups');
  });

  it('should print plugins grouped by manufacturer', async () => {
    const { stdout, stderr, getStdout } = createStreams();
    const code = await groupsCommand.run({ argv: [], stdout, stderr });

    expect(code).toBe(0);
    expect(getStdout()).toBe(
      [
        'Acme (1)',
        '  • Foo 2.1  [VST2, VST3]',
        '',
        'Toontrack (1)',
        '  • Drums  [CLAP]',
        '',
        'Unknown Manufacturer (1)',
        '  • Verb  [AU]',
        '',
        '',
      ].join('\n')
    );
  });

  it('should output JSON with --json', async () => {
    const { stdout, stderr, getStdout } = createStreams();
    const code = await groupsCommand.run({ argv: ['--json'], stdout, stderr });

    expect(code).toBe(0);
    const parsed = JSON.parse(getStdout()) as { groups: { name: string; plugins: { name: string }[] }[] };
    expect(parsed.groups.map((g) => g.name)).toEqual(['Acme', 'Toontrack', 'Unknown Manufacturer']);
    expect(parsed.groups[1]?.plugins.map((p) => p.name)).toEqual(['Drums']);
  });
});
