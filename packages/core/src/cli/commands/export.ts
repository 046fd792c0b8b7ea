/**
 * Export Command — Write the catalog manifest to a text file.
 */

import { resolve } from 'node:path';
import type { Command, CommandContext } from '../router.js';
import { extractFlag, extractBoolFlag } from '../utils.js';
import { openCatalog } from '../catalog.js';
import { defaultExportFileName, exportCatalogManifest } from '../../operations/manifest.js';
import { toErrorMessage } from '../../utils/errors.js';

const USAGE = `
Usage: audioshelf export [file] [options]

Writes every catalogued plugin, grouped by format, with sizes and locations.
The default file is plugins_manifest_<timestamp>.txt in the current directory.

Options:
      --config <path>    Config file path
  -h, --help             Show this help
`;

export const exportCommand: Command = {
  name: 'export',
  description: 'Export the catalog as a text manifest',
  usage: 'audioshelf export [file] [options]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      ctx.stdout.write(USAGE + '\n');
      return 0;
    }
    argv = helpResult.rest;

    const configResult = extractFlag(argv, 'config');
    argv = configResult.rest;

    const now = new Date();
    const target = resolve(argv[0] ?? defaultExportFileName(now));

    try {
      const { snapshot } = await openCatalog(configResult.value, ctx.stderr);
      const result = await exportCatalogManifest(snapshot.records, target, now);
      if (!result.success) {
        ctx.stderr.write(`Export failed: ${result.error}\n`);
        return 1;
      }
      ctx.stdout.write(`Exported ${String(snapshot.records.length)} plugin(s) to ${result.path}\n`);
      return 0;
    } catch (err) {
      ctx.stderr.write(`${toErrorMessage(err)}\n`);
      return 1;
    }
  },
};
