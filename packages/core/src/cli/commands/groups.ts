/**
 * Groups Command — Print the catalog grouped by manufacturer.
 */

import type { Command, CommandContext } from '../router.js';
import { extractFlag, extractBoolFlag, colorContext } from '../utils.js';
import { openCatalog } from '../catalog.js';
import { formatList } from '../../catalog/formats.js';
import { toErrorMessage } from '../../utils/errors.js';

const USAGE = `
Usage: audioshelf groups [options]

Options:
      --json             Output raw JSON
      --config <path>    Config file path
  -h, --help             Show this help
`;

export const groupsCommand: Command = {
  name: 'groups',
  description: 'List installed plugins grouped by manufacturer',
  usage: 'audioshelf groups [options]',

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
    const jsonResult = extractBoolFlag(argv, 'json');
    argv = jsonResult.rest;

    try {
      const { snapshot } = await openCatalog(configResult.value, ctx.stderr);

      if (jsonResult.value) {
        ctx.stdout.write(JSON.stringify({ groups: snapshot.groups }, null, 2) + '\n');
        return 0;
      }

      if (snapshot.groups.length === 0) {
        ctx.stdout.write('No plugins found.\n');
        return 0;
      }

      const c = colorContext(ctx.stdout);
      for (const group of snapshot.groups) {
        ctx.stdout.write(`${c.bold(group.name)} (${String(group.plugins.length)})\n`);
        for (const plugin of group.plugins) {
          const version = plugin.version ? ` ${c.dim(plugin.version)}` : '';
          ctx.stdout.write(`  • ${plugin.name}${version}  [${formatList(plugin)}]\n`);
        }
        ctx.stdout.write('\n');
      }
      return 0;
    } catch (err) {
      ctx.stderr.write(`${toErrorMessage(err)}\n`);
      return 1;
    }
  },
};
