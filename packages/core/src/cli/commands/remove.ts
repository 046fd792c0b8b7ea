/**
 * Remove Command — Move plugins to the recycle bin, or delete them.
 *
 * Without --yes nothing is touched: the command lists what would go.
 */

import { RemovalMode, type PluginRecord } from '@audioshelf/shared';
import type { Command, CommandContext } from '../router.js';
import { extractFlag, extractBoolFlag, colorContext, Spinner } from '../utils.js';
import { openCatalog, selectByName } from '../catalog.js';
import { removePlugins } from '../../operations/removal.js';
import { toErrorMessage } from '../../utils/errors.js';

const USAGE = `
Usage: audioshelf remove <name...> [options]

Every installed format of each named plugin is removed.

Options:
      --yes              Perform the removal (otherwise only list what would go)
      --permanent        Delete instead of moving to the recycle bin
      --config <path>    Config file path
  -h, --help             Show this help

Environment:
  AUDIOSHELF_REMOVAL_MODE   moveToRecycleBin (default) or permanentDelete
`;

function writePlan(ctx: CommandContext, records: readonly PluginRecord[], mode: RemovalMode): void {
  const verb = mode === RemovalMode.PERMANENT_DELETE ? 'permanently delete' : 'move to the recycle bin';
  ctx.stdout.write(`Would ${verb} ${String(records.length)} plugin(s):\n`);
  for (const record of records) {
    ctx.stdout.write(`  • ${record.name}\n`);
    for (const path of record.paths) ctx.stdout.write(`      ${path}\n`);
  }
  ctx.stdout.write('\nRun again with --yes to proceed.\n');
}

export const removeCommand: Command = {
  name: 'remove',
  aliases: ['rm'],
  description: 'Remove plugins (recycle bin by default)',
  usage: 'audioshelf remove <name...> [options]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value || argv.length === 0) {
      ctx.stdout.write(USAGE + '\n');
      return 0;
    }
    argv = helpResult.rest;

    const configResult = extractFlag(argv, 'config');
    argv = configResult.rest;
    const yesResult = extractBoolFlag(argv, 'yes', 'y');
    argv = yesResult.rest;
    const permanentResult = extractBoolFlag(argv, 'permanent');
    argv = permanentResult.rest;

    if (argv.length === 0) {
      ctx.stderr.write('Usage: audioshelf remove <name...>\n');
      return 1;
    }

    try {
      const { config, logger, store } = await openCatalog(configResult.value, ctx.stderr);
      const { selected, missing } = selectByName(store, argv);

      if (missing.length > 0) {
        ctx.stderr.write(`Plugin not found: ${missing.join(', ')}\n`);
        return 1;
      }

      const mode = permanentResult.value ? RemovalMode.PERMANENT_DELETE : config.removal.mode;
      if (!yesResult.value) {
        writePlan(ctx, selected, mode);
        return 0;
      }

      const spinner = new Spinner(ctx.stderr);
      spinner.start('Removing plugins...');
      const report = await removePlugins(selected, mode, {
        logger,
        onProgress: (progress) => {
          spinner.update(progress.message);
        },
      });
      spinner.stop(report.message, report.success);

      const c = colorContext(ctx.stdout);
      for (const result of report.results) {
        const status = result.success ? c.green('removed') : c.red('failed ');
        ctx.stdout.write(`  ${status}  ${result.record.name}\n`);
        for (const error of result.errors) ctx.stderr.write(`${error}\n`);
      }
      return report.success ? 0 : 1;
    } catch (err) {
      ctx.stderr.write(`${toErrorMessage(err)}\n`);
      return 1;
    }
  },
};
