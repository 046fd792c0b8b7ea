/**
 * Backup Command — Copy plugins into a timestamped backup folder.
 */

import { resolve } from 'node:path';
import type { PluginRecord } from '@audioshelf/shared';
import type { Command, CommandContext } from '../router.js';
import { extractFlag, extractBoolFlag, Spinner } from '../utils.js';
import { openCatalog, selectByName } from '../catalog.js';
import { backupPlugins, validateBackupDestination } from '../../operations/backup.js';
import { calculateBackupSize, formatByteCount } from '../../operations/size.js';
import { toErrorMessage } from '../../utils/errors.js';

const USAGE = `
Usage: audioshelf backup <name...> [options]
       audioshelf backup --all [options]

Copies every installed format of each plugin into
<dest>/Plugin_Backup_<timestamp>/<FORMAT>/ and writes manifest.txt.

Options:
  -d, --dest <dir>       Destination directory (must exist)
      --all              Back up the whole catalog
      --config <path>    Config file path
  -h, --help             Show this help

Environment:
  AUDIOSHELF_BACKUP_DIR   Default destination directory
`;

export const backupCommand: Command = {
  name: 'backup',
  description: 'Back up plugins to a folder',
  usage: 'audioshelf backup <name...> [options]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value || argv.length === 0) {
      ctx.stdout.write(USAGE + '\n');
      return 0;
    }
    argv = helpResult.rest;

    const destResult = extractFlag(argv, 'dest', 'd');
    argv = destResult.rest;
    const configResult = extractFlag(argv, 'config');
    argv = configResult.rest;
    const allResult = extractBoolFlag(argv, 'all');
    argv = allResult.rest;

    if (!allResult.value && argv.length === 0) {
      ctx.stderr.write('Name at least one plugin, or pass --all.\n');
      return 1;
    }

    try {
      const { config, logger, store } = await openCatalog(configResult.value, ctx.stderr);

      const destinationFlag = destResult.value ?? config.backup.destination;
      if (!destinationFlag) {
        ctx.stderr.write('Backup destination not set. Use --dest or set AUDIOSHELF_BACKUP_DIR.\n');
        return 1;
      }
      const destination = resolve(destinationFlag);
      if (!(await validateBackupDestination(destination))) {
        ctx.stderr.write(`Backup destination is not a directory: ${destination}\n`);
        return 1;
      }

      let records: readonly PluginRecord[];
      if (allResult.value) {
        records = store.current.records;
      } else {
        const { selected, missing } = selectByName(store, argv);
        if (missing.length > 0) {
          ctx.stderr.write(`Plugin not found: ${missing.join(', ')}\n`);
          return 1;
        }
        records = selected;
      }

      if (records.length === 0) {
        ctx.stdout.write('No plugins to back up.\n');
        return 0;
      }

      const size = formatByteCount(await calculateBackupSize(records));
      ctx.stdout.write(`Backing up ${String(records.length)} plugin(s) (${size}) to ${destination}\n`);

      const spinner = new Spinner(ctx.stderr);
      spinner.start('Backing up plugins...');
      const report = await backupPlugins(records, destination, {
        logger,
        onProgress: (progress) => {
          spinner.update(progress.message);
        },
      });

      if (report.status === 'destination-failed') {
        spinner.stop(report.message, false);
        return 1;
      }
      spinner.stop(report.message, report.success);

      for (const result of report.results) {
        for (const error of result.errors) ctx.stderr.write(`${error}\n`);
      }
      if (!report.manifestWritten) ctx.stderr.write('Failed to create backup manifest\n');
      ctx.stdout.write(`Backup folder: ${report.folder}\n`);
      return report.success ? 0 : 1;
    } catch (err) {
      ctx.stderr.write(`${toErrorMessage(err)}\n`);
      return 1;
    }
  },
};
