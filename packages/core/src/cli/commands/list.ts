/**
 * List Command — Scan the plugin folders and print the catalog.
 */

import type { Command, CommandContext } from '../router.js';
import { extractFlag, extractBoolFlag, formatTable } from '../utils.js';
import { openCatalog, parseFormat } from '../catalog.js';
import { formatList } from '../../catalog/formats.js';
import { multiFormat, search } from '../../catalog/query.js';
import { toErrorMessage } from '../../utils/errors.js';

const USAGE = `
Usage: audioshelf list [options]

Options:
  -f, --format <fmt>     Only plugins installed in this format (VST2, VST3, AU, CLAP)
      --multi            Only plugins installed in more than one format
  -s, --search <text>    Only plugins whose name contains text (any case)
      --json             Output raw JSON
      --config <path>    Config file path
  -h, --help             Show this help
`;

export const listCommand: Command = {
  name: 'list',
  aliases: ['ls'],
  description: 'Scan plugin folders and list installed plugins',
  usage: 'audioshelf list [options]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      ctx.stdout.write(USAGE + '\n');
      return 0;
    }
    argv = helpResult.rest;

    const formatResult = extractFlag(argv, 'format', 'f');
    argv = formatResult.rest;
    const searchResult = extractFlag(argv, 'search', 's');
    argv = searchResult.rest;
    const configResult = extractFlag(argv, 'config');
    argv = configResult.rest;
    const multiResult = extractBoolFlag(argv, 'multi');
    argv = multiResult.rest;
    const jsonResult = extractBoolFlag(argv, 'json');
    argv = jsonResult.rest;

    const format = formatResult.value === undefined ? null : parseFormat(formatResult.value);
    if (formatResult.value !== undefined && !format) {
      ctx.stderr.write(`Unknown format: ${formatResult.value}\n`);
      return 1;
    }

    try {
      const { store } = await openCatalog(configResult.value, ctx.stderr);

      let records = store.filterByFormat(format);
      if (multiResult.value) records = multiFormat(records);
      if (searchResult.value !== undefined) records = search(records, searchResult.value);

      if (jsonResult.value) {
        ctx.stdout.write(JSON.stringify({ plugins: records, total: records.length }, null, 2) + '\n');
        return 0;
      }

      if (records.length === 0) {
        ctx.stdout.write('No plugins found.\n');
        return 0;
      }

      const rows = records.map((record) => ({
        name: record.name,
        manufacturer: record.manufacturer ?? '',
        version: record.version ?? '',
        formats: formatList(record),
      }));
      ctx.stdout.write(formatTable(rows, ['name', 'manufacturer', 'version', 'formats']) + '\n');
      ctx.stdout.write(`\nTotal: ${String(records.length)}\n`);
      return 0;
    } catch (err) {
      ctx.stderr.write(`${toErrorMessage(err)}\n`);
      return 1;
    }
  },
};
