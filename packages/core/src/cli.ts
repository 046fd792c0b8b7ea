#!/usr/bin/env node
/**
 * Audioshelf CLI — Modular command router entry point.
 *
 * Usage:
 *   audioshelf                          # List installed plugins
 *   audioshelf list --format VST3       # Only VST3 plugins
 *   audioshelf groups                   # Grouped by manufacturer
 *   audioshelf export manifest.txt      # Text manifest of the catalog
 *   audioshelf remove Foo --yes         # Move Foo to the recycle bin
 *   audioshelf backup Foo --dest ~/Bak  # Copy Foo into a backup folder
 */

import { createRouter } from './cli/router.js';
import { listCommand } from './cli/commands/list.js';
import { groupsCommand } from './cli/commands/groups.js';
import { exportCommand } from './cli/commands/export.js';
import { removeCommand } from './cli/commands/remove.js';
import { backupCommand } from './cli/commands/backup.js';
import { VERSION } from './version.js';

const router = createRouter('list');

// Register all commands
router.register(listCommand);
router.register(groupsCommand);
router.register(exportCommand);
router.register(removeCommand);
router.register(backupCommand);

// Help command
router.register({
  name: 'help',
  description: 'Show available commands',
  usage: 'audioshelf help',
  async run() {
    router.printHelp(process.stdout);
    return 0;
  },
});

const first = process.argv[2];
if (first === '--version' || first === '-v') {
  process.stdout.write(`audioshelf ${VERSION}\n`);
} else {
  // Resolve and run
  const { command, rest } = router.resolve(process.argv);

  command
    .run({ argv: rest, stdout: process.stdout, stderr: process.stderr })
    .then((code) => {
      if (code !== 0) process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error('Fatal error:', err);
      process.exit(1);
    });
}
