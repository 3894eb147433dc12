#!/usr/bin/env tsx

import { Command } from 'commander';
import { registerProcessCommand } from './commands/process.js';
import { registerPollCommand } from './commands/poll.js';
import { registerMigrateCommand } from './commands/migrate.js';
import { registerAttemptsCommand } from './commands/attempts.js';
import { registerStatusCommand } from './commands/status.js';

// Server modules are imported lazily by the commands, after this default applies
process.env.LOG_LEVEL ??= 'warn';

const program = new Command();

program
  .name('lotrec')
  .description('Lot reconciler CLI: production events to ERP manufacturing orders')
  .version('1.0.0')
  .option('-v, --verbose', 'Show debug logs')
  .hook('preAction', (command) => {
    if (command.opts<{ verbose?: boolean }>().verbose) {
      process.env.LOG_LEVEL = 'debug';
    }
  });

// Local commands (talk to the ERP and database directly)
registerProcessCommand(program);
registerPollCommand(program);
registerMigrateCommand(program);

// Admin API commands
registerAttemptsCommand(program);
registerStatusCommand(program);

// Filter out bare '--' that npm injects when forwarding args
const args = process.argv.filter((a) => a !== '--');
program.parseAsync(args).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(msg);
  process.exit(1);
});
