#!/usr/bin/env node
import { Command } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerRunCommand } from './commands/run.js';
import { registerTagCommand } from './commands/tag.js';
import { registerSyncCommand } from './commands/sync.js';
import { registerHistoryCommand } from './commands/history.js';
import { registerVaultCommand } from './commands/vault.js';
import { closeDb } from '../workspace/db.js';
import { errorMessage } from '../shared/errors.js';
import { setLogLevel } from '../shared/logger.js';

const program = new Command();

program
  .name('tagflow')
  .description('tagflow – build, publish and GitOps-deploy one commit as a pinned container image')
  .version('0.1.0')
  .option('--verbose', 'Log debug output')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts<{ verbose?: boolean }>().verbose) setLogLevel('debug');
  });

registerInitCommand(program);
registerRunCommand(program);
registerTagCommand(program);
registerSyncCommand(program);
registerHistoryCommand(program);
registerVaultCommand(program);

program
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error('Error:', errorMessage(err));
    process.exitCode = 1;
  })
  .finally(closeDb);
