import { Command } from 'commander';

import { setLogLevel } from './core/logger.js';
import { registerCleanCommand } from './commands/clean.js';
import { registerGuessCommand } from './commands/guess.js';
import { registerReconcileCommand, type ReconcileCommandDependencies } from './commands/reconcile.js';

export const VERSION = '1.0.0';

export function buildProgram(dependencies?: ReconcileCommandDependencies): Command {
  const program = new Command();
  program
    .name('cw-contact-reconcile')
    .description('Reconcile PSA configuration contacts against the company contact directory')
    .version(VERSION)
    .option('--verbose', 'Enable verbose logging', false)
    .option('--json', 'JSON output when supported', false)
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts().verbose) {
        setLogLevel('debug');
      }
    });

  registerReconcileCommand(program, dependencies);
  registerGuessCommand(program);
  registerCleanCommand(program);

  return program;
}
