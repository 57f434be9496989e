import { Command } from 'commander';

import logger from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { OPTIONAL_CONFIGS } from '../config/startupValidation.js';
import { SnapshotStore } from '../lib/snapshots/SnapshotStore.js';

export function registerCleanCommand(program: Command) {
  program
    .command('clean')
    .description('Remove snapshots and audit files left by an interrupted or --keep-artifacts run')
    .option('--work-dir <path>', 'Snapshot directory (RECONCILE_WORK_DIR)')
    .action(async (opts: { workDir?: string }) => {
      const workDir = opts.workDir || process.env.RECONCILE_WORK_DIR || OPTIONAL_CONFIGS.RECONCILE_WORK_DIR.default;
      const store = new SnapshotStore(workDir);
      try {
        const removed = await store.clear();
        logger.info(removed ? `Removed ${store.rootDir}` : `Nothing to remove at ${store.rootDir}`);
      } catch (error) {
        logger.error(`Failed to remove ${store.rootDir}: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
