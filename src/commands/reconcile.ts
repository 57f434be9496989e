import { Command, Option } from 'commander';

import logger from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { loadReconcileConfig, logConfiguration } from '../config/startupValidation.js';
import type { ConnectWiseApi, ConnectWiseConnectionConfig } from '../interfaces/connectwise.interfaces.js';
import type { ReconciliationSummary } from '../interfaces/reconcile.interfaces.js';
import { ConnectWiseClient } from '../lib/integrations/connectwise/connectWiseClient.js';
import { ReconciliationPipeline } from '../lib/reconcile/pipeline.js';
import { RESUMABLE_STAGES, isResumableStage } from '../lib/reconcile/stages/types.js';
import { SnapshotStore } from '../lib/snapshots/SnapshotStore.js';

export interface ReconcileCommandOptions {
  company?: string;
  companyId?: string;
  publicKey?: string;
  privateKey?: string;
  clientId?: string;
  baseUrl?: string;
  apiVersion?: string;
  pageSize?: string;
  workDir?: string;
  resumeFrom?: string;
  dryRun: boolean;
  keepArtifacts: boolean;
}

export interface ReconcileCommandDependencies {
  createApi: (connection: ConnectWiseConnectionConfig) => ConnectWiseApi;
}

const defaultDependencies: ReconcileCommandDependencies = {
  createApi: (connection) => new ConnectWiseClient(connection),
};

function printSummary(summary: ReconciliationSummary): void {
  logger.info('Reconciliation summary', {
    resumedFrom: summary.resumedFrom,
    dryRun: summary.dryRun,
    configurationsFetched: summary.configurationsFetched,
    detailFailures: summary.detailFailures,
    contactsFetched: summary.contactsFetched,
    guessesMade: summary.guessesMade,
    guessesInDirectory: summary.guessesInDirectory,
    selected: summary.selected,
    updated: summary.updated,
    planned: summary.planned,
    skipped: summary.skipped,
    alreadyCurrent: summary.alreadyCurrent,
    unresolved: summary.unresolved,
    failed: summary.failed,
    artifactsRemoved: summary.artifactsRemoved,
  });

  for (const outcome of summary.outcomes) {
    const change = `${outcome.previousContactName ?? '(none)'} -> ${outcome.contactName ?? '?'}`;
    const line = `  #${outcome.configurationId} ${outcome.configurationName}: ${outcome.status} (${change})`;
    if (outcome.status === 'failed' || outcome.status === 'unresolved') {
      logger.warn(outcome.error ? `${line} ${outcome.error}` : line);
    } else {
      logger.info(line);
    }
  }
}

export function registerReconcileCommand(
  program: Command,
  dependencies: ReconcileCommandDependencies = defaultDependencies
) {
  program
    .command('reconcile')
    .description('Guess configuration owners from login names and repoint mismatched contacts')
    .option('--company <identifier>', 'Company identifier to reconcile (CW_COMPANY_IDENTIFIER)')
    .option('--company-id <id>', 'Login company id for credentials (CW_COMPANY_ID)')
    .option('--public-key <key>', 'API public key (CW_PUBLIC_KEY)')
    .option('--private-key <key>', 'API private key (CW_PRIVATE_KEY)')
    .option('--client-id <id>', 'Client id header value (CW_CLIENT_ID)')
    .option('--base-url <url>', 'API base URL (CW_BASE_URL)')
    .option('--api-version <mediaType>', 'Accept media type (CW_API_VERSION)')
    .option('--page-size <count>', 'Records per page (CW_PAGE_SIZE)')
    .option('--work-dir <path>', 'Snapshot directory (RECONCILE_WORK_DIR)')
    .addOption(
      new Option('--resume-from <stage>', 'Start at this stage, loading earlier stages from their snapshots').choices(
        RESUMABLE_STAGES
      )
    )
    .option('--dry-run', 'Check and audit updates without sending them', false)
    .option('--keep-artifacts', 'Keep snapshots and audit files after the run', false)
    .action(async (opts: ReconcileCommandOptions) => {
      try {
        const config = loadReconcileConfig({
          CW_COMPANY_IDENTIFIER: opts.company,
          CW_COMPANY_ID: opts.companyId,
          CW_PUBLIC_KEY: opts.publicKey,
          CW_PRIVATE_KEY: opts.privateKey,
          CW_CLIENT_ID: opts.clientId,
          CW_BASE_URL: opts.baseUrl,
          CW_API_VERSION: opts.apiVersion,
          CW_PAGE_SIZE: opts.pageSize,
          RECONCILE_WORK_DIR: opts.workDir,
        });
        logConfiguration(config);

        const pipeline = new ReconciliationPipeline({
          api: dependencies.createApi(config.connection),
          store: new SnapshotStore(config.workDir),
          companyIdentifier: config.companyIdentifier,
          pageSize: config.pageSize,
        });

        const summary = await pipeline.run({
          resumeFrom: opts.resumeFrom && isResumableStage(opts.resumeFrom) ? opts.resumeFrom : undefined,
          dryRun: opts.dryRun,
          keepArtifacts: opts.keepArtifacts,
        });

        if (program.opts().json) {
          console.log(JSON.stringify(summary, null, 2));
        } else {
          printSummary(summary);
        }
      } catch (error) {
        logger.error(`Reconciliation aborted: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
