import logger from '../../core/logger.js';
import type { ConnectWiseApi } from '../../interfaces/connectwise.interfaces.js';
import type {
  ReconcileOutcome,
  ReconcileStatus,
  ReconciliationSummary,
} from '../../interfaces/reconcile.interfaces.js';
import type { SnapshotStore } from '../snapshots/SnapshotStore.js';
import { createIssueCollector } from './issueCollector.js';
import { CleanupStage } from './stages/cleanup.js';
import { FetchConfigurationsStage } from './stages/fetchConfigurations.js';
import { FetchContactsStage } from './stages/fetchContacts.js';
import { GuessNamesStage } from './stages/guessNames.js';
import { ReconcileContactsStage } from './stages/reconcileContacts.js';
import {
  STAGE_ORDER,
  createFetchStats,
  type CleanupResult,
  type ConfigurationSet,
  type DirectorySnapshot,
  type GuessSet,
  type PipelineStage,
  type ReconcileReport,
  type ResumableStage,
  type SnapshotStage,
  type StageContext,
} from './stages/types.js';

export interface PipelineDependencies {
  api: ConnectWiseApi;
  store: SnapshotStore;
  companyIdentifier: string;
  pageSize: number;
}

export interface PipelineRunOptions {
  /** First stage to execute; earlier stages are loaded from their snapshots. */
  resumeFrom?: ResumableStage;
  dryRun?: boolean;
  keepArtifacts?: boolean;
}

export interface ReconciliationStages {
  configurations: SnapshotStage<void, ConfigurationSet>;
  contacts: SnapshotStage<ConfigurationSet, DirectorySnapshot>;
  guesses: SnapshotStage<DirectorySnapshot, GuessSet>;
  reconcile: PipelineStage<GuessSet, ReconcileReport>;
  cleanup: PipelineStage<ReconcileReport, CleanupResult>;
}

export function createDefaultStages(): ReconciliationStages {
  const configurations = new FetchConfigurationsStage();
  return {
    configurations,
    contacts: new FetchContactsStage(configurations),
    guesses: new GuessNamesStage(),
    reconcile: new ReconcileContactsStage(),
    cleanup: new CleanupStage(),
  };
}

function countStatus(outcomes: readonly ReconcileOutcome[], status: ReconcileStatus): number {
  return outcomes.filter((outcome) => outcome.status === status).length;
}

export class ReconciliationPipeline {
  constructor(
    private readonly dependencies: PipelineDependencies,
    private readonly stages: ReconciliationStages = createDefaultStages()
  ) {}

  async run(options: PipelineRunOptions = {}): Promise<ReconciliationSummary> {
    const startedAt = new Date().toISOString();
    const resumeFrom = options.resumeFrom ?? 'configurations';
    const start = STAGE_ORDER.indexOf(resumeFrom);
    const dryRun = options.dryRun ?? false;

    const context: StageContext = {
      ...this.dependencies,
      issues: createIssueCollector(),
      stats: createFetchStats(),
      dryRun,
    };

    logger.info('[Pipeline] Starting reconciliation', {
      companyIdentifier: context.companyIdentifier,
      workDir: context.store.rootDir,
      resumeFrom,
      dryRun,
    });

    // Each step pulls its input from the step before it, so resuming only
    // touches the snapshot directly upstream of the first executed stage.
    const configurations = () => this.step(this.stages.configurations, start, context, async () => undefined);
    const directory = () => this.step(this.stages.contacts, start, context, configurations);
    const guesses = () => this.step(this.stages.guesses, start, context, directory);

    const report = await this.stages.reconcile.run(await guesses(), context);

    let artifactsRemoved = false;
    if (options.keepArtifacts) {
      logger.info('[Pipeline] Keeping working directory', { path: context.store.rootDir });
    } else {
      ({ artifactsRemoved } = await this.stages.cleanup.run(report, context));
    }

    const { outcomes } = report;
    const { stats } = context;
    const summary: ReconciliationSummary = {
      startedAt,
      completedAt: new Date().toISOString(),
      resumedFrom: resumeFrom,
      dryRun,
      configurationsFetched: stats.configurationsFetched,
      detailFailures: stats.detailFailures,
      contactsFetched: stats.contactsFetched,
      guessesMade: stats.guessesMade,
      guessesInDirectory: stats.guessesInDirectory,
      selected: outcomes.length,
      updated: countStatus(outcomes, 'updated'),
      planned: countStatus(outcomes, 'planned'),
      skipped: countStatus(outcomes, 'skipped_inactive'),
      alreadyCurrent: countStatus(outcomes, 'already_current'),
      unresolved: countStatus(outcomes, 'unresolved'),
      failed: countStatus(outcomes, 'failed'),
      artifactsRemoved,
      outcomes,
      issues: context.issues.toResult(),
    };

    logger.info('[Pipeline] Reconciliation completed', {
      selected: summary.selected,
      updated: summary.updated,
      planned: summary.planned,
      skipped: summary.skipped,
      alreadyCurrent: summary.alreadyCurrent,
      unresolved: summary.unresolved,
      failed: summary.failed,
      warnings: summary.issues.warnings.length,
      errors: summary.issues.errors.length,
    });

    return summary;
  }

  private async step<I, O>(
    stage: SnapshotStage<I, O>,
    start: number,
    context: StageContext,
    input: () => Promise<I>
  ): Promise<O> {
    if (STAGE_ORDER.indexOf(stage.name) < start) {
      logger.info(`[Pipeline] Loading ${stage.name} snapshot`, { path: context.store.rootDir });
      return stage.load(context.store);
    }

    const output = await stage.run(await input(), context);
    await stage.persist(output, context.store);
    return output;
  }
}
