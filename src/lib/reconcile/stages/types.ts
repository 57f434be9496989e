import type { ConnectWiseApi } from '../../../interfaces/connectwise.interfaces.js';
import type {
  ConfigurationRecord,
  ContactRecord,
  GuessedConfiguration,
  ReconcileOutcome,
} from '../../../interfaces/reconcile.interfaces.js';
import type { SnapshotStore } from '../../snapshots/SnapshotStore.js';
import type { IssueCollector } from '../issueCollector.js';

export const STAGE_ORDER = ['configurations', 'contacts', 'guesses', 'reconcile', 'cleanup'] as const;
export const RESUMABLE_STAGES = ['configurations', 'contacts', 'guesses', 'reconcile'] as const;

export type StageName = (typeof STAGE_ORDER)[number];
export type ResumableStage = (typeof RESUMABLE_STAGES)[number];

export function isResumableStage(value: string): value is ResumableStage {
  return RESUMABLE_STAGES.some((stage) => stage === value);
}

export interface FetchStats {
  configurationsListed: number;
  configurationsFetched: number;
  detailFailures: number;
  contactsFetched: number;
  guessesMade: number;
  guessesInDirectory: number;
}

export interface StageContext {
  api: ConnectWiseApi;
  store: SnapshotStore;
  issues: IssueCollector;
  stats: FetchStats;
  companyIdentifier: string;
  pageSize: number;
  dryRun: boolean;
}

export interface ConfigurationSet {
  configurations: ConfigurationRecord[];
}

export interface DirectorySnapshot {
  configurations: ConfigurationRecord[];
  contacts: ContactRecord[];
}

export interface GuessSet {
  guesses: GuessedConfiguration[];
  contacts: ContactRecord[];
}

export interface ReconcileReport {
  outcomes: ReconcileOutcome[];
}

export interface CleanupResult {
  outcomes: ReconcileOutcome[];
  artifactsRemoved: boolean;
}

export interface PipelineStage<I, O> {
  readonly name: StageName;
  run(input: I, context: StageContext): Promise<O>;
}

/**
 * A stage whose output is written to the working directory so a later run can
 * resume from it without repeating the stage's API calls.
 */
export interface SnapshotStage<I, O> extends PipelineStage<I, O> {
  persist(output: O, store: SnapshotStore): Promise<void>;
  load(store: SnapshotStore): Promise<O>;
}

export const createFetchStats = (): FetchStats => ({
  configurationsListed: 0,
  configurationsFetched: 0,
  detailFailures: 0,
  contactsFetched: 0,
  guessesMade: 0,
  guessesInDirectory: 0,
});
