export interface ContactReference {
  id: number;
  name: string;
  href: string | null;
}

export interface ConfigurationRecord {
  id: number;
  name: string;
  lastLoginName: string | null;
  active: boolean;
  contact: ContactReference | null;
}

export interface ContactRecord {
  id: number;
  firstName: string;
  lastName: string;
  title: string;
  defaultEmail: string;
  defaultPhone: string;
}

export interface GuessedName {
  firstName: string;
  lastName: string;
  /** First and last name joined by a space and trimmed; casing preserved. */
  fullName: string;
}

export interface NameGuess extends GuessedName {
  matchesRecordedContact: boolean;
  existsInDirectory: boolean;
}

export interface GuessedConfiguration {
  configuration: ConfigurationRecord;
  guess: NameGuess;
}

export type ReconcileStatus =
  | 'updated'
  | 'planned'
  | 'skipped_inactive'
  | 'already_current'
  | 'unresolved'
  | 'failed';

export interface ReconcileOutcome {
  configurationId: number;
  configurationName: string;
  status: ReconcileStatus;
  previousContactName: string | null;
  contactId?: number;
  contactName?: string;
  error?: string;
}

export interface RunIssues {
  warnings: string[];
  errors: string[];
}

export interface ReconciliationSummary {
  startedAt: string;
  completedAt: string;
  resumedFrom: string;
  dryRun: boolean;
  configurationsFetched: number;
  detailFailures: number;
  contactsFetched: number;
  guessesMade: number;
  guessesInDirectory: number;
  selected: number;
  updated: number;
  planned: number;
  skipped: number;
  alreadyCurrent: number;
  unresolved: number;
  failed: number;
  artifactsRemoved: boolean;
  outcomes: ReconcileOutcome[];
  issues: RunIssues;
}
