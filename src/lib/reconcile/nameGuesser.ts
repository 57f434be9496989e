import type {
  ConfigurationRecord,
  GuessedName,
  NameGuess,
} from '../../interfaces/reconcile.interfaces.js';
import type { ContactDirectory } from './contactDirectory.js';

const CAMEL_BOUNDARY = /(?=\p{Lu})/u;

export const EMPTY_GUESS: NameGuess = Object.freeze({
  firstName: '',
  lastName: '',
  fullName: '',
  matchesRecordedContact: false,
  existsInDirectory: false,
});

/**
 * Case-folded form used for every name comparison. Upper-casing first folds
 * expansions such as `ß` -> `SS` before lower-casing.
 */
export function foldName(name: string): string {
  return name.trim().toUpperCase().toLowerCase();
}

/**
 * Derives a person name from a domain-qualified login such as `CORP\JohnSmith`.
 *
 * The username after the last backslash is split before each uppercase letter:
 * the first segment is the first name, the remaining segments form the last name.
 * This only works for camel-cased usernames; `jsmith`, `john.smith`, names with
 * digits or hyphenated surnames, and leading initials (`JSmith`) guess wrong.
 */
export function guessNameFromLogin(loginName: string | null | undefined): GuessedName | null {
  if (!loginName) {
    return null;
  }

  const separator = loginName.lastIndexOf('\\');
  if (separator === -1) {
    return null;
  }

  const segments = loginName
    .slice(separator + 1)
    .split(CAMEL_BOUNDARY)
    .filter((segment) => segment.length > 0);

  if (segments.length === 0) {
    return null;
  }

  const [firstName, ...rest] = segments;
  const lastName = rest.join(' ');
  const fullName = `${firstName} ${lastName}`.trim();

  return fullName.length > 0 ? { firstName, lastName, fullName } : null;
}

export function evaluateGuess(configuration: ConfigurationRecord, directory: ContactDirectory): NameGuess {
  const guessed = guessNameFromLogin(configuration.lastLoginName);
  if (!guessed) {
    return { ...EMPTY_GUESS };
  }

  const folded = foldName(guessed.fullName);
  const recorded = configuration.contact?.name;

  return {
    ...guessed,
    existsInDirectory: directory.has(guessed.fullName),
    matchesRecordedContact: recorded !== undefined && foldName(recorded) === folded,
  };
}

/**
 * Active configurations whose guess is a known contact other than the recorded one.
 */
export function isSelectedForUpdate(configuration: ConfigurationRecord, guess: NameGuess): boolean {
  return guess.existsInDirectory && !guess.matchesRecordedContact && configuration.active;
}
