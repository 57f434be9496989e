import logger from '../../../core/logger.js';
import type { GuessedConfiguration } from '../../../interfaces/reconcile.interfaces.js';
import type { SnapshotStore } from '../../snapshots/SnapshotStore.js';
import { GUESS_COLUMNS, decodeGuesses, encodeGuess } from '../../snapshots/snapshotCodecs.js';
import { ContactDirectory } from '../contactDirectory.js';
import { evaluateGuess, isSelectedForUpdate } from '../nameGuesser.js';
import { loadContacts } from './fetchContacts.js';
import type { DirectorySnapshot, GuessSet, SnapshotStage, StageContext } from './types.js';

export class GuessNamesStage implements SnapshotStage<DirectorySnapshot, GuessSet> {
  readonly name = 'guesses' as const;

  async run(input: DirectorySnapshot, context: StageContext): Promise<GuessSet> {
    const { stats } = context;
    const directory = new ContactDirectory(input.contacts);

    const guesses: GuessedConfiguration[] = input.configurations.map((configuration) => {
      const guess = evaluateGuess(configuration, directory);
      if (guess.fullName) {
        stats.guessesMade++;
        logger.debug('[Guesses] Guessed contact', {
          configurationId: configuration.id,
          lastLoginName: configuration.lastLoginName,
          guess: guess.fullName,
          existsInDirectory: guess.existsInDirectory,
          matchesRecordedContact: guess.matchesRecordedContact,
        });
      }
      if (guess.existsInDirectory) {
        stats.guessesInDirectory++;
      }
      return { configuration, guess };
    });

    logger.info('[Guesses] Done', {
      configurations: guesses.length,
      guessed: stats.guessesMade,
      inDirectory: stats.guessesInDirectory,
      selected: guesses.filter(({ configuration, guess }) => isSelectedForUpdate(configuration, guess)).length,
    });

    return { guesses, contacts: input.contacts };
  }

  async persist(output: GuessSet, store: SnapshotStore): Promise<void> {
    await store.writeTable('guesses', GUESS_COLUMNS, output.guesses.map(encodeGuess));
  }

  async load(store: SnapshotStore): Promise<GuessSet> {
    const rows = await store.readTable('guesses');
    const guesses = decodeGuesses(rows, store.pathFor('guesses'));
    return { guesses, contacts: await loadContacts(store) };
  }
}
