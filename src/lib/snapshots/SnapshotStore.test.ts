import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { MissingSnapshotError } from '../../core/errors.js';
import type { GuessedConfiguration } from '../../interfaces/reconcile.interfaces.js';
import { SnapshotStore } from './SnapshotStore.js';
import {
  ENRICHED_CONFIGURATION_COLUMNS,
  GUESS_COLUMNS,
  decodeContacts,
  decodeEnrichedConfigurations,
  decodeGuesses,
  encodeEnrichedConfiguration,
  encodeGuess,
} from './snapshotCodecs.js';

describe('SnapshotStore', () => {
  let baseDir: string;
  let store: SnapshotStore;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'reconcile-store-'));
    store = new SnapshotStore(join(baseDir, 'work'));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('writes a header row and quotes cells that need it', async () => {
    const file = await store.writeTable('contacts', ['id', 'firstName'], [{ id: 1, firstName: 'Smith, "JJ"' }]);

    expect(file).toBe(join(baseDir, 'work', 'contacts.csv'));
    expect(await readFile(file, 'utf8')).toBe('id,firstName\n1,"Smith, ""JJ"""\n');
  });

  it('reads back the cells it wrote', async () => {
    await store.writeTable('contacts', ['id', 'firstName', 'title'], [{ id: 1, firstName: 'Smith, "JJ"', title: null }]);

    expect(await store.readTable('contacts')).toEqual([{ id: '1', firstName: 'Smith, "JJ"', title: '' }]);
  });

  it('raises MissingSnapshotError for an absent table', async () => {
    const failure = store.readTable('guesses');

    await expect(failure).rejects.toBeInstanceOf(MissingSnapshotError);
    await expect(failure).rejects.toMatchObject({ snapshotPath: join(baseDir, 'work', 'guesses.csv') });
  });

  it('reports whether a table exists', async () => {
    expect(await store.exists('contacts')).toBe(false);
    await store.writeTable('contacts', ['id'], []);
    expect(await store.exists('contacts')).toBe(true);
  });

  it('writes JSON artifacts under their own directories', async () => {
    await store.writeJson(store.auditPath(101, 'before'), { id: 101 });

    expect(store.auditPath(101, 'before')).toBe(join(baseDir, 'work', 'audit', '101-before.json'));
    expect(store.detailPath(101)).toBe(join(baseDir, 'work', 'configurations', '101.json'));
    expect(await store.readJson(store.auditPath(101, 'before'))).toEqual({ id: 101 });
  });

  it('clears the working directory once', async () => {
    await store.writeTable('contacts', ['id'], [{ id: 1 }]);

    expect(await store.clear()).toBe(true);
    expect(await store.exists('contacts')).toBe(false);
    expect(await store.clear()).toBe(false);
  });

  it('round-trips configuration records through the enriched table', async () => {
    const configurations = [
      { id: 101, name: 'WS-101', lastLoginName: 'CORP\\JohnSmith', active: true, contact: { id: 11, name: 'Jon Smith', href: 'https://example.test/contacts/11' } },
      { id: 102, name: 'WS-102', lastLoginName: null, active: false, contact: null },
    ];
    await store.writeTable('configurationsEnriched', ENRICHED_CONFIGURATION_COLUMNS, configurations.map(encodeEnrichedConfiguration));

    const rows = await store.readTable('configurationsEnriched');

    expect(decodeEnrichedConfigurations(rows, store.pathFor('configurationsEnriched'))).toEqual(configurations);
  });

  it('round-trips guesses including flags', async () => {
    const guesses: GuessedConfiguration[] = [
      {
        configuration: { id: 105, name: 'WS-105', lastLoginName: 'CORP\\Madonna', active: true, contact: null },
        guess: { firstName: 'Madonna', lastName: '', fullName: 'Madonna', existsInDirectory: true, matchesRecordedContact: false },
      },
    ];
    await store.writeTable('guesses', GUESS_COLUMNS, guesses.map(encodeGuess));

    expect(decodeGuesses(await store.readTable('guesses'), store.pathFor('guesses'))).toEqual(guesses);
  });

  it('rejects rows that do not decode', async () => {
    await store.writeTable('contacts', ['id', 'firstName'], []);
    await writeFile(store.pathFor('contacts'), 'id,firstName\nabc,John\n', 'utf8');

    const rows = await store.readTable('contacts');

    expect(() => decodeContacts(rows, 'contacts.csv')).toThrow('Row 2 of contacts.csv is invalid: id: Expected an integer');
  });
});
