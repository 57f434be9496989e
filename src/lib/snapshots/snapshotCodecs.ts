import { z } from 'zod';

import { AppError } from '../../core/errors.js';
import type {
  ConfigurationRecord,
  ContactRecord,
  GuessedConfiguration,
} from '../../interfaces/reconcile.interfaces.js';
import { SNAPSHOT_UNREADABLE, type CsvRecord, type CsvRow } from './SnapshotStore.js';

export const RAW_CONFIGURATION_COLUMNS = ['id', 'name', 'lastLoginName', 'activeFlag', 'contact', 'detailFile'] as const;
export const ENRICHED_CONFIGURATION_COLUMNS = [
  'id',
  'name',
  'lastLoginName',
  'active',
  'contactId',
  'contactName',
  'contactHref',
] as const;
export const SIMPLIFIED_CONFIGURATION_COLUMNS = ['id', 'lastLoginName', 'active', 'contactName'] as const;
export const CONTACT_COLUMNS = ['id', 'firstName', 'lastName', 'title', 'defaultEmail', 'defaultPhone'] as const;
export const GUESS_COLUMNS = [
  'configurationId',
  'configurationName',
  'lastLoginName',
  'active',
  'contactId',
  'contactName',
  'contactHref',
  'guessedFirstName',
  'guessedLastName',
  'guessedFullName',
  'existsInDirectory',
  'matchesRecordedContact',
] as const;

// Cells come back from papaparse as strings; an empty cell stands for null.
const idCell = z
  .string()
  .regex(/^-?\d+$/, 'Expected an integer')
  .transform(Number);
const nullableIdCell = z.union([z.literal('').transform(() => null), idCell]);
const flagCell = z.enum(['true', 'false']).transform((value) => value === 'true');
const textCell = z.string().default('');
const nullableTextCell = textCell.transform((value) => (value === '' ? null : value));

const enrichedConfigurationRowSchema = z.object({
  id: idCell,
  name: textCell,
  lastLoginName: nullableTextCell,
  active: flagCell,
  contactId: nullableIdCell.default(''),
  contactName: textCell,
  contactHref: nullableTextCell,
});

const contactRowSchema = z.object({
  id: idCell,
  firstName: textCell,
  lastName: textCell,
  title: textCell,
  defaultEmail: textCell,
  defaultPhone: textCell,
});

const guessRowSchema = z.object({
  configurationId: idCell,
  configurationName: textCell,
  lastLoginName: nullableTextCell,
  active: flagCell,
  contactId: nullableIdCell.default(''),
  contactName: textCell,
  contactHref: nullableTextCell,
  guessedFirstName: textCell,
  guessedLastName: textCell,
  guessedFullName: textCell,
  existsInDirectory: flagCell,
  matchesRecordedContact: flagCell,
});

function decodeRows<S extends z.ZodTypeAny>(schema: S, rows: readonly CsvRecord[], file: string): z.infer<S>[] {
  return rows.map((row, index) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      const issues = result.error.errors
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join(', ');
      // +2: header line and one-based numbering
      throw new AppError(SNAPSHOT_UNREADABLE, `Row ${index + 2} of ${file} is invalid: ${issues}`, {
        file,
        row: index + 2,
      });
    }
    return result.data;
  });
}

function contactFromCells(contactId: number | null, contactName: string, contactHref: string | null) {
  return contactId === null ? null : { id: contactId, name: contactName, href: contactHref };
}

export function encodeRawConfiguration(configuration: ConfigurationRecord, detailFile: string): CsvRow {
  const contact = configuration.contact
    ? {
        id: configuration.contact.id,
        name: configuration.contact.name,
        _info: configuration.contact.href ? { contact_href: configuration.contact.href } : undefined,
      }
    : null;

  return {
    id: configuration.id,
    name: configuration.name,
    lastLoginName: configuration.lastLoginName,
    activeFlag: configuration.active,
    contact: JSON.stringify(contact),
    detailFile,
  };
}

export function encodeEnrichedConfiguration(configuration: ConfigurationRecord): CsvRow {
  return {
    id: configuration.id,
    name: configuration.name,
    lastLoginName: configuration.lastLoginName,
    active: configuration.active,
    contactId: configuration.contact?.id ?? null,
    contactName: configuration.contact?.name ?? null,
    contactHref: configuration.contact?.href ?? null,
  };
}

export function encodeSimplifiedConfiguration(configuration: ConfigurationRecord): CsvRow {
  return {
    id: configuration.id,
    lastLoginName: configuration.lastLoginName,
    active: configuration.active,
    contactName: configuration.contact?.name ?? null,
  };
}

export function decodeEnrichedConfigurations(rows: readonly CsvRecord[], file: string): ConfigurationRecord[] {
  return decodeRows(enrichedConfigurationRowSchema, rows, file).map((row) => ({
    id: row.id,
    name: row.name,
    lastLoginName: row.lastLoginName,
    active: row.active,
    contact: contactFromCells(row.contactId, row.contactName, row.contactHref),
  }));
}

export function encodeContact(contact: ContactRecord): CsvRow {
  return { ...contact };
}

export function decodeContacts(rows: readonly CsvRecord[], file: string): ContactRecord[] {
  return decodeRows(contactRowSchema, rows, file);
}

export function encodeGuess({ configuration, guess }: GuessedConfiguration): CsvRow {
  return {
    configurationId: configuration.id,
    configurationName: configuration.name,
    lastLoginName: configuration.lastLoginName,
    active: configuration.active,
    contactId: configuration.contact?.id ?? null,
    contactName: configuration.contact?.name ?? null,
    contactHref: configuration.contact?.href ?? null,
    guessedFirstName: guess.firstName,
    guessedLastName: guess.lastName,
    guessedFullName: guess.fullName,
    existsInDirectory: guess.existsInDirectory,
    matchesRecordedContact: guess.matchesRecordedContact,
  };
}

export function decodeGuesses(rows: readonly CsvRecord[], file: string): GuessedConfiguration[] {
  return decodeRows(guessRowSchema, rows, file).map((row) => ({
    configuration: {
      id: row.configurationId,
      name: row.configurationName,
      lastLoginName: row.lastLoginName,
      active: row.active,
      contact: contactFromCells(row.contactId, row.contactName, row.contactHref),
    },
    guess: {
      firstName: row.guessedFirstName,
      lastName: row.guessedLastName,
      fullName: row.guessedFullName,
      existsInDirectory: row.existsInDirectory,
      matchesRecordedContact: row.matchesRecordedContact,
    },
  }));
}
