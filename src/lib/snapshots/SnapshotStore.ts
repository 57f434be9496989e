import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import Papa from 'papaparse';

import { AppError, MissingSnapshotError } from '../../core/errors.js';

export const SNAPSHOT_FILES = {
  configurationsRaw: 'configurations.raw.csv',
  configurationsEnriched: 'configurations.enriched.csv',
  configurationsSimplified: 'configurations.simplified.csv',
  contacts: 'contacts.csv',
  guesses: 'guesses.csv',
} as const;

export type SnapshotName = keyof typeof SNAPSHOT_FILES;

export type CsvValue = string | number | boolean | null;
export type CsvRow = Record<string, CsvValue>;
export type CsvRecord = Record<string, string>;

export const SNAPSHOT_UNREADABLE = 'SNAPSHOT_UNREADABLE';

const DETAIL_DIR = 'configurations';
const AUDIT_DIR = 'audit';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Working directory holding the stage snapshots (CSV) and per-record JSON artifacts.
 */
export class SnapshotStore {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
  }

  pathFor(name: SnapshotName): string {
    return join(this.rootDir, SNAPSHOT_FILES[name]);
  }

  detailPath(configurationId: number): string {
    return join(this.rootDir, DETAIL_DIR, `${configurationId}.json`);
  }

  auditPath(configurationId: number, phase: 'before' | 'after'): string {
    return join(this.rootDir, AUDIT_DIR, `${configurationId}-${phase}.json`);
  }

  async writeTable(name: SnapshotName, columns: readonly string[], rows: readonly CsvRow[]): Promise<string> {
    const file = this.pathFor(name);
    const csv = Papa.unparse(
      {
        fields: [...columns],
        data: rows.map((row) => columns.map((column) => row[column] ?? '')),
      },
      { newline: '\n' }
    );

    await mkdir(this.rootDir, { recursive: true });
    await writeFile(file, `${csv}\n`, 'utf8');
    return file;
  }

  async readTable(name: SnapshotName): Promise<CsvRecord[]> {
    const file = this.pathFor(name);

    let text: string;
    try {
      text = await readFile(file, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new MissingSnapshotError(file);
      }
      throw error;
    }

    const result = Papa.parse<CsvRecord>(text, {
      header: true,
      skipEmptyLines: 'greedy',
      transformHeader: (header: string) => header.trim(),
    });

    if (result.errors.length > 0) {
      const [first] = result.errors;
      throw new AppError(SNAPSHOT_UNREADABLE, `Snapshot ${file} is unreadable: ${first.message}`, {
        file,
        row: first.row,
      });
    }

    return result.data;
  }

  async exists(name: SnapshotName): Promise<boolean> {
    try {
      await stat(this.pathFor(name));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async writeJson(file: string, value: unknown): Promise<string> {
    await mkdir(dirname(file), { recursive: true });
    await writeFile(file, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
    return file;
  }

  async readJson(file: string): Promise<unknown> {
    return JSON.parse(await readFile(file, 'utf8'));
  }

  /**
   * Removes the whole working directory. Returns false when there was nothing to remove.
   */
  async clear(): Promise<boolean> {
    try {
      await stat(this.rootDir);
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
    await rm(this.rootDir, { recursive: true, force: true });
    return true;
  }
}
