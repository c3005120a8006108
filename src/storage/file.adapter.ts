import { JSONFile } from 'lowdb/node';
import { mkdir, readdir, unlink } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import type { MockRecord, MockRecordSummary } from '../types/index.js';
import { CorruptDataError, ListError, NotFoundError, WriteError } from '../errors/index.js';
import {
  type MockStore,
  type StoredMockRecord,
  decodeRecord,
  decodeSummary,
  encodeRecord,
  sortNewestFirst,
} from './base.js';

const EXTENSION = '.json';

/**
 * Directory-backed storage: one `<id>.json` file per record
 */
export class FileMockStore implements MockStore {
  private directory: string;

  constructor(directory: string = './mocks') {
    // Use absolute path to avoid issues with temp file paths
    this.directory = resolve(directory);
  }

  async init(): Promise<void> {
    await mkdir(this.directory, { recursive: true });
  }

  async get(id: string): Promise<MockRecord> {
    if (!isPlainName(id)) {
      throw new NotFoundError(id);
    }

    let raw: unknown;
    try {
      raw = await this.file(id).read();
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new CorruptDataError(id, { cause: error });
      }
      throw error;
    }

    if (raw === null) {
      throw new NotFoundError(id);
    }

    const record = decodeRecord(raw);
    if (!record) {
      throw new CorruptDataError(id);
    }
    return record;
  }

  async list(): Promise<MockRecordSummary[]> {
    let names: string[];
    try {
      const entries = await readdir(this.directory, { withFileTypes: true });
      names = entries
        .filter((e) => e.isFile() && e.name.endsWith(EXTENSION) && !e.name.startsWith('.'))
        .map((e) => e.name)
        .sort();
    } catch (error) {
      throw new ListError(`cannot read directory ${this.directory}`, { cause: error });
    }

    const summaries: MockRecordSummary[] = [];
    for (const name of names) {
      const id = name.slice(0, -EXTENSION.length);

      let raw: unknown;
      try {
        raw = await this.file(id).read();
      } catch (error) {
        throw new ListError(`mock {${id}} cannot be read`, { cause: error });
      }

      // Removed between readdir and read
      if (raw === null) continue;

      const summary = decodeSummary(raw);
      if (!summary) {
        throw new ListError(`mock {${id}} cannot be read`, { cause: new CorruptDataError(id) });
      }
      summaries.push(summary);
    }

    return sortNewestFirst(summaries);
  }

  async put(record: MockRecord): Promise<void> {
    try {
      await this.file(record.id).write(encodeRecord(record));
    } catch (error) {
      throw new WriteError(record.id, { cause: error });
    }
  }

  async delete(id: string): Promise<boolean> {
    if (!isPlainName(id)) {
      return false;
    }

    try {
      await unlink(this.pathOf(id));
      return true;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  close(): void {
    // Nothing is held open between calls
  }

  /**
   * Directory the records live in
   */
  getDirectory(): string {
    return this.directory;
  }

  private pathOf(id: string): string {
    return join(this.directory, `${id}${EXTENSION}`);
  }

  private file(id: string): JSONFile<StoredMockRecord> {
    return new JSONFile<StoredMockRecord>(this.pathOf(id));
  }
}

/**
 * An id usable as a file name inside the store directory
 */
function isPlainName(id: string): boolean {
  return id.length > 0 && !id.includes('/') && !id.includes('\\') && id !== '.' && id !== '..';
}
