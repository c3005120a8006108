import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { z } from 'zod';
import { mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { MockRecord, MockRecordSummary } from '../types/index.js';
import { CorruptDataError, ListError, NotFoundError, WriteError } from '../errors/index.js';
import type { MockStore } from './base.js';

const summaryRowSchema = z.object({
  id: z.string().min(1),
  created_at: z.string().min(1),
  status: z.number().int(),
  content_type: z.string(),
});

const recordRowSchema = summaryRowSchema.extend({
  charset: z.string(),
  headers: z.string(),
  // SQLite binds a zero-length blob as NULL
  body: z.instanceof(Buffer).nullable(),
});

const headersSchema = z.record(z.string());

/**
 * SQLite-backed storage: one row per record in the `mocks` table.
 * Listing selects the summary columns only, so bodies stay on disk.
 */
export class SQLiteMockStore implements MockStore {
  private db: DatabaseType | null = null;
  private path: string;

  constructor(path: string = './mocks/mockvault.db') {
    this.path = resolve(path);
  }

  async init(): Promise<void> {
    // Ensure directory exists
    const dir = dirname(this.path);
    await mkdir(dir, { recursive: true });

    this.db = new Database(this.path);

    // Enable WAL mode for better concurrent access
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS mocks (
        id TEXT PRIMARY KEY,
        created_at TEXT NOT NULL,
        status INTEGER NOT NULL,
        content_type TEXT NOT NULL,
        charset TEXT NOT NULL,
        headers TEXT NOT NULL,
        body BLOB
      );

      CREATE INDEX IF NOT EXISTS idx_mocks_created_at ON mocks(created_at);
    `);
  }

  private getDb(): DatabaseType {
    if (!this.db) {
      throw new Error('Storage not initialized. Call init() first.');
    }
    return this.db;
  }

  async get(id: string): Promise<MockRecord> {
    const db = this.getDb();

    const row: unknown = db.prepare('SELECT * FROM mocks WHERE id = ?').get(id);
    if (row === undefined) {
      throw new NotFoundError(id);
    }

    const parsed = recordRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new CorruptDataError(id, { cause: parsed.error });
    }

    let headers: Record<string, string>;
    try {
      headers = headersSchema.parse(JSON.parse(parsed.data.headers));
    } catch (error) {
      throw new CorruptDataError(id, { cause: error });
    }

    return {
      id: parsed.data.id,
      createdAt: parsed.data.created_at,
      status: parsed.data.status,
      contentType: parsed.data.content_type,
      charset: parsed.data.charset,
      headers,
      body: parsed.data.body ?? Buffer.alloc(0),
    };
  }

  async list(): Promise<MockRecordSummary[]> {
    let rows: unknown[];
    try {
      rows = this.getDb()
        .prepare('SELECT id, created_at, status, content_type FROM mocks ORDER BY created_at DESC, id ASC')
        .all();
    } catch (error) {
      throw new ListError(`cannot read database ${this.path}`, { cause: error });
    }

    return rows.map((row) => {
      const parsed = summaryRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new ListError('a stored mock cannot be read', { cause: parsed.error });
      }
      return {
        id: parsed.data.id,
        createdAt: parsed.data.created_at,
        status: parsed.data.status,
        contentType: parsed.data.content_type,
      };
    });
  }

  async put(record: MockRecord): Promise<void> {
    try {
      this.getDb()
        .prepare(`
          INSERT OR REPLACE INTO mocks (id, created_at, status, content_type, charset, headers, body)
          VALUES (?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          record.id,
          record.createdAt,
          record.status,
          record.contentType,
          record.charset,
          JSON.stringify(record.headers),
          record.body
        );
    } catch (error) {
      throw new WriteError(record.id, { cause: error });
    }
  }

  async delete(id: string): Promise<boolean> {
    const result = this.getDb().prepare('DELETE FROM mocks WHERE id = ?').run(id);
    return result.changes > 0;
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
