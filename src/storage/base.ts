import { z } from 'zod';
import { v4 as uuidv4, validate as uuidValidate } from 'uuid';
import type { MockRecord, MockRecordSummary } from '../types/index.js';

export interface MockStore {
  /**
   * Prepare the backing medium (create directory/tables if needed)
   */
  init(): Promise<void>;

  /**
   * Load one record.
   * Throws NotFoundError when absent, CorruptDataError when unreadable.
   */
  get(id: string): Promise<MockRecord>;

  /**
   * Summaries of every stored record, newest first.
   * A single unreadable record fails the whole call with ListError.
   */
  list(): Promise<MockRecordSummary[]>;

  /**
   * Persist a record under its id. Throws WriteError.
   */
  put(record: MockRecord): Promise<void>;

  /**
   * Remove a record; resolves false when there was nothing to remove
   */
  delete(id: string): Promise<boolean>;

  /**
   * Release any open handle
   */
  close(): void;
}

/**
 * Generate a collision-resistant record id
 */
export function generateId(): string {
  return uuidv4();
}

/**
 * Why an id cannot be a generated one, or null when it can
 */
export function checkId(id: string): string | null {
  if (id.length !== 36) {
    return `length: ${id.length}`;
  }
  if (!uuidValidate(id)) {
    return `format: ${id}`;
  }
  return null;
}

/**
 * Creation timestamp truncated to the second, e.g. `2026-10-18T12:00:00Z`
 */
export function toTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Order summaries by createdAt descending. The sort is stable, so records
 * created in the same second keep the order they were given in.
 */
export function sortNewestFirst<T extends { createdAt: string }>(records: T[]): T[] {
  return [...records].sort((a, b) => {
    if (a.createdAt === b.createdAt) return 0;
    return a.createdAt < b.createdAt ? 1 : -1;
  });
}

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

const storedSummarySchema = z.object({
  id: z.string().min(1),
  createdAt: z.string().min(1),
  status: z.number().int(),
  contentType: z.string(),
});

const storedRecordSchema = storedSummarySchema.extend({
  charset: z.string(),
  headers: z.record(z.string()),
  body: z.string().regex(BASE64),
});

/**
 * JSON form of a record; the body travels as base64
 */
export type StoredMockRecord = z.infer<typeof storedRecordSchema>;

export function encodeRecord(record: MockRecord): StoredMockRecord {
  return {
    id: record.id,
    createdAt: record.createdAt,
    status: record.status,
    contentType: record.contentType,
    charset: record.charset,
    headers: { ...record.headers },
    body: record.body.toString('base64'),
  };
}

/**
 * Rebuild a record from its JSON form, or null when the shape does not match
 */
export function decodeRecord(raw: unknown): MockRecord | null {
  const parsed = storedRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  return { ...parsed.data, body: Buffer.from(parsed.data.body, 'base64') };
}

/**
 * Read only the summary fields of a stored record, or null when they do not match
 */
export function decodeSummary(raw: unknown): MockRecordSummary | null {
  const parsed = storedSummarySchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  const { id, createdAt, status, contentType } = parsed.data;
  return { id, createdAt, status, contentType };
}
