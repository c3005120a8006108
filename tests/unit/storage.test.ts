import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  FileMockStore,
  checkId,
  decodeRecord,
  decodeSummary,
  encodeRecord,
  generateId,
  sortNewestFirst,
  toTimestamp,
} from '../../src/storage/index.js';
import { CorruptDataError, ListError, NotFoundError, WriteError } from '../../src/errors/index.js';
import { idOf, makeRecord } from '../helpers/records.js';

const TEST_DIR = './test-file-store';

describe('generateId', () => {
  it('should generate unique ids accepted by checkId', () => {
    const id1 = generateId();
    const id2 = generateId();

    expect(id1).not.toBe(id2);
    expect(checkId(id1)).toBeNull();
    expect(checkId(id2)).toBeNull();
  });
});

describe('checkId', () => {
  it('should report a wrong length', () => {
    expect(checkId('wrong-uuid')).toBe('length: 10');
  });

  it('should report a wrong shape of the right length', () => {
    const id = 'z'.repeat(36);
    expect(checkId(id)).toBe(`format: ${id}`);
  });
});

describe('toTimestamp', () => {
  it('should truncate to the second', () => {
    expect(toTimestamp(new Date('2026-10-18T12:34:56.789Z'))).toBe('2026-10-18T12:34:56Z');
  });
});

describe('sortNewestFirst', () => {
  it('should order by createdAt descending and keep ties in input order', () => {
    const sorted = sortNewestFirst([
      { id: 'a', createdAt: '2026-01-01T00:00:01Z' },
      { id: 'b', createdAt: '2026-01-01T00:00:03Z' },
      { id: 'c', createdAt: '2026-01-01T00:00:01Z' },
      { id: 'd', createdAt: '2026-01-01T00:00:02Z' },
    ]);

    expect(sorted.map((r) => r.id)).toEqual(['b', 'd', 'a', 'c']);
  });
});

describe('record codec', () => {
  it('should store the body as base64', () => {
    const record = makeRecord({ id: idOf(1) });

    expect(encodeRecord(record)).toEqual({
      id: idOf(1),
      createdAt: '2026-01-01T00:00:00Z',
      status: 200,
      contentType: 'text/plain',
      charset: 'UTF-8',
      headers: { 'x-test': 'yes' },
      body: 'SGVsbG8gV29ybGQ=',
    });
  });

  it('should decode what it encodes, bytes included', () => {
    const record = makeRecord({ body: Buffer.from([0, 255, 10, 128]) });

    expect(decodeRecord(encodeRecord(record))).toEqual(record);
  });

  it('should refuse mismatched shapes', () => {
    expect(decodeRecord({ id: 'x' })).toBeNull();
    expect(decodeRecord({ ...encodeRecord(makeRecord()), body: 'not base64!' })).toBeNull();
    expect(decodeRecord({ ...encodeRecord(makeRecord()), headers: { a: 1 } })).toBeNull();
    expect(decodeRecord('text')).toBeNull();
  });

  it('should decode a summary without the remaining fields', () => {
    expect(
      decodeSummary({ id: idOf(2), createdAt: '2026-01-01T00:00:00Z', status: 404, contentType: 'text/html' })
    ).toEqual({ id: idOf(2), createdAt: '2026-01-01T00:00:00Z', status: 404, contentType: 'text/html' });
  });
});

describe('FileMockStore', () => {
  let store: FileMockStore;

  beforeEach(async () => {
    store = new FileMockStore(TEST_DIR);
    await store.init();
  });

  afterEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('init', () => {
    it('should create nested directories', async () => {
      const nested = new FileMockStore(`${TEST_DIR}/nested/dir`);
      await expect(nested.init()).resolves.toBeUndefined();
      expect(await nested.list()).toEqual([]);
    });
  });

  describe('put/get', () => {
    it('should round-trip every field', async () => {
      const record = makeRecord({
        status: 201,
        contentType: 'application/json',
        charset: 'UTF-16',
        headers: { 'x-one': '1', 'X-Two': 'two' },
        body: Buffer.from('{"ok":true}'),
      });

      await store.put(record);

      expect(await store.get(record.id)).toEqual(record);
    });

    it('should keep raw bytes intact', async () => {
      const record = makeRecord({ contentType: 'image/png', body: Buffer.from([137, 80, 78, 71, 0, 255]) });

      await store.put(record);
      const loaded = await store.get(record.id);

      expect(loaded.body.equals(record.body)).toBe(true);
    });

    it('should write one json file named by id', async () => {
      const record = makeRecord({ id: idOf(7) });
      await store.put(record);

      const raw = JSON.parse(await readFile(join(TEST_DIR, `${idOf(7)}.json`), 'utf-8'));

      expect(raw).toEqual(encodeRecord(record));
    });

    it('should persist across instances', async () => {
      const record = makeRecord();
      await store.put(record);

      const other = new FileMockStore(TEST_DIR);
      await other.init();

      expect(await other.get(record.id)).toEqual(record);
    });

    it('should throw NotFoundError for a missing id', async () => {
      await expect(store.get(idOf(99))).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should throw NotFoundError for ids that are not plain file names', async () => {
      await expect(store.get('../outside')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should throw CorruptDataError for unparsable files', async () => {
      await writeFile(join(TEST_DIR, `${idOf(3)}.json`), 'not json at all');

      await expect(store.get(idOf(3))).rejects.toBeInstanceOf(CorruptDataError);
    });

    it('should throw CorruptDataError for files of the wrong shape', async () => {
      await writeFile(join(TEST_DIR, `${idOf(4)}.json`), JSON.stringify({ id: idOf(4), status: 'ok' }));

      await expect(store.get(idOf(4))).rejects.toBeInstanceOf(CorruptDataError);
    });

    it('should throw WriteError when the directory is unusable', async () => {
      await rm(TEST_DIR, { recursive: true, force: true });
      await writeFile(TEST_DIR, 'a file where the directory should be');

      await expect(store.put(makeRecord())).rejects.toBeInstanceOf(WriteError);
    });
  });

  describe('list', () => {
    it('should return an empty array for an empty store', async () => {
      expect(await store.list()).toEqual([]);
    });

    it('should return summaries newest first', async () => {
      await store.put(makeRecord({ id: idOf(1), createdAt: '2026-01-01T00:00:02Z', status: 201 }));
      await store.put(makeRecord({ id: idOf(2), createdAt: '2026-01-01T00:00:03Z', status: 404 }));
      await store.put(makeRecord({ id: idOf(3), createdAt: '2026-01-01T00:00:01Z', contentType: 'text/html' }));

      expect(await store.list()).toEqual([
        { id: idOf(2), createdAt: '2026-01-01T00:00:03Z', status: 404, contentType: 'text/plain' },
        { id: idOf(1), createdAt: '2026-01-01T00:00:02Z', status: 201, contentType: 'text/plain' },
        { id: idOf(3), createdAt: '2026-01-01T00:00:01Z', status: 200, contentType: 'text/html' },
      ]);
    });

    it('should break ties by id order', async () => {
      await store.put(makeRecord({ id: idOf(9) }));
      await store.put(makeRecord({ id: idOf(5) }));

      const ids = (await store.list()).map((s) => s.id);

      expect(ids).toEqual([idOf(5), idOf(9)]);
    });

    it('should ignore dotfiles and non-json files', async () => {
      await store.put(makeRecord({ id: idOf(1) }));
      await writeFile(join(TEST_DIR, 'notes.txt'), 'hello');
      await writeFile(join(TEST_DIR, `.${idOf(2)}.json.tmp`), '{');
      await writeFile(join(TEST_DIR, '.hidden.json'), '{');
      await mkdir(join(TEST_DIR, 'sub.json'));

      const ids = (await store.list()).map((s) => s.id);

      expect(ids).toEqual([idOf(1)]);
    });

    it('should fail entirely when one record is corrupt', async () => {
      await store.put(makeRecord({ id: idOf(1) }));
      await writeFile(join(TEST_DIR, `${idOf(2)}.json`), '{ broken');

      await expect(store.list()).rejects.toBeInstanceOf(ListError);
    });

    it('should fail when the directory cannot be read', async () => {
      await rm(TEST_DIR, { recursive: true, force: true });

      await expect(store.list()).rejects.toBeInstanceOf(ListError);
    });
  });

  describe('delete', () => {
    it('should report whether a record was removed', async () => {
      const record = makeRecord();
      await store.put(record);

      expect(await store.delete(record.id)).toBe(true);
      expect(await store.delete(record.id)).toBe(false);
      await expect(store.get(record.id)).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
