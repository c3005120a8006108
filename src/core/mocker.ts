import type { MockParams, MockRecord, MockRecordSummary } from '../types/index.js';
import type { MockStore } from '../storage/base.js';
import { checkId, generateId, toTimestamp } from '../storage/base.js';
import { InvalidIdError } from '../errors/index.js';
import { validateCandidate } from './validator.js';

/**
 * Operations the HTTP layer and the CLI consume
 */
export interface Mocker {
  /** Load one mock; malformed ids fail with InvalidIdError */
  get(id: string): Promise<MockRecord>;
  /** Summaries of every mock, newest first */
  list(): Promise<MockRecordSummary[]>;
  /** Validate and store a new mock, resolving with its id */
  create(params: MockParams, body: Buffer): Promise<string>;
  /** Evict the oldest mocks beyond `limit`, resolving with how many were removed */
  clean(limit: number): Promise<number>;
}

export interface MockServiceOptions {
  /** Source of creation timestamps */
  clock?: () => Date;
  /** Source of record ids */
  generateId?: () => string;
  /** Called for each record clean() failed to remove */
  onCleanError?: (id: string, error: unknown) => void;
}

/**
 * Parameters that fill typed fields instead of becoming headers
 */
export const RESERVED_PARAMS: readonly string[] = ['status', 'contentType', 'charset'];

function firstValue(value: string | string[] | undefined): string | undefined {
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

/**
 * Status parameter as an integer, or -1 when it is not one
 */
function parseStatus(value: string | undefined): number {
  if (value === undefined || !/^[+-]?\d+$/.test(value)) {
    return -1;
  }
  return Number.parseInt(value, 10);
}

/**
 * Split request parameters into the typed fields and the headers mapping
 */
export function buildRecord(
  params: MockParams,
  body: Buffer,
  id: string,
  createdAt: string
): MockRecord {
  const record: MockRecord = {
    id,
    createdAt,
    status: -1,
    contentType: '',
    charset: '',
    headers: {},
    body,
  };

  for (const [name, values] of Object.entries(params)) {
    switch (name) {
      case 'status':
        record.status = parseStatus(firstValue(values));
        break;
      case 'contentType':
        record.contentType = firstValue(values) ?? '';
        break;
      case 'charset':
        record.charset = firstValue(values) ?? '';
        break;
      default: {
        const value = firstValue(values);
        if (value !== undefined) {
          record.headers[name] = value;
        }
      }
    }
  }

  return record;
}

/**
 * Mocker backed by a MockStore; validation happens here, persistence in the store
 */
export class MockService implements Mocker {
  private store: MockStore;
  private clock: () => Date;
  private nextId: () => string;
  private onCleanError?: (id: string, error: unknown) => void;

  constructor(store: MockStore, options: MockServiceOptions = {}) {
    this.store = store;
    this.clock = options.clock ?? (() => new Date());
    this.nextId = options.generateId ?? generateId;
    this.onCleanError = options.onCleanError;
  }

  async get(id: string): Promise<MockRecord> {
    const problem = checkId(id);
    if (problem !== null) {
      throw new InvalidIdError(id, problem);
    }
    return this.store.get(id);
  }

  async list(): Promise<MockRecordSummary[]> {
    return this.store.list();
  }

  async create(params: MockParams, body: Buffer): Promise<string> {
    const record = buildRecord(params, body, this.nextId(), toTimestamp(this.clock()));

    validateCandidate(record);
    await this.store.put(record);

    return record.id;
  }

  async clean(limit: number): Promise<number> {
    // NaN fails this comparison too
    if (!(limit >= 1)) {
      return 0;
    }

    const summaries = await this.store.list();
    const excess = summaries.length - Math.floor(limit);
    if (excess < 1) {
      return 0;
    }

    let removed = 0;
    for (const summary of summaries.slice(summaries.length - excess)) {
      try {
        if (await this.store.delete(summary.id)) {
          removed++;
        }
      } catch (error) {
        // Eviction is best-effort: report and keep going
        this.onCleanError?.(summary.id, error);
      }
    }

    return removed;
  }

  /**
   * Underlying store
   */
  getStore(): MockStore {
    return this.store;
  }
}
