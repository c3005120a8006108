import { generateId } from '../../src/storage/base.js';
import type { MockRecord } from '../../src/types/index.js';

export function makeRecord(override: Partial<MockRecord> = {}): MockRecord {
  return {
    id: generateId(),
    createdAt: '2026-01-01T00:00:00Z',
    status: 200,
    contentType: 'text/plain',
    charset: 'UTF-8',
    headers: { 'x-test': 'yes' },
    body: Buffer.from('Hello World'),
    ...override,
  };
}

/** Fixed, sortable ids: idOf(1) < idOf(2) */
export function idOf(n: number): string {
  return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;
}
