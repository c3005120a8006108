export {
  type MockStore,
  type StoredMockRecord,
  generateId,
  checkId,
  toTimestamp,
  sortNewestFirst,
  encodeRecord,
  decodeRecord,
  decodeSummary,
} from './base.js';
export { FileMockStore } from './file.adapter.js';
export { SQLiteMockStore } from './sqlite.adapter.js';
export { createStore } from './factory.js';
