import type { StorageConfig } from '../types/index.js';
import { ConfigError } from '../errors/index.js';
import type { MockStore } from './base.js';
import { FileMockStore } from './file.adapter.js';
import { SQLiteMockStore } from './sqlite.adapter.js';

/**
 * Create the storage adapter named by the config
 */
export function createStore(config: StorageConfig): MockStore {
  const { type, path } = config;

  if (type === 'file') {
    return new FileMockStore(path);
  }

  if (type === 'sqlite') {
    return new SQLiteMockStore(path);
  }

  throw new ConfigError(`Unsupported storage type: ${String(type)}`);
}
