import type { MockServerConfig } from '../types/index.js';

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: MockServerConfig = {
  port: 3333,
  host: '0.0.0.0',
  storage: {
    type: 'file',
    path: './mocks',
  },
  cors: {
    enabled: true,
    origins: undefined,
  },
  delay: {
    max: 60_000,
  },
  retention: {
    maxRecords: 0,
  },
  bodyLimit: '1mb',
};

/**
 * Database file used when sqlite storage is chosen without a path
 */
export const DEFAULT_SQLITE_PATH = './mocks/mockvault.db';

/**
 * Default config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'mockvault.config.yml',
  'mockvault.config.yaml',
  'mockvault.yml',
  'mockvault.yaml',
  '.mockvaultrc.yml',
  '.mockvaultrc.yaml',
];
