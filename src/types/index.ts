export type StorageType = 'file' | 'sqlite';

export interface MockServerConfig {
  port: number;
  host: string;
  storage: StorageConfig;
  cors?: CorsConfig;
  delay: DelayConfig;
  retention: RetentionConfig;
  /** Largest accepted mock body, in `bytes` notation (e.g. `1mb`) */
  bodyLimit: string;
}

export interface StorageConfig {
  type: StorageType;
  /** Directory for the file store, database file for sqlite */
  path: string;
}

export interface CorsConfig {
  enabled: boolean;
  origins?: string[];
}

export interface DelayConfig {
  /** Ceiling applied to every requested delay, in milliseconds */
  max: number;
}

export interface RetentionConfig {
  /** Records kept after each create; 0 disables eviction */
  maxRecords: number;
}

/**
 * A stored canned response
 */
export interface MockRecord {
  id: string;
  /** ISO 8601, second precision, UTC */
  createdAt: string;
  status: number;
  contentType: string;
  charset: string;
  headers: Record<string, string>;
  body: Buffer;
}

export type MockRecordSummary = Pick<MockRecord, 'id' | 'createdAt' | 'status' | 'contentType'>;

/**
 * The fields checked against the reference vocabularies before a record is stored
 */
export type MockCandidate = Pick<MockRecord, 'status' | 'contentType' | 'charset'>;

/**
 * Request parameters as parsed from a query string: repeated keys become arrays
 */
export type MockParams = Record<string, string | string[] | undefined>;
