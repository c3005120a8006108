export {
  MockServer,
  ENDPOINTS,
  type MockServerEvents,
  type MockServerDeps,
  type RequestLog,
  type ResponseLog,
} from './core/server.js';
export { MockService, buildRecord, RESERVED_PARAMS, type Mocker, type MockServiceOptions } from './core/mocker.js';
export { ResponseWriter, canonicalHeaderName, finalStatus, type ResponseSink } from './core/response-writer.js';
export { MAX_DELAY_MS, parseDuration, formatDuration, resolveDelay, sleep, isAbortError } from './core/delay.js';
export { validateCandidate } from './core/validator.js';
export * from './types/index.js';
export * from './errors/index.js';
export * from './reference/index.js';
export * from './storage/index.js';
export * from './config/index.js';
export { NAME, VERSION } from './version.js';
