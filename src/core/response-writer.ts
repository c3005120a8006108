import type { MockRecord } from '../types/index.js';
import { resolveDelay, sleep } from './delay.js';

/**
 * Outbound side of an HTTP exchange. Express's Response satisfies it.
 */
export interface ResponseSink {
  status(code: number): unknown;
  setHeader(name: string, value: string): unknown;
  end(body: Buffer): unknown;
}

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const HEADER_VALUE = /^[\t\x20-\x7e\x80-\xff]*$/;

/**
 * Canonical form of a header name: `x-request-id` becomes `X-Request-Id`.
 * Names that are not valid tokens are returned unchanged.
 */
export function canonicalHeaderName(name: string): string {
  if (!TOKEN.test(name)) {
    return name;
  }
  return name
    .split('-')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join('-');
}

/**
 * Status line for a stored status. An informational (1xx) status cannot end
 * an exchange, so the final response goes out as 200.
 */
export function finalStatus(status: number): number {
  return status >= 100 && status < 200 ? 200 : status;
}

/**
 * Renders stored mocks onto a response after an artificial, capped delay
 */
export class ResponseWriter {
  private maxDelay: number;

  constructor(maxDelayMs: number) {
    this.maxDelay = maxDelayMs;
  }

  setMaxDelay(maxDelayMs: number): void {
    this.maxDelay = maxDelayMs;
  }

  getMaxDelay(): number {
    return this.maxDelay;
  }

  /**
   * Wait the effective delay, then write status, headers and body.
   * Nothing is written when `signal` aborts during the wait.
   * Resolves with the delay applied, in milliseconds.
   */
  async write(
    sink: ResponseSink,
    record: MockRecord,
    requestedDelay?: string,
    signal?: AbortSignal
  ): Promise<number> {
    const delay = resolveDelay(requestedDelay, this.maxDelay);
    await sleep(delay, signal);

    sink.status(finalStatus(record.status));
    sink.setHeader('Content-Type', `${record.contentType}; charset=${record.charset}`);

    for (const [name, value] of Object.entries(record.headers)) {
      // Node refuses to emit names or values outside the HTTP grammar
      if (!TOKEN.test(name) || !HEADER_VALUE.test(value)) continue;

      const canonical = canonicalHeaderName(name);
      // Content-Type always comes from contentType and charset
      if (canonical === 'Content-Type') continue;
      sink.setHeader(canonical, value);
    }

    sink.end(record.body);
    return delay;
  }
}
