/**
 * Artificial latency for mock responses
 */

import { setTimeout as wait } from 'node:timers/promises';

/**
 * Longest wait a Node timer honors; larger values fire after 1ms
 */
export const MAX_DELAY_MS = 2_147_483_647;

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  μs: 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT = /^(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/;

/**
 * Parse a duration such as `250ms`, `1.5s` or `1m30s` into milliseconds.
 * A bare `0` is zero; anything else without a unit, negative or malformed is null.
 */
export function parseDuration(text: string): number | null {
  let rest = text.trim();
  if (rest === '') return null;
  if (rest === '0') return 0;

  let total = 0;
  while (rest.length > 0) {
    const match = SEGMENT.exec(rest);
    if (!match) return null;

    const [segment, amount, unit] = match;
    total += Number(amount) * UNIT_MS[unit];
    rest = rest.slice(segment.length);
  }

  return Number.isFinite(total) ? total : null;
}

/**
 * Format milliseconds the way parseDuration reads them back
 */
export function formatDuration(ms: number): string {
  if (ms === 0) return '0s';
  if (ms % 3_600_000 === 0) return `${ms / 3_600_000}h`;
  if (ms % 60_000 === 0) return `${ms / 60_000}m`;
  if (ms % 1000 === 0) return `${ms / 1000}s`;
  return `${ms}ms`;
}

/**
 * Effective delay for a request: the requested duration capped at `maxMs`
 * and at MAX_DELAY_MS, or 0 when nothing (or nothing parsable) was requested
 */
export function resolveDelay(requested: string | undefined, maxMs: number): number {
  if (requested === undefined || requested === '') {
    return 0;
  }

  const ms = parseDuration(requested);
  if (ms === null) {
    return 0;
  }

  return Math.min(ms, Math.max(0, maxMs), MAX_DELAY_MS);
}

/**
 * Wait `ms` milliseconds; rejects with an AbortError as soon as `signal` aborts
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  signal?.throwIfAborted();
  if (ms <= 0) return;
  await wait(ms, undefined, { signal });
}

export function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}
