/**
 * Reference vocabularies a mock's status, content type and charset must belong to
 */

import { readFileSync } from 'node:fs';

export const CONTENT_TYPES: readonly string[] = [
  'application/json',
  'application/x-www-form-urlencoded',
  'application/xhtml+xml',
  'application/xml',
  'image/jpeg',
  'image/png',
  'image/svg+xml',
  'multipart/form-data',
  'text/css',
  'text/csv',
  'text/html',
  'text/json',
  'text/plain',
  'text/xml',
];

/**
 * Content types whose bodies are printable as text
 */
export const DISPLAYABLE_CONTENT_TYPES: readonly string[] = CONTENT_TYPES.filter(
  (type) => type === 'application/json' || type === 'application/xml' || type.startsWith('text/')
);

export const CHARSETS: readonly string[] = ['UTF-8', 'ISO-8859-1', 'UTF-16'];

function loadStatusCodes(): ReadonlyMap<number, string> {
  const file = new URL('../../data/status-codes.json', import.meta.url);
  const parsed: unknown = JSON.parse(readFileSync(file, 'utf-8'));

  const codes = new Map<number, string>();
  if (parsed === null || typeof parsed !== 'object') {
    return codes;
  }
  for (const [code, reason] of Object.entries(parsed)) {
    if (typeof reason === 'string') {
      codes.set(Number(code), reason);
    }
  }
  return codes;
}

/** Supported status codes and their reason phrases */
export const STATUS_CODES: ReadonlyMap<number, string> = loadStatusCodes();

export function isStatusCode(status: number): boolean {
  return STATUS_CODES.has(status);
}

export function isContentType(contentType: string): boolean {
  return CONTENT_TYPES.includes(contentType);
}

export function isCharset(charset: string): boolean {
  return CHARSETS.includes(charset);
}

export function isDisplayable(contentType: string): boolean {
  return DISPLAYABLE_CONTENT_TYPES.includes(contentType);
}
