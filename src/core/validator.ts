import type { MockCandidate } from '../types/index.js';
import { ValidationError } from '../errors/index.js';
import { isCharset, isContentType, isStatusCode } from '../reference/index.js';

/**
 * Check a candidate against the reference vocabularies.
 * Status is checked first, then content type, then charset; the first
 * failure is thrown and the remaining checks are skipped.
 */
export function validateCandidate(candidate: MockCandidate): void {
  if (!isStatusCode(candidate.status)) {
    throw new ValidationError('status', candidate.status);
  }

  if (!isContentType(candidate.contentType)) {
    throw new ValidationError('contentType', candidate.contentType);
  }

  if (!isCharset(candidate.charset)) {
    throw new ValidationError('charset', candidate.charset);
  }
}
