import type { MockParams } from '../types/index.js';
import { RESERVED_PARAMS } from '../core/mocker.js';

/**
 * Add `name=value` options to the creation parameters. Names that would
 * replace status, contentType or charset are refused.
 */
export function addHeaderOptions(params: MockParams, headers: readonly string[]): MockParams {
  const result: MockParams = { ...params };

  for (const header of headers) {
    const separator = header.indexOf('=');
    if (separator < 1) {
      throw new Error(`Invalid header: ${header}. Use name=value.`);
    }

    const name = header.slice(0, separator);
    if (RESERVED_PARAMS.includes(name)) {
      throw new Error(`Invalid header: ${name} is set by its own option.`);
    }
    result[name] = header.slice(separator + 1);
  }

  return result;
}
