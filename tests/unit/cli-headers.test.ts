import { describe, it, expect } from 'vitest';
import { addHeaderOptions } from '../../src/cli/headers.js';

describe('addHeaderOptions', () => {
  const base = { status: '200', contentType: 'text/plain', charset: 'UTF-8' };

  it('should add each header as a parameter', () => {
    expect(addHeaderOptions(base, ['x-language=en', 'x-empty=', 'x-eq=a=b'])).toEqual({
      ...base,
      'x-language': 'en',
      'x-empty': '',
      'x-eq': 'a=b',
    });
  });

  it('should leave the given parameters untouched', () => {
    const params = { ...base };

    addHeaderOptions(params, ['x-language=en']);

    expect(params).toEqual(base);
  });

  it('should reject headers without a name', () => {
    expect(() => addHeaderOptions(base, ['=en'])).toThrow('Invalid header: =en. Use name=value.');
    expect(() => addHeaderOptions(base, ['x-language'])).toThrow('Invalid header: x-language. Use name=value.');
  });

  it('should refuse to replace status, content type or charset', () => {
    expect(() => addHeaderOptions(base, ['status=404'])).toThrow('Invalid header: status is set by its own option.');
    expect(() => addHeaderOptions(base, ['contentType=text/html'])).toThrow(
      'Invalid header: contentType is set by its own option.'
    );
    expect(() => addHeaderOptions(base, ['charset=UTF-16'])).toThrow(
      'Invalid header: charset is set by its own option.'
    );
  });
});
