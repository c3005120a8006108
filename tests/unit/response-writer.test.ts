import { describe, it, expect } from 'vitest';
import { ResponseWriter, canonicalHeaderName, finalStatus, type ResponseSink } from '../../src/core/response-writer.js';
import { isAbortError } from '../../src/core/delay.js';
import { makeRecord } from '../helpers/records.js';

type Call =
  | { kind: 'status'; code: number }
  | { kind: 'header'; name: string; value: string }
  | { kind: 'end'; body: string };

class RecordingSink implements ResponseSink {
  calls: Call[] = [];

  status(code: number): this {
    this.calls.push({ kind: 'status', code });
    return this;
  }

  setHeader(name: string, value: string): this {
    this.calls.push({ kind: 'header', name, value });
    return this;
  }

  end(body: Buffer): this {
    this.calls.push({ kind: 'end', body: body.toString('utf-8') });
    return this;
  }

  headers(): Record<string, string> {
    const headers: Record<string, string> = {};
    for (const call of this.calls) {
      if (call.kind === 'header') headers[call.name] = call.value;
    }
    return headers;
  }
}

describe('canonicalHeaderName', () => {
  it('should capitalize each dash-separated part', () => {
    expect(canonicalHeaderName('x-language')).toBe('X-Language');
    expect(canonicalHeaderName('RETRY-AFTER')).toBe('Retry-After');
    expect(canonicalHeaderName('etag')).toBe('Etag');
  });

  it('should leave names that are not tokens unchanged', () => {
    expect(canonicalHeaderName('bad name')).toBe('bad name');
  });
});

describe('finalStatus', () => {
  it('should answer informational statuses with 200', () => {
    expect(finalStatus(100)).toBe(200);
    expect(finalStatus(103)).toBe(200);
  });

  it('should keep every other status', () => {
    expect(finalStatus(200)).toBe(200);
    expect(finalStatus(204)).toBe(204);
    expect(finalStatus(418)).toBe(418);
  });
});

describe('ResponseWriter', () => {
  it('should write status, content type, headers and body in order', async () => {
    const sink = new RecordingSink();
    const record = makeRecord({ headers: { 'x-language': 'en' } });

    const applied = await new ResponseWriter(60_000).write(sink, record);

    expect(applied).toBe(0);
    expect(sink.calls).toEqual([
      { kind: 'status', code: 200 },
      { kind: 'header', name: 'Content-Type', value: 'text/plain; charset=UTF-8' },
      { kind: 'header', name: 'X-Language', value: 'en' },
      { kind: 'end', body: 'Hello World' },
    ]);
  });

  it('should end an informational mock with a final 200', async () => {
    const sink = new RecordingSink();

    await new ResponseWriter(60_000).write(sink, makeRecord({ status: 101 }));

    expect(sink.calls[0]).toEqual({ kind: 'status', code: 200 });
    expect(sink.calls[sink.calls.length - 1]).toEqual({ kind: 'end', body: 'Hello World' });
  });

  it('should never let a stored header override Content-Type', async () => {
    const sink = new RecordingSink();
    const record = makeRecord({
      contentType: 'application/json',
      headers: { 'content-type': 'text/html' },
    });

    await new ResponseWriter(60_000).write(sink, record);

    expect(sink.headers()).toEqual({ 'Content-Type': 'application/json; charset=UTF-8' });
  });

  it('should skip headers outside the HTTP grammar', async () => {
    const sink = new RecordingSink();
    const record = makeRecord({
      headers: { 'bad name': 'x', 'x-ok': 'fine', 'x-newline': 'a\nb' },
    });

    await new ResponseWriter(60_000).write(sink, record);

    expect(sink.headers()).toEqual({
      'Content-Type': 'text/plain; charset=UTF-8',
      'X-Ok': 'fine',
    });
  });

  it('should wait the requested delay before writing', async () => {
    const sink = new RecordingSink();
    const startedAt = Date.now();

    const applied = await new ResponseWriter(60_000).write(sink, makeRecord(), '100ms');

    expect(applied).toBe(100);
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(90);
    expect(sink.calls).toHaveLength(4);
  });

  it('should cap the delay at the configured maximum', async () => {
    const writer = new ResponseWriter(50);

    expect(await writer.write(new RecordingSink(), makeRecord(), '1h')).toBe(50);

    writer.setMaxDelay(0);
    expect(writer.getMaxDelay()).toBe(0);
    expect(await writer.write(new RecordingSink(), makeRecord(), '1h')).toBe(0);
  });

  it('should keep waiting when the cap is beyond the longest timer', async () => {
    const sink = new RecordingSink();
    const controller = new AbortController();
    const startedAt = Date.now();
    setTimeout(() => controller.abort(), 100);

    const error = await new ResponseWriter(30 * 24 * 3_600_000)
      .write(sink, makeRecord(), '600h', controller.signal)
      .catch((e: unknown) => e);

    expect(isAbortError(error)).toBe(true);
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(90);
    expect(sink.calls).toEqual([]);
  });

  it('should ignore an unparsable delay', async () => {
    expect(await new ResponseWriter(60_000).write(new RecordingSink(), makeRecord(), 'later')).toBe(0);
  });

  it('should write nothing when aborted during the delay', async () => {
    const sink = new RecordingSink();
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const error = await new ResponseWriter(60_000)
      .write(sink, makeRecord(), '10s', controller.signal)
      .catch((e: unknown) => e);

    expect(isAbortError(error)).toBe(true);
    expect(sink.calls).toEqual([]);
  });
});
