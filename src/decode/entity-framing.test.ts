import * as assert from 'node:assert';
import { Buffer } from 'node:buffer';
import { describe, test } from 'node:test';

import { HttpDecodeError, HttpDecodeErrorCode } from '../errors.js';
import { WELL_KNOWN_METHODS } from '../specs.js';
import type { HeaderEntry, HttpProtocol, ParsedMethod } from '../types.js';
import { decideEntityFraming, type FramingDecision, peelChunked } from './entity-framing.js';
import { createHeaderSet } from './headers.js';

const { GET, HEAD, POST, TRACE } = WELL_KNOWN_METHODS;

interface Scenario {
  method?: ParsedMethod;
  protocol?: HttpProtocol;
  entries: HeaderEntry[];
  body?: string;
}

function decide(scenario: Scenario): FramingDecision {
  const prefix = 'XXXX';
  return decideEntityFraming({
    method: scenario.method ?? POST,
    protocol: scenario.protocol ?? 'HTTP/1.1',
    headers: createHeaderSet(scenario.entries),
    buffer: Buffer.from(`${prefix}${scenario.body ?? ''}`),
    bodyStart: prefix.length,
  });
}

function expectCode(fn: () => unknown, code: HttpDecodeErrorCode): void {
  assert.throws(fn, (error: unknown) => error instanceof HttpDecodeError && error.code === code);
}

describe('peelChunked', () => {
  test('should drop the Transfer-Encoding header when only chunked was used', () => {
    assert.deepStrictEqual(
      peelChunked([['host', 'a'], ['transfer-encoding', 'chunked']], ['chunked']),
      [['host', 'a']],
    );
  });

  test('should keep the other codings in front', () => {
    assert.deepStrictEqual(
      peelChunked([['host', 'a'], ['transfer-encoding', 'gzip, chunked']], ['gzip', 'chunked']),
      [['transfer-encoding', 'gzip'], ['host', 'a']],
    );
  });
});

describe('decideEntityFraming', () => {
  test('should frame a request without length as empty', () => {
    const decision = decide({ method: GET, entries: [['host', 'a']] });

    assert.deepStrictEqual(decision.framing, { kind: 'empty' });
    assert.strictEqual(decision.offset, 4);
  });

  test('should frame a fully buffered body as strict', () => {
    const decision = decide({ entries: [['host', 'a'], ['content-length', '5']], body: 'helloGET' });

    assert.deepStrictEqual(decision.framing, { kind: 'strict', length: 5, data: Buffer.from('hello') });
    assert.strictEqual(decision.offset, 9);
    assert.deepStrictEqual(decision.headers, [['host', 'a'], ['content-length', '5']]);
  });

  test('should defer a partially buffered body', () => {
    const decision = decide({ entries: [['host', 'a'], ['content-length', '5']], body: 'he' });

    assert.deepStrictEqual(decision.framing, { kind: 'deferred-fixed-length', length: 5 });
    assert.strictEqual(decision.offset, 4);
  });

  test('should require Host except on HTTP/1.0', () => {
    expectCode(() => decide({ method: GET, entries: [] }), HttpDecodeErrorCode.MISSING_HOST);
    assert.deepStrictEqual(decide({ method: GET, protocol: 'HTTP/1.0', entries: [] }).framing, { kind: 'empty' });
  });

  test('should reject an entity on methods that do not accept one', () => {
    expectCode(
      () => decide({ method: HEAD, entries: [['host', 'a'], ['content-length', '5']], body: 'hello' }),
      HttpDecodeErrorCode.ENTITY_NOT_ALLOWED,
    );
    expectCode(
      () => decide({ method: HEAD, entries: [['host', 'a'], ['transfer-encoding', 'chunked']] }),
      HttpDecodeErrorCode.ENTITY_NOT_ALLOWED,
    );
    assert.deepStrictEqual(
      decide({ method: HEAD, entries: [['host', 'a'], ['content-length', '0']] }).framing,
      { kind: 'empty' },
    );
  });

  test('should defer a large declared length without capping it', () => {
    const decision = decide({ entries: [['host', 'a'], ['content-length', '9437184']] });

    assert.deepStrictEqual(decision.framing, { kind: 'deferred-fixed-length', length: 9437184 });
  });

  test('should treat an empty Transfer-Encoding as present', () => {
    expectCode(
      () => decide({ method: TRACE, entries: [['host', 'a'], ['transfer-encoding', '']] }),
      HttpDecodeErrorCode.ENTITY_NOT_ALLOWED,
    );
    assert.throws(
      () => decide({
        entries: [['host', 'a'], ['transfer-encoding', ','], ['content-length', '3']],
        body: 'abc',
      }),
      (error: unknown) => error instanceof HttpDecodeError
        && error.code === HttpDecodeErrorCode.INVALID_HEADER
        && error.status === 400,
    );
  });

  test('should stream a chunked body and hide the chunked coding', () => {
    const decision = decide({ entries: [['host', 'a'], ['transfer-encoding', 'gzip, chunked']] });

    assert.deepStrictEqual(decision.framing, { kind: 'deferred-chunked' });
    assert.deepStrictEqual(decision.headers, [['transfer-encoding', 'gzip'], ['host', 'a']]);
    assert.strictEqual(decision.offset, 4);
  });

  test('should refuse chunked combined with Content-Length', () => {
    expectCode(
      () => decide({ entries: [['host', 'a'], ['transfer-encoding', 'chunked'], ['content-length', '3']] }),
      HttpDecodeErrorCode.CONFLICTING_FRAMING,
    );
  });

  test('should fall back to Content-Length when chunked is not the final coding', () => {
    const decision = decide({
      entries: [['host', 'a'], ['transfer-encoding', 'gzip'], ['content-length', '3']],
      body: 'abc',
    });

    assert.deepStrictEqual(decision.framing, { kind: 'strict', length: 3, data: Buffer.from('abc') });
    assert.deepStrictEqual(decision.headers, [['transfer-encoding', 'gzip'], ['host', 'a'], ['content-length', '3']]);
  });

  test('should be deterministic for the same input', () => {
    const scenario: Scenario = { entries: [['host', 'a'], ['content-length', '3']], body: 'ab' };

    assert.deepStrictEqual(decide(scenario), decide(scenario));
  });
});
