import * as assert from 'node:assert';
import { Buffer } from 'node:buffer';
import { describe, test } from 'node:test';

import { HttpDecodeError, HttpDecodeErrorCode } from '../errors.js';
import { DEFAULT_CHUNKED_BODY_LIMITS } from '../specs.js';
import type { ChunkedBodyLimits } from '../types.js';
import {
  ChunkedBodyPhase,
  createChunkedBodyState,
  parseChunkSize,
  streamChunked,
} from './chunked-body.js';

function expectCode(fn: () => unknown, code: HttpDecodeErrorCode): void {
  assert.throws(fn, (error: unknown) => error instanceof HttpDecodeError && error.code === code);
}

function limitsWith(overrides: Partial<ChunkedBodyLimits>): ChunkedBodyLimits {
  return { ...DEFAULT_CHUNKED_BODY_LIMITS, ...overrides };
}

describe('parseChunkSize', () => {
  test('should parse hex sizes with or without extensions', () => {
    assert.strictEqual(parseChunkSize('a', DEFAULT_CHUNKED_BODY_LIMITS), 10);
    assert.strictEqual(parseChunkSize('A;name=value', DEFAULT_CHUNKED_BODY_LIMITS), 10);
    assert.strictEqual(parseChunkSize('0', DEFAULT_CHUNKED_BODY_LIMITS), 0);
  });

  test('should reject malformed sizes', () => {
    expectCode(() => parseChunkSize('', DEFAULT_CHUNKED_BODY_LIMITS), HttpDecodeErrorCode.INVALID_CHUNK_SIZE);
    expectCode(() => parseChunkSize('zz', DEFAULT_CHUNKED_BODY_LIMITS), HttpDecodeErrorCode.INVALID_CHUNK_SIZE);
    expectCode(() => parseChunkSize('5 ', DEFAULT_CHUNKED_BODY_LIMITS), HttpDecodeErrorCode.INVALID_CHUNK_SIZE);
  });

  test('should enforce size limits', () => {
    expectCode(() => parseChunkSize('1ffffffff', DEFAULT_CHUNKED_BODY_LIMITS), HttpDecodeErrorCode.CHUNK_SIZE_TOO_LARGE);
    expectCode(() => parseChunkSize('200000', DEFAULT_CHUNKED_BODY_LIMITS), HttpDecodeErrorCode.CHUNK_SIZE_TOO_LARGE);
    expectCode(
      () => parseChunkSize('1;abc', limitsWith({ maxChunkExtensionLength: 2 })),
      HttpDecodeErrorCode.CHUNK_EXTENSION_TOO_LARGE,
    );
  });
});

describe('streamChunked', () => {
  test('should emit chunk data and then the end', () => {
    const buffer = Buffer.from('5\r\nhello\r\n0\r\n\r\n');
    const first = streamChunked(createChunkedBodyState(DEFAULT_CHUNKED_BODY_LIMITS), buffer, 0);

    assert.ok(first);
    assert.deepStrictEqual(first.output, { type: 'entity-part', data: Buffer.from('hello') });
    assert.strictEqual(first.offset, 8);
    assert.strictEqual(first.state.phase, ChunkedBodyPhase.CRLF);

    const second = streamChunked(first.state, buffer, first.offset);

    assert.ok(second);
    assert.deepStrictEqual(second.output, { type: 'entity-end', trailers: [] });
    assert.strictEqual(second.offset, 15);
    assert.strictEqual(second.state.phase, ChunkedBodyPhase.FINISHED);

    expectCode(() => streamChunked(second.state, buffer, second.offset), HttpDecodeErrorCode.INTERNAL_ERROR);
  });

  test('should emit partial chunk data', () => {
    const initial = createChunkedBodyState(DEFAULT_CHUNKED_BODY_LIMITS);
    const first = streamChunked(initial, Buffer.from('5\r\nhel'), 0);

    assert.ok(first);
    assert.deepStrictEqual(first.output, { type: 'entity-part', data: Buffer.from('hel') });
    assert.strictEqual(first.state.phase, ChunkedBodyPhase.DATA);
    assert.strictEqual(first.state.remainingChunkBytes, 2);

    const second = streamChunked(first.state, Buffer.from('5\r\nhello\r\n'), first.offset);

    assert.ok(second);
    assert.deepStrictEqual(second.output, { type: 'entity-part', data: Buffer.from('lo') });
    assert.strictEqual(second.offset, 8);
    assert.strictEqual(second.state.phase, ChunkedBodyPhase.CRLF);
  });

  test('should return null until an event is complete', () => {
    const initial = createChunkedBodyState(DEFAULT_CHUNKED_BODY_LIMITS);

    assert.strictEqual(streamChunked(initial, Buffer.from('5'), 0), null);
    assert.strictEqual(streamChunked(initial, Buffer.from('5\r'), 0), null);
    assert.strictEqual(streamChunked(initial, Buffer.from('5\r\n'), 0), null);
    assert.strictEqual(streamChunked(initial, Buffer.from('0\r\nX-A: 1\r\n'), 0), null);
  });

  test('should collect trailers', () => {
    const step = streamChunked(
      createChunkedBodyState(DEFAULT_CHUNKED_BODY_LIMITS),
      Buffer.from('0\r\nX-Checksum: abc\r\n\r\n'),
      0,
    );

    assert.ok(step);
    assert.deepStrictEqual(step.output, { type: 'entity-end', trailers: [['x-checksum', 'abc']] });
    assert.strictEqual(step.offset, 22);
  });

  test('should accept chunk extensions', () => {
    const step = streamChunked(
      createChunkedBodyState(DEFAULT_CHUNKED_BODY_LIMITS),
      Buffer.from('3;name=value\r\nabc\r\n'),
      0,
    );

    assert.ok(step);
    assert.deepStrictEqual(step.output, { type: 'entity-part', data: Buffer.from('abc') });
  });

  test('should accept bare LF framing', () => {
    const buffer = Buffer.from('3\nabc\n0\n\n');
    const first = streamChunked(createChunkedBodyState(DEFAULT_CHUNKED_BODY_LIMITS), buffer, 0);

    assert.ok(first);
    assert.strictEqual(first.offset, 5);

    const second = streamChunked(first.state, buffer, first.offset);
    assert.ok(second);
    assert.strictEqual(second.output.type, 'entity-end');
    assert.strictEqual(second.offset, 9);
  });

  test('should reject data not followed by CRLF', () => {
    const buffer = Buffer.from('3\r\nabcX');
    const first = streamChunked(createChunkedBodyState(DEFAULT_CHUNKED_BODY_LIMITS), buffer, 0);

    assert.ok(first);
    expectCode(() => streamChunked(first.state, buffer, first.offset), HttpDecodeErrorCode.INVALID_CHUNKED_ENCODING);
  });

  test('should limit the number of trailers', () => {
    expectCode(
      () => streamChunked(
        createChunkedBodyState(limitsWith({ maxTrailers: 1 })),
        Buffer.from('0\r\nA: 1\r\nB: 2\r\n\r\n'),
        0,
      ),
      HttpDecodeErrorCode.TRAILER_TOO_LARGE,
    );
  });

  test('should reject malformed trailers', () => {
    expectCode(
      () => streamChunked(
        createChunkedBodyState(DEFAULT_CHUNKED_BODY_LIMITS),
        Buffer.from('0\r\nno-colon\r\n\r\n'),
        0,
      ),
      HttpDecodeErrorCode.INVALID_TRAILER,
    );
  });
});
