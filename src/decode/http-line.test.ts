import * as assert from 'node:assert';
import { Buffer } from 'node:buffer';
import { describe, test } from 'node:test';

import { DecodeErrors, HttpDecodeError, HttpDecodeErrorCode } from '../errors.js';
import { decodeHttpLine } from './http-line.js';

const limitError = () => DecodeErrors.headerTooLarge('Line', 8);

describe('decodeHttpLine', () => {
  test('should read a CRLF terminated line', () => {
    const result = decodeHttpLine(Buffer.from('abc\r\nrest'), 0, 8, limitError);

    assert.ok(result);
    assert.strictEqual(result.line.toString(), 'abc');
    assert.strictEqual(result.bytesConsumed, 5);
  });

  test('should accept a bare LF', () => {
    const result = decodeHttpLine(Buffer.from('xxabc\nrest'), 2, 8, limitError);

    assert.ok(result);
    assert.strictEqual(result.line.toString(), 'abc');
    assert.strictEqual(result.bytesConsumed, 4);
  });

  test('should return an empty line for a lone terminator', () => {
    const result = decodeHttpLine(Buffer.from('\r\n'), 0, 8, limitError);

    assert.ok(result);
    assert.strictEqual(result.line.length, 0);
    assert.strictEqual(result.bytesConsumed, 2);
  });

  test('should return null while the terminator is missing', () => {
    assert.strictEqual(decodeHttpLine(Buffer.from('abc'), 0, 8, limitError), null);
    assert.strictEqual(decodeHttpLine(Buffer.from('abc\r'), 0, 8, limitError), null);
    assert.strictEqual(decodeHttpLine(Buffer.alloc(0), 0, 8, limitError), null);
  });

  test('should reject CR followed by another byte', () => {
    assert.throws(
      () => decodeHttpLine(Buffer.from('ab\rc\n'), 0, 8, limitError),
      (error: unknown) => error instanceof HttpDecodeError
        && error.code === HttpDecodeErrorCode.INVALID_LINE_ENDING,
    );
  });

  test('should allow a line of exactly the limit', () => {
    const result = decodeHttpLine(Buffer.from('12345678\r\n'), 0, 8, limitError);

    assert.ok(result);
    assert.strictEqual(result.line.toString(), '12345678');
  });

  test('should throw the limit error without waiting for the terminator', () => {
    assert.throws(
      () => decodeHttpLine(Buffer.from('123456789'), 0, 8, limitError),
      (error: unknown) => error instanceof HttpDecodeError
        && error.code === HttpDecodeErrorCode.HEADER_TOO_LARGE,
    );
  });
});
