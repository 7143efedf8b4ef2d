import type { Buffer } from 'node:buffer';

import { DecodeErrors } from '../errors.js';
import { COLON, HTAB, SP, TOKEN_REG } from '../specs.js';
import type { HeaderEntry, HeaderLimits, HeaderSet } from '../types.js';
import { parseDecimalLength } from '../utils/number.js';
import { parseTokenList } from '../utils/token-list.js';
import { advance, type CursorResult } from './byte-cursor.js';
import { decodeHttpLine } from './http-line.js';

const OWS_REG = /^[ \t]+|[ \t]+$/g;
const EXPECT_CONTINUE = '100-continue';

export function decodeHeaderLine(line: Buffer, limits: HeaderLimits): HeaderEntry {
  const colonIndex = line.indexOf(COLON);

  if (colonIndex < 0) {
    throw DecodeErrors.invalidHeader('missing ":" separator');
  }

  if (colonIndex === 0) {
    throw DecodeErrors.invalidHeader('empty header name');
  }

  if (colonIndex > limits.maxHeaderNameLength) {
    throw DecodeErrors.headerTooLarge('Header name', limits.maxHeaderNameLength);
  }

  const name = line.toString('latin1', 0, colonIndex);

  if (!TOKEN_REG.test(name)) {
    throw DecodeErrors.invalidHeader(`invalid characters in header name "${name}"`);
  }

  const value = line.toString('latin1', colonIndex + 1).replace(OWS_REG, '');

  if (value.length > limits.maxHeaderValueLength) {
    throw DecodeErrors.headerTooLarge(`Value of header "${name}"`, limits.maxHeaderValueLength);
  }

  return [name.toLowerCase(), value];
}

function valuesOf(entries: readonly HeaderEntry[], name: string): string[] {
  return entries.filter(([key]) => key === name).map(([, value]) => value);
}

function deriveContentLength(values: readonly string[]): number | null {
  let contentLength: number | null = null;

  for (const value of values) {
    for (const element of value.split(',')) {
      const length = parseDecimalLength(element.trim());
      if (length === null) {
        throw DecodeErrors.invalidContentLength(value);
      }
      if (contentLength !== null && contentLength !== length) {
        throw DecodeErrors.invalidContentLength(values.join(', '));
      }
      contentLength = length;
    }
  }

  return contentLength;
}

function deriveTokens(entries: readonly HeaderEntry[], name: string): string[] {
  const result = parseTokenList(valuesOf(entries, name));
  if (!result.valid) {
    throw DecodeErrors.invalidHeader(`${name}: ${(result.errors ?? []).join('; ')}`);
  }
  return result.tokens;
}

export function createHeaderSet(entries: HeaderEntry[]): HeaderSet {
  const hosts = valuesOf(entries, 'host');
  if (hosts.length > 1) {
    throw DecodeErrors.invalidHeader('multiple Host headers');
  }

  return {
    entries,
    contentLength: deriveContentLength(valuesOf(entries, 'content-length')),
    contentType: valuesOf(entries, 'content-type')[0] ?? null,
    transferEncoding: deriveTokens(entries, 'transfer-encoding'),
    transferEncodingPresent: valuesOf(entries, 'transfer-encoding').length > 0,
    connection: deriveTokens(entries, 'connection'),
    hostPresent: hosts.length === 1,
    expectsContinue: valuesOf(entries, 'expect')
      .some((value) => value.toLowerCase() === EXPECT_CONTINUE),
  };
}

/**
 * Parses the header block starting at `offset`, up to and including the
 * empty line that ends it. Returns `null` while the block is incomplete.
 */
export function parseHeaderBlock(
  buffer: Buffer,
  offset: number,
  limits: HeaderLimits,
): CursorResult<HeaderSet> {
  const entries: HeaderEntry[] = [];
  const maxLineLength = limits.maxHeaderNameLength + 1 + limits.maxHeaderValueLength + 2;
  let cursor = offset;

  for (;;) {
    const lineResult = decodeHttpLine(
      buffer,
      cursor,
      maxLineLength,
      () => DecodeErrors.headerTooLarge('Header line', maxLineLength),
    );

    if (!lineResult) {
      if (buffer.length - offset > limits.maxHeaderBytes) {
        throw DecodeErrors.headerTooLarge('Header section', limits.maxHeaderBytes);
      }
      return null;
    }

    cursor += lineResult.bytesConsumed;
    const { line } = lineResult;

    if (line.length === 0) {
      return advance(createHeaderSet(entries), cursor);
    }

    if (cursor - offset > limits.maxHeaderBytes) {
      throw DecodeErrors.headerTooLarge('Header section', limits.maxHeaderBytes);
    }

    if (line[0] === SP || line[0] === HTAB) {
      throw DecodeErrors.invalidHeader('obsolete line folding is not supported');
    }

    if (entries.length >= limits.maxHeaderCount) {
      throw DecodeErrors.headerTooMany(limits.maxHeaderCount);
    }

    entries.push(decodeHeaderLine(line, limits));
  }
}
