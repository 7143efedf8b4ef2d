import type { Buffer } from 'node:buffer';

import { DecodeErrors, HttpUrlParseError } from '../errors.js';
import { CR, HTAB, LF, SP } from '../specs.js';
import type { ParsedTarget, ParserSettings } from '../types.js';
import { advance, type CursorResult } from './byte-cursor.js';
import { parseHttpRequestTarget } from './uri.js';

export interface DecodedRequestTarget {
  target: ParsedTarget;
  rawBytes: Buffer;
}

function isTargetTerminator(byte: number): boolean {
  return byte === SP || byte === HTAB || byte === CR || byte === LF;
}

/**
 * Finds the end of the request-target without looking more than
 * `maxUriLength` bytes past `cursor`.
 */
export function findTargetEnd(
  buffer: Buffer,
  cursor: number,
  maxUriLength: number,
): number | null {
  const limit = cursor + maxUriLength;

  for (let ix = cursor; ; ix++) {
    if (ix >= buffer.length) {
      return null;
    }
    if (isTargetTerminator(buffer[ix] ?? 0)) {
      return ix;
    }
    if (ix >= limit) {
      throw DecodeErrors.uriTooLong(maxUriLength);
    }
  }
}

/**
 * Scans and parses the request-target at `cursor`. The returned offset points
 * past the byte that terminated the target.
 */
export function decodeRequestTarget(
  buffer: Buffer,
  cursor: number,
  settings: ParserSettings,
): CursorResult<DecodedRequestTarget> {
  const end = findTargetEnd(buffer, cursor, settings.maxUriLength);
  if (end === null) {
    return null;
  }

  const rawBytes = buffer.subarray(cursor, end);
  let target: ParsedTarget;
  try {
    target = parseHttpRequestTarget(rawBytes.toString('latin1'), settings.uriParsingMode);
  } catch (error) {
    if (error instanceof HttpUrlParseError) {
      throw DecodeErrors.invalidRequestTarget(error);
    }
    throw error;
  }

  return advance({ target, rawBytes }, end + 1);
}
