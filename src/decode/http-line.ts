import type { Buffer } from 'node:buffer';

import { DecodeErrors, type HttpDecodeError } from '../errors.js';
import { CR, LF } from '../specs.js';
import type { DecodeLineResult } from '../types.js';

const enum HttpLineState {
  DATA,
  CR,
}

/**
 * Reads one line starting at `offset`, terminated by CRLF or a bare LF.
 * Returns `null` while the terminator is not yet in the buffer. The scan
 * never looks further than `maxLineLength` bytes plus the terminator.
 */
export function decodeHttpLine(
  buffer: Buffer,
  offset: number,
  maxLineLength: number,
  createLimitError: () => HttpDecodeError,
): DecodeLineResult | null {
  let state = HttpLineState.DATA;
  const bufferLength = buffer.length;

  for (let cursor = offset; cursor < bufferLength; cursor++) {
    const byte = buffer[cursor];

    if (state === HttpLineState.DATA) {
      if (byte === LF) {
        return {
          line: buffer.subarray(offset, cursor),
          bytesConsumed: cursor - offset + 1,
        };
      }

      if (byte === CR) {
        state = HttpLineState.CR;
        continue;
      }

      if (cursor - offset >= maxLineLength) {
        throw createLimitError();
      }
    } else {
      if (byte !== LF) {
        throw DecodeErrors.invalidLineEnding();
      }

      return {
        line: buffer.subarray(offset, cursor - 1),
        bytesConsumed: cursor - offset + 1,
      };
    }
  }

  return null;
}
