import type { Buffer } from 'node:buffer';

import type { EntityStreamOutput } from '../types.js';

export interface FixedLengthStep {
  output: EntityStreamOutput;
  offset: number;
  remaining: number;
}

/**
 * Delivers the next slice of a Content-Length delimited body. Each call emits
 * whatever part of the remaining body is buffered, then `entity-end` once
 * nothing remains. Returns `null` when no body byte is available yet.
 */
export function streamFixedLength(
  buffer: Buffer,
  offset: number,
  remainingLength: number,
): FixedLengthStep | null {
  if (remainingLength === 0) {
    return {
      output: { type: 'entity-end', trailers: [] },
      offset,
      remaining: 0,
    };
  }

  const available = buffer.length - offset;
  if (available <= 0) {
    return null;
  }

  const size = Math.min(available, remainingLength);

  return {
    output: { type: 'entity-part', data: buffer.subarray(offset, offset + size) },
    offset: offset + size,
    remaining: remainingLength - size,
  };
}
