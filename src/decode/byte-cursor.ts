import type { Buffer } from 'node:buffer';

/**
 * Result of a structural reader that made progress. Readers return `null`
 * instead when the element is not yet fully visible in the buffer.
 */
export interface Advance<T> {
  value: T;
  offset: number;
}

export type CursorResult<T> = Advance<T> | null;

export function byteAt(buffer: Buffer, index: number): number | null {
  return index < buffer.length ? (buffer[index] ?? null) : null;
}

export function advance<T>(value: T, offset: number): Advance<T> {
  return { value, offset };
}

/**
 * Compares `expected` against the buffer starting at `offset`.
 * Returns `null` when the buffer ends before a mismatch could be found.
 */
export function matchAscii(buffer: Buffer, offset: number, expected: string): boolean | null {
  for (let ix = 0; ix < expected.length; ix++) {
    const byte = byteAt(buffer, offset + ix);
    if (byte === null) {
      return null;
    }
    if (byte !== expected.charCodeAt(ix)) {
      return false;
    }
  }
  return true;
}
