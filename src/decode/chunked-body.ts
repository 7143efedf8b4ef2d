import type { Buffer } from 'node:buffer';

import { DecodeErrors, HttpDecodeError, HttpDecodeErrorCode } from '../errors.js';
import { CR, LF, TOKEN_REG } from '../specs.js';
import type { ChunkedBodyLimits, EntityStreamOutput, HeaderEntry } from '../types.js';
import { byteAt } from './byte-cursor.js';
import { decodeHttpLine } from './http-line.js';

export enum ChunkedBodyPhase {
  SIZE = 'size',
  DATA = 'data',
  CRLF = 'crlf',
  TRAILER = 'trailer',
  FINISHED = 'finished',
}

export interface ChunkedBodyState {
  readonly phase: ChunkedBodyPhase;
  readonly remainingChunkBytes: number;
  readonly limits: ChunkedBodyLimits;
}

export interface ChunkedStep {
  output: EntityStreamOutput;
  offset: number;
  state: ChunkedBodyState;
}

const HEX_REG = /^[0-9A-Fa-f]+$/;

export function createChunkedBodyState(limits: ChunkedBodyLimits): ChunkedBodyState {
  return {
    phase: ChunkedBodyPhase.SIZE,
    remainingChunkBytes: 0,
    limits,
  };
}

export function parseChunkSize(line: string, limits: ChunkedBodyLimits): number {
  const semicolonIndex = line.indexOf(';');
  const sizePart = semicolonIndex === -1 ? line : line.slice(0, semicolonIndex);

  if (semicolonIndex !== -1 && line.length - semicolonIndex - 1 > limits.maxChunkExtensionLength) {
    throw new HttpDecodeError({
      code: HttpDecodeErrorCode.CHUNK_EXTENSION_TOO_LARGE,
      message: `Chunk extension exceeds maximum allowed of ${limits.maxChunkExtensionLength}`,
    });
  }

  if (!sizePart) {
    throw new HttpDecodeError({
      code: HttpDecodeErrorCode.INVALID_CHUNK_SIZE,
      message: 'Empty chunk size line',
    });
  }

  if (sizePart.length > limits.maxChunkSizeHexDigits) {
    throw new HttpDecodeError({
      code: HttpDecodeErrorCode.CHUNK_SIZE_TOO_LARGE,
      message: `Chunk size hex digits exceed limit of ${limits.maxChunkSizeHexDigits}`,
    });
  }

  if (!HEX_REG.test(sizePart)) {
    throw new HttpDecodeError({
      code: HttpDecodeErrorCode.INVALID_CHUNK_SIZE,
      message: `Invalid chunk size: "${sizePart}"`,
    });
  }

  const size = parseInt(sizePart, 16);

  if (size > limits.maxChunkSize) {
    throw new HttpDecodeError({
      code: HttpDecodeErrorCode.CHUNK_SIZE_TOO_LARGE,
      message: `Chunk size exceeds maximum allowed of ${limits.maxChunkSize}`,
    });
  }

  return size;
}

function parseTrailerLine(line: string): HeaderEntry {
  const colonIndex = line.indexOf(':');

  if (colonIndex <= 0) {
    throw new HttpDecodeError({
      code: HttpDecodeErrorCode.INVALID_TRAILER,
      message: `Invalid trailer header (missing colon): "${line}"`,
    });
  }

  const key = line.slice(0, colonIndex).trim();
  if (!TOKEN_REG.test(key)) {
    throw new HttpDecodeError({
      code: HttpDecodeErrorCode.INVALID_TRAILER,
      message: `Invalid trailer header name: "${key}"`,
    });
  }

  return [key.toLowerCase(), line.slice(colonIndex + 1).trim()];
}

function trailerTooLarge(limit: number): HttpDecodeError {
  return new HttpDecodeError({
    code: HttpDecodeErrorCode.TRAILER_TOO_LARGE,
    message: `Trailer size exceeds maximum allowed of ${limit}`,
  });
}

function readTrailers(
  buffer: Buffer,
  offset: number,
  limits: ChunkedBodyLimits,
): { trailers: HeaderEntry[]; offset: number } | null {
  const trailers: HeaderEntry[] = [];
  let cursor = offset;

  for (;;) {
    const lineResult = decodeHttpLine(
      buffer,
      cursor,
      limits.maxTrailerSize,
      () => trailerTooLarge(limits.maxTrailerSize),
    );
    if (!lineResult) {
      if (buffer.length - offset > limits.maxTrailerSize) {
        throw trailerTooLarge(limits.maxTrailerSize);
      }
      return null;
    }

    cursor += lineResult.bytesConsumed;
    if (lineResult.line.length === 0) {
      return { trailers, offset: cursor };
    }

    if (cursor - offset > limits.maxTrailerSize) {
      throw trailerTooLarge(limits.maxTrailerSize);
    }
    if (trailers.length >= limits.maxTrailers) {
      throw new HttpDecodeError({
        code: HttpDecodeErrorCode.TRAILER_TOO_LARGE,
        message: `Trailers too many: exceeds limit of ${limits.maxTrailers} count`,
      });
    }
    trailers.push(parseTrailerLine(lineResult.line.toString('latin1')));
  }
}

function readChunkDataEnd(buffer: Buffer, cursor: number): number | null {
  const first = byteAt(buffer, cursor);
  if (first === null) {
    return null;
  }
  if (first === LF) {
    return cursor + 1;
  }
  const second = byteAt(buffer, cursor + 1);
  if (second === null && first === CR) {
    return null;
  }
  if (first !== CR || second !== LF) {
    throw new HttpDecodeError({
      code: HttpDecodeErrorCode.INVALID_CHUNKED_ENCODING,
      message: `Missing CRLF after chunk data (got: 0x${first.toString(16)})`,
    });
  }
  return cursor + 2;
}

/**
 * Delivers the next event of a chunked body. Nothing is committed unless an
 * event is returned: when the buffer ends inside a size line, the CRLF after
 * chunk data, or the trailer section, the next call re-reads from `offset`.
 */
export function streamChunked(
  state: ChunkedBodyState,
  buffer: Buffer,
  offset: number,
): ChunkedStep | null {
  const { limits } = state;
  let phase = state.phase;
  let remaining = state.remainingChunkBytes;
  let cursor = offset;

  for (;;) {
    switch (phase) {
    case ChunkedBodyPhase.SIZE: {
      const maxLineLength = limits.maxChunkSizeHexDigits + 1 + limits.maxChunkExtensionLength;
      const lineResult = decodeHttpLine(
        buffer,
        cursor,
        maxLineLength,
        () => new HttpDecodeError({
          code: HttpDecodeErrorCode.INVALID_CHUNK_SIZE,
          message: `Chunk size line exceeds ${maxLineLength} bytes`,
        }),
      );
      if (!lineResult) {
        return null;
      }
      const size = parseChunkSize(lineResult.line.toString('latin1'), limits);
      cursor += lineResult.bytesConsumed;
      remaining = size;
      phase = size === 0 ? ChunkedBodyPhase.TRAILER : ChunkedBodyPhase.DATA;
      break;
    }

    case ChunkedBodyPhase.DATA: {
      const available = buffer.length - cursor;
      if (available <= 0) {
        return null;
      }
      const size = Math.min(available, remaining);
      const left = remaining - size;
      return {
        output: { type: 'entity-part', data: buffer.subarray(cursor, cursor + size) },
        offset: cursor + size,
        state: {
          ...state,
          phase: left === 0 ? ChunkedBodyPhase.CRLF : ChunkedBodyPhase.DATA,
          remainingChunkBytes: left,
        },
      };
    }

    case ChunkedBodyPhase.CRLF: {
      const next = readChunkDataEnd(buffer, cursor);
      if (next === null) {
        return null;
      }
      cursor = next;
      phase = ChunkedBodyPhase.SIZE;
      break;
    }

    case ChunkedBodyPhase.TRAILER: {
      const result = readTrailers(buffer, cursor, limits);
      if (!result) {
        return null;
      }
      return {
        output: { type: 'entity-end', trailers: result.trailers },
        offset: result.offset,
        state: {
          ...state,
          phase: ChunkedBodyPhase.FINISHED,
          remainingChunkBytes: 0,
        },
      };
    }

    case ChunkedBodyPhase.FINISHED:
      throw DecodeErrors.internalError('chunked body already finished');
    }
  }
}
