import type { Buffer } from 'node:buffer';

import { DecodeErrors } from '../errors.js';
import { HTTP_1_0 } from '../specs.js';
import type {
  EntityFraming,
  HeaderEntry,
  HeaderSet,
  HttpProtocol,
  ParsedMethod,
} from '../types.js';

const CHUNKED = 'chunked';
const TRANSFER_ENCODING = 'transfer-encoding';

export interface FramingInput {
  method: ParsedMethod;
  protocol: HttpProtocol;
  headers: HeaderSet;
  buffer: Buffer;
  bodyStart: number;
}

export interface FramingDecision {
  framing: EntityFraming;
  headers: HeaderEntry[];
  /** Offset right after the entity when it is already complete, else the body start. */
  offset: number;
}

/**
 * Removes every `chunked` coding from the Transfer-Encoding header. The
 * remaining codings, if any, are emitted as one header in front of the others.
 */
export function peelChunked(entries: readonly HeaderEntry[], codings: readonly string[]): HeaderEntry[] {
  const others = entries.filter(([name]) => name !== TRANSFER_ENCODING);
  const remaining = codings.filter((coding) => coding !== CHUNKED);
  return remaining.length > 0
    ? [[TRANSFER_ENCODING, remaining.join(', ')], ...others]
    : others;
}

function decideLengthFraming(input: FramingInput, headers: HeaderEntry[]): FramingDecision {
  const { method, buffer, bodyStart } = input;
  const contentLength = input.headers.contentLength ?? 0;

  if (contentLength === 0) {
    return { framing: { kind: 'empty' }, headers, offset: bodyStart };
  }

  if (!method.entityAccepted) {
    throw DecodeErrors.entityNotAllowed(method.name);
  }

  if (contentLength <= buffer.length - bodyStart) {
    return {
      framing: {
        kind: 'strict',
        length: contentLength,
        data: buffer.subarray(bodyStart, bodyStart + contentLength),
      },
      headers,
      offset: bodyStart + contentLength,
    };
  }

  return {
    framing: { kind: 'deferred-fixed-length', length: contentLength },
    headers,
    offset: bodyStart,
  };
}

/**
 * Chooses how the entity of one request is delimited. The result depends only
 * on the arguments, so evaluating the same input twice yields the same framing.
 */
export function decideEntityFraming(input: FramingInput): FramingDecision {
  const { method, protocol, headers } = input;

  if (!headers.hostPresent && protocol !== HTTP_1_0) {
    throw DecodeErrors.missingHost();
  }

  if (!headers.transferEncodingPresent) {
    return decideLengthFraming(input, headers.entries);
  }

  if (!method.entityAccepted) {
    throw DecodeErrors.entityNotAllowed(method.name);
  }

  const codings = headers.transferEncoding;
  if (codings.length === 0) {
    throw DecodeErrors.invalidHeader('Transfer-Encoding without transfer codings');
  }

  const peeled = peelChunked(headers.entries, codings);

  if (codings[codings.length - 1] === CHUNKED) {
    if (headers.contentLength !== null) {
      throw DecodeErrors.conflictingFraming();
    }
    return {
      framing: { kind: 'deferred-chunked' },
      headers: peeled,
      offset: input.bodyStart,
    };
  }

  // A final coding other than chunked does not delimit the message; only
  // Content-Length does.
  return decideLengthFraming(input, peeled);
}
