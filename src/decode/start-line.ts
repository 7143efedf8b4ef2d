import type { Buffer } from 'node:buffer';

import { DecodeErrors } from '../errors.js';
import { CR, HTTP_1_0, HTTP_1_1, LF } from '../specs.js';
import type { HttpProtocol, ParsedMethod, ParsedTarget, ParserSettings } from '../types.js';
import { advance, byteAt, type CursorResult, matchAscii } from './byte-cursor.js';
import { decodeMethod } from './method.js';
import { decodeRequestTarget } from './request-target.js';

const PROTOCOL_PREFIX = 'HTTP/1.';
const VERSION_0 = 0x30;
const VERSION_1 = 0x31;

export interface RequestStartLine {
  method: ParsedMethod;
  target: ParsedTarget;
  rawTarget: Buffer;
  protocol: HttpProtocol;
}

/**
 * Reads `HTTP/1.0` or `HTTP/1.1` followed by the line terminator.
 */
export function decodeProtocol(buffer: Buffer, cursor: number): CursorResult<HttpProtocol> {
  const prefix = matchAscii(buffer, cursor, PROTOCOL_PREFIX);
  if (prefix === null) {
    return null;
  }
  if (!prefix) {
    throw DecodeErrors.unsupportedHttpVersion();
  }

  let offset = cursor + PROTOCOL_PREFIX.length;
  const version = byteAt(buffer, offset);
  if (version === null) {
    return null;
  }

  let protocol: HttpProtocol;
  if (version === VERSION_0) {
    protocol = HTTP_1_0;
  } else if (version === VERSION_1) {
    protocol = HTTP_1_1;
  } else {
    throw DecodeErrors.unsupportedHttpVersion();
  }
  offset += 1;

  const first = byteAt(buffer, offset);
  if (first === null) {
    return null;
  }
  if (first === LF) {
    return advance(protocol, offset + 1);
  }
  if (first !== CR) {
    throw DecodeErrors.unsupportedHttpVersion();
  }

  const second = byteAt(buffer, offset + 1);
  if (second === null) {
    return null;
  }
  if (second !== LF) {
    throw DecodeErrors.unsupportedHttpVersion();
  }
  return advance(protocol, offset + 2);
}

export function decodeRequestStartLine(
  buffer: Buffer,
  offset: number,
  settings: ParserSettings,
): CursorResult<RequestStartLine> {
  const method = decodeMethod(buffer, offset, settings);
  if (!method) {
    return null;
  }

  const target = decodeRequestTarget(buffer, method.offset, settings);
  if (!target) {
    return null;
  }

  const protocol = decodeProtocol(buffer, target.offset);
  if (!protocol) {
    return null;
  }

  return advance({
    method: method.value,
    target: target.value.target,
    rawTarget: target.value.rawBytes,
    protocol: protocol.value,
  }, protocol.offset);
}
