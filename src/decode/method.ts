import type { Buffer } from 'node:buffer';

import { DecodeErrors } from '../errors.js';
import { SP, TLS_HANDSHAKE_RECORD, WELL_KNOWN_METHODS } from '../specs.js';
import type { ParsedMethod, ParserSettings } from '../types.js';
import { advance, byteAt, type CursorResult } from './byte-cursor.js';

const { CONNECT, DELETE, GET, HEAD, OPTIONS, PATCH, POST, PUT, TRACE } = WELL_KNOWN_METHODS;

const P = 0x50;

const METHODS_BY_FIRST_BYTE = new Map<number, ParsedMethod>([
  [0x47, GET],
  [0x44, DELETE],
  [0x48, HEAD],
  [0x4f, OPTIONS],
  [0x54, TRACE],
  [0x43, CONNECT],
]);

const P_METHODS_BY_SECOND_BYTE = new Map<number, ParsedMethod>([
  [0x4f, POST],
  [0x55, PUT],
  [0x41, PATCH],
]);

function decodeCustomMethod(
  buffer: Buffer,
  cursor: number,
  settings: ParserSettings,
): CursorResult<ParsedMethod> {
  const { maxMethodLength, customMethods } = settings;

  for (let ix = 0; ix <= maxMethodLength; ix++) {
    const byte = byteAt(buffer, cursor + ix);
    if (byte === null) {
      return null;
    }
    if (byte !== SP) {
      continue;
    }

    const name = buffer.toString('latin1', cursor, cursor + ix);
    const options = Object.hasOwn(customMethods, name) ? customMethods[name] : undefined;
    if (!options) {
      throw DecodeErrors.unsupportedMethod(name);
    }
    return advance({ name, entityAccepted: options.entityAccepted, custom: true }, cursor + ix + 1);
  }

  throw DecodeErrors.methodTooLong(
    buffer.toString('latin1', cursor, cursor + maxMethodLength),
    maxMethodLength,
  );
}

function decodeKnownMethod(
  buffer: Buffer,
  cursor: number,
  method: ParsedMethod,
  matched: number,
  settings: ParserSettings,
): CursorResult<ParsedMethod> {
  const { name } = method;

  for (let ix = matched; ix < name.length; ix++) {
    const byte = byteAt(buffer, cursor + ix);
    if (byte === null) {
      return null;
    }
    if (byte !== name.charCodeAt(ix)) {
      return decodeCustomMethod(buffer, cursor, settings);
    }
  }

  const next = byteAt(buffer, cursor + name.length);
  if (next === null) {
    return null;
  }
  if (next !== SP) {
    return decodeCustomMethod(buffer, cursor, settings);
  }
  return advance(method, cursor + name.length + 1);
}

/**
 * Recognizes the request method at `cursor`, including the single SP after it.
 * Well-known methods are matched byte by byte; anything else is scanned as a
 * token and looked up in `settings.customMethods`.
 */
export function decodeMethod(
  buffer: Buffer,
  cursor: number,
  settings: ParserSettings,
): CursorResult<ParsedMethod> {
  const first = byteAt(buffer, cursor);
  if (first === null) {
    return null;
  }

  if (first === TLS_HANDSHAKE_RECORD) {
    throw DecodeErrors.wrongProtocol();
  }

  if (first === P) {
    const second = byteAt(buffer, cursor + 1);
    if (second === null) {
      return null;
    }
    const method = P_METHODS_BY_SECOND_BYTE.get(second);
    return method
      ? decodeKnownMethod(buffer, cursor, method, 2, settings)
      : decodeCustomMethod(buffer, cursor, settings);
  }

  const method = METHODS_BY_FIRST_BYTE.get(first);
  return method
    ? decodeKnownMethod(buffer, cursor, method, 1, settings)
    : decodeCustomMethod(buffer, cursor, settings);
}
