import { HttpUrlParseError } from '../errors.js';
import type { ParsedTarget, UriParsingMode } from '../types.js';

const ABSOLUTE_FORM_REG = /^([a-z][a-z0-9+\-.]*):\/\/([^/?]*)(.*)$/i;
const HEX_REG = /^[0-9a-f]{2}$/i;
const PORT_REG = /^\d{1,5}$/;
const MAX_PORT = 65535;

const UNRESERVED = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789-._~';
const SUB_DELIMS = "!$&'()*+,;=";

const REG_NAME_CHARS = new Set(`${UNRESERVED}${SUB_DELIMS}%`);
const PATH_CHARS = new Set(`${UNRESERVED}${SUB_DELIMS}:@/%`);
const QUERY_CHARS = new Set(`${UNRESERVED}${SUB_DELIMS}:@/?%`);

const FRAGMENT_MARK = '#';

function isVisibleAscii(char: string): boolean {
  const code = char.charCodeAt(0);
  return code > 0x20 && code < 0x7f;
}

function validateComponent(
  value: string,
  component: string,
  isAllowed: (char: string) => boolean,
): void {
  for (let ix = 0; ix < value.length; ix++) {
    const char = value.charAt(ix);
    if (char === '%') {
      if (!HEX_REG.test(value.slice(ix + 1, ix + 3))) {
        throw new HttpUrlParseError(`Invalid percent-encoding in ${component} at position ${ix}`);
      }
      ix += 2;
      continue;
    }
    if (!isAllowed(char)) {
      throw new HttpUrlParseError(`Illegal character '${char}' in ${component} at position ${ix}`);
    }
  }
}

function splitPathAndQuery(
  value: string,
  mode: UriParsingMode,
): { path: string; query: string | null } {
  const queryIndex = value.indexOf('?');
  const path = queryIndex === -1 ? value : value.slice(0, queryIndex);
  const query = queryIndex === -1 ? null : value.slice(queryIndex + 1);

  validateComponent(path, 'path', (char) => PATH_CHARS.has(char));
  if (query !== null) {
    validateComponent(
      query,
      'query',
      mode === 'relaxed' ? isVisibleAscii : (char) => QUERY_CHARS.has(char),
    );
  }

  return { path, query };
}

function parsePort(value: string): number {
  if (!PORT_REG.test(value)) {
    throw new HttpUrlParseError(`Invalid port: "${value}"`);
  }
  const port = Number(value);
  if (port > MAX_PORT) {
    throw new HttpUrlParseError(`Port out of range: ${port}`);
  }
  return port;
}

function parseAuthority(
  authority: string,
  requirePort: boolean,
): { host: string; port: number | null } {
  if (authority.includes('@')) {
    throw new HttpUrlParseError('User info is not allowed in a request target');
  }

  let host: string;
  let portPart: string | null;

  if (authority.startsWith('[')) {
    const closing = authority.indexOf(']');
    if (closing === -1) {
      throw new HttpUrlParseError('Unterminated IP literal');
    }
    host = authority.slice(0, closing + 1);
    const rest = authority.slice(closing + 1);
    if (rest !== '' && !rest.startsWith(':')) {
      throw new HttpUrlParseError(`Unexpected characters after IP literal: "${rest}"`);
    }
    portPart = rest === '' ? null : rest.slice(1);
  } else {
    const colonIndex = authority.lastIndexOf(':');
    host = colonIndex === -1 ? authority : authority.slice(0, colonIndex);
    portPart = colonIndex === -1 ? null : authority.slice(colonIndex + 1);
    validateComponent(host, 'host', (char) => REG_NAME_CHARS.has(char));
  }

  if (host === '') {
    throw new HttpUrlParseError('Empty host');
  }

  if (portPart === null) {
    if (requirePort) {
      throw new HttpUrlParseError('Authority-form target must include a port');
    }
    return { host: host.toLowerCase(), port: null };
  }

  return { host: host.toLowerCase(), port: parsePort(portPart) };
}

/**
 * Parses an HTTP request-target in any of its four forms
 * (origin, absolute, authority, asterisk).
 */
export function parseHttpRequestTarget(raw: string, mode: UriParsingMode): ParsedTarget {
  if (raw === '') {
    throw new HttpUrlParseError('Empty request target');
  }

  if (raw.includes(FRAGMENT_MARK)) {
    throw new HttpUrlParseError('Fragment is not allowed in a request target');
  }

  if (raw === '*') {
    return {
      form: 'asterisk',
      scheme: null,
      host: null,
      port: null,
      path: '*',
      query: null,
      raw,
    };
  }

  if (raw.startsWith('/')) {
    const { path, query } = splitPathAndQuery(raw, mode);
    return {
      form: 'origin',
      scheme: null,
      host: null,
      port: null,
      path,
      query,
      raw,
    };
  }

  const matches = raw.match(ABSOLUTE_FORM_REG);
  if (matches) {
    const [, scheme = '', authority = '', rest = ''] = matches;
    const { host, port } = parseAuthority(authority, false);
    const { path, query } = splitPathAndQuery(rest, mode);
    return {
      form: 'absolute',
      scheme: scheme.toLowerCase(),
      host,
      port,
      path: path === '' ? '/' : path,
      query,
      raw,
    };
  }

  const { host, port } = parseAuthority(raw, true);
  return {
    form: 'authority',
    scheme: null,
    host,
    port,
    path: '',
    query: null,
    raw,
  };
}
