import { Buffer } from 'node:buffer';
import { createHash } from 'node:crypto';

import { UPGRADE_TO_WEBSOCKET_HEADER } from '../specs.js';
import type { HeaderEntry, WebSocketSettings } from '../types.js';
import { hasToken, parseTokenList } from '../utils/token-list.js';

const WEBSOCKET_GUID = '258EAFA5-E914-47DA-95CA-C5AB0DC85B11';
const SUPPORTED_VERSION = '13';
const KEY_BYTE_LENGTH = 16;
const BASE64_REG = /^[A-Za-z0-9+/]+={0,2}$/;

function headerValue(headers: readonly HeaderEntry[], name: string): string | null {
  const found = headers.filter(([key]) => key === name);
  return found.length === 1 ? (found[0]?.[1] ?? null) : null;
}

function tokensOf(headers: readonly HeaderEntry[], name: string): string[] {
  return parseTokenList(headers.filter(([key]) => key === name).map(([, value]) => value)).tokens;
}

function isValidKey(key: string): boolean {
  return BASE64_REG.test(key) && Buffer.from(key, 'base64').length === KEY_BYTE_LENGTH;
}

export function computeAcceptKey(key: string): string {
  return createHash('sha1').update(`${key}${WEBSOCKET_GUID}`).digest('base64');
}

/**
 * Recognizes a WebSocket opening handshake on a GET request. On success
 * returns the synthetic header carrying the `Sec-WebSocket-Accept` value the
 * response must send.
 */
export function detectWebSocketUpgrade(
  headers: readonly HeaderEntry[],
  hostPresent: boolean,
  settings: WebSocketSettings,
): HeaderEntry | null {
  if (!settings.enabled || !hostPresent) {
    return null;
  }

  if (!hasToken(tokensOf(headers, 'connection'), 'upgrade')) {
    return null;
  }

  if (!hasToken(tokensOf(headers, 'upgrade'), 'websocket')) {
    return null;
  }

  if (headerValue(headers, 'sec-websocket-version') !== SUPPORTED_VERSION) {
    return null;
  }

  const key = headerValue(headers, 'sec-websocket-key');
  if (key === null || !isValidKey(key)) {
    return null;
  }

  return [UPGRADE_TO_WEBSOCKET_HEADER, computeAcceptKey(key)];
}
