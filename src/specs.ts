import type {
  ChunkedBodyLimits,
  HeaderLimits,
  ParsedMethod,
  ParserSettings,
} from './types.js';

export const CR = 0x0d;
export const LF = 0x0a;
export const SP = 0x20;
export const HTAB = 0x09;
export const COLON = 0x3a;
export const TLS_HANDSHAKE_RECORD = 0x16;

export const HTTP_1_0 = 'HTTP/1.0';
export const HTTP_1_1 = 'HTTP/1.1';

export const TOKEN_REG = /^[!#$%&'*+\-.^_`|~0-9a-z]+$/i;

export const RAW_REQUEST_URI_HEADER = 'raw-request-uri';
export const UPGRADE_TO_WEBSOCKET_HEADER = 'upgrade-to-websocket';

export enum RequestParserPhase {
  AWAITING_MESSAGE = 'awaiting-message',
  STREAMING_FIXED_BODY = 'streaming-fixed-body',
  STREAMING_CHUNKED_BODY = 'streaming-chunked-body',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

// HEAD, TRACE and CONNECT never carry a request entity.
export const WELL_KNOWN_METHODS = {
  GET: { name: 'GET', entityAccepted: true, custom: false },
  POST: { name: 'POST', entityAccepted: true, custom: false },
  PUT: { name: 'PUT', entityAccepted: true, custom: false },
  PATCH: { name: 'PATCH', entityAccepted: true, custom: false },
  DELETE: { name: 'DELETE', entityAccepted: true, custom: false },
  HEAD: { name: 'HEAD', entityAccepted: false, custom: false },
  OPTIONS: { name: 'OPTIONS', entityAccepted: true, custom: false },
  TRACE: { name: 'TRACE', entityAccepted: false, custom: false },
  CONNECT: { name: 'CONNECT', entityAccepted: false, custom: false },
} satisfies Record<string, ParsedMethod>;

export const DEFAULT_HEADER_LIMITS: HeaderLimits = {
  maxHeaderCount: 64,
  maxHeaderNameLength: 64,
  maxHeaderValueLength: 8 * 1024,
  maxHeaderBytes: 32 * 1024,
} as const;

export const DEFAULT_CHUNKED_BODY_LIMITS: ChunkedBodyLimits = {
  maxChunkSizeHexDigits: 8,
  maxChunkExtensionLength: 256,
  maxChunkSize: 1024 * 1024,
  maxTrailers: 32,
  maxTrailerSize: 8 * 1024,
} as const;

export const DEFAULT_PARSER_SETTINGS: ParserSettings = {
  maxMethodLength: 16,
  maxUriLength: 2048,
  customMethods: {},
  uriParsingMode: 'strict',
  rawRequestUriHeader: false,
  headers: DEFAULT_HEADER_LIMITS,
  chunked: DEFAULT_CHUNKED_BODY_LIMITS,
  websocket: { enabled: true },
} as const;
