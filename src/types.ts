import type { Buffer } from 'node:buffer';

import type { HttpDecodeError } from './errors.js';

export type HeaderEntry = [name: string, value: string];

export type HttpProtocol = 'HTTP/1.0' | 'HTTP/1.1';

export type UriParsingMode = 'strict' | 'relaxed';

export type RequestTargetForm = 'origin' | 'absolute' | 'authority' | 'asterisk';

export interface ParsedMethod {
  name: string;
  entityAccepted: boolean;
  custom: boolean;
}

export interface ParsedTarget {
  form: RequestTargetForm;
  scheme: string | null;
  host: string | null;
  port: number | null;
  path: string;
  query: string | null;
  raw: string;
}

export interface HeaderSet {
  entries: HeaderEntry[];
  contentLength: number | null;
  contentType: string | null;
  transferEncoding: string[];
  /** A Transfer-Encoding header was sent, even one that lists no codings. */
  transferEncodingPresent: boolean;
  connection: string[];
  hostPresent: boolean;
  expectsContinue: boolean;
}

export interface HeaderLimits {
  maxHeaderCount: number;
  maxHeaderNameLength: number;
  maxHeaderValueLength: number;
  maxHeaderBytes: number;
}

export interface ChunkedBodyLimits {
  maxChunkSizeHexDigits: number;
  maxChunkExtensionLength: number;
  maxChunkSize: number;
  maxTrailers: number;
  maxTrailerSize: number;
}

export interface CustomMethodOptions {
  entityAccepted: boolean;
}

export interface WebSocketSettings {
  enabled: boolean;
}

export interface ParserSettings {
  readonly maxMethodLength: number;
  readonly maxUriLength: number;
  readonly customMethods: Readonly<Record<string, CustomMethodOptions>>;
  readonly uriParsingMode: UriParsingMode;
  readonly rawRequestUriHeader: boolean;
  readonly headers: Readonly<HeaderLimits>;
  readonly chunked: Readonly<ChunkedBodyLimits>;
  readonly websocket: Readonly<WebSocketSettings>;
}

export interface ParserSettingsInput {
  maxMethodLength?: number;
  maxUriLength?: number;
  customMethods?: Record<string, CustomMethodOptions>;
  uriParsingMode?: UriParsingMode;
  rawRequestUriHeader?: boolean;
  headers?: Partial<HeaderLimits>;
  chunked?: Partial<ChunkedBodyLimits>;
  websocket?: Partial<WebSocketSettings>;
}

export type EntityFraming =
  | { kind: 'empty' }
  | { kind: 'strict'; length: number; data: Buffer }
  | { kind: 'deferred-fixed-length'; length: number }
  | { kind: 'deferred-chunked' };

export interface RequestStartOutput {
  type: 'request-start';
  method: ParsedMethod;
  target: ParsedTarget;
  protocol: HttpProtocol;
  headers: HeaderEntry[];
  contentType: string | null;
  entity: EntityFraming;
  expectsContinue: boolean;
  closeAfterResponse: boolean;
}

export interface EntityPartOutput {
  type: 'entity-part';
  data: Buffer;
}

export interface EntityEndOutput {
  type: 'entity-end';
  trailers: HeaderEntry[];
}

export interface NeedMoreDataOutput {
  type: 'need-more-data';
}

export interface StreamEndOutput {
  type: 'stream-end';
}

export interface FailureOutput {
  type: 'failure';
  status: number;
  error: HttpDecodeError;
}

export type EntityStreamOutput = EntityPartOutput | EntityEndOutput;

export type RequestOutput =
  | RequestStartOutput
  | EntityPartOutput
  | EntityEndOutput
  | NeedMoreDataOutput
  | StreamEndOutput
  | FailureOutput;

export type RequestOutputType = RequestOutput['type'];

export interface DecodeLineResult {
  line: Buffer;
  bytesConsumed: number;
}
