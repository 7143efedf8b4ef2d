import { Buffer } from 'node:buffer';

import { DecodeErrors, type HttpDecodeError, toHttpDecodeError } from '../errors.js';
import { resolveParserSettings } from '../settings.js';
import {
  HTTP_1_0,
  HTTP_1_1,
  RAW_REQUEST_URI_HEADER,
  RequestParserPhase,
  WELL_KNOWN_METHODS,
} from '../specs.js';
import type {
  EntityStreamOutput,
  HeaderEntry,
  ParserSettings,
  RequestOutput,
  RequestStartOutput,
} from '../types.js';
import { hasToken } from '../utils/token-list.js';
import { type ChunkedBodyState, createChunkedBodyState, streamChunked } from './chunked-body.js';
import { decideEntityFraming, type FramingDecision } from './entity-framing.js';
import { streamFixedLength } from './fixed-length-body.js';
import { parseHeaderBlock } from './headers.js';
import { decodeRequestStartLine, type RequestStartLine } from './start-line.js';
import { detectWebSocketUpgrade } from './websocket.js';

const EMPTY_BUFFER = Buffer.alloc(0);
const DEFAULT_SETTINGS = resolveParserSettings();
const NEED_MORE_DATA: RequestOutput = Object.freeze({ type: 'need-more-data' });

export interface RequestParserHooks {
  onPhaseChange?(from: RequestParserPhase, to: RequestParserPhase): void;
  onRequestStart?(output: RequestStartOutput): void;
  onEntityPart?(data: Buffer): void;
  onEntityEnd?(trailers: HeaderEntry[]): void;
  onError?(error: HttpDecodeError): void;
}

/**
 * Parser state of one connection. Between messages it holds nothing but
 * unconsumed input; the method and target of the message being parsed only
 * live inside a single parse attempt.
 */
export interface RequestParserState {
  phase: RequestParserPhase;
  buffer: Buffer;
  offset: number;
  inputFinished: boolean;
  remainingBodyBytes: number;
  chunkedBody: ChunkedBodyState | null;
  error: HttpDecodeError | null;
  readonly settings: ParserSettings;
  readonly hooks: RequestParserHooks | undefined;
}

interface MessageStart {
  output: RequestStartOutput;
  decision: FramingDecision;
}

export function createRequestParser(
  settings: ParserSettings = DEFAULT_SETTINGS,
  hooks?: RequestParserHooks,
): RequestParserState {
  return {
    phase: RequestParserPhase.AWAITING_MESSAGE,
    buffer: EMPTY_BUFFER,
    offset: 0,
    inputFinished: false,
    remainingBodyBytes: 0,
    chunkedBody: null,
    error: null,
    settings,
    hooks,
  };
}

function transition(state: RequestParserState, next: RequestParserPhase): void {
  if (state.phase !== next) {
    const prev = state.phase;
    state.phase = next;
    state.hooks?.onPhaseChange?.(prev, next);
  }
}

function isTerminal(state: RequestParserState): boolean {
  return state.phase === RequestParserPhase.COMPLETED || state.phase === RequestParserPhase.FAILED;
}

export function pushRequestBytes(state: RequestParserState, chunk: Buffer): void {
  if (isTerminal(state)) {
    return;
  }
  if (state.inputFinished) {
    throw DecodeErrors.internalError('input already finished');
  }
  if (chunk.length === 0) {
    return;
  }

  const unconsumed = state.buffer.subarray(state.offset);
  state.buffer = Buffer.concat([unconsumed, chunk]);
  state.offset = 0;
}

/**
 * Signals that upstream has completed or was closed. Between messages this is
 * a clean end of stream; anywhere else the next pull reports a truncation.
 */
export function finishRequestInput(state: RequestParserState): void {
  state.inputFinished = true;
}

export function getUnconsumedBytes(state: RequestParserState): Buffer {
  return state.buffer.subarray(state.offset);
}

function buildRequestHeaders(
  startLine: RequestStartLine,
  decision: FramingDecision,
  original: readonly HeaderEntry[],
  hostPresent: boolean,
  settings: ParserSettings,
): HeaderEntry[] {
  let headers = decision.headers;

  if (settings.rawRequestUriHeader) {
    headers = [[RAW_REQUEST_URI_HEADER, startLine.rawTarget.toString('ascii')], ...headers];
  }

  if (startLine.method === WELL_KNOWN_METHODS.GET) {
    const upgrade = detectWebSocketUpgrade(original, hostPresent, settings.websocket);
    if (upgrade) {
      headers = [upgrade, ...headers];
    }
  }

  return headers;
}

function parseMessageStart(state: RequestParserState): MessageStart | null {
  const { buffer, offset, settings } = state;

  const startLine = decodeRequestStartLine(buffer, offset, settings);
  if (!startLine) {
    return null;
  }

  const headerBlock = parseHeaderBlock(buffer, startLine.offset, settings.headers);
  if (!headerBlock) {
    return null;
  }

  const { method, target, protocol } = startLine.value;
  const headerSet = headerBlock.value;
  const decision = decideEntityFraming({
    method,
    protocol,
    headers: headerSet,
    buffer,
    bodyStart: headerBlock.offset,
  });

  const { connection } = headerSet;

  return {
    decision,
    output: {
      type: 'request-start',
      method,
      target,
      protocol,
      headers: buildRequestHeaders(
        startLine.value,
        decision,
        headerSet.entries,
        headerSet.hostPresent,
        settings,
      ),
      contentType: headerSet.contentType,
      entity: decision.framing,
      expectsContinue: headerSet.expectsContinue && protocol === HTTP_1_1,
      closeAfterResponse: hasToken(connection, 'close')
        || (protocol === HTTP_1_0 && !hasToken(connection, 'keep-alive')),
    },
  };
}

function needMoreData(state: RequestParserState): RequestOutput {
  if (state.inputFinished) {
    throw DecodeErrors.truncatedStream();
  }
  return NEED_MORE_DATA;
}

function handleAwaitingMessage(state: RequestParserState): RequestOutput {
  if (state.offset >= state.buffer.length) {
    if (state.inputFinished) {
      transition(state, RequestParserPhase.COMPLETED);
      return { type: 'stream-end' };
    }
    return NEED_MORE_DATA;
  }

  const start = parseMessageStart(state);
  if (!start) {
    return needMoreData(state);
  }

  const { decision, output } = start;
  state.offset = decision.offset;

  if (decision.framing.kind === 'deferred-fixed-length') {
    state.remainingBodyBytes = decision.framing.length;
    transition(state, RequestParserPhase.STREAMING_FIXED_BODY);
  } else if (decision.framing.kind === 'deferred-chunked') {
    state.chunkedBody = createChunkedBodyState(state.settings.chunked);
    transition(state, RequestParserPhase.STREAMING_CHUNKED_BODY);
  }

  state.hooks?.onRequestStart?.(output);
  return output;
}

function emitEntityOutput(state: RequestParserState, output: EntityStreamOutput): RequestOutput {
  if (output.type === 'entity-part') {
    state.hooks?.onEntityPart?.(output.data);
    return output;
  }

  state.remainingBodyBytes = 0;
  state.chunkedBody = null;
  transition(state, RequestParserPhase.AWAITING_MESSAGE);
  state.hooks?.onEntityEnd?.(output.trailers);
  return output;
}

function handleFixedBody(state: RequestParserState): RequestOutput {
  const step = streamFixedLength(state.buffer, state.offset, state.remainingBodyBytes);
  if (!step) {
    return needMoreData(state);
  }
  state.offset = step.offset;
  state.remainingBodyBytes = step.remaining;
  return emitEntityOutput(state, step.output);
}

function handleChunkedBody(state: RequestParserState): RequestOutput {
  const chunkedBody = state.chunkedBody ?? createChunkedBodyState(state.settings.chunked);
  const step = streamChunked(chunkedBody, state.buffer, state.offset);
  if (!step) {
    return needMoreData(state);
  }
  state.offset = step.offset;
  state.chunkedBody = step.state;
  return emitEntityOutput(state, step.output);
}

const phaseHandlers: Partial<Record<RequestParserPhase, (state: RequestParserState) => RequestOutput>> = {
  [RequestParserPhase.AWAITING_MESSAGE]: handleAwaitingMessage,
  [RequestParserPhase.STREAMING_FIXED_BODY]: handleFixedBody,
  [RequestParserPhase.STREAMING_CHUNKED_BODY]: handleChunkedBody,
};

/**
 * Produces the next output for the connection. Called whenever downstream is
 * ready for one more event; a `need-more-data` result means the driver should
 * push more bytes before pulling again.
 */
export function pullRequestOutput(state: RequestParserState): RequestOutput {
  const handler = phaseHandlers[state.phase];
  if (!handler) {
    throw DecodeErrors.internalError(`cannot pull from a parser in phase "${state.phase}"`);
  }

  try {
    return handler(state);
  } catch (error) {
    const httpError = toHttpDecodeError(error);
    state.error = httpError;
    transition(state, RequestParserPhase.FAILED);
    state.hooks?.onError?.(httpError);
    return {
      type: 'failure',
      status: httpError.status,
      error: httpError,
    };
  }
}

export function isParserFinished(state: RequestParserState): boolean {
  return isTerminal(state);
}
