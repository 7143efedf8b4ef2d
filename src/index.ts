export {
  ChunkedBodyPhase,
  type ChunkedBodyState,
  type ChunkedStep,
  createChunkedBodyState,
  streamChunked,
} from './decode/chunked-body.js';
export {
  decideEntityFraming,
  type FramingDecision,
  type FramingInput,
} from './decode/entity-framing.js';
export { type FixedLengthStep, streamFixedLength } from './decode/fixed-length-body.js';
export { parseHeaderBlock } from './decode/headers.js';
export { decodeMethod } from './decode/method.js';
export {
  createPipelineState,
  endRequest,
  getError,
  hasError,
  isFinished,
  pipe,
  type PipelineState,
  pushAll,
  pushRequest,
  subscribe,
  unsubscribe,
} from './decode/pipeline.js';
export {
  createRequestParser,
  finishRequestInput,
  getUnconsumedBytes,
  isParserFinished,
  pullRequestOutput,
  pushRequestBytes,
  type RequestParserHooks,
  type RequestParserState,
} from './decode/request-parser.js';
export { RequestParserStream, type RequestParserStreamOptions } from './decode/request-stream.js';
export { decodeRequestTarget } from './decode/request-target.js';
export { decodeProtocol, decodeRequestStartLine, type RequestStartLine } from './decode/start-line.js';
export { parseHttpRequestTarget } from './decode/uri.js';
export { computeAcceptKey, detectWebSocketUpgrade } from './decode/websocket.js';
export {
  DecodeErrors,
  ERROR_CATEGORY,
  ERROR_STATUS,
  HttpDecodeError,
  HttpDecodeErrorCategory,
  HttpDecodeErrorCode,
  HttpUrlParseError,
} from './errors.js';
export { resolveParserSettings } from './settings.js';
export {
  DEFAULT_PARSER_SETTINGS,
  RAW_REQUEST_URI_HEADER,
  RequestParserPhase,
  UPGRADE_TO_WEBSOCKET_HEADER,
  WELL_KNOWN_METHODS,
} from './specs.js';
export type * from './types.js';
