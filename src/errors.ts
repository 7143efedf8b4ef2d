export enum HttpDecodeErrorCode {
  METHOD_TOO_LONG = 'METHOD_TOO_LONG',
  WRONG_PROTOCOL = 'WRONG_PROTOCOL',
  UNSUPPORTED_METHOD = 'UNSUPPORTED_METHOD',
  URI_TOO_LONG = 'URI_TOO_LONG',
  INVALID_REQUEST_TARGET = 'INVALID_REQUEST_TARGET',
  UNSUPPORTED_HTTP_VERSION = 'UNSUPPORTED_HTTP_VERSION',
  INVALID_LINE_ENDING = 'INVALID_LINE_ENDING',

  INVALID_HEADER = 'INVALID_HEADER',
  HEADER_TOO_LARGE = 'HEADER_TOO_LARGE',
  HEADER_TOO_MANY = 'HEADER_TOO_MANY',
  INVALID_CONTENT_LENGTH = 'INVALID_CONTENT_LENGTH',
  MISSING_HOST = 'MISSING_HOST',

  CONFLICTING_FRAMING = 'CONFLICTING_FRAMING',
  ENTITY_NOT_ALLOWED = 'ENTITY_NOT_ALLOWED',

  INVALID_CHUNKED_ENCODING = 'INVALID_CHUNKED_ENCODING',
  INVALID_CHUNK_SIZE = 'INVALID_CHUNK_SIZE',
  CHUNK_SIZE_TOO_LARGE = 'CHUNK_SIZE_TOO_LARGE',
  CHUNK_EXTENSION_TOO_LARGE = 'CHUNK_EXTENSION_TOO_LARGE',
  INVALID_TRAILER = 'INVALID_TRAILER',
  TRAILER_TOO_LARGE = 'TRAILER_TOO_LARGE',

  TRUNCATED_STREAM = 'TRUNCATED_STREAM',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export enum HttpDecodeErrorCategory {
  SYNTAX = 'syntax',
  SIZE_LIMIT = 'size_limit',
  UNSUPPORTED = 'unsupported',
  FRAMING = 'framing',
  STATE = 'state',
  INTERNAL = 'internal',
}

export const ERROR_CATEGORY: Record<HttpDecodeErrorCode, HttpDecodeErrorCategory> = {
  [HttpDecodeErrorCode.METHOD_TOO_LONG]: HttpDecodeErrorCategory.SIZE_LIMIT,
  [HttpDecodeErrorCode.WRONG_PROTOCOL]: HttpDecodeErrorCategory.UNSUPPORTED,
  [HttpDecodeErrorCode.UNSUPPORTED_METHOD]: HttpDecodeErrorCategory.UNSUPPORTED,
  [HttpDecodeErrorCode.URI_TOO_LONG]: HttpDecodeErrorCategory.SIZE_LIMIT,
  [HttpDecodeErrorCode.INVALID_REQUEST_TARGET]: HttpDecodeErrorCategory.SYNTAX,
  [HttpDecodeErrorCode.UNSUPPORTED_HTTP_VERSION]: HttpDecodeErrorCategory.UNSUPPORTED,
  [HttpDecodeErrorCode.INVALID_LINE_ENDING]: HttpDecodeErrorCategory.SYNTAX,

  [HttpDecodeErrorCode.INVALID_HEADER]: HttpDecodeErrorCategory.SYNTAX,
  [HttpDecodeErrorCode.HEADER_TOO_LARGE]: HttpDecodeErrorCategory.SIZE_LIMIT,
  [HttpDecodeErrorCode.HEADER_TOO_MANY]: HttpDecodeErrorCategory.SIZE_LIMIT,
  [HttpDecodeErrorCode.INVALID_CONTENT_LENGTH]: HttpDecodeErrorCategory.FRAMING,
  [HttpDecodeErrorCode.MISSING_HOST]: HttpDecodeErrorCategory.SYNTAX,

  [HttpDecodeErrorCode.CONFLICTING_FRAMING]: HttpDecodeErrorCategory.FRAMING,
  [HttpDecodeErrorCode.ENTITY_NOT_ALLOWED]: HttpDecodeErrorCategory.FRAMING,

  [HttpDecodeErrorCode.INVALID_CHUNKED_ENCODING]: HttpDecodeErrorCategory.FRAMING,
  [HttpDecodeErrorCode.INVALID_CHUNK_SIZE]: HttpDecodeErrorCategory.FRAMING,
  [HttpDecodeErrorCode.CHUNK_SIZE_TOO_LARGE]: HttpDecodeErrorCategory.SIZE_LIMIT,
  [HttpDecodeErrorCode.CHUNK_EXTENSION_TOO_LARGE]: HttpDecodeErrorCategory.SIZE_LIMIT,
  [HttpDecodeErrorCode.INVALID_TRAILER]: HttpDecodeErrorCategory.SYNTAX,
  [HttpDecodeErrorCode.TRAILER_TOO_LARGE]: HttpDecodeErrorCategory.SIZE_LIMIT,

  [HttpDecodeErrorCode.TRUNCATED_STREAM]: HttpDecodeErrorCategory.STATE,
  [HttpDecodeErrorCode.INTERNAL_ERROR]: HttpDecodeErrorCategory.INTERNAL,
};

export const ERROR_STATUS: Record<HttpDecodeErrorCode, number> = {
  [HttpDecodeErrorCode.METHOD_TOO_LONG]: 400,
  [HttpDecodeErrorCode.WRONG_PROTOCOL]: 400,
  [HttpDecodeErrorCode.UNSUPPORTED_METHOD]: 501,
  [HttpDecodeErrorCode.URI_TOO_LONG]: 414,
  [HttpDecodeErrorCode.INVALID_REQUEST_TARGET]: 400,
  [HttpDecodeErrorCode.UNSUPPORTED_HTTP_VERSION]: 505,
  [HttpDecodeErrorCode.INVALID_LINE_ENDING]: 400,

  [HttpDecodeErrorCode.INVALID_HEADER]: 400,
  [HttpDecodeErrorCode.HEADER_TOO_LARGE]: 431,
  [HttpDecodeErrorCode.HEADER_TOO_MANY]: 431,
  [HttpDecodeErrorCode.INVALID_CONTENT_LENGTH]: 400,
  [HttpDecodeErrorCode.MISSING_HOST]: 400,

  [HttpDecodeErrorCode.CONFLICTING_FRAMING]: 400,
  [HttpDecodeErrorCode.ENTITY_NOT_ALLOWED]: 422,

  [HttpDecodeErrorCode.INVALID_CHUNKED_ENCODING]: 400,
  [HttpDecodeErrorCode.INVALID_CHUNK_SIZE]: 400,
  [HttpDecodeErrorCode.CHUNK_SIZE_TOO_LARGE]: 400,
  [HttpDecodeErrorCode.CHUNK_EXTENSION_TOO_LARGE]: 400,
  [HttpDecodeErrorCode.INVALID_TRAILER]: 400,
  [HttpDecodeErrorCode.TRAILER_TOO_LARGE]: 431,

  [HttpDecodeErrorCode.TRUNCATED_STREAM]: 400,
  [HttpDecodeErrorCode.INTERNAL_ERROR]: 500,
};

export interface HttpDecodeErrorOptions {
  code: HttpDecodeErrorCode;
  message: string;
  cause?: unknown;
}

export class HttpDecodeError extends Error {
  public readonly code: HttpDecodeErrorCode;
  public readonly category: HttpDecodeErrorCategory;
  public readonly status: number;

  constructor(options: HttpDecodeErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'HttpDecodeError';
    this.code = options.code;
    this.category = ERROR_CATEGORY[options.code];
    this.status = ERROR_STATUS[options.code];
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpDecodeError);
    }
  }
}

function createCustomError(code: string, defaultMessage: string) {
  return class extends Error {
    public readonly code: string;

    constructor(message?: string) {
      super(message ?? defaultMessage);
      this.name = this.constructor.name;
      this.code = code;
      if (Error.captureStackTrace) {
        Error.captureStackTrace(this, this.constructor);
      }
    }
  };
}

export class HttpUrlParseError extends createCustomError(
  'ERR_HTTP_URL_PARSE',
  'Http Url Parse Error',
) {}

export const DecodeErrors = {
  methodTooLong: (prefix: string, limit: number) => new HttpDecodeError({
    code: HttpDecodeErrorCode.METHOD_TOO_LONG,
    message: `HTTP method too long (started with '${prefix}'), exceeds limit of ${limit} bytes`,
  }),

  wrongProtocol: () => new HttpDecodeError({
    code: HttpDecodeErrorCode.WRONG_PROTOCOL,
    message: 'The HTTP method started with 0x16 rather than any known HTTP method. '
      + 'Perhaps this was an HTTPS request sent to an HTTP endpoint?',
  }),

  unsupportedMethod: (method: string) => new HttpDecodeError({
    code: HttpDecodeErrorCode.UNSUPPORTED_METHOD,
    message: `Unsupported HTTP method: ${method}`,
  }),

  uriTooLong: (limit: number) => new HttpDecodeError({
    code: HttpDecodeErrorCode.URI_TOO_LONG,
    message: `URI length exceeds the configured limit of ${limit} characters`,
  }),

  invalidRequestTarget: (cause: Error) => new HttpDecodeError({
    code: HttpDecodeErrorCode.INVALID_REQUEST_TARGET,
    message: `Invalid request target: ${cause.message}`,
    cause,
  }),

  unsupportedHttpVersion: () => new HttpDecodeError({
    code: HttpDecodeErrorCode.UNSUPPORTED_HTTP_VERSION,
    message: 'HTTP version not supported',
  }),

  invalidLineEnding: () => new HttpDecodeError({
    code: HttpDecodeErrorCode.INVALID_LINE_ENDING,
    message: 'CR not followed by LF',
  }),

  invalidHeader: (detail: string) => new HttpDecodeError({
    code: HttpDecodeErrorCode.INVALID_HEADER,
    message: `Invalid header: ${detail}`,
  }),

  headerTooLarge: (detail: string, limit: number) => new HttpDecodeError({
    code: HttpDecodeErrorCode.HEADER_TOO_LARGE,
    message: `${detail} exceeds limit (${limit} bytes)`,
  }),

  headerTooMany: (limit: number) => new HttpDecodeError({
    code: HttpDecodeErrorCode.HEADER_TOO_MANY,
    message: `HTTP message contains more than the configured limit of ${limit} headers`,
  }),

  invalidContentLength: (value: string) => new HttpDecodeError({
    code: HttpDecodeErrorCode.INVALID_CONTENT_LENGTH,
    message: `Invalid Content-Length: "${value}"`,
  }),

  missingHost: () => new HttpDecodeError({
    code: HttpDecodeErrorCode.MISSING_HOST,
    message: 'Request is missing required `Host` header',
  }),

  conflictingFraming: () => new HttpDecodeError({
    code: HttpDecodeErrorCode.CONFLICTING_FRAMING,
    message: 'A chunked request must not contain a Content-Length header',
  }),

  entityNotAllowed: (method: string) => new HttpDecodeError({
    code: HttpDecodeErrorCode.ENTITY_NOT_ALLOWED,
    message: `${method} requests must not have an entity`,
  }),

  truncatedStream: () => new HttpDecodeError({
    code: HttpDecodeErrorCode.TRUNCATED_STREAM,
    message: 'Connection closed before the message was complete',
  }),

  internalError: (detail: string, cause?: unknown) => new HttpDecodeError({
    code: HttpDecodeErrorCode.INTERNAL_ERROR,
    message: `Internal error: ${detail}`,
    cause,
  }),
} as const;

export function toHttpDecodeError(error: unknown): HttpDecodeError {
  if (error instanceof HttpDecodeError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return DecodeErrors.internalError(detail, error);
}
