import {
  DEFAULT_CHUNKED_BODY_LIMITS,
  DEFAULT_HEADER_LIMITS,
  DEFAULT_PARSER_SETTINGS,
  TOKEN_REG,
  WELL_KNOWN_METHODS,
} from './specs.js';
import type {
  CustomMethodOptions,
  ParserSettings,
  ParserSettingsInput,
} from './types.js';

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value)) {
    throw new TypeError(`${name} must be an integer`);
  }
  if (value <= 0) {
    throw new RangeError(`${name} must be greater than 0, got ${value}`);
  }
}

function resolveCustomMethods(
  input: Record<string, CustomMethodOptions>,
  maxMethodLength: number,
): Readonly<Record<string, CustomMethodOptions>> {
  const methods: Record<string, CustomMethodOptions> = {};

  for (const [name, options] of Object.entries(input)) {
    if (!TOKEN_REG.test(name)) {
      throw new TypeError(`Custom method "${name}" is not a valid token`);
    }
    if (name.length > maxMethodLength) {
      throw new RangeError(`Custom method "${name}" is longer than maxMethodLength (${maxMethodLength})`);
    }
    if (Object.hasOwn(WELL_KNOWN_METHODS, name)) {
      throw new TypeError(`Custom method "${name}" shadows a standard method`);
    }
    methods[name] = Object.freeze({ entityAccepted: options.entityAccepted });
  }

  return Object.freeze(methods);
}

/** Merges user settings over the defaults, validates them and freezes the result. */
export function resolveParserSettings(input: ParserSettingsInput = {}): ParserSettings {
  const headers = Object.freeze({ ...DEFAULT_HEADER_LIMITS, ...input.headers });
  const chunked = Object.freeze({ ...DEFAULT_CHUNKED_BODY_LIMITS, ...input.chunked });
  const maxMethodLength = input.maxMethodLength ?? DEFAULT_PARSER_SETTINGS.maxMethodLength;
  const maxUriLength = input.maxUriLength ?? DEFAULT_PARSER_SETTINGS.maxUriLength;
  const uriParsingMode = input.uriParsingMode ?? DEFAULT_PARSER_SETTINGS.uriParsingMode;

  assertPositiveInteger('maxMethodLength', maxMethodLength);
  assertPositiveInteger('maxUriLength', maxUriLength);

  for (const [name, value] of Object.entries(headers)) {
    assertPositiveInteger(`headers.${name}`, value);
  }

  for (const [name, value] of Object.entries(chunked)) {
    if (name === 'maxChunkExtensionLength') {
      if (!Number.isInteger(value) || value < 0) {
        throw new RangeError(`chunked.${name} must be a non-negative integer`);
      }
      continue;
    }
    assertPositiveInteger(`chunked.${name}`, value);
  }

  if (uriParsingMode !== 'strict' && uriParsingMode !== 'relaxed') {
    throw new TypeError(`Unknown uriParsingMode: ${String(uriParsingMode)}`);
  }

  return Object.freeze({
    maxMethodLength,
    maxUriLength,
    customMethods: resolveCustomMethods(input.customMethods ?? {}, maxMethodLength),
    uriParsingMode,
    rawRequestUriHeader: input.rawRequestUriHeader ?? DEFAULT_PARSER_SETTINGS.rawRequestUriHeader,
    headers,
    chunked,
    websocket: Object.freeze({ ...DEFAULT_PARSER_SETTINGS.websocket, ...input.websocket }),
  });
}
