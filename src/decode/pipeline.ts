import type { Buffer } from 'node:buffer';

import type { ParserSettings, RequestOutput, RequestOutputType } from '../types.js';
import {
  createRequestParser,
  finishRequestInput,
  isParserFinished,
  pullRequestOutput,
  pushRequestBytes,
  type RequestParserState,
} from './request-parser.js';

type OutputHandler = (output: RequestOutput) => void;
type OutputSubscriptions = Map<RequestOutputType | '*', readonly OutputHandler[]>;

export interface PipelineState {
  readonly parser: RequestParserState;
  readonly subscriptions: OutputSubscriptions;
}

export const createPipelineState = (settings?: ParserSettings): PipelineState => ({
  parser: createRequestParser(settings),
  subscriptions: new Map(),
});

export const subscribe = (
  state: PipelineState,
  outputType: RequestOutputType | '*',
  handler: OutputHandler,
): PipelineState => {
  const existing = state.subscriptions.get(outputType);
  if (existing?.includes(handler)) {
    return state;
  }

  const subscriptions = new Map(state.subscriptions);
  subscriptions.set(outputType, [...(existing ?? []), handler]);

  return { ...state, subscriptions };
};

export const unsubscribe = (
  state: PipelineState,
  outputType: RequestOutputType | '*',
  handler: OutputHandler,
): PipelineState => {
  const existing = state.subscriptions.get(outputType);
  if (!existing) return state;

  const next = existing.filter((function_) => function_ !== handler);
  if (next.length === existing.length) return state;

  const subscriptions = new Map(state.subscriptions);
  if (next.length === 0) {
    subscriptions.delete(outputType);
  } else {
    subscriptions.set(outputType, next);
  }

  return { ...state, subscriptions };
};

const emitOutput = (
  subscriptions: OutputSubscriptions,
  output: RequestOutput,
): void => {
  subscriptions.get(output.type)?.forEach((handler) => handler(output));
  subscriptions.get('*')?.forEach((handler) => handler(output));
};

// Pulls until the parser needs more input or reaches a terminal phase.
const drain = (state: PipelineState): PipelineState => {
  while (!isParserFinished(state.parser)) {
    const output = pullRequestOutput(state.parser);
    emitOutput(state.subscriptions, output);
    if (output.type === 'need-more-data') {
      break;
    }
  }
  return state;
};

export const pushRequest = (
  state: PipelineState,
  chunk: Buffer,
): PipelineState => {
  pushRequestBytes(state.parser, chunk);
  return drain(state);
};

export const endRequest = (state: PipelineState): PipelineState => {
  finishRequestInput(state.parser);
  return drain(state);
};

export const isFinished = (state: PipelineState): boolean =>
  isParserFinished(state.parser);

export const getError = (state: PipelineState): Error | null =>
  state.parser.error;

export const hasError = (state: PipelineState): boolean =>
  state.parser.error !== null;

export const pipe =
  (...functions: Array<(state: PipelineState) => PipelineState>) =>
  (initial: PipelineState): PipelineState =>
    functions.reduce((state, function_) => function_(state), initial);

export const pushAll =
  (chunks: readonly Buffer[]) =>
  (state: PipelineState): PipelineState =>
    chunks.reduce(pushRequest, state);
