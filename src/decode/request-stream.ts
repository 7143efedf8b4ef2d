import type { Buffer } from 'node:buffer';
import { Duplex } from 'node:stream';

import type { ParserSettings } from '../types.js';
import {
  createRequestParser,
  finishRequestInput,
  isParserFinished,
  pullRequestOutput,
  pushRequestBytes,
  type RequestParserHooks,
  type RequestParserState,
} from './request-parser.js';

export interface RequestParserStreamOptions {
  settings?: ParserSettings;
  hooks?: RequestParserHooks;
  /** Number of parsed outputs buffered on the readable side. */
  highWaterMark?: number;
}

type Callback = (error?: Error | null) => void;

/**
 * Bytes in, request outputs (`request-start`, `entity-part`, `entity-end`)
 * out. A write is acknowledged only after the parser has consumed everything
 * it can, and the parser is pulled only while the readable side has room.
 */
export class RequestParserStream extends Duplex {
  private readonly parser: RequestParserState;
  private pendingWrite: Callback | null = null;
  private pendingFinal: Callback | null = null;
  private wantsOutput = false;
  private pumping = false;

  constructor(options: RequestParserStreamOptions = {}) {
    super({
      readableObjectMode: true,
      readableHighWaterMark: options.highWaterMark ?? 16,
    });
    this.parser = createRequestParser(options.settings, options.hooks);
  }

  get state(): Readonly<RequestParserState> {
    return this.parser;
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: Callback): void {
    pushRequestBytes(this.parser, chunk);
    this.pendingWrite = callback;
    this.pump();
  }

  override _final(callback: Callback): void {
    finishRequestInput(this.parser);
    this.pendingFinal = callback;
    this.pump();
  }

  override _read(): void {
    this.wantsOutput = true;
    this.pump();
  }

  override _destroy(error: Error | null, callback: Callback): void {
    this.pendingWrite = null;
    this.pendingFinal = null;
    callback(error);
  }

  private releaseWrite(): void {
    const callback = this.pendingWrite;
    this.pendingWrite = null;
    callback?.();
  }

  private releaseFinal(): void {
    const callback = this.pendingFinal;
    this.pendingFinal = null;
    callback?.();
  }

  private pump(): void {
    if (this.pumping) {
      return;
    }
    this.pumping = true;
    try {
      while (this.wantsOutput && !isParserFinished(this.parser)) {
        const output = pullRequestOutput(this.parser);

        if (output.type === 'need-more-data') {
          if (!this.pendingWrite) {
            return;
          }
          // The callback may start the next _write synchronously.
          this.releaseWrite();
          continue;
        }

        if (output.type === 'stream-end') {
          this.push(null);
          this.releaseFinal();
          return;
        }

        if (output.type === 'failure') {
          this.destroy(output.error);
          return;
        }

        this.wantsOutput = this.push(output);
      }
    } finally {
      this.pumping = false;
    }
  }
}
