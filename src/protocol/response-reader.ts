/**
 * Response Reader
 *
 * Accumulates bytes from a connection and decodes complete responses as
 * they become available. Chunks are queued without copying them together
 * until the decoder's hint says enough bytes have arrived to try again.
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'events';
import { previewLine } from '../encoding/text.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { DecoderOptions, ReaderOptions } from '../types/config.js';
import { ImapError, ImapLimitError, ImapParseError } from '../types/errors.js';
import type { Response } from '../types/protocol.js';
import { decodeResponse } from './parser.js';

/**
 * Default limit for a pending response in bytes (64 MiB)
 */
export const DEFAULT_MAX_BUFFER_SIZE = 64 * 1024 * 1024;

const LF = 0x0a;

/**
 * ResponseReader events interface for type safety
 */
export interface ResponseReaderEvents {
  response: (response: Response) => void;
  error: (err: ImapParseError | ImapLimitError) => void;
  end: () => void;
}

/**
 * Literal size announced at the end of a line (`... {42}\r\n`), or null
 */
function announcedLiteral(line: Buffer): number | null {
  const match = /\{(\d+)\}\r?\n$/.exec(line.toString('latin1'));
  return match ? Number(match[1]) : null;
}

/**
 * Byte accumulator emitting decoded responses in arrival order
 *
 * Malformed or oversized input is reported through the `error` event and
 * skipped up to the end of its line, and past any literal that line
 * announces; the reader resumes with the response after it. A reader
 * cannot be reused once `end()` has been called.
 */
export class ResponseReader extends EventEmitter {
  private chunks: Buffer[] = [];
  private pendingBytes = 0;
  /** Bytes that must still arrive before decoding is worth retrying */
  private awaiting = 0;
  /** Dropping the rest of a malformed line */
  private skipLine = false;
  /** Dropping a literal body announced by a malformed line */
  private skipLiteral = 0;
  private ended = false;
  private decoderOptions: DecoderOptions;
  private maxBufferSize: number;
  private logger: Logger;

  constructor(options?: ReaderOptions) {
    super();
    this.decoderOptions = options?.decoder ?? {};
    this.maxBufferSize = options?.maxBufferSize ?? DEFAULT_MAX_BUFFER_SIZE;
    this.logger = options?.logger ?? silentLogger;
  }

  /**
   * Number of bytes received but not yet decoded
   */
  get bufferedBytes(): number {
    return this.pendingBytes;
  }

  override on<E extends keyof ResponseReaderEvents>(event: E, listener: ResponseReaderEvents[E]): this {
    return super.on(event, listener);
  }

  override once<E extends keyof ResponseReaderEvents>(event: E, listener: ResponseReaderEvents[E]): this {
    return super.once(event, listener);
  }

  override emit<E extends keyof ResponseReaderEvents>(
    event: E,
    ...args: Parameters<ResponseReaderEvents[E]>
  ): boolean {
    return super.emit(event, ...args);
  }

  /**
   * Appends a chunk and emits every response it completes
   * @throws ImapError if called after end()
   */
  push(chunk: Uint8Array): void {
    if (this.ended) {
      throw new ImapError('Cannot push data: reader has ended', 'READER_ENDED', 'state');
    }

    let data: Buffer = Buffer.from(chunk);
    if (this.skipLine || this.skipLiteral > 0) {
      data = this.skipMalformed(data);
    }
    if (data.length === 0) return;

    this.chunks.push(data);
    this.pendingBytes += data.length;
    this.awaiting = Math.max(0, this.awaiting - data.length);
    if (this.awaiting > 0) return;

    this.processBuffer();
  }

  /**
   * Signals that no more input will arrive
   */
  end(): void {
    if (this.ended) return;
    this.ended = true;

    if (this.pendingBytes > 0) {
      const rawData = previewLine(this.takeBuffer());
      this.logger.warn('Input ended mid-response', { bufferedBytes: this.pendingBytes });
      this.clear();
      this.emit('error', new ImapParseError('Input ended mid-response', rawData));
    }
    this.emit('end');
  }

  /**
   * Joins the queued chunks into one buffer
   */
  private takeBuffer(): Buffer {
    if (this.chunks.length !== 1) {
      this.chunks = [Buffer.concat(this.chunks, this.pendingBytes)];
    }
    return this.chunks[0] ?? Buffer.alloc(0);
  }

  private clear(): void {
    this.chunks = [];
    this.pendingBytes = 0;
    this.awaiting = 0;
  }

  /**
   * Decode complete responses from the front of the buffer
   */
  private processBuffer(): void {
    let buffer = this.takeBuffer();

    while (buffer.length > 0) {
      const result = decodeResponse(buffer, this.decoderOptions);

      if (result.status === 'success') {
        buffer = buffer.subarray(result.consumed);
        this.logger.debug('Decoded response', { type: result.response.type, consumed: result.consumed });
        this.emit('response', result.response);
        continue;
      }

      if (result.status === 'syntax-error') {
        const rawData = previewLine(buffer);
        this.logger.warn('Discarding malformed response', { line: rawData });
        this.skipLine = true;
        buffer = this.skipMalformed(buffer);
        this.emit('error', new ImapParseError('Malformed IMAP response', rawData));
        continue;
      }

      // The hint is a lower bound on the bytes the response still lacks
      const required = buffer.length + (result.needed ?? 0);
      if (required > this.maxBufferSize) {
        this.logger.warn('Pending response exceeds buffer limit', { limit: this.maxBufferSize, actual: required });
        // Walk the dropped bytes so the rest of this response is skipped too
        this.skipLine = true;
        this.skipMalformed(buffer);
        this.clear();
        this.emit(
          'error',
          new ImapLimitError(`Pending response exceeds ${this.maxBufferSize} bytes`, this.maxBufferSize, required)
        );
        return;
      }

      this.logger.debug('Waiting for more input', { bufferedBytes: buffer.length, needed: result.needed });
      this.chunks = [buffer];
      this.pendingBytes = buffer.length;
      this.awaiting = result.needed ?? 0;
      return;
    }

    this.clear();
  }

  /**
   * Drops the remainder of a malformed response from the front of data
   * @returns The bytes after it
   */
  private skipMalformed(data: Buffer): Buffer {
    let rest = data;

    while (rest.length > 0 && (this.skipLine || this.skipLiteral > 0)) {
      if (this.skipLiteral > 0) {
        const skipped = Math.min(this.skipLiteral, rest.length);
        this.skipLiteral -= skipped;
        rest = rest.subarray(skipped);
        continue;
      }

      const eol = rest.indexOf(LF);
      if (eol === -1) return Buffer.alloc(0);

      const literalSize = announcedLiteral(rest.subarray(0, eol + 1));
      rest = rest.subarray(eol + 1);
      if (literalSize === null) {
        this.skipLine = false;
      } else {
        // The line continues after the literal body
        this.skipLiteral = literalSize;
      }
    }

    return rest;
  }
}
