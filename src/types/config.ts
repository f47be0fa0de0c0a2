/**
 * Configuration types for imap-response-decoder
 */

import type { Logger } from '../logging/logger.js';

/**
 * How string content (quoted strings, literals, atoms, text) becomes a JS string
 *
 * - `utf8`: strict; invalid UTF-8 makes the response a syntax error
 * - `utf8-lossy`: invalid sequences become U+FFFD
 * - `latin1`: one character per byte, so binary literal bodies survive
 *   intact and can be recovered with `Buffer.from(value, 'latin1')`
 */
export type TextEncoding = 'utf8' | 'utf8-lossy' | 'latin1';

/**
 * Options for decodeResponse
 */
export interface DecoderOptions {
  /** Text decoding applied to string content (default: 'utf8') */
  textEncoding?: TextEncoding;
}

/**
 * Options for ResponseReader
 */
export interface ReaderOptions {
  /** Options passed to every decodeResponse call */
  decoder?: DecoderOptions;
  /**
   * Largest number of bytes kept while a response is incomplete
   * (default: 64 MiB). Large FETCH literals count against it.
   */
  maxBufferSize?: number;
  /** Logger for decode tracing (default: silent) */
  logger?: Logger;
}
