/**
 * Byte-to-string decoding for response content
 *
 * Uses Node.js Buffer and the global TextDecoder only (zero dependencies).
 */

import type { TextEncoding } from '../types/config.js';

// A leading U+FEFF is content, not a byte order mark
const strictUtf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Turns a byte range into a string
 *
 * @param bytes - Source buffer
 * @param start - First byte (inclusive)
 * @param end - Last byte (exclusive)
 * @param encoding - Decoding mode
 * @returns The decoded string, or null if strict UTF-8 decoding rejects the bytes
 */
export function decodeText(
  bytes: Uint8Array,
  start: number,
  end: number,
  encoding: TextEncoding = 'utf8'
): string | null {
  const slice = bytes.subarray(start, end);

  switch (encoding) {
    case 'latin1':
      return Buffer.from(slice).toString('latin1');
    case 'utf8-lossy':
      return Buffer.from(slice).toString('utf8');
    case 'utf8':
      try {
        return strictUtf8.decode(slice);
      } catch (err) {
        if (err instanceof TypeError) {
          return null;
        }
        throw err;
      }
  }
}

/**
 * Encodes a string for the wire
 *
 * Inverse of decodeText for the same encoding ('utf8-lossy' encodes as UTF-8).
 */
export function encodeText(value: string, encoding: TextEncoding = 'utf8'): Buffer {
  return Buffer.from(value, encoding === 'latin1' ? 'latin1' : 'utf8');
}

/**
 * Byte length of a string once encoded
 */
export function encodedLength(value: string, encoding: TextEncoding = 'utf8'): number {
  return Buffer.byteLength(value, encoding === 'latin1' ? 'latin1' : 'utf8');
}

/**
 * First line of a buffer as printable text, for error reports
 *
 * @param bytes - Raw response bytes
 * @param maxLength - Longest preview returned (default: 200)
 */
export function previewLine(bytes: Uint8Array, maxLength = 200): string {
  let end = bytes.indexOf(0x0d);
  if (end === -1) end = bytes.indexOf(0x0a);
  if (end === -1) end = bytes.length;
  const line = Buffer.from(bytes.subarray(0, Math.min(end, maxLength))).toString('utf8');
  return end > maxLength ? `${line}...` : line;
}
