/**
 * Content decoding utilities for IMAP response handling
 *
 * Implemented with Node.js built-ins only (zero dependencies).
 *
 * @packageDocumentation
 */

export { decodeText, encodeText, encodedLength, previewLine } from './text.js';
