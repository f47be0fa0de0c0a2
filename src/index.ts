/**
 * imap-response-decoder - An incremental decoder for IMAP4rev1 server responses
 *
 * Given the bytes received so far, decodeResponse returns one complete
 * response and the bytes it used, reports that more input is needed, or
 * rejects the input as malformed.
 *
 * @packageDocumentation
 */

// Export all types
export * from './types/index.js';

// Export text decoding utilities
export * from './encoding/index.js';

// Export protocol layer
export * from './protocol/index.js';

// Export logging
export * from './logging/index.js';
