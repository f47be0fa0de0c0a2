/**
 * Type exports for imap-response-decoder
 */

// Configuration types
export type { DecoderOptions, ReaderOptions, TextEncoding } from './config.js';

// Mailbox types
export type { MailboxDatum, MailboxState } from './mailbox.js';

// Message types
export type { Address, Envelope, AttributeValue } from './message.js';

// Protocol types
export type {
  RequestId,
  Status,
  ResponseCode,
  Response,
  DoneResponse,
  DataResponse,
  CapabilitiesResponse,
  MailboxDataResponse,
  FetchResponse,
  ExpungeResponse,
  ContinueResponse,
  DecodeResult
} from './protocol.js';

// Error types
export { ImapError, ImapParseError, ImapLimitError } from './errors.js';

export type { ErrorSource } from './errors.js';
