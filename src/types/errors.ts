/**
 * Error types for imap-response-decoder
 */

/**
 * Error source categories
 */
export type ErrorSource = 'parse' | 'limit' | 'state';

/**
 * Base IMAP error class
 */
export class ImapError extends Error {
  /** Error code */
  code: string;
  /** Error source category */
  source: ErrorSource;

  constructor(message: string, code: string, source: ErrorSource) {
    super(message);
    this.name = 'ImapError';
    this.code = code;
    this.source = source;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Parse error (bytes that can never form a valid response)
 */
export class ImapParseError extends ImapError {
  override source: 'parse' = 'parse';
  /** Raw data that failed to parse */
  rawData: string;

  constructor(message: string, rawData: string) {
    super(message, 'PARSE_ERROR', 'parse');
    this.name = 'ImapParseError';
    this.rawData = rawData;
  }
}

/**
 * Limit error (a pending response outgrew the configured buffer)
 */
export class ImapLimitError extends ImapError {
  override source: 'limit' = 'limit';
  /** Configured limit in bytes */
  limit: number;
  /** Bytes buffered when the limit was hit */
  actual: number;

  constructor(message: string, limit: number, actual: number) {
    super(message, 'LIMIT_ERROR', 'limit');
    this.name = 'ImapLimitError';
    this.limit = limit;
    this.actual = actual;
  }
}
