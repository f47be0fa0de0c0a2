/**
 * Protocol types for imap-response-decoder
 */

import type { AttributeValue } from './message.js';
import type { MailboxDatum } from './mailbox.js';

/**
 * Client-chosen tag correlating a tagged response with its command
 */
export type RequestId = string;

/**
 * Response status (resp-cond-state, resp-cond-auth and resp-cond-bye)
 */
export type Status = 'OK' | 'NO' | 'BAD' | 'PREAUTH' | 'BYE';

/**
 * Bracketed response code carried in resp-text
 */
export type ResponseCode =
  | { type: 'PERMANENTFLAGS'; flags: string[] }
  | { type: 'UIDVALIDITY'; value: number }
  | { type: 'UIDNEXT'; value: number }
  | { type: 'UNSEEN'; value: number }
  /** CONDSTORE (RFC 7162) */
  | { type: 'HIGHESTMODSEQ'; value: bigint }
  | { type: 'NOMODSEQ' }
  | { type: 'READ-ONLY' }
  | { type: 'READ-WRITE' }
  | { type: 'TRYCREATE' }
  | { type: 'ALERT' };

/**
 * Tagged completion: `A001 OK [READ-WRITE] SELECT completed`
 */
export interface DoneResponse {
  type: 'done';
  tag: RequestId;
  status: Status;
  code: ResponseCode | null;
  text: string | null;
}

/**
 * Untagged condition: `* OK [UIDNEXT 4392] Predicted next UID`
 */
export interface DataResponse {
  type: 'data';
  status: Status;
  code: ResponseCode | null;
  text: string | null;
}

/**
 * `* CAPABILITY IMAP4rev1 STARTTLS`
 */
export interface CapabilitiesResponse {
  type: 'capabilities';
  capabilities: string[];
}

/**
 * FLAGS, EXISTS, RECENT, SEARCH and LIST/LSUB data
 */
export interface MailboxDataResponse {
  type: 'mailbox-data';
  datum: MailboxDatum;
}

/**
 * `* 12 FETCH (UID 4827 FLAGS (\Seen))`
 */
export interface FetchResponse {
  type: 'fetch';
  /** Message sequence number */
  seq: number;
  /** Attributes in the order the server sent them */
  attributes: AttributeValue[];
}

/**
 * `* 3 EXPUNGE`
 */
export interface ExpungeResponse {
  type: 'expunge';
  seq: number;
}

/**
 * Continuation request: `+ Ready for literal data`
 */
export interface ContinueResponse {
  type: 'continue';
  code: ResponseCode | null;
  text: string | null;
}

/**
 * One decoded server response
 */
export type Response =
  | DoneResponse
  | DataResponse
  | CapabilitiesResponse
  | MailboxDataResponse
  | FetchResponse
  | ExpungeResponse
  | ContinueResponse;

/**
 * Outcome of decoding one response from the front of a buffer
 */
export type DecodeResult =
  | {
      status: 'success';
      response: Response;
      /** Bytes up to and including the terminating CRLF */
      consumed: number;
    }
  | {
      status: 'incomplete';
      /** Minimum number of additional bytes, or null when unknown */
      needed: number | null;
    }
  | { status: 'syntax-error' };
