/**
 * Message types for imap-response-decoder
 */

/**
 * Represents an email address from an ENVELOPE
 *
 * Every field may be NIL on the wire. Group syntax (RFC 2822) is carried
 * as addresses with a null host.
 */
export interface Address {
  /** Display name */
  name: string | null;
  /** Source route (at-domain-list) */
  adl: string | null;
  /** Mailbox part (before @) */
  mailbox: string | null;
  /** Host part (after @) */
  host: string | null;
}

/**
 * Message envelope (RFC 2822 header information)
 *
 * Address fields are null when the server sent NIL.
 */
export interface Envelope {
  date: string | null;
  subject: string | null;
  from: Address[] | null;
  sender: Address[] | null;
  replyTo: Address[] | null;
  to: Address[] | null;
  cc: Address[] | null;
  bcc: Address[] | null;
  inReplyTo: string | null;
  messageId: string | null;
}

/**
 * One message attribute from a FETCH response
 */
export type AttributeValue =
  | { type: 'ENVELOPE'; envelope: Envelope }
  | { type: 'INTERNALDATE'; date: string }
  | { type: 'FLAGS'; flags: string[] }
  | { type: 'RFC822'; raw: string | null }
  | { type: 'RFC822.SIZE'; size: number }
  | { type: 'MODSEQ'; modSeq: bigint }
  | { type: 'UID'; uid: number };
