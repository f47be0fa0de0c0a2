/**
 * Mailbox types for imap-response-decoder
 */

/**
 * Untagged mailbox data
 */
export type MailboxDatum =
  | { type: 'FLAGS'; flags: string[] }
  | { type: 'EXISTS'; count: number }
  | { type: 'RECENT'; count: number }
  | {
      type: 'SEARCH';
      ids: number[];
      /** Trailing `(MODSEQ n)` from a CONDSTORE search, if present */
      modSeq: bigint | null;
    }
  | {
      type: 'LIST' | 'LSUB';
      /** Mailbox attributes (e.g., \Noselect, \HasChildren) */
      attributes: string[];
      /** Hierarchy delimiter, null for a flat namespace */
      delimiter: string | null;
      name: string;
    };

/**
 * Represents a selected mailbox with its status
 */
export interface MailboxState {
  /** Mailbox name */
  name: string;
  /** Whether the mailbox is opened in read-only mode */
  readOnly: boolean;
  /** UID validity value */
  uidvalidity: number;
  /** Next UID to be assigned */
  uidnext: number;
  /** Available flags for this mailbox */
  flags: string[];
  /** Permanent flags that can be set */
  permFlags: string[];
  /** Highest mod-sequence (CONDSTORE), undefined after NOMODSEQ or when never sent */
  highestModseq?: bigint;
  /** Message counts */
  messages: {
    /** Total number of messages */
    total: number;
    /** Number of new messages */
    new: number;
    /** Sequence number of the first unseen message */
    unseen: number;
  };
}
