/**
 * Mailbox state from SELECT/EXAMINE responses
 *
 * @packageDocumentation
 */

import type { MailboxState } from '../types/mailbox.js';
import type { Response, ResponseCode } from '../types/protocol.js';

/**
 * Folds the responses of a SELECT/EXAMINE exchange into a MailboxState
 *
 * SELECT responses include multiple untagged responses:
 * * FLAGS (\Answered \Flagged \Deleted \Seen \Draft)
 * * OK [PERMANENTFLAGS (\Answered \Flagged \Deleted \Seen \Draft \*)]
 * * 172 EXISTS
 * * 1 RECENT
 * * OK [UNSEEN 12]
 * * OK [UIDVALIDITY 3857529045]
 * * OK [UIDNEXT 4392]
 * A142 OK [READ-WRITE] SELECT completed
 *
 * @param responses - Decoded responses, in arrival order
 * @param mailboxName - Name of the selected mailbox
 * @param readOnly - Whether the mailbox was opened read-only (EXAMINE vs SELECT)
 * @returns Mailbox state; responses that carry no mailbox state are ignored
 */
export function buildMailboxState(
  responses: Iterable<Response>,
  mailboxName: string,
  readOnly: boolean = false
): MailboxState {
  const mailbox: MailboxState = {
    name: mailboxName,
    readOnly,
    uidvalidity: 0,
    uidnext: 0,
    flags: [],
    permFlags: [],
    messages: {
      total: 0,
      new: 0,
      unseen: 0
    }
  };

  for (const response of responses) {
    applyMailboxResponse(mailbox, response);
  }

  return mailbox;
}

/**
 * Updates a mailbox state with one response
 */
export function applyMailboxResponse(mailbox: MailboxState, response: Response): void {
  switch (response.type) {
    case 'mailbox-data': {
      const { datum } = response;
      if (datum.type === 'EXISTS') {
        mailbox.messages.total = datum.count;
      } else if (datum.type === 'RECENT') {
        mailbox.messages.new = datum.count;
      } else if (datum.type === 'FLAGS') {
        mailbox.flags = [...datum.flags];
      }
      break;
    }

    case 'data':
    case 'done':
      if (response.status === 'OK' && response.code !== null) {
        applyCode(mailbox, response.code);
      }
      break;
  }
}

/**
 * Applies an OK response code
 */
function applyCode(mailbox: MailboxState, code: ResponseCode): void {
  switch (code.type) {
    case 'UIDVALIDITY':
      mailbox.uidvalidity = code.value;
      break;
    case 'UIDNEXT':
      mailbox.uidnext = code.value;
      break;
    case 'UNSEEN':
      mailbox.messages.unseen = code.value;
      break;
    case 'PERMANENTFLAGS':
      mailbox.permFlags = [...code.flags];
      break;
    // CONDSTORE (RFC 7162)
    case 'HIGHESTMODSEQ':
      mailbox.highestModseq = code.value;
      break;
    // Mailbox does not support persistent mod-sequences
    case 'NOMODSEQ':
      mailbox.highestModseq = undefined;
      break;
    case 'READ-WRITE':
      mailbox.readOnly = false;
      break;
    case 'READ-ONLY':
      mailbox.readOnly = true;
      break;
  }
}
