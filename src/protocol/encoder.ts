/**
 * IMAP Response Encoder
 *
 * Produces the canonical wire form of decoded responses, for test
 * servers, fixtures and replay. decodeResponse(encode(r)) gives back r for
 * every response the grammar can express (see ResponseEncoder.encode).
 *
 * @packageDocumentation
 */

import { encodedLength } from '../encoding/text.js';
import type { MailboxDatum } from '../types/mailbox.js';
import type { Address, AttributeValue, Envelope } from '../types/message.js';
import type { Response, ResponseCode } from '../types/protocol.js';
import { isAstringChar } from './tokenizer.js';

const CRLF = '\r\n';

/**
 * ResponseEncoder provides static methods to serialize responses and their parts
 */
export class ResponseEncoder {
  /**
   * Encodes a string as a quoted string, or as a literal when it holds
   * anything outside printable ASCII (CR, LF, NUL, 8-bit text)
   */
  static string(value: string): string {
    if (/[^\x20-\x7e]/.test(value)) {
      return `{${encodedLength(value)}}${CRLF}${value}`;
    }
    const escaped = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
    return `"${escaped}"`;
  }

  static nstring(value: string | null): string {
    return value === null ? 'NIL' : this.string(value);
  }

  /**
   * Bare atom when every character allows it, a string otherwise
   */
  static astring(value: string): string {
    const bare = value.length > 0 && [...value].every(ch => ch.charCodeAt(0) < 0x80 && isAstringChar(ch.charCodeAt(0)));
    return bare ? value : this.string(value);
  }

  static flagList(flags: string[]): string {
    return `(${flags.join(' ')})`;
  }

  static address(address: Address): string {
    const fields = [address.name, address.adl, address.mailbox, address.host];
    return `(${fields.map(field => this.nstring(field)).join(' ')})`;
  }

  /**
   * Encodes an address list
   * Note: an empty array encodes as `()`, which the decoder rejects
   */
  static addressList(addresses: Address[] | null): string {
    if (addresses === null) {
      return 'NIL';
    }
    return `(${addresses.map(address => this.address(address)).join('')})`;
  }

  static envelope(envelope: Envelope): string {
    const fields = [
      this.nstring(envelope.date),
      this.nstring(envelope.subject),
      this.addressList(envelope.from),
      this.addressList(envelope.sender),
      this.addressList(envelope.replyTo),
      this.addressList(envelope.to),
      this.addressList(envelope.cc),
      this.addressList(envelope.bcc),
      this.nstring(envelope.inReplyTo),
      this.nstring(envelope.messageId)
    ];
    return `(${fields.join(' ')})`;
  }

  static attribute(attribute: AttributeValue): string {
    switch (attribute.type) {
      case 'ENVELOPE':
        return `ENVELOPE ${this.envelope(attribute.envelope)}`;
      case 'INTERNALDATE':
        return `INTERNALDATE ${this.string(attribute.date)}`;
      case 'FLAGS':
        return `FLAGS ${this.flagList(attribute.flags)}`;
      case 'RFC822':
        return `RFC822 ${this.nstring(attribute.raw)}`;
      case 'RFC822.SIZE':
        return `RFC822.SIZE ${attribute.size}`;
      case 'MODSEQ':
        return `MODSEQ (${attribute.modSeq})`;
      case 'UID':
        return `UID ${attribute.uid}`;
    }
  }

  static code(code: ResponseCode): string {
    switch (code.type) {
      case 'PERMANENTFLAGS':
        return `[PERMANENTFLAGS ${this.flagList(code.flags)}]`;
      case 'UIDVALIDITY':
      case 'UIDNEXT':
      case 'UNSEEN':
      case 'HIGHESTMODSEQ':
        return `[${code.type} ${code.value}]`;
      default:
        return `[${code.type}]`;
    }
  }

  /**
   * Encodes resp-text
   * Note: empty text is indistinguishable from no text once encoded
   */
  static respText(code: ResponseCode | null, text: string | null): string {
    if (code === null) {
      return text ?? '';
    }
    return text === null ? this.code(code) : `${this.code(code)} ${text}`;
  }

  static mailboxDatum(datum: MailboxDatum): string {
    switch (datum.type) {
      case 'FLAGS':
        return `FLAGS ${this.flagList(datum.flags)}`;
      case 'EXISTS':
      case 'RECENT':
        return `${datum.count} ${datum.type}`;
      case 'SEARCH': {
        const ids = datum.ids.map(id => ` ${id}`).join('');
        const modSeq = datum.modSeq === null ? '' : ` (MODSEQ ${datum.modSeq})`;
        return `SEARCH${ids}${modSeq}`;
      }
      case 'LIST':
      case 'LSUB':
        return `${datum.type} ${this.flagList(datum.attributes)} ${this.nstring(datum.delimiter)} ${this.astring(datum.name)}`;
    }
  }

  /**
   * Formats a response as wire text, CRLF included
   *
   * Capability and attribute lists must be non-empty, address lists must
   * be null or non-empty, and text must be free of CR/LF and must not
   * start with `[`; anything else has no wire form the decoder accepts.
   */
  static format(response: Response): string {
    switch (response.type) {
      case 'done':
        return `${response.tag} ${response.status} ${this.respText(response.code, response.text)}${CRLF}`;
      case 'data':
        return `* ${response.status} ${this.respText(response.code, response.text)}${CRLF}`;
      case 'capabilities':
        return `* CAPABILITY${response.capabilities.map(name => ` ${name}`).join('')}${CRLF}`;
      case 'mailbox-data':
        return `* ${this.mailboxDatum(response.datum)}${CRLF}`;
      case 'fetch':
        return `* ${response.seq} FETCH (${response.attributes.map(a => this.attribute(a)).join(' ')})${CRLF}`;
      case 'expunge':
        return `* ${response.seq} EXPUNGE${CRLF}`;
      case 'continue':
        return `+ ${this.respText(response.code, response.text)}${CRLF}`;
    }
  }

  /**
   * Encodes a response as UTF-8 bytes
   */
  static encode(response: Response): Buffer {
    return Buffer.from(this.format(response), 'utf8');
  }
}
