/**
 * IMAP Response Value Parser
 *
 * Rules for the structured values inside responses: ENVELOPE, the other
 * FETCH attributes, bracketed response codes and resp-text.
 *
 * @packageDocumentation
 */

import type { AttributeValue, Envelope } from '../types/message.js';
import type { ResponseCode } from '../types/protocol.js';
import {
  addressList,
  flag,
  flagList,
  keyword,
  listOf,
  matchKeyword,
  nstring,
  number,
  number64,
  space,
  string,
  text
} from './tokenizer.js';
import {
  alt,
  delimited,
  done,
  incomplete,
  map,
  opt,
  preceded,
  separated1,
  type Rule
} from './result.js';

/**
 * resp-text: optional response code followed by optional human-readable text
 */
export interface ResponseText {
  code: ResponseCode | null;
  text: string | null;
}

const spNstring = preceded(space, nstring);
const spAddresses = preceded(space, addressList);

/**
 * Parses the parenthesized envelope structure
 *
 * Fields are positional: date, subject, from, sender, reply-to, to, cc,
 * bcc, in-reply-to, message-id.
 */
export const envelope: Rule<Envelope> = (input, pos) => {
  const open = matchKeyword(input, pos, '(');
  if (open.status !== 'done') return open;

  const date = nstring(input, open.pos);
  if (date.status !== 'done') return date;
  const subject = spNstring(input, date.pos);
  if (subject.status !== 'done') return subject;
  const from = spAddresses(input, subject.pos);
  if (from.status !== 'done') return from;
  const sender = spAddresses(input, from.pos);
  if (sender.status !== 'done') return sender;
  const replyTo = spAddresses(input, sender.pos);
  if (replyTo.status !== 'done') return replyTo;
  const to = spAddresses(input, replyTo.pos);
  if (to.status !== 'done') return to;
  const cc = spAddresses(input, to.pos);
  if (cc.status !== 'done') return cc;
  const bcc = spAddresses(input, cc.pos);
  if (bcc.status !== 'done') return bcc;
  const inReplyTo = spNstring(input, bcc.pos);
  if (inReplyTo.status !== 'done') return inReplyTo;
  const messageId = spNstring(input, inReplyTo.pos);
  if (messageId.status !== 'done') return messageId;

  const close = matchKeyword(input, messageId.pos, ')');
  if (close.status !== 'done') return close;

  return done(
    {
      date: date.value,
      subject: subject.value,
      from: from.value,
      sender: sender.value,
      replyTo: replyTo.value,
      to: to.value,
      cc: cc.value,
      bcc: bcc.value,
      inReplyTo: inReplyTo.value,
      messageId: messageId.value
    },
    close.pos
  );
};

const msgAttEnvelope: Rule<AttributeValue> = map(
  preceded(keyword('ENVELOPE '), envelope),
  (value): AttributeValue => ({ type: 'ENVELOPE', envelope: value })
);

const msgAttInternalDate: Rule<AttributeValue> = map(
  preceded(keyword('INTERNALDATE '), string),
  (date): AttributeValue => ({ type: 'INTERNALDATE', date })
);

const msgAttFlags: Rule<AttributeValue> = map(
  preceded(keyword('FLAGS '), flagList),
  (flags): AttributeValue => ({ type: 'FLAGS', flags })
);

// CONDSTORE (RFC 7162)
const msgAttModSeq: Rule<AttributeValue> = map(
  delimited(keyword('MODSEQ ('), number64, keyword(')')),
  (modSeq): AttributeValue => ({ type: 'MODSEQ', modSeq })
);

const msgAttRfc822Size: Rule<AttributeValue> = map(
  preceded(keyword('RFC822.SIZE '), number),
  (size): AttributeValue => ({ type: 'RFC822.SIZE', size })
);

const msgAttRfc822: Rule<AttributeValue> = map(
  preceded(keyword('RFC822 '), nstring),
  (raw): AttributeValue => ({ type: 'RFC822', raw })
);

const msgAttUid: Rule<AttributeValue> = map(
  preceded(keyword('UID '), number),
  (uid): AttributeValue => ({ type: 'UID', uid })
);

/**
 * One FETCH attribute
 */
export const msgAtt: Rule<AttributeValue> = alt(
  msgAttEnvelope,
  msgAttInternalDate,
  msgAttFlags,
  msgAttModSeq,
  msgAttRfc822Size,
  msgAttRfc822,
  msgAttUid
);

/**
 * `(att SP att ...)`, at least one attribute, order and duplicates kept
 */
export const msgAttList: Rule<AttributeValue[]> = delimited(
  keyword('('),
  separated1(msgAtt, space),
  keyword(')')
);

/**
 * Permanent flag: any flag, or `\*` (new keywords may be created)
 */
const flagPerm: Rule<string> = alt(keyword('\\*'), flag);

function bare(type: 'NOMODSEQ' | 'READ-ONLY' | 'READ-WRITE' | 'TRYCREATE' | 'ALERT'): Rule<ResponseCode> {
  return map(keyword(type), (): ResponseCode => ({ type }));
}

const respTextCodeAlternatives: Rule<ResponseCode> = alt(
  map(preceded(keyword('PERMANENTFLAGS '), listOf(flagPerm)), (flags): ResponseCode => ({ type: 'PERMANENTFLAGS', flags })),
  map(preceded(keyword('UIDVALIDITY '), number), (value): ResponseCode => ({ type: 'UIDVALIDITY', value })),
  map(preceded(keyword('UIDNEXT '), number), (value): ResponseCode => ({ type: 'UIDNEXT', value })),
  map(preceded(keyword('UNSEEN '), number), (value): ResponseCode => ({ type: 'UNSEEN', value })),
  bare('READ-ONLY'),
  bare('READ-WRITE'),
  bare('TRYCREATE'),
  map(preceded(keyword('HIGHESTMODSEQ '), number64), (value): ResponseCode => ({ type: 'HIGHESTMODSEQ', value })),
  bare('NOMODSEQ'),
  bare('ALERT')
);

/**
 * `[CODE ...]`
 *
 * RFC 3501 has the closing bracket followed by a space and text, but the
 * RFC 4551 examples omit both, so only `]` is consumed here.
 */
export const respTextCode: Rule<ResponseCode> = delimited(
  keyword('['),
  respTextCodeAlternatives,
  keyword(']')
);

const optionalCode = opt(respTextCode);

/**
 * Parses resp-text
 *
 * An unknown bracketed code is left in the text. After a known code, the
 * one separating space is dropped; no text at all (or only that space)
 * gives null.
 */
export const respText: Rule<ResponseText> = (input, pos) => {
  const code = optionalCode(input, pos);
  // An unfinished code may still turn out to be plain text, which can end
  // sooner than the code would
  if (code.status !== 'done') return incomplete();
  const body = text(input, code.pos);
  if (body.status !== 'done') return body;

  let value = body.value;
  if (code.value !== null && value.startsWith(' ')) {
    value = value.slice(1);
  }

  return done({ code: code.value, text: value.length > 0 ? value : null }, body.pos);
};
