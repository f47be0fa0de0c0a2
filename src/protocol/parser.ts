/**
 * IMAP Response Parser
 *
 * Assembles tokens and values into complete server responses: tagged
 * completions, untagged data and continuation requests. Decoding is
 * stateless; a caller holding a partial response calls again from the
 * start of the same response once more bytes have arrived.
 *
 * @packageDocumentation
 */

import { previewLine } from '../encoding/text.js';
import type { DecoderOptions, TextEncoding } from '../types/config.js';
import { ImapParseError } from '../types/errors.js';
import type { MailboxDatum } from '../types/mailbox.js';
import type {
  ContinueResponse,
  DecodeResult,
  DoneResponse,
  Response
} from '../types/protocol.js';
import { msgAttList, respText } from './response-parser.js';
import {
  alt,
  delimited,
  done,
  many0,
  many1,
  map,
  opt,
  preceded,
  type Input,
  type Rule
} from './result.js';
import {
  astring,
  atom,
  crlf,
  flagList,
  keyword,
  nstring,
  number,
  number64,
  space,
  status,
  tag
} from './tokenizer.js';

/**
 * Default text decoding for string content
 */
const DEFAULT_TEXT_ENCODING: TextEncoding = 'utf8';

/**
 * Untagged condition: `OK [UIDNEXT 4392] Predicted next UID`
 */
const respCond: Rule<Response> = (input, pos) => {
  const state = status(input, pos);
  if (state.status !== 'done') return state;
  const sp = space(input, state.pos);
  if (sp.status !== 'done') return sp;
  const rest = respText(input, sp.pos);
  if (rest.status !== 'done') return rest;
  return done({ type: 'data', status: state.value, code: rest.value.code, text: rest.value.text }, rest.pos);
};

const mailboxDataFlags: Rule<MailboxDatum> = map(
  preceded(keyword('FLAGS '), flagList),
  (flags): MailboxDatum => ({ type: 'FLAGS', flags })
);

const searchIds = many0(preceded(space, number));
const searchModSeq = opt(delimited(keyword(' (MODSEQ '), number64, keyword(')')));

/**
 * `SEARCH 2 84 882`, optionally ending in `(MODSEQ 917162500)`
 */
const mailboxDataSearch: Rule<MailboxDatum> = (input, pos) => {
  const head = keyword('SEARCH')(input, pos);
  if (head.status !== 'done') return head;
  const ids = searchIds(input, head.pos);
  if (ids.status !== 'done') return ids;
  const modSeq = searchModSeq(input, ids.pos);
  if (modSeq.status !== 'done') return modSeq;
  return done({ type: 'SEARCH', ids: ids.value, modSeq: modSeq.value }, modSeq.pos);
};

const listKind = alt<'LIST' | 'LSUB'>(
  map(keyword('LIST '), (): 'LIST' => 'LIST'),
  map(keyword('LSUB '), (): 'LSUB' => 'LSUB')
);

/**
 * `LIST (\HasNoChildren) "/" INBOX`
 */
const mailboxDataList: Rule<MailboxDatum> = (input, pos) => {
  const kind = listKind(input, pos);
  if (kind.status !== 'done') return kind;
  const attributes = flagList(input, kind.pos);
  if (attributes.status !== 'done') return attributes;
  const delimiter = preceded(space, nstring)(input, attributes.pos);
  if (delimiter.status !== 'done') return delimiter;
  const name = preceded(space, astring)(input, delimiter.pos);
  if (name.status !== 'done') return name;
  return done(
    { type: kind.value, attributes: attributes.value, delimiter: delimiter.value, name: name.value },
    name.pos
  );
};

/**
 * `<n> <word>` forms (EXISTS, RECENT, EXPUNGE)
 */
function counted<T>(word: string, build: (n: number) => T): Rule<T> {
  return (input, pos) => {
    const n = number(input, pos);
    if (n.status !== 'done') return n;
    const kw = keyword(word)(input, n.pos);
    if (kw.status !== 'done') return kw;
    return done(build(n.value), kw.pos);
  };
}

const mailboxData: Rule<Response> = map(
  alt(
    mailboxDataFlags,
    mailboxDataSearch,
    mailboxDataList,
    counted(' EXISTS', (count): MailboxDatum => ({ type: 'EXISTS', count })),
    counted(' RECENT', (count): MailboxDatum => ({ type: 'RECENT', count }))
  ),
  (datum): Response => ({ type: 'mailbox-data', datum })
);

const messageDataExpunge: Rule<Response> = counted(' EXPUNGE', (seq): Response => ({ type: 'expunge', seq }));

const messageDataFetch: Rule<Response> = (input, pos) => {
  const seq = number(input, pos);
  if (seq.status !== 'done') return seq;
  const kw = keyword(' FETCH ')(input, seq.pos);
  if (kw.status !== 'done') return kw;
  const attributes = msgAttList(input, kw.pos);
  if (attributes.status !== 'done') return attributes;
  return done({ type: 'fetch', seq: seq.value, attributes: attributes.value }, attributes.pos);
};

const capabilityData: Rule<Response> = map(
  preceded(keyword('CAPABILITY'), many1(preceded(space, atom))),
  (capabilities): Response => ({ type: 'capabilities', capabilities })
);

/**
 * `* ...` responses
 */
const responseData: Rule<Response> = delimited(
  keyword('* '),
  alt(respCond, mailboxData, messageDataExpunge, messageDataFetch, capabilityData),
  crlf
);

/**
 * `+ [resp-text]`; some servers omit the space after `+`
 */
const continueReq: Rule<Response> = (input, pos) => {
  const plus = keyword('+')(input, pos);
  if (plus.status !== 'done') return plus;
  const sp = opt(space)(input, plus.pos);
  if (sp.status !== 'done') return sp;
  const rest = respText(input, sp.pos);
  if (rest.status !== 'done') return rest;
  const eol = crlf(input, rest.pos);
  if (eol.status !== 'done') return eol;
  return done({ type: 'continue', code: rest.value.code, text: rest.value.text }, eol.pos);
};

/**
 * `A001 OK [READ-WRITE] SELECT completed`
 */
const responseTagged: Rule<Response> = (input, pos) => {
  const id = tag(input, pos);
  if (id.status !== 'done') return id;
  const sp1 = space(input, id.pos);
  if (sp1.status !== 'done') return sp1;
  const state = status(input, sp1.pos);
  if (state.status !== 'done') return state;
  const sp2 = space(input, state.pos);
  if (sp2.status !== 'done') return sp2;
  const rest = respText(input, sp2.pos);
  if (rest.status !== 'done') return rest;
  const eol = crlf(input, rest.pos);
  if (eol.status !== 'done') return eol;
  return done(
    { type: 'done', tag: id.value, status: state.value, code: rest.value.code, text: rest.value.text },
    eol.pos
  );
};

/**
 * Any single response
 */
export const response: Rule<Response> = alt(responseData, continueReq, responseTagged);

/**
 * Decodes one response from the start of a buffer
 *
 * @param bytes - Bytes read from the server, starting at a response boundary
 * @param options - Decoding options
 * @returns The response and the bytes it used, an incomplete marker with
 *   the number of missing bytes when known, or a syntax error
 */
export function decodeResponse(bytes: Uint8Array, options?: DecoderOptions): DecodeResult {
  const input: Input = {
    bytes,
    encoding: options?.textEncoding ?? DEFAULT_TEXT_ENCODING
  };

  const result = response(input, 0);

  switch (result.status) {
    case 'done':
      return { status: 'success', response: result.value, consumed: result.pos };
    case 'incomplete':
      return { status: 'incomplete', needed: result.needed };
    case 'error':
      return { status: 'syntax-error' };
  }
}

/**
 * Decodes one response, throwing on malformed input
 *
 * @returns The decoded response, or null when more bytes are needed
 * @throws ImapParseError if the bytes can never form a valid response
 */
export function decodeResponseOrThrow(
  bytes: Uint8Array,
  options?: DecoderOptions
): { response: Response; consumed: number } | null {
  const result = decodeResponse(bytes, options);

  if (result.status === 'syntax-error') {
    throw new ImapParseError('Malformed IMAP response', previewLine(bytes));
  }
  if (result.status === 'incomplete') {
    return null;
  }
  return { response: result.response, consumed: result.consumed };
}

/**
 * Checks if a response is a tagged completion
 */
export function isTaggedResponse(value: Response): value is DoneResponse {
  return value.type === 'done';
}

/**
 * Checks if a response is a continuation request
 */
export function isContinuationResponse(value: Response): value is ContinueResponse {
  return value.type === 'continue';
}
