/**
 * IMAP Response Tokenizer
 *
 * Byte classes and token rules of the RFC 3501 response grammar: atoms,
 * numbers, quoted strings, literals, flags and free text, plus the
 * composite tokens built from them (flag lists, nstrings, addresses).
 *
 * Every rule works on raw bytes so literal payloads stay binary-safe,
 * and every rule reports a run that reaches the end of the buffer as
 * incomplete: more bytes could still extend it.
 *
 * @packageDocumentation
 */

import type { Address } from '../types/message.js';
import type { RequestId, Status } from '../types/protocol.js';
import {
  FAIL,
  alt,
  delimited,
  done,
  incomplete,
  many1,
  map,
  opt,
  separated1,
  separatedCount,
  textAt,
  type Input,
  type ParseResult,
  type Rule
} from './result.js';

const CR = 0x0d;
const LF = 0x0a;
const SP = 0x20;
const DQUOTE = 0x22;
const BACKSLASH = 0x5c;
const PLUS = 0x2b;
const DIGIT_0 = 0x30;
const DIGIT_9 = 0x39;

const MAX_UINT32 = 0xffffffff;
const MAX_UINT64 = 0xffffffffffffffffn;

const LIST_WILDCARDS = new Set(['%', '*'].map(c => c.charCodeAt(0)));
const QUOTED_SPECIALS = new Set(['"', '\\'].map(c => c.charCodeAt(0)));
const RESP_SPECIALS = new Set([']'].map(c => c.charCodeAt(0)));

/**
 * Atom specials besides CTLs, list wildcards, quoted specials and resp-specials
 */
const ATOM_SPECIALS = new Set(['(', ')', '{', ' '].map(c => c.charCodeAt(0)));

export function isCrlf(c: number): boolean {
  return c === CR || c === LF;
}

export function isListWildcard(c: number): boolean {
  return LIST_WILDCARDS.has(c);
}

export function isQuotedSpecial(c: number): boolean {
  return QUOTED_SPECIALS.has(c);
}

export function isRespSpecial(c: number): boolean {
  return RESP_SPECIALS.has(c);
}

/**
 * Checks if a byte is an atom special
 * Note: `]` is special in atoms only; quoted strings and literals may carry it
 */
export function isAtomSpecial(c: number): boolean {
  return c < SP || ATOM_SPECIALS.has(c) || isListWildcard(c) || isQuotedSpecial(c) || isRespSpecial(c);
}

export function isAtomChar(c: number): boolean {
  return !isAtomSpecial(c);
}

export function isAstringChar(c: number): boolean {
  return isAtomChar(c) || isRespSpecial(c);
}

export function isTagChar(c: number): boolean {
  return c !== PLUS && isAstringChar(c);
}

function isDigit(c: number): boolean {
  return c >= DIGIT_0 && c <= DIGIT_9;
}

/**
 * End of the run of bytes matching `pred` that starts at `pos`
 */
function runEnd(bytes: Uint8Array, pos: number, pred: (c: number) => boolean): number {
  let end = pos;
  while (end < bytes.length && pred(bytes[end])) {
    end++;
  }
  return end;
}

/**
 * Matches a fixed ASCII keyword or punctuation
 *
 * A buffer that ends inside a matching prefix is incomplete, with the
 * number of missing keyword bytes as the hint.
 */
export function matchKeyword(input: Input, pos: number, word: string, ignoreCase = false): ParseResult<string> {
  const { bytes } = input;
  const available = bytes.length - pos;
  const compared = Math.min(available, word.length);

  for (let i = 0; i < compared; i++) {
    let actual = bytes[pos + i];
    let expected = word.charCodeAt(i);
    if (ignoreCase) {
      actual = toUpper(actual);
      expected = toUpper(expected);
    }
    if (actual !== expected) {
      return FAIL;
    }
  }

  if (available < word.length) {
    return incomplete(word.length - available);
  }
  return done(word, pos + word.length);
}

function toUpper(c: number): number {
  return c >= 0x61 && c <= 0x7a ? c - 0x20 : c;
}

/**
 * Rule form of matchKeyword
 */
export function keyword(word: string, ignoreCase = false): Rule<string> {
  return (input, pos) => matchKeyword(input, pos, word, ignoreCase);
}

export const space = keyword(' ');
export const crlf = keyword('\r\n');

/**
 * One or more bytes matching `pred`, decoded as text
 */
export function takeWhile1(input: Input, pos: number, pred: (c: number) => boolean): ParseResult<string> {
  const end = runEnd(input.bytes, pos, pred);
  if (end === input.bytes.length) return incomplete();
  if (end === pos) return FAIL;
  const value = textAt(input, pos, end);
  return value === null ? FAIL : done(value, end);
}

/**
 * Unsigned 32-bit number
 */
export const number: Rule<number> = (input, pos) => {
  const { bytes } = input;
  const end = runEnd(bytes, pos, isDigit);
  if (end === bytes.length) return incomplete();
  if (end === pos) return FAIL;

  let value = 0;
  for (let i = pos; i < end; i++) {
    value = value * 10 + (bytes[i] - DIGIT_0);
    if (value > MAX_UINT32) return FAIL;
  }
  return done(value, end);
};

/**
 * Unsigned 64-bit number (mod-sequences)
 */
export const number64: Rule<bigint> = (input, pos) => {
  const { bytes } = input;
  const end = runEnd(bytes, pos, isDigit);
  if (end === bytes.length) return incomplete();
  if (end === pos) return FAIL;

  let value = 0n;
  for (let i = pos; i < end; i++) {
    value = value * 10n + BigInt(bytes[i] - DIGIT_0);
    if (value > MAX_UINT64) return FAIL;
  }
  return done(value, end);
};

/**
 * Parses a quoted string
 *
 * A backslash makes the following byte part of the content. The backslash
 * itself is dropped before `"` and `\`; before any other byte it is kept,
 * so `\n` stays two characters.
 */
export const quoted: Rule<string> = (input, pos) => {
  const open = matchKeyword(input, pos, '"');
  if (open.status !== 'done') return open;

  const { bytes } = input;
  const content: number[] = [];
  let escaped = false;

  for (let i = open.pos; i < bytes.length; i++) {
    const c = bytes[i];

    if (escaped) {
      if (!isQuotedSpecial(c)) {
        content.push(BACKSLASH);
      }
      content.push(c);
      escaped = false;
      continue;
    }

    if (c === BACKSLASH) {
      escaped = true;
      continue;
    }

    if (c === DQUOTE) {
      const value = textAt({ bytes: Uint8Array.from(content), encoding: input.encoding }, 0, content.length);
      return value === null ? FAIL : done(value, i + 1);
    }

    content.push(c);
  }

  // Unterminated quoted string
  return incomplete();
};

/**
 * Parses a literal `{n}\r\n` followed by exactly n raw bytes
 */
export const literal: Rule<string> = (input, pos) => {
  const open = matchKeyword(input, pos, '{');
  if (open.status !== 'done') return open;
  const size = number(input, open.pos);
  if (size.status !== 'done') return size;
  const close = matchKeyword(input, size.pos, '}');
  if (close.status !== 'done') return close;
  const eol = matchKeyword(input, close.pos, '\r\n');
  if (eol.status !== 'done') return eol;

  const start = eol.pos;
  const end = start + size.value;
  if (end > input.bytes.length) {
    return incomplete(end - input.bytes.length);
  }

  const value = textAt(input, start, end);
  return value === null ? FAIL : done(value, end);
};

export const string: Rule<string> = alt(quoted, literal);

export const atom: Rule<string> = (input, pos) => takeWhile1(input, pos, isAtomChar);

/**
 * System or extension flag: backslash followed by an atom (`\Seen`)
 */
const flagExtension: Rule<string> = (input, pos) => {
  const slash = matchKeyword(input, pos, '\\');
  if (slash.status !== 'done') return slash;
  const name = atom(input, slash.pos);
  return name.status === 'done' ? done(`\\${name.value}`, name.pos) : name;
};

export const flag: Rule<string> = alt(flagExtension, atom);

/**
 * Free text up to, not including, CR or LF
 */
export const text: Rule<string> = (input, pos) => {
  const end = runEnd(input.bytes, pos, c => !isCrlf(c));
  if (end === input.bytes.length) return incomplete();
  const value = textAt(input, pos, end);
  return value === null ? FAIL : done(value, end);
};

/**
 * Command tag
 */
export const tag: Rule<RequestId> = (input, pos) => takeWhile1(input, pos, isTagChar);

const STATUSES: readonly Status[] = ['OK', 'NO', 'BAD', 'PREAUTH', 'BYE'];

/**
 * Case-insensitive status keyword, reported upper-case
 */
export const status: Rule<Status> = alt(
  ...STATUSES.map(value => map(keyword(value, true), (): Status => value))
);

/**
 * Parenthesized, space separated list of flags; `()` is the empty list
 */
export function listOf(element: Rule<string>): Rule<string[]> {
  return delimited(
    keyword('('),
    map(opt(separated1(element, space)), flags => flags ?? []),
    keyword(')')
  );
}

export const flagList: Rule<string[]> = listOf(flag);

const nil: Rule<null> = map(keyword('NIL'), () => null);

/**
 * `NIL` (absent) or a string
 */
export const nstring: Rule<string | null> = alt<string | null>(nil, string);

/**
 * Mailbox name: an atom of astring chars or a string
 */
export const astring: Rule<string> = alt(string, (input, pos) => takeWhile1(input, pos, isAstringChar));

/**
 * Parses an address: `(name adl mailbox host)`
 */
export const address: Rule<Address> = map(
  delimited(keyword('('), separatedCount(nstring, space, 4), keyword(')')),
  ([name, adl, mailbox, host]) => ({ name, adl, mailbox, host })
);

/**
 * `NIL` or one or more addresses in parentheses; `()` is not accepted
 */
export const addressList: Rule<Address[] | null> = alt<Address[] | null>(
  nil,
  delimited(keyword('('), many1(address), keyword(')'))
);

