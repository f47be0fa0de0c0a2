/**
 * Three-way rule results shared by every grammar layer
 *
 * A rule receives the input and a byte position and either matches
 * (value plus the position after the match), needs more bytes, or can
 * never match at that position. Running out of input is an ordinary
 * return value, never an exception.
 *
 * @packageDocumentation
 */

import { decodeText } from '../encoding/text.js';
import type { TextEncoding } from '../types/config.js';

/**
 * Bytes under decode plus the text decoding to apply
 */
export interface Input {
  readonly bytes: Uint8Array;
  readonly encoding: TextEncoding;
}

export interface Done<T> {
  status: 'done';
  value: T;
  /** Position just past the match */
  pos: number;
}

export interface Incomplete {
  status: 'incomplete';
  /** Minimum number of additional bytes, or null when unknown */
  needed: number | null;
}

export interface Failure {
  status: 'error';
}

export type ParseResult<T> = Done<T> | Incomplete | Failure;

/**
 * A grammar rule
 */
export type Rule<T> = (input: Input, pos: number) => ParseResult<T>;

export function done<T>(value: T, pos: number): Done<T> {
  return { status: 'done', value, pos };
}

export function incomplete(needed: number | null = null): Incomplete {
  return { status: 'incomplete', needed };
}

export const FAIL: Failure = { status: 'error' };

/**
 * Decodes a byte range of the input; null when strict UTF-8 rejects it
 */
export function textAt(input: Input, start: number, end: number): string | null {
  return decodeText(input.bytes, start, end, input.encoding);
}

/**
 * Ordered alternatives
 *
 * The first match wins. A failing alternative hands over to the next one at
 * the same position; an incomplete one ends the search, because the
 * choice cannot be made until more bytes arrive.
 */
export function alt<T>(...rules: Rule<T>[]): Rule<T> {
  return (input, pos) => {
    for (const rule of rules) {
      const result = rule(input, pos);
      if (result.status !== 'error') {
        return result;
      }
    }
    return FAIL;
  };
}

/**
 * Optional rule: failure yields null without consuming input
 */
export function opt<T>(rule: Rule<T>): Rule<T | null> {
  return (input, pos) => {
    const result = rule(input, pos);
    return result.status === 'error' ? done(null, pos) : result;
  };
}

/**
 * Zero or more repetitions, stopping at the first failure
 */
export function many0<T>(rule: Rule<T>): Rule<T[]> {
  return (input, pos) => {
    const values: T[] = [];
    let current = pos;
    for (;;) {
      const result = rule(input, current);
      if (result.status === 'incomplete') return result;
      if (result.status === 'error') return done(values, current);
      if (result.pos === current) return done(values, current);
      values.push(result.value);
      current = result.pos;
    }
  };
}

/**
 * One or more repetitions
 */
export function many1<T>(rule: Rule<T>): Rule<T[]> {
  const rest = many0(rule);
  return (input, pos) => {
    const result = rest(input, pos);
    if (result.status === 'done' && result.value.length === 0) return FAIL;
    return result;
  };
}

/**
 * Runs `prefix`, discards its value, then runs `rule`
 */
export function preceded<T>(prefix: Rule<unknown>, rule: Rule<T>): Rule<T> {
  return (input, pos) => {
    const head = prefix(input, pos);
    if (head.status !== 'done') return head;
    return rule(input, head.pos);
  };
}

/**
 * `open rule close`, keeping the value of `rule`
 */
export function delimited<T>(open: Rule<unknown>, rule: Rule<T>, close: Rule<unknown>): Rule<T> {
  return (input, pos) => {
    const head = open(input, pos);
    if (head.status !== 'done') return head;
    const body = rule(input, head.pos);
    if (body.status !== 'done') return body;
    const tail = close(input, body.pos);
    if (tail.status !== 'done') return tail;
    return done(body.value, tail.pos);
  };
}

/**
 * One or more elements with a separator between them
 */
export function separated1<T>(element: Rule<T>, separator: Rule<unknown>): Rule<T[]> {
  const rest = many0(preceded(separator, element));
  return (input, pos) => {
    const first = element(input, pos);
    if (first.status !== 'done') return first;
    const tail = rest(input, first.pos);
    if (tail.status !== 'done') return tail;
    return done([first.value, ...tail.value], tail.pos);
  };
}

/**
 * Exactly `count` elements with a separator between them
 */
export function separatedCount<T>(element: Rule<T>, separator: Rule<unknown>, count: number): Rule<T[]> {
  const next = preceded(separator, element);
  return (input, pos) => {
    const values: T[] = [];
    let current = pos;
    for (let i = 0; i < count; i++) {
      const result = (i === 0 ? element : next)(input, current);
      if (result.status !== 'done') return result;
      values.push(result.value);
      current = result.pos;
    }
    return done(values, current);
  };
}

/**
 * Transforms the value of a successful match
 */
export function map<T, U>(rule: Rule<T>, fn: (value: T) => U): Rule<U> {
  return (input, pos) => {
    const result = rule(input, pos);
    return result.status === 'done' ? done(fn(result.value), result.pos) : result;
  };
}
