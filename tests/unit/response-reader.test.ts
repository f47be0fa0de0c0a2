/**
 * ResponseReader Unit Tests
 *
 * Chunked input, literal bodies split across chunks, recovery after
 * malformed responses, buffer limits and end-of-input handling.
 */

import { describe, it, expect, vi } from 'vitest';
import { decodeResponse } from '../../src/protocol/parser.js';
import { ResponseReader } from '../../src/protocol/response-reader.js';
import { ImapError, ImapLimitError, ImapParseError } from '../../src/types/errors.js';
import type { Response } from '../../src/types/protocol.js';
import type { Logger } from '../../src/logging/logger.js';

vi.mock('../../src/protocol/parser.js', async importOriginal => {
  const actual = await importOriginal<typeof import('../../src/protocol/parser.js')>();
  return { ...actual, decodeResponse: vi.fn(actual.decodeResponse) };
});

function collect(reader: ResponseReader) {
  const responses: Response[] = [];
  const errors: Error[] = [];
  reader.on('response', response => responses.push(response));
  reader.on('error', err => errors.push(err));
  return { responses, errors };
}

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: message => lines.push(`debug ${message}`),
    info: message => lines.push(`info ${message}`),
    warn: message => lines.push(`warn ${message}`),
    error: message => lines.push(`error ${message}`)
  };
}

describe('ResponseReader', () => {
  it('should emit every response in a single chunk', () => {
    const reader = new ResponseReader();
    const { responses, errors } = collect(reader);

    reader.push(Buffer.from('* 3 EXISTS\r\n* 0 RECENT\r\nA1 OK done\r\n'));

    expect(errors).toEqual([]);
    expect(responses).toEqual([
      { type: 'mailbox-data', datum: { type: 'EXISTS', count: 3 } },
      { type: 'mailbox-data', datum: { type: 'RECENT', count: 0 } },
      { type: 'done', tag: 'A1', status: 'OK', code: null, text: 'done' }
    ]);
    expect(reader.bufferedBytes).toBe(0);
  });

  it('should wait for the rest of a split response', () => {
    const reader = new ResponseReader();
    const { responses } = collect(reader);

    reader.push(Buffer.from('* 5 EXI'));
    expect(responses).toEqual([]);
    expect(reader.bufferedBytes).toBe(7);

    reader.push(Buffer.from('STS\r\n'));
    expect(responses).toEqual([{ type: 'mailbox-data', datum: { type: 'EXISTS', count: 5 } }]);
    expect(reader.bufferedBytes).toBe(0);
  });

  it('should reassemble a literal split across chunks', () => {
    const reader = new ResponseReader();
    const { responses } = collect(reader);

    reader.push(Buffer.from('* 1 FETCH (RFC822 {11}\r\nhello'));
    reader.push(Buffer.from(' worl'));
    expect(responses).toEqual([]);

    reader.push(Buffer.from('d)\r\n* 2 EXPUNGE\r\n'));
    expect(responses).toEqual([
      { type: 'fetch', seq: 1, attributes: [{ type: 'RFC822', raw: 'hello world' }] },
      { type: 'expunge', seq: 2 }
    ]);
  });

  it('should decode one byte at a time', () => {
    const reader = new ResponseReader();
    const { responses } = collect(reader);

    for (const byte of Buffer.from('+ go\r\n* CAPABILITY IMAP4rev1\r\n')) {
      reader.push(Uint8Array.of(byte));
    }

    expect(responses).toEqual([
      { type: 'continue', code: null, text: 'go' },
      { type: 'capabilities', capabilities: ['IMAP4rev1'] }
    ]);
  });

  it('should report a malformed response and keep reading', () => {
    const reader = new ResponseReader();
    const { responses, errors } = collect(reader);

    reader.push(Buffer.from('* 1 EXISTS\r\n* FOO bar\r\n'));
    reader.push(Buffer.from('* 2 EXISTS\r\n'));

    expect(responses).toEqual([
      { type: 'mailbox-data', datum: { type: 'EXISTS', count: 1 } },
      { type: 'mailbox-data', datum: { type: 'EXISTS', count: 2 } }
    ]);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(ImapParseError);
    if (errors[0] instanceof ImapParseError) {
      expect(errors[0].rawData).toBe('* FOO bar');
    }
  });

  it('should resume after a malformed response in the same chunk', () => {
    const reader = new ResponseReader();
    const { responses, errors } = collect(reader);

    reader.push(Buffer.from('* FOO\r\n* 1 EXISTS\r\n'));

    expect(responses).toEqual([{ type: 'mailbox-data', datum: { type: 'EXISTS', count: 1 } }]);
    expect(errors).toHaveLength(1);
    if (errors[0] instanceof ImapParseError) {
      expect(errors[0].rawData).toBe('* FOO');
    }
  });

  it('should skip the rest of a malformed line that arrives later', () => {
    const reader = new ResponseReader();
    const { responses, errors } = collect(reader);

    reader.push(Buffer.from('* FO'));
    expect(errors).toHaveLength(1);
    expect(reader.bufferedBytes).toBe(0);

    reader.push(Buffer.from('O bar\r\n* 2 EXISTS\r\n'));

    expect(errors).toHaveLength(1);
    expect(responses).toEqual([{ type: 'mailbox-data', datum: { type: 'EXISTS', count: 2 } }]);
  });

  it('should skip a literal announced by a malformed response', () => {
    const reader = new ResponseReader();
    const { responses, errors } = collect(reader);

    reader.push(
      Buffer.concat([
        Buffer.from('* 1 FETCH (RFC822 {3}\r\n'),
        Buffer.from([0xff, 0xfe, 0xfd]),
        Buffer.from(')\r\n* 2 EXISTS\r\n')
      ])
    );

    expect(errors).toHaveLength(1);
    if (errors[0] instanceof ImapParseError) {
      expect(errors[0].rawData).toBe('* 1 FETCH (RFC822 {3}');
    }
    expect(responses).toEqual([{ type: 'mailbox-data', datum: { type: 'EXISTS', count: 2 } }]);
  });

  it('should decode again only once a literal hint is satisfied', () => {
    const reader = new ResponseReader();
    const { responses } = collect(reader);
    const decode = vi.mocked(decodeResponse);
    decode.mockClear();

    reader.push(Buffer.from('* 1 FETCH (RFC822 {1000}\r\n'));
    for (let i = 0; i < 10; i++) {
      reader.push(Buffer.from('x'.repeat(100)));
    }
    expect(reader.bufferedBytes).toBe(1026);
    expect(decode).toHaveBeenCalledTimes(2);

    reader.push(Buffer.from(')\r\n'));

    expect(decode).toHaveBeenCalledTimes(3);
    expect(responses).toEqual([
      { type: 'fetch', seq: 1, attributes: [{ type: 'RFC822', raw: 'x'.repeat(1000) }] }
    ]);
  });

  it('should reject an announced literal over the limit on its header chunk', () => {
    const reader = new ResponseReader({ maxBufferSize: 1024 });
    const { errors } = collect(reader);

    reader.push(Buffer.from('* 1 FETCH (RFC822 {4294967295}\r\n'));

    expect(reader.bufferedBytes).toBe(0);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(ImapLimitError);
    if (errors[0] instanceof ImapLimitError) {
      expect(errors[0].limit).toBe(1024);
      expect(errors[0].actual).toBe(4294967327);
    }
  });

  it('should skip the body of a rejected literal and resume', () => {
    const reader = new ResponseReader({ maxBufferSize: 16 });
    const { responses, errors } = collect(reader);

    reader.push(Buffer.from('* 1 FETCH (RFC822 {100}\r\n'));

    expect(responses).toEqual([]);
    expect(reader.bufferedBytes).toBe(0);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(ImapLimitError);
    if (errors[0] instanceof ImapLimitError) {
      expect(errors[0].limit).toBe(16);
      expect(errors[0].actual).toBe(125);
      expect(errors[0].code).toBe('LIMIT_ERROR');
    }

    reader.push(Buffer.from('x'.repeat(60)));
    reader.push(Buffer.from('x'.repeat(40) + ')\r\n* 2 EXPUNGE\r\n'));

    expect(errors).toHaveLength(1);
    expect(responses).toEqual([{ type: 'expunge', seq: 2 }]);
  });

  it('should drop a line that outgrows the buffer limit', () => {
    const reader = new ResponseReader({ maxBufferSize: 16 });
    const { responses, errors } = collect(reader);

    reader.push(Buffer.from('* OK ' + 'a'.repeat(20)));

    expect(errors).toHaveLength(1);
    if (errors[0] instanceof ImapLimitError) {
      expect(errors[0].actual).toBe(25);
    }

    reader.push(Buffer.from('bbb\r\n* 3 EXISTS\r\n'));

    expect(errors).toHaveLength(1);
    expect(responses).toEqual([{ type: 'mailbox-data', datum: { type: 'EXISTS', count: 3 } }]);
  });

  it('should report leftover bytes at end of input', () => {
    const reader = new ResponseReader();
    const { errors } = collect(reader);
    const onEnd = vi.fn();
    reader.on('end', onEnd);

    reader.push(Buffer.from('A1 OK partial'));
    reader.end();

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(ImapParseError);
    expect(errors[0].message).toBe('Input ended mid-response');
    expect(reader.bufferedBytes).toBe(0);
    expect(onEnd).toHaveBeenCalledTimes(1);
  });

  it('should end cleanly with an empty buffer', () => {
    const reader = new ResponseReader();
    const { errors } = collect(reader);
    const onEnd = vi.fn();
    reader.on('end', onEnd);

    reader.push(Buffer.from('A1 OK done\r\n'));
    reader.end();

    expect(errors).toEqual([]);
    expect(onEnd).toHaveBeenCalledTimes(1);
  });

  it('should refuse input after end', () => {
    const reader = new ResponseReader();
    const onEnd = vi.fn();
    reader.on('end', onEnd);

    reader.end();
    reader.end();

    expect(onEnd).toHaveBeenCalledTimes(1);
    expect(() => reader.push(Buffer.from('* 1 EXISTS\r\n'))).toThrow(ImapError);
    expect(() => reader.push(Buffer.from('* 1 EXISTS\r\n'))).toThrow('Cannot push data: reader has ended');
  });

  it('should pass decoder options through', () => {
    const reader = new ResponseReader({ decoder: { textEncoding: 'latin1' } });
    const { responses, errors } = collect(reader);

    reader.push(Buffer.concat([Buffer.from('* OK '), Buffer.from([0xe9]), Buffer.from('\r\n')]));

    expect(errors).toEqual([]);
    expect(responses).toEqual([{ type: 'data', status: 'OK', code: null, text: '\u00e9' }]);
  });

  it('should log decoded responses and dropped input', () => {
    const logger = recordingLogger();
    const reader = new ResponseReader({ logger });
    collect(reader);

    reader.push(Buffer.from('* 1 EXPUNGE\r\n* 2 EXP'));
    reader.push(Buffer.from('ORT\r\n'));

    expect(logger.lines).toEqual([
      'debug Decoded response',
      'debug Waiting for more input',
      'warn Discarding malformed response'
    ]);
  });
});
