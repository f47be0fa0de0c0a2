/**
 * Property-based tests for error classes
 *
 * Error context (raw data, limits) survives construction unchanged.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { ImapError, ImapLimitError, ImapParseError } from '../../src/types/errors.js';

describe('Property: Error Context Preservation', () => {
  it('ImapParseError preserves message and raw data', () => {
    fc.assert(
      fc.property(
        fc.string({ minLength: 1 }), // message
        fc.string(), // rawData
        (message, rawData) => {
          const error = new ImapParseError(message, rawData);

          expect(error).toBeInstanceOf(Error);
          expect(error).toBeInstanceOf(ImapError);
          expect(error.source).toBe('parse');
          expect(error.message).toBe(message);
          expect(error.rawData).toBe(rawData);
          expect(error.code).toBe('PARSE_ERROR');
        }
      ),
      { numRuns: 100 }
    );
  });

  it('ImapLimitError preserves limit and actual size', () => {
    fc.assert(
      fc.property(
        fc.nat(),
        fc.nat(),
        (limit, actual) => {
          const error = new ImapLimitError(`Pending response exceeds ${limit} bytes`, limit, actual);

          expect(error).toBeInstanceOf(ImapError);
          expect(error.source).toBe('limit');
          expect(error.limit).toBe(limit);
          expect(error.actual).toBe(actual);
          expect(error.message).toBe(`Pending response exceeds ${limit} bytes`);
        }
      ),
      { numRuns: 100 }
    );
  });
});
