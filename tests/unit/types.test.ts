import { describe, it, expect } from 'vitest';
import { ImapError, ImapLimitError, ImapParseError } from '../../src/types/errors.js';

describe('Type definitions', () => {
  describe('Error classes', () => {
    it('should create ImapError with correct properties', () => {
      const error = new ImapError('Test error', 'TEST_CODE', 'parse');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(ImapError);
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_CODE');
      expect(error.source).toBe('parse');
      expect(error.name).toBe('ImapError');
    });

    it('should create ImapParseError with raw data', () => {
      const error = new ImapParseError('Malformed IMAP response', '* FOO bar');

      expect(error).toBeInstanceOf(ImapError);
      expect(error).toBeInstanceOf(ImapParseError);
      expect(error.source).toBe('parse');
      expect(error.code).toBe('PARSE_ERROR');
      expect(error.rawData).toBe('* FOO bar');
      expect(error.name).toBe('ImapParseError');
    });

    it('should create ImapLimitError with limit and actual size', () => {
      const error = new ImapLimitError('Pending response exceeds 16 bytes', 16, 25);

      expect(error).toBeInstanceOf(ImapError);
      expect(error).toBeInstanceOf(ImapLimitError);
      expect(error.source).toBe('limit');
      expect(error.code).toBe('LIMIT_ERROR');
      expect(error.limit).toBe(16);
      expect(error.actual).toBe(25);
      expect(error.name).toBe('ImapLimitError');
    });

    it('should capture a stack trace', () => {
      const error = new ImapParseError('Malformed IMAP response', '');
      expect(error.stack).toContain('Malformed IMAP response');
    });
  });
});
