/**
 * Tests for error handling utilities.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ShareLinkError,
  FormatError,
  TransportError,
  ParseError,
  TypeMismatchError,
  isShareLinkError,
  toShareLinkError,
  formatErrorForUser,
  formatErrorForLog,
  logError,
} from '../../src/core/errors';
import { ErrorType } from '../../src/core/types';

describe('errors', () => {
  describe('ShareLinkError', () => {
    it('creates an error with correct type', () => {
      const error = new ShareLinkError(ErrorType.TRANSPORT_ERROR);
      expect(error.type).toBe(ErrorType.TRANSPORT_ERROR);
    });

    it('creates an error with user-friendly message', () => {
      const error = new ShareLinkError(ErrorType.TRANSPORT_ERROR);
      expect(error.userMessage).toContain('Could not download the file');
      expect(error.userMessage).toContain('Anyone with the link');
      expect(error.message).toBe(error.userMessage);
    });

    it('appends details to the message when provided', () => {
      const error = new ShareLinkError(ErrorType.UNKNOWN_ERROR, 'disk full');
      expect(error.details).toBe('disk full');
      expect(error.message).toBe('An unexpected error occurred. (disk full)');
    });

    it('sets recoverable flag based on error type', () => {
      expect(new ShareLinkError(ErrorType.TRANSPORT_ERROR).recoverable).toBe(true);

      expect(new ShareLinkError(ErrorType.INVALID_LINK).recoverable).toBe(false);
      expect(new ShareLinkError(ErrorType.PARSE_ERROR).recoverable).toBe(false);
      expect(new ShareLinkError(ErrorType.TYPE_MISMATCH).recoverable).toBe(false);
      expect(new ShareLinkError(ErrorType.UNKNOWN_ERROR).recoverable).toBe(false);
    });

    it('extends Error', () => {
      const error = new ShareLinkError(ErrorType.UNKNOWN_ERROR);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('ShareLinkError');
    });
  });

  describe('subclasses', () => {
    it('FormatError uses the invalid link category', () => {
      const error = new FormatError('Link must be from drive.google.com');
      expect(error).toBeInstanceOf(ShareLinkError);
      expect(error.name).toBe('FormatError');
      expect(error.type).toBe(ErrorType.INVALID_LINK);
      expect(error.details).toBe('Link must be from drive.google.com');
    });

    it('TransportError carries the status code', () => {
      const error = new TransportError(404);
      expect(error.name).toBe('TransportError');
      expect(error.type).toBe(ErrorType.TRANSPORT_ERROR);
      expect(error.status).toBe(404);
      expect(error.details).toBe('status 404');
    });

    it('TransportError allows a missing status', () => {
      const cause = new TypeError('fetch failed');
      const error = new TransportError(null, 'GET failed: fetch failed', { cause });
      expect(error.status).toBeNull();
      expect(error.cause).toBe(cause);
    });

    it('ParseError keeps the cause', () => {
      const cause = new TypeError('The encoded data was not valid for encoding utf-8');
      const error = new ParseError(cause);
      expect(error.name).toBe('ParseError');
      expect(error.type).toBe(ErrorType.PARSE_ERROR);
      expect(error.cause).toBe(cause);
      expect(error.details).toBe('The encoded data was not valid for encoding utf-8');
    });

    it('ParseError accepts non-Error causes', () => {
      expect(new ParseError('bad bytes').details).toBe('bad bytes');
    });

    it('TypeMismatchError uses the type mismatch category', () => {
      const error = new TypeMismatchError('expected rows, got records');
      expect(error.name).toBe('TypeMismatchError');
      expect(error.type).toBe(ErrorType.TYPE_MISMATCH);
    });
  });

  describe('isShareLinkError', () => {
    it('returns true for library errors', () => {
      expect(isShareLinkError(new TransportError(500))).toBe(true);
    });

    it('returns false for regular Error instances', () => {
      expect(isShareLinkError(new Error('Test error'))).toBe(false);
    });

    it('returns false for non-errors', () => {
      expect(isShareLinkError('error')).toBe(false);
      expect(isShareLinkError(null)).toBe(false);
    });
  });

  describe('toShareLinkError', () => {
    it('returns library errors unchanged', () => {
      const original = new FormatError();
      expect(toShareLinkError(original)).toBe(original);
    });

    it('wraps regular errors as UNKNOWN_ERROR', () => {
      const original = new Error('EACCES');
      const error = toShareLinkError(original);
      expect(error.type).toBe(ErrorType.UNKNOWN_ERROR);
      expect(error.details).toBe('EACCES');
      expect(error.cause).toBe(original);
    });

    it('wraps non-error values', () => {
      const error = toShareLinkError('string error');
      expect(error.type).toBe(ErrorType.UNKNOWN_ERROR);
      expect(error.details).toBe('string error');
    });
  });

  describe('formatErrorForUser', () => {
    it('returns the user message', () => {
      const error = new TransportError(403);
      expect(formatErrorForUser(error)).toBe(error.userMessage);
    });
  });

  describe('formatErrorForLog', () => {
    it('includes type, message and details', () => {
      const formatted = formatErrorForLog(new TransportError(404));
      expect(formatted).toContain('[ShareLink] TRANSPORT_ERROR:');
      expect(formatted).toContain('Details: status 404');
      expect(formatted).toContain('Stack:');
    });

    it('omits details when there are none', () => {
      expect(formatErrorForLog(new FormatError())).not.toContain('Details:');
    });
  });

  describe('logError', () => {
    it('logs the formatted error', () => {
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const error = new ParseError(new Error('bad'));
      logError(error);
      expect(consoleSpy).toHaveBeenCalledWith(formatErrorForLog(error));
      consoleSpy.mockRestore();
    });
  });
});
