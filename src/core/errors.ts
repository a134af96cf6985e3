/**
 * Error handling utilities for the share link data source.
 * Provides the error taxonomy, consistent messaging, and logging.
 */

import { ErrorType } from './types';

// ============================================================================
// Error Messages
// ============================================================================

/**
 * User-friendly messages and recovery status for each error type.
 */
const ERROR_CONFIGS: Record<ErrorType, { message: string; recoverable: boolean }> = {
  [ErrorType.INVALID_LINK]: {
    message: 'Invalid Google Drive share link. Please paste a link of the form https://drive.google.com/file/d/ID/view.',
    recoverable: false,
  },
  [ErrorType.TRANSPORT_ERROR]: {
    message: 'Could not download the file. Check that it is shared as "Anyone with the link".',
    recoverable: true,
  },
  [ErrorType.PARSE_ERROR]: {
    message: 'Failed to parse the file. Please check that it is UTF-8 text.',
    recoverable: false,
  },
  [ErrorType.TYPE_MISMATCH]: {
    message: 'The parsed data does not have the shape the model expects.',
    recoverable: false,
  },
  [ErrorType.UNKNOWN_ERROR]: {
    message: 'An unexpected error occurred.',
    recoverable: false,
  },
};

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Base class for every error the library raises.
 */
export class ShareLinkError extends Error {
  /** Error category */
  readonly type: ErrorType;
  /** User-friendly message */
  readonly userMessage: string;
  /** Technical details for debugging */
  readonly details?: string;
  /** Whether retrying the operation can succeed */
  readonly recoverable: boolean;

  constructor(type: ErrorType, details?: string, options?: { cause?: unknown }) {
    const config = ERROR_CONFIGS[type];
    super(details ? `${config.message} (${details})` : config.message, options);
    this.name = 'ShareLinkError';
    this.type = type;
    this.userMessage = config.message;
    this.details = details;
    this.recoverable = config.recoverable;
  }
}

/**
 * The share link does not match the expected pattern.
 */
export class FormatError extends ShareLinkError {
  constructor(details?: string) {
    super(ErrorType.INVALID_LINK, details);
    this.name = 'FormatError';
  }
}

/**
 * A download returned a non-success status, or never completed.
 */
export class TransportError extends ShareLinkError {
  /** HTTP status code; null when no response arrived */
  readonly status: number | null;

  constructor(status: number | null, details?: string, options?: { cause?: unknown }) {
    super(ErrorType.TRANSPORT_ERROR, details ?? `status ${status}`, options);
    this.name = 'TransportError';
    this.status = status;
  }
}

/**
 * Staged content could not be decoded or parsed.
 */
export class ParseError extends ShareLinkError {
  constructor(cause: unknown) {
    super(ErrorType.PARSE_ERROR, cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'ParseError';
  }
}

/**
 * A model transform was applied to data of another shape.
 */
export class TypeMismatchError extends ShareLinkError {
  constructor(details?: string) {
    super(ErrorType.TYPE_MISMATCH, details);
    this.name = 'TypeMismatchError';
  }
}

// ============================================================================
// Type Guards & Conversion
// ============================================================================

/**
 * Check if an error is one of the library's errors.
 */
export function isShareLinkError(error: unknown): error is ShareLinkError {
  return error instanceof ShareLinkError;
}

/**
 * Convert any error to a ShareLinkError.
 * If already a ShareLinkError, returns as-is.
 * Otherwise wraps in an UNKNOWN_ERROR.
 */
export function toShareLinkError(error: unknown): ShareLinkError {
  if (isShareLinkError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new ShareLinkError(ErrorType.UNKNOWN_ERROR, error.message, { cause: error });
  }

  return new ShareLinkError(ErrorType.UNKNOWN_ERROR, String(error));
}

// ============================================================================
// Error Formatting
// ============================================================================

/**
 * Format an error for user display.
 * Returns a concise, user-friendly message.
 */
export function formatErrorForUser(error: ShareLinkError): string {
  return error.userMessage;
}

/**
 * Format an error for logging.
 * Includes technical details for debugging.
 */
export function formatErrorForLog(error: ShareLinkError): string {
  const parts = [`[ShareLink] ${error.type}: ${error.userMessage}`];

  if (error.details) {
    parts.push(`Details: ${error.details}`);
  }

  if (error.stack) {
    parts.push(`Stack: ${error.stack}`);
  }

  return parts.join('\n');
}

/**
 * Log an error with appropriate context.
 */
export function logError(error: ShareLinkError): void {
  console.error(formatErrorForLog(error));
}
