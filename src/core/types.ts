/**
 * Core type definitions for the share link data source.
 * These types are shared across the library codebase.
 */

// ============================================================================
// Parsed Data Types
// ============================================================================

/**
 * A single parsed field.
 * Plain text, or the comma-separated parts of a multi-value field.
 */
export type Cell = string | string[];

/**
 * One data line, cells in positional order. Never empty.
 */
export type Row = Cell[];

/**
 * One data line keyed by the header line's cells.
 */
export type DataRecord = Record<string, Cell>;

/**
 * Output shape requested from a parse.
 * - `rows`: list of rows, header flag ignored
 * - `records`: list of records, only with the header flag set
 * - `none`: download only, nothing parsed
 */
export type ResultShape = 'rows' | 'records' | 'none';

/**
 * Outcome of parsing downloaded content.
 */
export type ParseResult =
  | { shape: 'rows'; rows: Row[] }
  | { shape: 'records'; records: DataRecord[] }
  | { shape: 'none' };

// ============================================================================
// Model Mapping Types
// ============================================================================

/**
 * Builds a caller model from a row (no header).
 */
export interface RowModel<T> {
  shape: 'rows';
  fromRow: (row: Row) => T;
}

/**
 * Builds a caller model from a record (header mode).
 */
export interface RecordModel<T> {
  shape: 'records';
  fromRecord: (record: DataRecord) => T;
}

/**
 * Either kind of model transform.
 */
export type ModelSpec<T> = RowModel<T> | RecordModel<T>;

// ============================================================================
// Link Parsing Types
// ============================================================================

/**
 * Result of parsing a Drive share link.
 */
export interface ParsedShareLink {
  /** The extracted file ID */
  resourceId: string;
  /** Whether the link is valid */
  isValid: boolean;
  /** Error message if the link is invalid */
  errorMessage?: string;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Categories of errors the library raises.
 */
export enum ErrorType {
  INVALID_LINK = 'INVALID_LINK',
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',
  TYPE_MISMATCH = 'TYPE_MISMATCH',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}
