/**
 * Delimited text parsing.
 *
 * Turns downloaded text into rows or header-keyed records.
 *
 * Format reference:
 * - one entry per line; blank lines are skipped
 * - fields are separated by `|`
 * - a field containing `,` holds several values
 * - whitespace around lines, fields and values is ignored, and empty
 *   fields and values are dropped
 *
 * Example:
 *   img1.jpg,img2.jpg | Obra 1 | https://x/video1 | etiqueta1,etiqueta2
 *   → [['img1.jpg', 'img2.jpg'], 'Obra 1', 'https://x/video1', ['etiqueta1', 'etiqueta2']]
 */

import { ParseError } from './errors';
import type { Cell, DataRecord, ParseResult, ResultShape, Row } from './types';

// ============================================================================
// Constants
// ============================================================================

/** Separates fields within a line */
export const FIELD_DELIMITER = '|';

/** Separates values within a multi-value field */
export const VALUE_DELIMITER = ',';

/** Any common line ending */
const LINE_BREAK_PATTERN = /\r\n|\n|\r/;

// ============================================================================
// Splitting
// ============================================================================

/**
 * Split text into trimmed, non-empty lines.
 */
export function splitLines(text: string): string[] {
  return text
    .split(LINE_BREAK_PATTERN)
    .map((line) => line.trim())
    .filter((line) => line !== '');
}

/**
 * Split a line into trimmed, non-empty fields.
 *
 * @example
 * splitFields(' a | | b ')
 * // => ['a', 'b']
 */
export function splitFields(line: string): string[] {
  return line
    .split(FIELD_DELIMITER)
    .map((field) => field.trim())
    .filter((field) => field !== '');
}

/**
 * Decode a trimmed field into a cell.
 * Fields with a comma become the list of their trimmed, non-empty parts,
 * so `'a,'` decodes to `['a']` and `','` to `[]`.
 */
export function decodeCell(field: string): Cell {
  if (!field.includes(VALUE_DELIMITER)) {
    return field;
  }
  return field
    .split(VALUE_DELIMITER)
    .map((part) => part.trim())
    .filter((part) => part !== '');
}

/**
 * Parse one line into a row. May return an empty row.
 */
export function parseRow(line: string): Row {
  return splitFields(line).map(decodeCell);
}

// ============================================================================
// Rows & Records
// ============================================================================

/**
 * Parse text into rows, one per non-empty line.
 */
export function parseRows(text: string): Row[] {
  return splitLines(text)
    .map(parseRow)
    .filter((row) => row.length > 0);
}

/**
 * Key a record field by a header cell.
 * Multi-value header cells are keyed by their parts joined with a comma.
 */
function headerKey(cell: Cell): string {
  return typeof cell === 'string' ? cell : cell.join(VALUE_DELIMITER);
}

/**
 * Pair header cells with row cells by position, up to the shorter length.
 *
 * @example
 * zipRecord(['img', 'title', 'url'], ['a.jpg', 'T'])
 * // => { img: 'a.jpg', title: 'T' }
 */
export function zipRecord(header: Row, row: Row): DataRecord {
  const length = Math.min(header.length, row.length);
  const entries: Array<[string, Cell]> = [];

  for (let i = 0; i < length; i++) {
    entries.push([headerKey(header[i]), row[i]]);
  }

  return Object.fromEntries(entries);
}

/**
 * Parse text into records keyed by its first non-empty line.
 * Data lines that decode to no cells are skipped.
 */
export function parseRecords(text: string): DataRecord[] {
  const lines = splitLines(text);
  if (lines.length === 0) {
    return [];
  }

  const header = parseRow(lines[0]);
  return lines
    .slice(1)
    .map(parseRow)
    .filter((row) => row.length > 0)
    .map((row) => zipRecord(header, row));
}

// ============================================================================
// Shape Selection
// ============================================================================

/**
 * Parse text into the requested shape.
 *
 * - `rows` yields rows whatever the header flag says
 * - `records` yields records only with the header flag set
 * - anything else yields `{ shape: 'none' }`
 *
 * @throws ParseError wrapping any failure while decoding
 */
export function parseDelimitedText(text: string, shape: ResultShape, useHeader: boolean = false): ParseResult {
  try {
    if (shape === 'rows') {
      return { shape: 'rows', rows: parseRows(text) };
    }
    if (shape === 'records' && useHeader) {
      return { shape: 'records', records: parseRecords(text) };
    }
    return { shape: 'none' };
  } catch (error) {
    throw new ParseError(error);
  }
}
