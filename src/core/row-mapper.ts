/**
 * Mapping parsed rows and records onto caller models.
 */

import { TypeMismatchError } from './errors';
import type { Cell, ModelSpec, ParseResult } from './types';

/**
 * Apply a model transform to every parsed entry, in order.
 *
 * Returns an empty list without calling the transform when nothing was
 * parsed. Errors thrown by the transform propagate as they are.
 *
 * @throws TypeMismatchError when the result and the model disagree on shape
 */
export function mapRows<T>(result: ParseResult, model: ModelSpec<T>): T[] {
  switch (result.shape) {
    case 'none':
      return [];
    case 'rows':
      if (model.shape !== 'rows') {
        throw new TypeMismatchError(`expected ${model.shape}, got rows`);
      }
      return result.rows.map((row) => model.fromRow(row));
    case 'records':
      if (model.shape !== 'records') {
        throw new TypeMismatchError(`expected ${model.shape}, got records`);
      }
      return result.records.map((record) => model.fromRecord(record));
    default:
      return unknownShape(result);
  }
}

function unknownShape(result: never): never {
  const shape: unknown = Object(result).shape;
  throw new TypeMismatchError(`unrecognized result shape: ${String(shape)}`);
}

// ============================================================================
// Cell Helpers
// ============================================================================

/**
 * Read a cell as a list; a single value becomes a one-element list.
 * A missing cell reads as an empty list.
 *
 * @example
 * cellAsList('etiqueta3')
 * // => ['etiqueta3']
 */
export function cellAsList(cell: Cell | undefined): string[] {
  if (cell === undefined) return [];
  return typeof cell === 'string' ? [cell] : cell;
}

/**
 * Read a cell as text; the values of a multi-value cell are joined.
 * A missing cell reads as an empty string.
 */
export function cellAsText(cell: Cell | undefined, separator: string = ', '): string {
  if (cell === undefined) return '';
  return typeof cell === 'string' ? cell : cell.join(separator);
}
