/**
 * Unit tests for mapping parsed data onto caller models.
 */

import { describe, it, expect, vi } from 'vitest';
import { mapRows, cellAsList, cellAsText } from '../../src/core/row-mapper';
import { TypeMismatchError } from '../../src/core/errors';
import type { DataRecord, ParseResult, Row } from '../../src/core/types';

interface Work {
  images: string[];
  title: string;
}

const fromRow = (row: Row): Work => ({
  images: cellAsList(row[0]),
  title: cellAsText(row[1]),
});

describe('mapRows', () => {
  it('maps rows in order', () => {
    const result: ParseResult = {
      shape: 'rows',
      rows: [
        [['a.jpg', 'b.jpg'], 'First'],
        ['c.jpg', 'Second'],
      ],
    };

    expect(mapRows(result, { shape: 'rows', fromRow })).toEqual([
      { images: ['a.jpg', 'b.jpg'], title: 'First' },
      { images: ['c.jpg'], title: 'Second' },
    ]);
  });

  it('maps records in order', () => {
    const result: ParseResult = {
      shape: 'records',
      records: [{ name: 'bolt' }, { name: 'nut' }],
    };
    const fromRecord = (record: DataRecord) => cellAsText(record.name);

    expect(mapRows(result, { shape: 'records', fromRecord })).toEqual(['bolt', 'nut']);
  });

  it('returns an empty list without calling the transform when nothing was parsed', () => {
    const transform = vi.fn(fromRow);

    expect(mapRows({ shape: 'none' }, { shape: 'rows', fromRow: transform })).toEqual([]);
    expect(transform).not.toHaveBeenCalled();
  });

  it('passes only the row to the transform', () => {
    const transform = vi.fn((row: Row) => row.length);

    mapRows({ shape: 'rows', rows: [['a', 'b']] }, { shape: 'rows', fromRow: transform });

    expect(transform).toHaveBeenCalledWith(['a', 'b']);
  });

  it('throws TypeMismatchError when a row model meets records', () => {
    const result: ParseResult = { shape: 'records', records: [{ a: '1' }] };

    expect(() => mapRows(result, { shape: 'rows', fromRow })).toThrow(TypeMismatchError);
    expect(() => mapRows(result, { shape: 'rows', fromRow })).toThrow('expected rows, got records');
  });

  it('throws TypeMismatchError when a record model meets rows', () => {
    const result: ParseResult = { shape: 'rows', rows: [['1']] };
    const fromRecord = (record: DataRecord) => record;

    expect(() => mapRows(result, { shape: 'records', fromRecord })).toThrow('expected records, got rows');
  });

  it('throws TypeMismatchError for an unrecognized shape', () => {
    const result = JSON.parse('{"shape":"table"}');

    expect(() => mapRows(result, { shape: 'rows', fromRow })).toThrow(TypeMismatchError);
    expect(() => mapRows(result, { shape: 'rows', fromRow })).toThrow('unrecognized result shape: table');
  });

  it('lets transform errors propagate unwrapped', () => {
    const failure = new RangeError('bad row');
    const transform = () => {
      throw failure;
    };

    expect(() => mapRows({ shape: 'rows', rows: [['a']] }, { shape: 'rows', fromRow: transform })).toThrow(
      failure
    );
  });
});

describe('cellAsList', () => {
  it('wraps a single value', () => {
    expect(cellAsList('etiqueta3')).toEqual(['etiqueta3']);
  });

  it('returns a multi-value cell as is', () => {
    expect(cellAsList(['x', 'y'])).toEqual(['x', 'y']);
  });

  it('reads a missing cell as an empty list', () => {
    expect(cellAsList(undefined)).toEqual([]);
  });
});

describe('cellAsText', () => {
  it('returns a single value as is', () => {
    expect(cellAsText('Obra 1')).toBe('Obra 1');
  });

  it('joins a multi-value cell', () => {
    expect(cellAsText(['x', 'y'])).toBe('x, y');
    expect(cellAsText(['x', 'y'], '|')).toBe('x|y');
  });

  it('reads a missing cell as an empty string', () => {
    expect(cellAsText(undefined)).toBe('');
  });
});
