/**
 * Parameter table filtering tests
 */

import { describe, it, expect } from 'vitest';
import { ParamTable } from './param-table.js';
import { UnknownColumnError } from './frame.js';

const COLUMNS = ['path', 'run', 'parameter'];

const table = ParamTable.fromRecords(COLUMNS, [
  { path: 'data/run1_p10.csv', run: 1, parameter: 10 },
  { path: 'data/run2_p20.csv', run: 2, parameter: 20 },
  { path: 'data/run3_p10.csv', run: 3, parameter: 10 },
]);

describe('ParamTable', () => {
  it('exposes columns, rows and paths', () => {
    expect(table.columns).toEqual(COLUMNS);
    expect(table.length).toBe(3);
    expect(table.column('run')).toEqual([1, 2, 3]);
    expect(table.paths()).toEqual(['data/run1_p10.csv', 'data/run2_p20.csv', 'data/run3_p10.csv']);
    expect([...table]).toEqual(table.toJSON());
  });

  it('keeps its columns when empty', () => {
    const empty = ParamTable.empty(COLUMNS);
    expect(empty.length).toBe(0);
    expect(empty.columns).toEqual(COLUMNS);
    expect(empty.column('run')).toEqual([]);
  });

  describe('filter', () => {
    it('keeps rows equal to a scalar', () => {
      expect(table.filter({ run: 1 }).toJSON()).toEqual([{ path: 'data/run1_p10.csv', run: 1, parameter: 10 }]);
    });

    it('keeps rows in a list, in their original order', () => {
      expect(table.filter({ run: [3, 1] }).column('run')).toEqual([1, 3]);
    });

    it('combines constraints with OR by default', () => {
      expect(table.filter({ run: 1, parameter: 20 }).column('run')).toEqual([1, 2]);
    });

    it('combines constraints with AND when asked', () => {
      expect(table.filter({ run: 1, parameter: 20 }, { match: 'all' }).length).toBe(0);
      expect(table.filter({ run: [1, 3], parameter: 10 }, { match: 'all' }).column('run')).toEqual([1, 3]);
    });

    it('returns an empty table without constraints', () => {
      const result = table.filter({});
      expect(result.length).toBe(0);
      expect(result.columns).toEqual(COLUMNS);
    });

    it('keeps every row without constraints in all mode', () => {
      expect(table.filter({}, { match: 'all' }).length).toBe(3);
    });

    it('is idempotent', () => {
      const constraints = { parameter: [20], run: 3 };
      const once = table.filter(constraints);
      expect(once.filter(constraints).toJSON()).toEqual(once.toJSON());
    });

    it('does not change the source table', () => {
      table.filter({ run: 1 });
      expect(table.length).toBe(3);
    });

    it('fails on an unknown column', () => {
      expect(() => table.filter({ rn: 1 })).toThrow(UnknownColumnError);
      expect(() => ParamTable.empty(COLUMNS).filter({ rn: 1 })).toThrow(UnknownColumnError);
    });

    it('can filter on path', () => {
      expect(table.filter({ path: 'data/run2_p20.csv' }).column('run')).toEqual([2]);
    });
  });
});
