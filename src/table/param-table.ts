/**
 * Parameter table - one row per discovered file
 *
 * Wraps a RecordFrame and adds keyword filtering. Columns are `path`
 * followed by the template's placeholder names.
 */

import type { FieldValue } from '../template/index.js';
import { buildMask, type Constraints, type FilterOptions } from '../filter/index.js';
import { RecordFrame, type Row } from './frame.js';

export const PATH_COLUMN = 'path';

export class ParamTable implements Iterable<Row> {
  private constructor(private readonly frame: RecordFrame) {}

  static fromRecords(columns: readonly string[], records: readonly Row[]): ParamTable {
    return new ParamTable(RecordFrame.fromRecords(records, columns));
  }

  static empty(columns: readonly string[]): ParamTable {
    return new ParamTable(new RecordFrame(columns, []));
  }

  get columns(): readonly string[] {
    return this.frame.columns;
  }

  get length(): number {
    return this.frame.length;
  }

  /** @throws UnknownColumnError */
  column(name: string): (FieldValue | undefined)[] {
    return this.frame.column(name);
  }

  row(index: number): Row | undefined {
    return this.frame.row(index);
  }

  rows(): readonly Row[] {
    return this.frame.rows();
  }

  paths(): string[] {
    return this.frame.column(PATH_COLUMN).map(String);
  }

  /**
   * Keep rows matching the constraints, in their original order.
   *
   * With the default `match: 'any'` a row is kept when it satisfies ANY
   * constraint, and an empty constraint set keeps nothing. Pass
   * `match: 'all'` to require every constraint.
   *
   * @throws UnknownColumnError for a constraint on a missing column
   */
  filter(constraints: Constraints, options: FilterOptions = {}): ParamTable {
    const mask = buildMask(this.frame, constraints, options.match ?? 'any');
    return new ParamTable(this.frame.select(mask));
  }

  [Symbol.iterator](): Iterator<Row> {
    return this.frame.rows()[Symbol.iterator]();
  }

  toJSON(): Row[] {
    return [...this.frame.rows()];
  }
}
