/**
 * Record frame - an ordered, immutable set of rows with named columns
 */

import type { FieldValue } from '../template/index.js';
import type { ColumnSource } from '../filter/index.js';
import { suggestColumns } from '../filter/index.js';

export type Row = Readonly<Record<string, FieldValue>>;

export class UnknownColumnError extends Error {
  constructor(
    public readonly column: string,
    public readonly columns: readonly string[]
  ) {
    const hints = suggestColumns(column, columns);
    const hint = hints.length > 0 ? ` (did you mean: ${hints.join(', ')}?)` : '';
    super(`Unknown column "${column}"; available: ${columns.join(', ') || '(none)'}${hint}`);
    this.name = 'UnknownColumnError';
  }
}

export class RecordFrame implements ColumnSource {
  readonly columns: readonly string[];
  private readonly data: readonly Row[];

  constructor(columns: readonly string[], rows: readonly Row[]) {
    this.columns = Object.freeze([...columns]);
    this.data = Object.freeze(rows.map((row) => Object.freeze({ ...row })));
  }

  /**
   * Build a frame from records; columns follow first-seen key order
   * unless given explicitly
   */
  static fromRecords(records: readonly Row[], columns?: readonly string[]): RecordFrame {
    if (columns) {
      return new RecordFrame(columns, records);
    }
    const seen = new Set<string>();
    for (const record of records) {
      for (const key of Object.keys(record)) seen.add(key);
    }
    return new RecordFrame([...seen], records);
  }

  get length(): number {
    return this.data.length;
  }

  hasColumn(name: string): boolean {
    return this.columns.includes(name);
  }

  /**
   * Values of one column, in row order (undefined where a row lacks it)
   * @throws UnknownColumnError
   */
  column(name: string): (FieldValue | undefined)[] {
    if (!this.hasColumn(name)) {
      throw new UnknownColumnError(name, this.columns);
    }
    return this.data.map((row) => row[name]);
  }

  row(index: number): Row | undefined {
    return this.data[index];
  }

  rows(): readonly Row[] {
    return this.data;
  }

  /**
   * Keep the rows whose mask entry is true
   */
  select(mask: readonly boolean[]): RecordFrame {
    if (mask.length !== this.data.length) {
      throw new RangeError(`Mask length ${mask.length} does not match row count ${this.data.length}`);
    }
    return new RecordFrame(
      this.columns,
      this.data.filter((_, i) => mask[i])
    );
  }
}
