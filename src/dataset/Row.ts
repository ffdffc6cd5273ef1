import { KeyNotFoundError } from '../errors';
import type { ColumnKey, ColumnValue, RowEntry } from '../types/row';

/**
 * Ordered mapping of column keys to values.
 *
 * Order is the column order written on export, so every operation keeps the
 * position of the keys it touches.
 */
export class Row implements Iterable<RowEntry> {
  private columns: Map<ColumnKey, ColumnValue>;

  constructor(entries: Iterable<RowEntry> = []) {
    this.columns = new Map(entries);
  }

  static fromEntries(entries: Iterable<RowEntry>): Row {
    return new Row(entries);
  }

  /**
   * Build a row keyed by position (0, 1, 2, ...).
   */
  static fromValues(values: readonly ColumnValue[]): Row {
    return new Row(values.map((value, index): RowEntry => [index, value]));
  }

  get size(): number {
    return this.columns.size;
  }

  has(key: ColumnKey): boolean {
    return this.columns.has(key);
  }

  get(key: ColumnKey): ColumnValue {
    const value = this.columns.get(key);
    if (value === undefined) {
      throw new KeyNotFoundError(key);
    }
    return value;
  }

  set(key: ColumnKey, value: ColumnValue): this {
    this.columns.set(key, value);
    return this;
  }

  /**
   * Replace `oldKey` with `newKey` at the same position. A column already
   * stored under `newKey` elsewhere in the row is dropped.
   */
  rename(oldKey: ColumnKey, newKey: ColumnKey): this {
    if (!this.columns.has(oldKey)) {
      throw new KeyNotFoundError(oldKey);
    }
    if (oldKey === newKey) {
      return this;
    }

    const renamed = new Map<ColumnKey, ColumnValue>();
    for (const [key, value] of this.columns) {
      if (key === oldKey) {
        renamed.set(newKey, value);
      } else if (key !== newKey) {
        renamed.set(key, value);
      }
    }
    this.columns = renamed;
    return this;
  }

  remove(key: ColumnKey): this {
    if (!this.columns.delete(key)) {
      throw new KeyNotFoundError(key);
    }
    return this;
  }

  keys(): ColumnKey[] {
    return [...this.columns.keys()];
  }

  values(): ColumnValue[] {
    return [...this.columns.values()];
  }

  entries(): RowEntry[] {
    return [...this.columns.entries()];
  }

  clone(): Row {
    return new Row(this.columns);
  }

  [Symbol.iterator](): Iterator<RowEntry> {
    return this.columns.entries();
  }
}

export type RowSequence = Row[];

/**
 * Data split by array ID, in order of first appearance.
 */
export type ArrayIdPartitions = Map<string, RowSequence>;
