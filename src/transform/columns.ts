import { DateTime } from 'luxon';
import { Row } from '../dataset/Row';
import type { RowSequence } from '../dataset/Row';
import { TimeColumnValueError } from '../errors';
import { getLogger } from '../logger';
import { resolveTimeZone } from '../parsers/timeParser';
import type { TimeRange } from '../types/csv';
import type { ColumnKey, RowEntry } from '../types/row';

const log = getLogger('columns');

function timestampAt(row: Row, timeColumn: ColumnKey): DateTime {
  if (!row.has(timeColumn)) {
    throw new TimeColumnValueError(`Time column ${String(timeColumn)} not found in row!`);
  }
  const value = row.get(timeColumn);
  if (!DateTime.isDateTime(value)) {
    throw new TimeColumnValueError(`Time column ${String(timeColumn)} does not hold a timestamp!`);
  }
  return value;
}

/**
 * Keep the named columns of every row (all columns when none are named).
 *
 * With a time range, only rows whose timestamp lies between `fromTimestamp`
 * (default: the UNIX epoch) and `toTimestamp` (default: now), both inclusive,
 * are kept.
 */
export function extractColumnsData(
  rows: RowSequence,
  columnNames: readonly ColumnKey[] = [],
  timeRange?: TimeRange
): RowSequence {
  let selected = rows;

  if (timeRange) {
    const from = (timeRange.fromTimestamp ?? DateTime.fromMillis(0, { zone: 'utc' })).toMillis();
    const to = (timeRange.toTimestamp ?? DateTime.now()).toMillis();
    selected = rows.filter((row) => {
      const at = timestampAt(row, timeRange.timeColumn).toMillis();
      return from <= at && at <= to;
    });
  }

  if (columnNames.length === 0) {
    return selected.map((row) => row.clone());
  }

  return selected.map((row) =>
    Row.fromEntries(row.entries().filter(([key]) => columnNames.includes(key)))
  );
}

export interface UpdateColumnNamesOptions {
  /** Set aside rows whose length differs from `columnNames` (default: true) */
  matchRowLengths?: boolean;
}

/**
 * Re-key every row positionally with `columnNames`.
 *
 * Rows whose length does not match are returned in `mismatched` unless
 * `matchRowLengths` is false, in which case names and values are zipped to
 * the shorter of the two.
 */
export function updateColumnNames(
  rows: RowSequence,
  columnNames: readonly ColumnKey[],
  options: UpdateColumnNamesOptions = {}
): { rows: RowSequence; mismatched: RowSequence } {
  const matchRowLengths = options.matchRowLengths !== false;
  const renamed: RowSequence = [];
  const mismatched: RowSequence = [];

  for (const row of rows) {
    if (matchRowLengths && row.size !== columnNames.length) {
      mismatched.push(row);
      continue;
    }
    const values = row.values();
    const pairs = Math.min(values.length, columnNames.length);
    const entries: RowEntry[] = [];
    for (let i = 0; i < pairs; i++) {
      entries.push([columnNames[i], values[i]]);
    }
    renamed.push(Row.fromEntries(entries));
  }

  if (mismatched.length > 0) {
    log.warn(`${mismatched.length} row(s) do not match the ${columnNames.length} column names`);
  }
  return { rows: renamed, mismatched };
}

/**
 * Express the timestamps in `timeColumn` in another IANA time zone. The
 * instants are unchanged.
 */
export function convertTimeZone(rows: RowSequence, timeColumn: ColumnKey, toTimeZone: string): RowSequence {
  const { zone } = resolveTimeZone(toTimeZone);
  return rows.map((row) => row.clone().set(timeColumn, timestampAt(row, timeColumn).setZone(zone)));
}
