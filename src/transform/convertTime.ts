import type { Row, RowSequence } from '../dataset/Row';
import { valueToString } from '../dataset/values';
import { DataloggerError, MissingTimeColumnsError, TimeColumnNotFoundError, TimeParsingError } from '../errors';
import { getLogger } from '../logger';
import { parseTimeValues } from '../parsers/timeParser';
import type { RowConversionError } from '../types/csv';
import type { ColumnKey } from '../types/row';
import type { ConvertTimeOptions, TimeFormatGrammar, TimeZoneConfig } from '../types/time';

const log = getLogger('convert');

/**
 * Find the column the parsed timestamp is written to.
 */
export function findInsertionKey(
  keys: readonly ColumnKey[],
  timeColumns: readonly ColumnKey[],
  replaceTimeColumn?: ColumnKey
): ColumnKey {
  if (replaceTimeColumn !== undefined) {
    if (!keys.includes(replaceTimeColumn)) {
      throw new TimeColumnNotFoundError(replaceTimeColumn);
    }
    return replaceTimeColumn;
  }

  const first = keys.find((key) => key === timeColumns[0]);
  if (first === undefined) {
    throw new TimeColumnNotFoundError(
      timeColumns[0],
      `First time column '${String(timeColumns[0])}' not found in column names!`
    );
  }
  return first;
}

/**
 * Convert the time columns of a single row into one timestamp column.
 */
export function convertRowTime(
  row: Row,
  timeZone: TimeZoneConfig,
  grammar: TimeFormatGrammar,
  options: ConvertTimeOptions
): Row {
  const { timeColumns, timeParsedColumn, replaceTimeColumn, toUtc, ignoreParsingError } = options;

  const insertionKey = findInsertionKey(row.keys(), timeColumns, replaceTimeColumn);
  const rawValues = row
    .entries()
    .filter(([key]) => timeColumns.includes(key))
    .map(([, value]) => valueToString(value));

  const timestamp = parseTimeValues(timeZone, grammar, rawValues, { toUtc, ignoreParsingError });
  const outputKey = timeParsedColumn ?? insertionKey;

  const converted = row.clone().rename(insertionKey, outputKey).set(outputKey, timestamp);
  for (const timeColumn of timeColumns) {
    if (timeColumn !== outputKey && converted.has(timeColumn)) {
      converted.remove(timeColumn);
    }
  }
  return converted;
}

/**
 * Convert the time columns of every row into a single timestamp column.
 *
 * The timestamp takes the place of the first time column (or of
 * `replaceTimeColumn`), under `timeParsedColumn` when given. The remaining
 * time columns are dropped. Input rows are left untouched. The first row that
 * fails aborts the conversion.
 */
export function convertTime(
  rows: RowSequence,
  timeZone: TimeZoneConfig,
  grammar: TimeFormatGrammar,
  options: ConvertTimeOptions
): RowSequence {
  if (options.timeColumns.length === 0) {
    throw new MissingTimeColumnsError();
  }
  return rows.map((row) => convertRowTime(row, timeZone, grammar, options));
}

function toRowConversionError(err: unknown, line: number): RowConversionError {
  if (err instanceof TimeParsingError) {
    return {
      line,
      message: err.message,
      code: err.code,
      rawValue: err.value,
      recoverable: true,
    };
  }
  if (err instanceof TimeColumnNotFoundError) {
    return {
      line,
      column: String(err.column),
      message: err.message,
      code: err.code,
      recoverable: true,
    };
  }
  if (err instanceof DataloggerError) {
    return { line, message: err.message, code: err.code, recoverable: true };
  }
  throw err;
}

/**
 * Like `convertTime`, but rows that fail are left out of the result and
 * reported in `errors` instead of aborting the whole data set.
 */
export function convertTimeCollectingErrors(
  rows: RowSequence,
  timeZone: TimeZoneConfig,
  grammar: TimeFormatGrammar,
  options: ConvertTimeOptions
): { rows: RowSequence; errors: RowConversionError[] } {
  if (options.timeColumns.length === 0) {
    throw new MissingTimeColumnsError();
  }

  const converted: RowSequence = [];
  const errors: RowConversionError[] = [];

  rows.forEach((row, line) => {
    try {
      converted.push(convertRowTime(row, timeZone, grammar, options));
    } catch (err) {
      const rowError = toRowConversionError(err, line);
      log.warn(`Skipping row ${line}: ${rowError.message}`, { code: rowError.code });
      errors.push(rowError);
    }
  });

  return { rows: converted, errors };
}
