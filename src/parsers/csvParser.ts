import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import { Row } from '../dataset/Row';
import type { ArrayIdPartitions, RowSequence } from '../dataset/Row';
import { getLogger } from '../logger';
import { filterMixedArrayData, renameArrayIds } from '../partition/arrayIds';
import type {
  LineRangeOptions,
  ReadArrayIdsOptions,
  ReadMixedArrayOptions,
  ReadTableOptions,
} from '../types/csv';
import type { RowEntry } from '../types/row';

const log = getLogger('ingest');

/** Leading-zero repairs for values older CR dataloggers write as `.5` / `-.5` */
const FLOAT_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ['-.', '-0.'],
  ['.', '0.'],
];

interface SourceLine {
  /** Zero-based line number in the source */
  line: number;
  values: string[];
}

interface RecordWithInfo {
  record: string[];
  info: { lines: number };
}

function isRecordWithInfo(value: unknown): value is RecordWithInfo {
  if (typeof value !== 'object' || value === null) return false;
  if (!('record' in value) || !('info' in value)) return false;

  const { record, info } = value;
  return (
    Array.isArray(record) &&
    record.every((field) => typeof field === 'string') &&
    typeof info === 'object' &&
    info !== null &&
    'lines' in info &&
    typeof info.lines === 'number'
  );
}

/**
 * Parse CSV content into records tagged with their source line number.
 * Blank lines are skipped but still counted. A record spanning several lines
 * is tagged with its last line.
 */
export function readSourceLines(content: string, delimiter: string = ','): SourceLine[] {
  const parsed: unknown = parse(content, {
    delimiter,
    info: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });
  if (!Array.isArray(parsed)) return [];

  return parsed.filter(isRecordWithInfo).map(({ record, info }) => ({ line: info.lines - 1, values: record }));
}

function inLineRange(line: number, options: LineRangeOptions): boolean {
  const first = options.firstLineNum ?? 0;
  if (line < first) return false;
  return options.lastLineNum === undefined || line <= options.lastLineNum;
}

/**
 * Insert the missing leading zero in values such as `.5` and `-.25`.
 */
export function fixFloat(value: string): string {
  for (const [source, replacement] of FLOAT_REPLACEMENTS) {
    if (value.startsWith(source)) {
      return replacement + value.slice(source.length);
    }
  }
  return value;
}

/**
 * Parse table-formatted content (one record format per file).
 *
 * Rows are keyed by header name when a header is given (or read from
 * `headerRow`), and by column position otherwise.
 */
export function parseTableRows(content: string, options: ReadTableOptions = {}): RowSequence {
  let lines = readSourceLines(content, options.delimiter);
  let header = options.header;

  if (options.headerRow !== undefined && options.headerRow >= 0) {
    const headerRow = options.headerRow;
    const headerLine = lines.find(({ line }) => line === headerRow);
    header = headerLine ? headerLine.values : [];
    lines = lines.filter(({ line }) => line > headerRow);
  }

  const rows: RowSequence = [];
  for (const { line, values } of lines) {
    if (!inLineRange(line, options)) continue;

    if (header && header.length > 0) {
      const names = header;
      const pairs = Math.min(names.length, values.length);
      const entries: RowEntry[] = [];
      for (let i = 0; i < pairs; i++) {
        entries.push([names[i], values[i]]);
      }
      rows.push(Row.fromEntries(entries));
    } else {
      rows.push(Row.fromValues(values));
    }
  }
  return rows;
}

/**
 * Parse mixed array content: rows from several table definitions, told
 * apart by the array ID in their first column. Rows are keyed by position.
 */
export function parseMixedArrayRows(content: string, options: ReadMixedArrayOptions = {}): RowSequence {
  const fixFloats = options.fixFloats !== false;

  return readSourceLines(content, options.delimiter)
    .filter(({ line }) => inLineRange(line, options))
    .map(({ values }) => Row.fromValues(fixFloats ? values.map(fixFloat) : values));
}

/**
 * Read a table-formatted data file
 */
export function readTableData(filePath: string, options: ReadTableOptions = {}): RowSequence {
  const rows = parseTableRows(fs.readFileSync(filePath, { encoding: 'utf-8' }), options);
  log.debug(`Read ${rows.length} row(s) from ${filePath}`);
  return rows;
}

/**
 * Read a mixed array data file without splitting it by array ID
 */
export function readMixedArrayData(filePath: string, options: ReadMixedArrayOptions = {}): RowSequence {
  const rows = parseMixedArrayRows(fs.readFileSync(filePath, { encoding: 'utf-8' }), options);
  log.debug(`Read ${rows.length} mixed array row(s) from ${filePath}`);
  return rows;
}

/**
 * Read a mixed array data file split by array ID.
 *
 * With `arrayIdNames`, only the listed array IDs are kept and each partition
 * is stored under its mapped name (or its ID when the name is empty).
 */
export function readArrayIdsData(filePath: string, options: ReadArrayIdsOptions = {}): ArrayIdPartitions {
  const { arrayIdNames = {}, ...mixedOptions } = options;
  const data = readMixedArrayData(filePath, mixedOptions);
  const partitions = filterMixedArrayData(data, Object.keys(arrayIdNames));
  return renameArrayIds(partitions, arrayIdNames);
}
