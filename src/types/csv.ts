/**
 * Reading and writing options for datalogger CSV files.
 */

import type { DateTime } from 'luxon';
import type { ColumnKey } from './row';

export interface LineRangeOptions {
  /** First line to read. NOTE: zero-based numbering. */
  firstLineNum?: number;
  /** Last line to read (inclusive). NOTE: zero-based numbering. */
  lastLineNum?: number;
  /** Field delimiter (default: ',') */
  delimiter?: ',' | '\t' | string;
}

export interface ReadTableOptions extends LineRangeOptions {
  /** Column names mapped onto each row's values */
  header?: readonly string[];
  /** Line holding the column names. Takes precedence over `header`. */
  headerRow?: number;
}

export interface ReadMixedArrayOptions extends LineRangeOptions {
  /** Restore leading zeros on values such as `.5` and `-.5` (default: true) */
  fixFloats?: boolean;
}

export interface ReadArrayIdsOptions extends ReadMixedArrayOptions {
  /**
   * Array IDs to keep, mapped to the name the partition is stored under.
   * An empty name keeps the array ID. Omit to keep every array ID.
   */
  arrayIdNames?: Record<string, string | null>;
}

export type ExportMode = 'append' | 'overwrite';

export interface ExportOptions {
  /** Write the first row's keys as a header line, unless the file already has content */
  exportHeader?: boolean;
  /** Default: 'append' */
  mode?: ExportMode;
  /** Append the UTC offset (`+0100`) to timestamp values */
  includeTimeZone?: boolean;
  delimiter?: string;
}

export interface ArrayIdExportInfo {
  filePath?: string;
}

export type ArrayIdsExportInfo = Record<string, ArrayIdExportInfo | undefined>;

export interface TimeRange {
  timeColumn: ColumnKey;
  /** Default: the UNIX epoch */
  fromTimestamp?: DateTime;
  /** Default: now */
  toTimestamp?: DateTime;
}

/**
 * A row that could not be time converted, reported instead of thrown when
 * errors are collected.
 */
export interface RowConversionError {
  /** Zero-based position of the row in the input sequence */
  line: number;
  column?: string;
  message: string;
  code: string;
  rawValue?: string;
  recoverable: boolean;
}
