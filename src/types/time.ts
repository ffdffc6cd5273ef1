/**
 * Time format and time conversion types.
 *
 * A datalogger writes a row's time across one or more columns (year, day of
 * year, compact hour/minute, ...). The format library lists, column by column,
 * how each of those values is read.
 */

import type { Zone } from 'luxon';
import type { ColumnKey } from './row';

export type DeviceModel = 'generic' | 'CR10' | 'CR10X' | 'CR1000';

/** strftime-style tokens, or a device-specific sentinel such as `Hour/Minute`. */
export type TimeFormatLibrary = readonly string[];

export interface ParsedTimeInfo {
  /** Format tokens joined with `,` */
  parsedTimeFormat: string;
  /** Time values joined with `,` */
  parsedTime: string;
}

export interface CustomTokenExpansion {
  token: string;
  value: string;
}

/**
 * Rewrites a device-specific token/value pair into a generic one. Returns
 * null for pairs it does not handle.
 */
export type CustomTokenExpander = (token: string, value: string) => CustomTokenExpansion | null;

export interface TimeFormatGrammar {
  library: TimeFormatLibrary;
  expandCustomToken?: CustomTokenExpander;
  /** Largest number of time values the device format accepts */
  maxTimeValues?: number;
}

export interface DeviceProfile extends TimeFormatGrammar {
  model: DeviceModel;
  description: string;
}

export interface TimeZoneConfig {
  name: string;
  zone: Zone;
}

export interface ParseTimeOptions {
  /** Substitute the UNIX epoch instead of throwing when a value does not parse */
  ignoreParsingError?: boolean;
  toUtc?: boolean;
}

export interface ConvertTimeOptions extends ParseTimeOptions {
  /** Columns (names or positions) holding the time values, in format-library order */
  timeColumns: readonly ColumnKey[];
  /** Name of the converted column. Defaults to the insertion column's key. */
  timeParsedColumn?: ColumnKey;
  /** Column to place the timestamp at. Defaults to the first time column. */
  replaceTimeColumn?: ColumnKey;
}
