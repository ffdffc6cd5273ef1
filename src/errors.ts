/**
 * Error types raised while reading, time-converting and exporting datalogger data.
 *
 * Every error carries a stable `code` so callers can branch without `instanceof`
 * checks across package boundaries.
 */

import type { ColumnKey } from './types/row';

export type DataloggerErrorCode =
  | 'INVALID_TIME_ZONE'
  | 'INVALID_OPTIONS'
  | 'TIME_COLUMN_VALUE'
  | 'MISSING_TIME_COLUMNS'
  | 'TIME_COLUMN_NOT_FOUND'
  | 'INVALID_COMPACT_TIME'
  | 'UNSUPPORTED_TIME_FORMAT'
  | 'TIME_PARSING_ERROR'
  | 'KEY_NOT_FOUND'
  | 'ARRAY_IDS_INFO'
  | 'ARRAY_IDS_EXPORT_INFO';

export class DataloggerError extends Error {
  readonly code: DataloggerErrorCode;

  constructor(code: DataloggerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised at parser construction when the time zone is not a known IANA zone.
 */
export class UnknownTimeZoneError extends DataloggerError {
  readonly timeZone: string;

  constructor(timeZone: string) {
    super('INVALID_TIME_ZONE', `${timeZone} is not a valid IANA time zone`);
    this.timeZone = timeZone;
  }
}

export class InvalidParserOptionsError extends DataloggerError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_OPTIONS', `Invalid parser options: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class TimeColumnValueError extends DataloggerError {
  constructor(message: string, code: DataloggerErrorCode = 'TIME_COLUMN_VALUE') {
    super(code, message);
  }
}

export class MissingTimeColumnsError extends TimeColumnValueError {
  constructor() {
    super('At least one time column is required!', 'MISSING_TIME_COLUMNS');
  }
}

export class TimeColumnNotFoundError extends TimeColumnValueError {
  readonly column: ColumnKey;

  constructor(column: ColumnKey, message?: string) {
    super(message ?? `${String(column)} not found in column names!`, 'TIME_COLUMN_NOT_FOUND');
    this.column = column;
  }
}

/**
 * Raised by the Hour/Minute decoder for values outside 1-4 characters.
 */
export class InvalidCompactTimeError extends TimeColumnValueError {
  readonly value: string;

  constructor(value: string) {
    super(`Hour/Minute ${value} could not be parsed!`, 'INVALID_COMPACT_TIME');
    this.value = value;
  }
}

export class UnsupportedTimeFormatError extends DataloggerError {
  constructor(message: string) {
    super('UNSUPPORTED_TIME_FORMAT', message);
  }
}

/**
 * Raised when a combined time value does not match its combined format.
 */
export class TimeParsingError extends DataloggerError {
  readonly value: string;
  readonly format: string;

  constructor(value: string, format: string) {
    super('TIME_PARSING_ERROR', `Could not parse time string ${value} using the format ${format}`);
    this.value = value;
    this.format = format;
  }
}

export class KeyNotFoundError extends DataloggerError {
  readonly key: ColumnKey;

  constructor(key: ColumnKey) {
    super('KEY_NOT_FOUND', `Column ${typeof key === 'number' ? key : `"${key}"`} not found in row`);
    this.key = key;
  }
}

export class ArrayIdsInfoError extends DataloggerError {
  constructor(message: string) {
    super('ARRAY_IDS_INFO', message);
  }
}

export class ArrayIdsExportInfoError extends DataloggerError {
  readonly arrayId: string;

  constructor(arrayId: string, message: string) {
    super('ARRAY_IDS_EXPORT_INFO', message);
    this.arrayId = arrayId;
  }
}
