/**
 * Column types for rows read from datalogger output files.
 *
 * A column is keyed either by its header name or, when the file carries no
 * header, by its zero-based position. Values start out as the raw strings read
 * from the file; time conversion replaces the time columns with a zone-aware
 * luxon `DateTime`.
 */

import type { DateTime } from 'luxon';

export type ColumnKey = string | number;

export type ColumnValue = string | DateTime;

export type RowEntry = readonly [ColumnKey, ColumnValue];
