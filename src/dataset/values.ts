import { DateTime } from 'luxon';
import type { ColumnValue } from '../types/row';

const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';
const TIMESTAMP_FORMAT_WITH_ZONE = 'yyyy-MM-dd HH:mm:ssZZZ';

/**
 * Format a timestamp as `2016-05-02 12:34:15`, or `2016-05-02 12:34:15+0100`
 * when the time zone is included.
 */
export function formatTimestamp(dt: DateTime, includeTimeZone: boolean = false): string {
  return dt.toFormat(includeTimeZone ? TIMESTAMP_FORMAT_WITH_ZONE : TIMESTAMP_FORMAT);
}

export function valueToString(value: ColumnValue, includeTimeZone: boolean = false): string {
  return DateTime.isDateTime(value) ? formatTimestamp(value, includeTimeZone) : value;
}
