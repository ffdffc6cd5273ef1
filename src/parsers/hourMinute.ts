import { InvalidCompactTimeError } from '../errors';
import type { CustomTokenExpander } from '../types/time';

/** Format library sentinel for the CR10-family Hour/Minute column */
export const HOUR_MINUTE_TOKEN = 'Hour/Minute';

/** Generic format the decoded Hour/Minute value is read with */
export const HOUR_MINUTE_FORMAT = '%H%M';

export type HourMinuteStyle = 'compact' | 'colon';

/**
 * Decode the CR10-family 'Hour/Minute' column into `HHMM` (or `HH:MM`).
 *
 * The logger writes hours and minutes without leading zeros (midnight is
 * written as `0`), so the split between hour and minute depends on the total
 * length of the value:
 *
 *   '5'    -> '0005'
 *   '35'   -> '0035'
 *   '159'  -> '0159'
 *   '2345' -> '2345'
 */
export function decodeHourMinute(value: string, style: HourMinuteStyle = 'compact'): string {
  let hour: string;
  let minute: string;

  switch (value.length) {
    case 1: // 0 - 9
      hour = '00';
      minute = '0' + value;
      break;
    case 2: // 10 - 59
      hour = '00';
      minute = value;
      break;
    case 3: // 100 - 959
      hour = '0' + value.slice(0, 1);
      minute = value.slice(1);
      break;
    case 4: // 1000 - 2359
      hour = value.slice(0, 2);
      minute = value.slice(2);
      break;
    default:
      throw new InvalidCompactTimeError(value);
  }

  return style === 'colon' ? `${hour}:${minute}` : hour + minute;
}

/**
 * Expander for CR10-family format libraries. Both the sentinel and a literal
 * `%H%M` token mark the Hour/Minute column.
 */
export const expandHourMinute: CustomTokenExpander = (token, value) => {
  if (token !== HOUR_MINUTE_TOKEN && token !== HOUR_MINUTE_FORMAT) {
    return null;
  }
  return { token: HOUR_MINUTE_FORMAT, value: decodeHourMinute(value) };
};
