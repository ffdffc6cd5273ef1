import { DateTime, FixedOffsetZone, IANAZone } from 'luxon';
import type { Zone } from 'luxon';
import { TimeParsingError, UnknownTimeZoneError } from '../errors';
import { getLogger } from '../logger';
import type { ParseTimeOptions, TimeFormatGrammar, TimeZoneConfig } from '../types/time';
import { resolveTimeFormat } from './formatLibrary';
import { strptime, translateFormat } from './strptime';

const log = getLogger('parse');

/**
 * Resolve an IANA time zone name (`UTC`, `Etc/GMT-1`, `Europe/Stockholm`, ...).
 */
export function resolveTimeZone(name: string): TimeZoneConfig {
  if (!IANAZone.isValidZone(name)) {
    throw new UnknownTimeZoneError(name);
  }
  return { name, zone: IANAZone.create(name) };
}

function sameWallClock(a: DateTime, b: DateTime): boolean {
  return (
    a.year === b.year &&
    a.month === b.month &&
    a.day === b.day &&
    a.hour === b.hour &&
    a.minute === b.minute &&
    a.second === b.second
  );
}

/**
 * Attach `zone` to a wall-clock time without moving the wall clock.
 *
 * Times repeated when clocks go back, and times skipped when they go
 * forward, take the zone's standard (non-DST) offset. A skipped time keeps
 * that fixed offset.
 */
export function localize(wallClock: DateTime, zone: Zone): DateTime {
  const units = wallClock.toObject();
  const local = DateTime.fromObject(units, { zone });
  if (!local.isValid) return local;

  const standardOffset = Math.min(
    zone.offset(Date.UTC(wallClock.year, 0, 1)),
    zone.offset(Date.UTC(wallClock.year, 6, 1))
  );
  if (local.offset === standardOffset) return local;

  const standard = DateTime.fromObject(units, { zone: FixedOffsetZone.instance(standardOffset) });
  if (!sameWallClock(local, wallClock)) {
    return standard;
  }

  const repeated = standard.setZone(zone);
  return sameWallClock(repeated, wallClock) ? repeated : local;
}

/**
 * Parse `value` with `format` into a zone-aware timestamp, or null if it does
 * not match. Values without an explicit offset are read as wall-clock time in
 * `timeZone`; values with one keep their own offset.
 */
export function parseTimeString(value: string, format: string, timeZone: TimeZoneConfig): DateTime | null {
  const parsed = strptime(value, format);
  if (!parsed) return null;

  const translated = translateFormat(format);
  if (translated && translated.hasOffset) return parsed;

  const dt = localize(parsed, timeZone.zone);
  return dt.isValid ? dt : null;
}

/**
 * Convert one row's raw time values into a timestamp.
 *
 * An empty library or an empty value list parses as 1900-01-01 00:00:00 in
 * the configured zone.
 */
export function parseTimeValues(
  timeZone: TimeZoneConfig,
  grammar: TimeFormatGrammar,
  rawValues: readonly string[],
  options: ParseTimeOptions = {}
): DateTime {
  const { ignoreParsingError = false, toUtc = false } = options;
  const { parsedTimeFormat, parsedTime } = resolveTimeFormat(grammar, rawValues);

  let dt = parseTimeString(parsedTime, parsedTimeFormat, timeZone);

  if (!dt) {
    if (!ignoreParsingError) {
      throw new TimeParsingError(parsedTime, parsedTimeFormat);
    }
    dt = DateTime.fromMillis(0, { zone: timeZone.zone });
    log.warn('Could not parse time string, using epoch time', {
      value: parsedTime,
      format: parsedTimeFormat,
      epoch: dt.toISO(),
    });
  }

  return toUtc ? dt.toUTC() : dt;
}
