import { UnsupportedTimeFormatError } from '../errors';
import type { ParsedTimeInfo, TimeFormatGrammar } from '../types/time';

const TIME_INFO_DELIMITER = ',';

/**
 * Pair a row's raw time values with the format library and join both sides
 * into one format string and one value string.
 *
 * Pairing stops at the shorter of the two sequences: a library longer than
 * the row's time columns (or the reverse) is not an error. No pairs at all
 * yields two empty strings.
 */
export function resolveTimeFormat(grammar: TimeFormatGrammar, rawValues: readonly string[]): ParsedTimeInfo {
  const { library, expandCustomToken, maxTimeValues } = grammar;

  if (maxTimeValues !== undefined && rawValues.length > maxTimeValues) {
    throw new UnsupportedTimeFormatError(
      `Expected at most ${maxTimeValues} time values, got ${rawValues.length}: ${rawValues.join(', ')}`
    );
  }

  const formats: string[] = [];
  const values: string[] = [];
  const pairs = Math.min(library.length, rawValues.length);

  for (let i = 0; i < pairs; i++) {
    const expanded = expandCustomToken?.(library[i], rawValues[i]);
    formats.push(expanded ? expanded.token : library[i]);
    values.push(expanded ? expanded.value : rawValues[i]);
  }

  return {
    parsedTimeFormat: formats.join(TIME_INFO_DELIMITER),
    parsedTime: values.join(TIME_INFO_DELIMITER),
  };
}
