import type { DateTime } from 'luxon';
import type { ArrayIdPartitions, RowSequence } from '../dataset/Row';
import { DEFAULT_TIME_ZONE, getDeviceProfile, parseDataloggerParserOptions } from '../config/devices';
import type { DataloggerParserOptions } from '../config/devices';
import { getLogger } from '../logger';
import * as csvParser from '../parsers/csvParser';
import { parseTimeValues, resolveTimeZone } from '../parsers/timeParser';
import * as convert from '../transform/convertTime';
import type {
  ArrayIdsExportInfo,
  ExportOptions,
  ReadArrayIdsOptions,
  ReadMixedArrayOptions,
  ReadTableOptions,
  RowConversionError,
} from '../types/csv';
import type {
  ConvertTimeOptions,
  DeviceModel,
  ParseTimeOptions,
  TimeFormatGrammar,
  TimeZoneConfig,
} from '../types/time';
import * as csvWriter from '../writers/csvWriter';

const log = getLogger('parser');

export interface ReadTableTimeOptions extends ReadTableOptions, Partial<ConvertTimeOptions> {
  /** Convert `timeColumns` into a timestamp while reading */
  parseTimeColumns?: boolean;
}

/**
 * Reads, time-converts and exports the data files of one datalogger model.
 *
 * The time zone and time format are fixed at construction; the parser holds
 * no other state.
 */
export class DataloggerParser {
  readonly device: DeviceModel;
  readonly timeZone: TimeZoneConfig;
  readonly grammar: TimeFormatGrammar;

  constructor(options: DataloggerParserOptions = {}) {
    const { device, timeZone, timeFormatArgsLibrary } = parseDataloggerParserOptions(options);
    const profile = getDeviceProfile(device);

    this.device = profile.model;
    this.timeZone = resolveTimeZone(timeZone ?? DEFAULT_TIME_ZONE);
    this.grammar = {
      library: timeFormatArgsLibrary && timeFormatArgsLibrary.length > 0 ? timeFormatArgsLibrary : profile.library,
      expandCustomToken: profile.expandCustomToken,
      maxTimeValues: profile.maxTimeValues,
    };

    log.debug(`Created ${this.device} parser`, { timeZone: this.timeZone.name, library: this.grammar.library });
  }

  parseTimeValues(rawValues: readonly string[], options: ParseTimeOptions = {}): DateTime {
    return parseTimeValues(this.timeZone, this.grammar, rawValues, options);
  }

  convertTime(rows: RowSequence, options: ConvertTimeOptions): RowSequence {
    return convert.convertTime(rows, this.timeZone, this.grammar, options);
  }

  convertTimeCollectingErrors(
    rows: RowSequence,
    options: ConvertTimeOptions
  ): { rows: RowSequence; errors: RowConversionError[] } {
    return convert.convertTimeCollectingErrors(rows, this.timeZone, this.grammar, options);
  }

  /**
   * Read a table-formatted file, converting its time columns when
   * `parseTimeColumns` is set.
   */
  readTableData(filePath: string, options: ReadTableTimeOptions = {}): RowSequence {
    const {
      parseTimeColumns = false,
      timeColumns = [],
      timeParsedColumn,
      replaceTimeColumn,
      toUtc,
      ignoreParsingError,
      ...readOptions
    } = options;
    const rows = csvParser.readTableData(filePath, readOptions);
    if (!parseTimeColumns) return rows;

    return this.convertTime(rows, { timeColumns, timeParsedColumn, replaceTimeColumn, toUtc, ignoreParsingError });
  }

  readMixedArrayData(filePath: string, options: ReadMixedArrayOptions = {}): RowSequence {
    return csvParser.readMixedArrayData(filePath, options);
  }

  readArrayIdsData(filePath: string, options: ReadArrayIdsOptions = {}): ArrayIdPartitions {
    return csvParser.readArrayIdsData(filePath, options);
  }

  exportToCsv(rows: RowSequence, outfilePath: string, options: ExportOptions = {}): void {
    csvWriter.exportToCsv(rows, outfilePath, options);
  }

  exportArrayIdsToCsv(
    data: RowSequence | ArrayIdPartitions,
    arrayIdsInfo: ArrayIdsExportInfo,
    options: ExportOptions = {}
  ): void {
    csvWriter.exportArrayIdsToCsv(data, arrayIdsInfo, options);
  }
}

export function createDataloggerParser(options: DataloggerParserOptions = {}): DataloggerParser {
  return new DataloggerParser(options);
}
