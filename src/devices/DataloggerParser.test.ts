import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { DateTime } from 'luxon';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Row } from '../dataset/Row';
import { UnknownTimeZoneError, UnsupportedTimeFormatError } from '../errors';
import { DataloggerParser, createDataloggerParser } from './DataloggerParser';

const ISO_FORMAT = "yyyy-MM-dd'T'HH:mm:ssZZ";
const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'parsers', '__fixtures__');

describe('DataloggerParser', () => {
  it('validates options at construction', () => {
    expect(() => new DataloggerParser({ timeZone: 'Nowhere/Land' })).toThrow(UnknownTimeZoneError);
    expect(() => createDataloggerParser({ timeZone: '' })).toThrow(UnknownTimeZoneError);
  });

  it('uses the device profile library', () => {
    const parser = createDataloggerParser({ device: 'CR10', timeZone: 'Etc/GMT-1' });
    expect(parser.device).toBe('CR10');
    expect(parser.parseTimeValues(['16', '30', '2230']).toFormat(ISO_FORMAT)).toBe('2016-01-30T22:30:00+01:00');
    expect(parser.parseTimeValues(['16', '30', '2230'], { toUtc: true }).toFormat(ISO_FORMAT)).toBe(
      '2016-01-30T21:30:00+00:00'
    );
    expect(() => parser.parseTimeValues(['16', '30', '2230', '0'])).toThrow(UnsupportedTimeFormatError);
  });

  it('overrides the library', () => {
    const parser = createDataloggerParser({ timeZone: 'UTC', timeFormatArgsLibrary: ['%d.%m.%Y', '%H:%M'] });
    expect(parser.parseTimeValues(['30.01.2016', '22:30']).toFormat(ISO_FORMAT)).toBe('2016-01-30T22:30:00+00:00');
  });

  it('keeps the preset library when the override is empty', () => {
    const parser = createDataloggerParser({ device: 'CR10', timeZone: 'UTC', timeFormatArgsLibrary: [] });
    expect(parser.grammar.library).toEqual(['%y', '%j', 'Hour/Minute']);
    expect(parser.parseTimeValues(['16', '30', '2230']).toFormat(ISO_FORMAT)).toBe('2016-01-30T22:30:00+00:00');
  });

  it('converts rows', () => {
    const parser = createDataloggerParser({ device: 'CR1000', timeZone: 'UTC' });
    const rows = [Row.fromEntries([['TIMESTAMP', '2016-01-30 22:30:00'], ['AirTC', '3.5']])];
    const [row] = parser.convertTime(rows, { timeColumns: ['TIMESTAMP'], timeParsedColumn: 'time' });
    expect(row.keys()).toEqual(['time', 'AirTC']);

    const { errors } = parser.convertTimeCollectingErrors(
      [Row.fromEntries([['TIMESTAMP', 'bad']])],
      { timeColumns: ['TIMESTAMP'] }
    );
    expect(errors.map((error) => error.code)).toEqual(['TIME_PARSING_ERROR']);
  });

  it('converts time while reading a table file', () => {
    const parser = createDataloggerParser({ device: 'CR1000', timeZone: 'Etc/GMT-1' });
    const rows = parser.readTableData(path.join(FIXTURES, 'cr1000_table.dat'), {
      headerRow: 1,
      parseTimeColumns: true,
      timeColumns: ['TIMESTAMP'],
      toUtc: true,
    });
    const timestamp = rows[0].get('TIMESTAMP');
    expect(DateTime.isDateTime(timestamp) && timestamp.toFormat(ISO_FORMAT)).toBe('2016-01-30T21:30:00+00:00');
  });

  it('reads mixed array files', () => {
    const parser = createDataloggerParser({ device: 'CR10' });
    expect(parser.readMixedArrayData(path.join(FIXTURES, 'cr10_mixed.dat'))).toHaveLength(4);
    expect([...parser.readArrayIdsData(path.join(FIXTURES, 'cr10_mixed.dat')).keys()]).toEqual(['105', '106']);
  });

  describe('export', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'datalogger-parser-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('reads, converts and exports a CR10 array', () => {
      const parser = createDataloggerParser({ device: 'CR10', timeZone: 'Etc/GMT-1' });
      const partitions = parser.readArrayIdsData(path.join(FIXTURES, 'cr10_mixed.dat'), {
        arrayIdNames: { '105': 'hourly' },
      });
      const hourly = parser.convertTime(partitions.get('hourly') ?? [], {
        timeColumns: [1, 2, 3],
        timeParsedColumn: 'timestamp',
      });

      const outfile = path.join(tmpDir, 'hourly.csv');
      parser.exportToCsv(hourly, outfile, { exportHeader: true, includeTimeZone: true });
      expect(fs.readFileSync(outfile, 'utf-8')).toBe(
        '0,timestamp,4,5\n' + '105,2016-01-30 22:30:00+0100,12.5,-0.5\n' + '105,2016-01-30 23:00:00+0100,12.25,-0.25\n'
      );
    });

    it('exports array ids to their files', () => {
      const parser = createDataloggerParser({ device: 'CR10' });
      const data = parser.readMixedArrayData(path.join(FIXTURES, 'cr10_mixed.dat'));
      const outfile = path.join(tmpDir, '106.csv');
      parser.exportArrayIdsToCsv(data, { '106': { filePath: outfile } }, { mode: 'overwrite' });
      expect(fs.readFileSync(outfile, 'utf-8')).toBe('106,16,30,2230,0.75,88\n106,16,30,2300,0.5,87\n');
    });
  });
});
