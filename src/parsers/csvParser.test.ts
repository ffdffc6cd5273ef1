import * as path from 'path';
import { fileURLToPath } from 'url';
import { describe, expect, it } from 'vitest';
import { fixFloat, parseMixedArrayRows, parseTableRows, readArrayIdsData, readSourceLines, readTableData } from './csvParser';

const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), '__fixtures__');
const MIXED_FILE = path.join(FIXTURES, 'cr10_mixed.dat');
const TABLE_FILE = path.join(FIXTURES, 'cr1000_table.dat');

describe('readSourceLines', () => {
  it('counts blank lines without returning them', () => {
    expect(readSourceLines('a,b\n\nc,"d e"\n')).toEqual([
      { line: 0, values: ['a', 'b'] },
      { line: 2, values: ['c', 'd e'] },
    ]);
  });

  it('keeps quoted line breaks inside one record', () => {
    expect(readSourceLines('a,"b\nc"\nd,e\n')).toEqual([
      { line: 1, values: ['a', 'b\nc'] },
      { line: 2, values: ['d', 'e'] },
    ]);
  });

  it('keeps quoted delimiters and quotes', () => {
    expect(readSourceLines('a,"b,c","say ""hi"""')).toEqual([{ line: 0, values: ['a', 'b,c', 'say "hi"'] }]);
  });

  it('splits on a custom delimiter', () => {
    expect(readSourceLines('a\tb', '\t')).toEqual([{ line: 0, values: ['a', 'b'] }]);
  });
});

describe('fixFloat', () => {
  it('adds the missing leading zero', () => {
    expect(fixFloat('.5')).toBe('0.5');
    expect(fixFloat('-.25')).toBe('-0.25');
    expect(fixFloat('1.5')).toBe('1.5');
    expect(fixFloat('x.5')).toBe('x.5');
  });
});

describe('parseTableRows', () => {
  const content = 'a,b,c\n1,2,3\n4,5\n6,7,8\n';

  it('keys rows by position without a header', () => {
    const rows = parseTableRows(content);
    expect(rows).toHaveLength(4);
    expect(rows[1].entries()).toEqual([
      [0, '1'],
      [1, '2'],
      [2, '3'],
    ]);
  });

  it('zips rows with the given header', () => {
    const rows = parseTableRows(content, { header: ['x', 'y', 'z'], firstLineNum: 1 });
    expect(rows.map((row) => row.entries())).toEqual([
      [
        ['x', '1'],
        ['y', '2'],
        ['z', '3'],
      ],
      [
        ['x', '4'],
        ['y', '5'],
      ],
      [
        ['x', '6'],
        ['y', '7'],
        ['z', '8'],
      ],
    ]);
  });

  it('reads the header from headerRow', () => {
    const rows = parseTableRows(content, { headerRow: 0, header: ['ignored'] });
    expect(rows).toHaveLength(3);
    expect(rows[0].keys()).toEqual(['a', 'b', 'c']);
  });

  it('keeps only the requested line range', () => {
    const rows = parseTableRows(content, { firstLineNum: 1, lastLineNum: 2 });
    expect(rows.map((row) => row.values())).toEqual([
      ['1', '2', '3'],
      ['4', '5'],
    ]);
  });
});

describe('parseMixedArrayRows', () => {
  it('fixes floats by default', () => {
    const [row] = parseMixedArrayRows('105,.5,-.5,7');
    expect(row.values()).toEqual(['105', '0.5', '-0.5', '7']);
  });

  it('leaves values alone without fixFloats', () => {
    const [row] = parseMixedArrayRows('105,.5', { fixFloats: false });
    expect(row.values()).toEqual(['105', '.5']);
  });
});

describe('readTableData', () => {
  it('reads a file with a header row', () => {
    const rows = readTableData(TABLE_FILE, { headerRow: 1 });
    expect(rows).toHaveLength(2);
    expect(rows[1].entries()).toEqual([
      ['TIMESTAMP', '2016-01-30 22:40:00'],
      ['RECORD', '1'],
      ['AirTC', '3.25'],
    ]);
  });
});

describe('readArrayIdsData', () => {
  it('partitions every array id', () => {
    const partitions = readArrayIdsData(MIXED_FILE);
    expect([...partitions.keys()]).toEqual(['105', '106']);
    expect(partitions.get('106')?.map((row) => row.get(4))).toEqual(['0.75', '0.5']);
  });

  it('keeps and renames the requested array ids', () => {
    const partitions = readArrayIdsData(MIXED_FILE, { arrayIdNames: { '105': 'hourly' } });
    expect([...partitions.keys()]).toEqual(['hourly']);
    expect(partitions.get('hourly')?.map((row) => row.get(5))).toEqual(['-0.5', '-0.25']);
  });

  it('keeps the id when the name is empty', () => {
    const partitions = readArrayIdsData(MIXED_FILE, { arrayIdNames: { '106': null } });
    expect([...partitions.keys()]).toEqual(['106']);
  });
});
