import { describe, expect, it } from 'vitest';
import { KeyNotFoundError } from '../errors';
import { Row } from './Row';

describe('Row', () => {
  it('keys values by position', () => {
    const row = Row.fromValues(['a', 'b', 'c']);
    expect(row.keys()).toEqual([0, 1, 2]);
    expect(row.get(1)).toBe('b');
    expect(row.size).toBe(3);
  });

  it('throws KeyNotFoundError for missing keys', () => {
    const row = Row.fromEntries([['temp', '21.5']]);
    expect(() => row.get('rh')).toThrow(KeyNotFoundError);
    expect(() => row.get('rh')).toThrow('Column "rh" not found in row');
    expect(() => row.remove(3)).toThrow('Column 3 not found in row');
  });

  it('renames a key in place', () => {
    const row = Row.fromEntries([
      ['id', '1'],
      ['year', '2016'],
      ['temp', '3.2'],
    ]);
    row.rename('year', 'timestamp');
    expect(row.entries()).toEqual([
      ['id', '1'],
      ['timestamp', '2016'],
      ['temp', '3.2'],
    ]);
  });

  it('drops an existing column under the new key on rename', () => {
    const row = Row.fromEntries([
      ['a', '1'],
      ['b', '2'],
      ['c', '3'],
    ]);
    row.rename('c', 'a');
    expect(row.entries()).toEqual([
      ['b', '2'],
      ['a', '3'],
    ]);
  });

  it('treats renaming to the same key as a no-op', () => {
    const row = Row.fromEntries([['a', '1']]);
    expect(row.rename('a', 'a').entries()).toEqual([['a', '1']]);
  });

  it('clones without sharing state', () => {
    const row = Row.fromValues(['x']);
    const copy = row.clone().set(1, 'y');
    expect(row.size).toBe(1);
    expect(copy.values()).toEqual(['x', 'y']);
  });

  it('iterates entries in order', () => {
    const row = Row.fromEntries([
      ['b', '2'],
      ['a', '1'],
    ]);
    expect([...row]).toEqual([
      ['b', '2'],
      ['a', '1'],
    ]);
  });
});
