import { describe, it, expect } from 'vitest';
import { isRecord, readFlag, readNullableString, readNumber, readString } from '../row-guards.js';

describe('row guards', () => {
  const row = { id: 3, name: 'basil', active: 1, archived: 0, image: null, broken: 'x' };

  it('should recognise plain objects only', () => {
    expect(isRecord(row)).toBe(true);
    expect(isRecord(null)).toBe(false);
    expect(isRecord([row])).toBe(false);
    expect(isRecord('row')).toBe(false);
  });

  it('should read typed columns and return null on mismatch', () => {
    expect(readNumber(row, 'id')).toBe(3);
    expect(readNumber(row, 'name')).toBeNull();
    expect(readString(row, 'name')).toBe('basil');
    expect(readString(row, 'missing')).toBeNull();
  });

  it('should map 0/1 integers to booleans', () => {
    expect(readFlag(row, 'active')).toBe(true);
    expect(readFlag(row, 'archived')).toBe(false);
    expect(readFlag(row, 'id')).toBeNull();
  });

  it('should distinguish a null column from a wrongly typed one', () => {
    expect(readNullableString(row, 'image')).toBeNull();
    expect(readNullableString(row, 'broken')).toBe('x');
    expect(readNullableString(row, 'id')).toBeUndefined();
  });
});
