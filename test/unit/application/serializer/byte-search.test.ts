import { describe, test, expect } from 'vitest';
import { indexOfBytes } from '../../../../src/application/serializer/byte-search';
import { utf8 } from '../../../setup';

describe('indexOfBytes', () => {
  test('should find a match at the start, middle and end', () => {
    expect(indexOfBytes(utf8('--ab rest'), utf8('--ab'))).toBe(0);
    expect(indexOfBytes(utf8('xx--ab yy'), utf8('--ab'))).toBe(2);
    expect(indexOfBytes(utf8('tail --ab'), utf8('--ab'))).toBe(5);
  });

  test('should return the first of several matches', () => {
    expect(indexOfBytes(utf8('a--b--b'), utf8('--b'))).toBe(1);
  });

  test('should return -1 when there is no match', () => {
    expect(indexOfBytes(utf8('--a-b'), utf8('--ab'))).toBe(-1);
    expect(indexOfBytes(utf8('--a'), utf8('--ab'))).toBe(-1);
    expect(indexOfBytes(new Uint8Array(0), utf8('-'))).toBe(-1);
  });

  test('should recover from partial matches', () => {
    expect(indexOfBytes(utf8('---ab'), utf8('--ab'))).toBe(1);
  });

  test('should match an empty needle at zero for direct callers', () => {
    expect(indexOfBytes(utf8('abc'), new Uint8Array(0))).toBe(0);
  });

  test('should search binary data', () => {
    const haystack = new Uint8Array([0, 255, 0x2d, 0x2d, 0x5a, 1]);
    expect(indexOfBytes(haystack, utf8('--Z'))).toBe(2);
  });
});
