import { describe, test, expect } from 'vitest';
import { formatPartName } from '../../../src/domain/part-path';

describe('formatPartName', () => {
  test('should return an empty name for the empty path', () => {
    expect(formatPartName([])).toBe('');
  });

  test('should write a leading field name bare', () => {
    expect(formatPartName(['name'])).toBe('name');
  });

  test('should bracket nested field names', () => {
    expect(formatPartName(['address', 'city'])).toBe('address[city]');
    expect(formatPartName(['a', 'b', 'c'])).toBe('a[b][c]');
  });

  test('should bracket indexes', () => {
    expect(formatPartName(['tags', 0])).toBe('tags[0]');
    expect(formatPartName(['rows', 2, 'cells', 10])).toBe('rows[2][cells][10]');
  });

  test('should bracket a leading index', () => {
    expect(formatPartName([0])).toBe('[0]');
    expect(formatPartName([1, 'id'])).toBe('[1][id]');
  });
});
