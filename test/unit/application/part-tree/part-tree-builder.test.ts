import { describe, test, expect } from 'vitest';
import { buildPartTree, buildParts } from '../../../../src/application/part-tree/part-tree-builder';
import { ObjectReflector } from '../../../../src/infrastructure/reflection/object-reflector';
import { MultipartFile } from '../../../../src/domain/multipart-file';
import type { EncodingContext, Shape, ValueReflector } from '../../../../src/ports/traversal';
import {
  CircularStructureError,
  RootNotKeyedError,
  TraversalFailureError,
} from '../../../../src/errors';
import { text, utf8 } from '../../../setup';

describe('buildParts', () => {
  const reflector = new ObjectReflector();

  function names(value: unknown): string[] {
    return buildParts(value, { reflector }).map((part) => part.name);
  }

  function entries(value: unknown): Array<[string, string]> {
    return buildParts(value, { reflector }).map((part): [string, string] => [part.name, text(part.body)]);
  }

  describe('records', () => {
    test('should keep declaration order', () => {
      expect(names({ a: '1', b: '2', c: '3' })).toEqual(['a', 'b', 'c']);
    });

    test('should bracket nested field names', () => {
      expect(entries({ address: { city: 'X' } })).toEqual([['address[city]', 'X']]);
    });

    test('should nest deeply', () => {
      expect(entries({ a: { b: { c: { d: 'deep' } } } })).toEqual([['a[b][c][d]', 'deep']]);
    });
  });

  describe('sequences', () => {
    test('should index elements from zero', () => {
      expect(entries({ tags: ['x', 'y'] })).toEqual([
        ['tags[0]', 'x'],
        ['tags[1]', 'y'],
      ]);
    });

    test('should combine records and sequences', () => {
      expect(
        entries({
          users: [
            { name: 'Ada', roles: ['admin'] },
            { name: 'Alan', roles: [] },
          ],
        })
      ).toEqual([
        ['users[0][name]', 'Ada'],
        ['users[0][roles][0]', 'admin'],
        ['users[1][name]', 'Alan'],
      ]);
    });

    test('should keep indexes of absent elements', () => {
      expect(entries({ list: ['a', null, 'c'] })).toEqual([
        ['list[0]', 'a'],
        ['list[2]', 'c'],
      ]);
    });

    test('should keep indexes after an empty nested container', () => {
      expect(entries({ grid: [[], ['c']] })).toEqual([['grid[1][0]', 'c']]);
    });

    test('should keep indexes after undefined elements and empty records', () => {
      expect(names({ rows: [undefined, {}, { id: '3' }, null, 'e'] })).toEqual([
        'rows[2][id]',
        'rows[4]',
      ]);
    });

    test('should store source indexes in the tree', () => {
      expect(buildPartTree({ list: [null, 'b'] }, { reflector })).toEqual({
        kind: 'keyed',
        children: [['list', { kind: 'indexed', children: [[1, { kind: 'leaf', leaf: { body: utf8('b') } }]] }]],
      });
    });

    test('should index nested sequences', () => {
      expect(names({ grid: [['a', 'b'], ['c']] })).toEqual(['grid[0][0]', 'grid[0][1]', 'grid[1][0]']);
    });
  });

  describe('omission', () => {
    test('should omit absent fields', () => {
      expect(entries({ a: 'x', b: undefined, c: null })).toEqual([['a', 'x']]);
    });

    test('should omit empty containers', () => {
      expect(names({ items: [], meta: {}, name: 'n' })).toEqual(['name']);
    });

    test('should omit containers whose children are all absent', () => {
      expect(names({ outer: { inner: { value: undefined } }, list: [null] })).toEqual([]);
    });

    test('should return no parts for an empty root', () => {
      expect(buildParts({}, { reflector })).toEqual([]);
      expect(buildPartTree({}, { reflector })).toBeUndefined();
    });

    test('should keep empty strings', () => {
      expect(entries({ a: '' })).toEqual([['a', '']]);
    });
  });

  describe('leaves', () => {
    test('should carry file headers', () => {
      const parts = buildParts(
        { avatar: new MultipartFile('png', { filename: 'me.png', contentType: 'image/png' }) },
        { reflector }
      );
      expect(parts).toEqual([
        { name: 'avatar', body: utf8('png'), filename: 'me.png', contentType: 'image/png' },
      ]);
    });

    test('should encode scalars canonically', () => {
      expect(entries({ n: 3, f: 0.25, ok: false })).toEqual([
        ['n', '3'],
        ['f', '0.25'],
        ['ok', 'false'],
      ]);
    });
  });

  describe('root', () => {
    test('should reject a scalar root', () => {
      expect(() => buildParts('x', { reflector })).toThrow(RootNotKeyedError);
      expect(() => buildParts('x', { reflector })).toThrow(
        'Top-level value must be record-like, got leaf'
      );
    });

    test('should reject a sequence root', () => {
      expect(() => buildParts(['x'], { reflector })).toThrow(
        'Top-level value must be record-like, got sequence'
      );
    });

    test('should reject an absent root', () => {
      expect(() => buildParts(null, { reflector })).toThrow(RootNotKeyedError);
    });
  });

  describe('cycles', () => {
    test('should reject a value that contains itself', () => {
      const node: Record<string, unknown> = { name: 'loop' };
      node['self'] = node;

      expect(() => buildParts(node, { reflector })).toThrow(CircularStructureError);
      expect(() => buildParts(node, { reflector })).toThrow("Circular structure detected at 'self'");
    });

    test('should reject a cycle through a sequence', () => {
      const list: unknown[] = [];
      const root = { list };
      list.push(root);

      expect(() => buildParts(root, { reflector })).toThrow("Circular structure detected at 'list[0]'");
    });

    test('should encode a shared value at every place it appears', () => {
      const shared = { id: '1' };
      expect(entries({ a: shared, b: shared })).toEqual([
        ['a[id]', '1'],
        ['b[id]', '1'],
      ]);
    });
  });

  describe('traversal failures', () => {
    test('should tag a failing field with its path', () => {
      const cause = new Error('getter failed');
      const value = {
        profile: {
          get email(): string {
            throw cause;
          },
        },
      };

      let caught: unknown;
      try {
        buildParts(value, { reflector });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(TraversalFailureError);
      if (caught instanceof TraversalFailureError) {
        expect(caught.path).toBe('profile[email]');
        expect(caught.codingPath).toEqual(['profile', 'email']);
        expect(caught.cause).toBe(cause);
        expect(caught.message).toBe("Failed to read value at 'profile[email]': getter failed");
      }
    });

    test('should tag a reflector failure with the described path', () => {
      const failing: ValueReflector = {
        describe(value: unknown, context: EncodingContext): Shape {
          if (context.codingPath.length > 0) {
            throw 'unreadable';
          }
          return reflector.describe(value, context);
        },
      };

      expect(() => buildParts({ a: 'x' }, { reflector: failing })).toThrow(
        "Failed to read value at 'a': unreadable"
      );
    });
  });

  describe('context', () => {
    test('should pass userInfo and the coding path to the reflector', () => {
      const seen: Array<{ path: readonly (string | number)[]; userInfo: unknown }> = [];
      const recording: ValueReflector = {
        describe(value: unknown, context: EncodingContext): Shape {
          seen.push({ path: context.codingPath, userInfo: context.userInfo });
          return reflector.describe(value, context);
        },
      };
      const userInfo = { locale: 'de' };

      buildParts({ a: ['x'] }, { reflector: recording, userInfo });

      expect(seen.map((entry) => entry.path)).toEqual([[], ['a'], ['a', 0]]);
      expect(seen.every((entry) => entry.userInfo === userInfo)).toBe(true);
    });

    test('should default userInfo to an empty frozen object', () => {
      let captured: Readonly<Record<string, unknown>> | undefined;
      const recording: ValueReflector = {
        describe(value: unknown, context: EncodingContext): Shape {
          captured = context.userInfo;
          return reflector.describe(value, context);
        },
      };

      buildParts({}, { reflector: recording });

      expect(captured).toEqual({});
      expect(Object.isFrozen(captured)).toBe(true);
    });
  });
});
