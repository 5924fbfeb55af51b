import type { NamedPart } from '../../domain/named-part';
import { formatPartName, type PathSegment } from '../../domain/part-path';
import type { EncodingContext, Shape, ValueReflector } from '../../ports/traversal';
import {
  CircularStructureError,
  MultipartError,
  RootNotKeyedError,
  TraversalFailureError,
} from '../../errors';
import { flattenPartTree, type PartTree } from './part-tree';

/**
 * Configuration for building a part tree.
 */
export interface PartTreeBuilderOptions {
  /** Reflector used to discover the shape of every value */
  reflector: ValueReflector;
  /** Caller-supplied context, passed to the reflector unmodified */
  userInfo?: Readonly<Record<string, unknown>>;
}

/**
 * State threaded through one build. Never shared between builds.
 */
interface Walk {
  readonly reflector: ValueReflector;
  readonly userInfo: Readonly<Record<string, unknown>>;
  /** Objects on the current path, for cycle detection */
  readonly ancestors: Set<object>;
}

const EMPTY_USER_INFO: Readonly<Record<string, unknown>> = Object.freeze({});

/**
 * Encode a record-like value into a part tree.
 *
 * Returns `undefined` when the value yields no parts (every field absent
 * or empty).
 *
 * @throws {RootNotKeyedError} if the value is not record-like
 * @throws {CircularStructureError} if the value contains itself
 * @throws {TraversalFailureError} if the reflector fails on some value
 */
export function buildPartTree(value: unknown, options: PartTreeBuilderOptions): PartTree | undefined {
  const walk: Walk = {
    reflector: options.reflector,
    userInfo: options.userInfo ?? EMPTY_USER_INFO,
    ancestors: new Set(),
  };

  const shape = describe(walk, value, []);
  if (shape.kind !== 'record') {
    throw new RootNotKeyedError(shape.kind);
  }
  return visit(walk, value, shape, []);
}

/**
 * Encode a record-like value into named parts, in discovery order.
 *
 * @example
 * ```ts
 * buildParts({ user: { name: 'Ada', tags: ['x', 'y'] } }, { reflector: new ObjectReflector() });
 * // names: 'user[name]', 'user[tags][0]', 'user[tags][1]'
 * ```
 */
export function buildParts(value: unknown, options: PartTreeBuilderOptions): NamedPart[] {
  const tree = buildPartTree(value, options);
  return tree === undefined ? [] : flattenPartTree(tree);
}

function build(walk: Walk, value: unknown, path: readonly PathSegment[]): PartTree | undefined {
  return visit(walk, value, describe(walk, value, path), path);
}

function visit(
  walk: Walk,
  value: unknown,
  shape: Shape,
  path: readonly PathSegment[]
): PartTree | undefined {
  switch (shape.kind) {
    case 'absent':
      return undefined;

    case 'leaf':
      return { kind: 'leaf', leaf: shape.leaf };

    case 'record': {
      const record = shape;
      const exit = enter(walk, value, path);
      const children: Array<readonly [string, PartTree]> = [];
      for (const key of record.keys) {
        const childPath = [...path, key];
        const child = build(walk, read(() => record.read(key), childPath), childPath);
        if (child !== undefined) {
          children.push([key, child]);
        }
      }
      exit();
      return children.length > 0 ? { kind: 'keyed', children } : undefined;
    }

    case 'sequence': {
      const sequence = shape;
      const exit = enter(walk, value, path);
      const children: Array<readonly [number, PartTree]> = [];
      for (let index = 0; index < sequence.length; index++) {
        const childPath = [...path, index];
        const child = build(walk, read(() => sequence.at(index), childPath), childPath);
        if (child !== undefined) {
          children.push([index, child]);
        }
      }
      exit();
      return children.length > 0 ? { kind: 'indexed', children } : undefined;
    }
  }
}

function describe(walk: Walk, value: unknown, path: readonly PathSegment[]): Shape {
  const context: EncodingContext = { userInfo: walk.userInfo, codingPath: path };
  return read(() => walk.reflector.describe(value, context), path);
}

function read<T>(access: () => T, path: readonly PathSegment[]): T {
  try {
    return access();
  } catch (error) {
    if (error instanceof MultipartError) {
      throw error;
    }
    throw new TraversalFailureError(formatPartName(path), path, error);
  }
}

/**
 * Mark a container as being visited. Returns the matching exit.
 */
function enter(walk: Walk, value: unknown, path: readonly PathSegment[]): () => void {
  if (typeof value !== 'object' || value === null) {
    return () => {};
  }
  if (walk.ancestors.has(value)) {
    throw new CircularStructureError(formatPartName(path));
  }
  walk.ancestors.add(value);
  return () => {
    walk.ancestors.delete(value);
  };
}
