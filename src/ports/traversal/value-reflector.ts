import type { MultipartLeaf } from '../../domain/multipart-leaf';
import type { PathSegment } from '../../domain/part-path';

/**
 * Per-call context handed to a reflector.
 */
export interface EncodingContext {
  /** Caller-supplied configuration, passed through unmodified */
  readonly userInfo: Readonly<Record<string, unknown>>;
  /** Path of the value being described */
  readonly codingPath: readonly PathSegment[];
}

/**
 * A value that contributes no parts.
 */
export interface AbsentShape {
  kind: 'absent';
}

/**
 * A value with no further structure.
 */
export interface LeafShape {
  kind: 'leaf';
  leaf: MultipartLeaf;
}

/**
 * A value exposing named fields, in declaration order.
 */
export interface RecordShape {
  kind: 'record';
  keys: readonly string[];
  read(key: string): unknown;
}

/**
 * A value exposing ordered, unnamed elements.
 */
export interface SequenceShape {
  kind: 'sequence';
  length: number;
  at(index: number): unknown;
}

export type Shape = AbsentShape | LeafShape | RecordShape | SequenceShape;

/**
 * Abstract reflection interface used by the part tree builder.
 *
 * The builder never inspects user values itself. It asks a reflector for
 * the shape of each value and reads children through that shape, so field
 * and element access failures surface at a known path.
 *
 * Reflectors must report keys and elements in a stable order.
 *
 * @example
 * ```ts
 * // Production
 * const encoder = new FormDataEncoder();
 *
 * // Custom mapping for a domain type
 * const encoder = new FormDataEncoder({ reflector: new MoneyAwareReflector() });
 * ```
 */
export interface ValueReflector {
  /**
   * Describe one value. Children are read lazily through the returned shape.
   * @throws any error raised while inspecting the value
   */
  describe(value: unknown, context: EncodingContext): Shape;
}

/**
 * Custom types that know their own multipart encoding.
 *
 * @example
 * ```ts
 * class Money implements MultipartConvertible {
 *   constructor(private readonly cents: number) {}
 *   toMultipartLeaf(): MultipartLeaf {
 *     return { body: new TextEncoder().encode((this.cents / 100).toFixed(2)) };
 *   }
 * }
 * ```
 */
export interface MultipartConvertible {
  /**
   * Return the leaf for this value, or `undefined` to omit it.
   */
  toMultipartLeaf(context: EncodingContext): MultipartLeaf | undefined;
}

/**
 * Check whether a value implements {@link MultipartConvertible}.
 */
export function isMultipartConvertible(value: unknown): value is MultipartConvertible {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toMultipartLeaf' in value &&
    typeof value.toMultipartLeaf === 'function'
  );
}
