/**
 * FormDataEncoder - encode structured values as multipart/form-data.
 *
 * Records become one part per field, nested records and sequences get
 * bracketed names, absent values and empty containers are left out.
 *
 * @example
 * ```ts
 * const encoder = new FormDataEncoder();
 *
 * const body = encoder.encode(
 *   { name: 'Ada', address: { city: 'London' }, tags: ['x', 'y'] },
 *   'form-boundary'
 * );
 * // parts: name, address[city], tags[0], tags[1]
 *
 * await fetch(url, {
 *   method: 'POST',
 *   headers: { 'content-type': encoder.contentType('form-boundary') },
 *   body,
 * });
 * ```
 *
 * @module form-data-encoder
 */

import type { NamedPart } from './domain/named-part';
import type { Boundary } from './domain/value-objects/boundary';
import type { ValueReflector } from './ports/traversal';
import type { ByteSink } from './ports/output';
import { ObjectReflector } from './infrastructure/reflection/object-reflector';
import { buildParts } from './application/part-tree';
import { MultipartSerializer, multipartContentType } from './application/serializer';

/**
 * Configuration options for FormDataEncoder.
 */
export interface FormDataEncoderOptions {
  /**
   * Contextual information handed to the reflector on every call.
   * Copied and frozen when the encoder is created.
   * Default: {}
   */
  userInfo?: Record<string, unknown>;

  /**
   * Reflector that discovers the shape of values.
   * Default: ObjectReflector with default options
   */
  reflector?: ValueReflector;
}

/**
 * Encoder from structured values to multipart/form-data.
 *
 * Calls share nothing but the frozen configuration, so one instance can
 * serve concurrent requests.
 */
export class FormDataEncoder {
  /** Contextual information passed to the reflector */
  readonly userInfo: Readonly<Record<string, unknown>>;

  private readonly reflector: ValueReflector;
  private readonly serializer = new MultipartSerializer();

  constructor(options: FormDataEncoderOptions = {}) {
    this.userInfo = Object.freeze({ ...options.userInfo });
    this.reflector = options.reflector ?? new ObjectReflector();
  }

  /**
   * Flatten a record-like value into named parts, in discovery order.
   *
   * @throws {RootNotKeyedError} if the value is not record-like
   * @throws {CircularStructureError} if the value contains itself
   * @throws {TraversalFailureError} if reading some value fails
   */
  parts(value: unknown): NamedPart[] {
    return buildParts(value, { reflector: this.reflector, userInfo: this.userInfo });
  }

  /**
   * Encode to text. Prefer {@link encodeBytes} when bodies are binary.
   *
   * @throws {BodyNotTextError} if a body is not valid UTF-8
   * @throws {BoundaryCollisionError} if a body contains the boundary delimiter
   */
  encode(value: unknown, boundary: string | Boundary): string {
    return this.serializer.serialize(this.parts(value), boundary);
  }

  /**
   * Encode to bytes.
   *
   * @throws {BoundaryCollisionError} if a body contains the boundary delimiter
   */
  encodeBytes(value: unknown, boundary: string | Boundary): Uint8Array {
    return this.serializer.serializeToBytes(this.parts(value), boundary);
  }

  /**
   * Encode incrementally into a sink. Writes the same bytes as
   * {@link encodeBytes}; writes nothing when encoding fails.
   */
  encodeInto(value: unknown, boundary: string | Boundary, sink: ByteSink): void {
    this.serializer.serializeInto(this.parts(value), boundary, sink);
  }

  /**
   * Content-Type header value for a body encoded with `boundary`.
   */
  contentType(boundary: string | Boundary): string {
    return multipartContentType(boundary);
  }
}
