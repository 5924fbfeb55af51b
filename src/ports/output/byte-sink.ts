/**
 * Destination for serialized bytes.
 *
 * The serializer writes each header block, body and line break as it goes.
 * Chunks are read-only: a sink may copy them or keep references, but must
 * not modify them.
 *
 * @example
 * ```ts
 * // Growable in-memory buffer
 * const buffer = new ByteBuffer();
 * serializer.serializeInto(parts, 'xyz', buffer);
 *
 * // Collect chunks for a stream
 * const chunks: Uint8Array[] = [];
 * serializer.serializeInto(parts, 'xyz', { write: (bytes) => chunks.push(bytes) });
 * ```
 */
export interface ByteSink {
  write(bytes: Uint8Array): void;
}
