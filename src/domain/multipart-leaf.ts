/**
 * Payload of one leaf value, as reported by a reflector.
 *
 * `contentType` and `filename` are only set for file-typed values.
 */
export interface MultipartLeaf {
  body: Uint8Array;
  contentType?: string;
  filename?: string;
}
