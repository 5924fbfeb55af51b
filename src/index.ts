// ============================================================
// FormDataEncoder - Primary Public API
// ============================================================

export { FormDataEncoder, type FormDataEncoderOptions } from './form-data-encoder';

// Errors
export {
  MultipartErrorCode,
  MultipartError,
  RootNotKeyedError,
  CircularStructureError,
  TraversalFailureError,
  InvalidPartNameError,
  InvalidPartHeaderError,
  InvalidBoundaryError,
  BoundaryCollisionError,
  BodyNotTextError,
} from './errors';

// ============================================================
// Types commonly used with FormDataEncoder
// ============================================================

export {
  namedPart,
  MultipartFile,
  multipartFile,
  formatPartName,
  Boundary,
  type NamedPart,
  type NamedPartOptions,
  type MultipartLeaf,
  type MultipartFileOptions,
  type PathSegment,
} from './domain';

// ============================================================
// Advanced APIs
// ============================================================
// Building blocks for custom reflection, custom sinks, or serializing
// parts assembled by hand.

// Ports - Interfaces
export {
  isMultipartConvertible,
  type EncodingContext,
  type Shape,
  type AbsentShape,
  type LeafShape,
  type RecordShape,
  type SequenceShape,
  type ValueReflector,
  type MultipartConvertible,
  type ByteSink,
} from './ports';

// Default implementations
export {
  ObjectReflector,
  DEFAULT_FILENAME,
  DEFAULT_FILE_CONTENT_TYPE,
  ByteBuffer,
  type ObjectReflectorOptions,
} from './infrastructure';

// Part tree and serializer
export {
  buildPartTree,
  buildParts,
  flattenPartTree,
  MultipartSerializer,
  multipartContentType,
  escapeQuoted,
  type PartTreeBuilderOptions,
  type PartTree,
  type LeafTree,
  type KeyedTree,
  type IndexedTree,
} from './application';
