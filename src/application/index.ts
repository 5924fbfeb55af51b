// Part tree building
export {
  buildPartTree,
  buildParts,
  flattenPartTree,
  type PartTreeBuilderOptions,
  type PartTree,
  type LeafTree,
  type KeyedTree,
  type IndexedTree,
} from './part-tree';

// Serialization
export {
  MultipartSerializer,
  multipartContentType,
  escapeQuoted,
  indexOfBytes,
} from './serializer';
