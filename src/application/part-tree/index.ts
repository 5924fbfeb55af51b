export {
  flattenPartTree,
  type PartTree,
  type LeafTree,
  type KeyedTree,
  type IndexedTree,
} from './part-tree';

export {
  buildPartTree,
  buildParts,
  type PartTreeBuilderOptions,
} from './part-tree-builder';
