import type { MultipartLeaf } from '../../domain/multipart-leaf';
import type { NamedPart } from '../../domain/named-part';
import { formatPartName, type PathSegment } from '../../domain/part-path';

/**
 * A single leaf payload.
 */
export interface LeafTree {
  kind: 'leaf';
  leaf: MultipartLeaf;
}

/**
 * Named children of a record, in declaration order.
 */
export interface KeyedTree {
  kind: 'keyed';
  children: ReadonlyArray<readonly [key: string, tree: PartTree]>;
}

/**
 * Children of a sequence, in index order. Each child keeps its position in
 * the source sequence, so elements that yielded nothing leave a gap.
 */
export interface IndexedTree {
  kind: 'indexed';
  children: ReadonlyArray<readonly [index: number, tree: PartTree]>;
}

/**
 * Intermediate form of an encoded value: the parts it yields, grouped by
 * the containers they came from.
 */
export type PartTree = LeafTree | KeyedTree | IndexedTree;

/**
 * Flatten a part tree into named parts, in pre-order.
 *
 * Keyed children extend the path by their key, indexed children by their
 * stored source index. Indexed children are bracketed even at the top level, so an
 * indexed root yields names `[0]`, `[1]`, ...
 */
export function flattenPartTree(
  tree: PartTree,
  path: readonly PathSegment[] = []
): NamedPart[] {
  const parts: NamedPart[] = [];
  collectParts(tree, path, parts);
  return parts;
}

function collectParts(tree: PartTree, path: readonly PathSegment[], parts: NamedPart[]): void {
  switch (tree.kind) {
    case 'leaf': {
      const part: NamedPart = { name: formatPartName(path), body: tree.leaf.body };
      if (tree.leaf.filename !== undefined) {
        part.filename = tree.leaf.filename;
      }
      if (tree.leaf.contentType !== undefined) {
        part.contentType = tree.leaf.contentType;
      }
      parts.push(part);
      return;
    }
    case 'keyed':
      for (const [key, child] of tree.children) {
        collectParts(child, [...path, key], parts);
      }
      return;
    case 'indexed':
      for (const [index, child] of tree.children) {
        collectParts(child, [...path, index], parts);
      }
      return;
  }
}
