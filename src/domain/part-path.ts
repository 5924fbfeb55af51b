/**
 * One step of a coding path: a field name or a sequence index.
 */
export type PathSegment = string | number;

/**
 * Format a coding path as a form field name.
 *
 * A leading field name is written bare; every later segment, and a leading
 * index, is wrapped in brackets.
 *
 * @example
 * ```ts
 * formatPartName(['address', 'city']); // 'address[city]'
 * formatPartName(['tags', 0]);         // 'tags[0]'
 * formatPartName([0, 'id']);           // '[0][id]'
 * ```
 */
export function formatPartName(path: readonly PathSegment[]): string {
  let name = '';
  for (let i = 0; i < path.length; i++) {
    const segment = path[i];
    if (i === 0 && typeof segment === 'string') {
      name += segment;
    } else {
      name += `[${segment}]`;
    }
  }
  return name;
}
