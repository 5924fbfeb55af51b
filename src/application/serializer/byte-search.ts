/**
 * Find the first occurrence of `needle` in `haystack`.
 *
 * Scans for the needle's first byte, then compares the rest in place.
 * Worst case O(n * m); delimiters are short, so this stays close to O(n).
 *
 * An empty needle matches at 0. Boundary delimiters are never empty.
 *
 * @returns Byte offset of the match, or -1
 */
export function indexOfBytes(haystack: Uint8Array, needle: Uint8Array): number {
  if (needle.length === 0) {
    return 0;
  }
  const first = needle[0];
  const last = haystack.length - needle.length;
  for (let i = 0; i <= last; i++) {
    if (haystack[i] !== first) {
      continue;
    }
    let j = 1;
    while (j < needle.length && haystack[i + j] === needle[j]) {
      j++;
    }
    if (j === needle.length) {
      return i;
    }
  }
  return -1;
}
