/**
 * Exact substring scanning
 *
 * @module matching
 */

/**
 * Every 0-based index at which `needle` occurs in `haystack`.
 *
 * The cursor advances one character past each hit, so overlapping
 * occurrences are all reported: 'AA' in 'AAAA' gives [0, 1, 2].
 * An empty needle has no occurrences.
 *
 * Comparison is exact; callers normalize case beforehand.
 */
export function findOccurrences(haystack: string, needle: string): number[] {
  const positions: number[] = [];
  if (needle.length === 0 || needle.length > haystack.length) {
    return positions;
  }

  let cursor = 0;
  for (;;) {
    const pos = haystack.indexOf(needle, cursor);
    if (pos === -1) {
      break;
    }
    positions.push(pos);
    cursor = pos + 1;
  }

  return positions;
}

/**
 * Number of (possibly overlapping) occurrences of `needle` in `haystack`
 */
export function countOccurrences(haystack: string, needle: string): number {
  return findOccurrences(haystack, needle).length;
}
