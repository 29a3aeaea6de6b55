/**
 * Token-boundary wrapper for linkifier patterns.
 *
 * The server-side renderer wraps patterns with exactly the same expression,
 * so both sides agree on where a linkifier may fire. Do not edit one side
 * without the other.
 *
 * RE2 has no look-ahead or look-behind, so the boundary characters are
 * consumed by ordinary capture groups around the pattern:
 *
 *   group 1  preceding boundary (start, whitespace, U+0085, separators, '"(,:<)
 *   group 2  the caller's pattern
 *   group 3  following boundary (end, or anything but a letter or number)
 *
 * `\s` in RE2 is ASCII-only, hence the explicit U+0085 and `\p{Z}`. RE2 has
 * no `\u` escape; U+0085 is spelled `\x{85}`.
 */

export const BOUNDARY_PREFIX = "(^|\\s|\\x{85}|\\p{Z}|['\"(,:<])(";

export const BOUNDARY_SUFFIX = ")($|[^\\p{L}\\p{N}])";

/** Index of the capture group holding the caller's pattern. */
export const PATTERN_GROUP = 2;

export function wrapPattern(pattern: string): string {
  return BOUNDARY_PREFIX + pattern + BOUNDARY_SUFFIX;
}
