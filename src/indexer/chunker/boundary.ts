/**
 * Boundary Scanner
 *
 * Finds where a delimited block ends by counting open/close characters line
 * by line. Strings and comments are not special-cased, so a brace inside a
 * string literal counts like any other.
 */

/**
 * Find the exclusive end line of the block that starts at `startIndex`.
 *
 * Depth is updated character by character. The block ends on the first line
 * where depth drops to zero or below after it has been positive at least
 * once. When that never happens (unbalanced input, or no opener at all) the
 * block runs to the end of the file.
 *
 * @example
 * ```typescript
 * findBlockEnd(['function a() {', '  return 1;', '}'], 0); // 3
 * findBlockEnd(['no braces here'], 0);                     // 1
 * ```
 */
export function findBlockEnd(
  lines: readonly string[],
  startIndex: number,
  openChar = '{',
  closeChar = '}'
): number {
  let depth = 0;
  let opened = false;

  for (let i = startIndex; i < lines.length; i++) {
    const line = lines[i] ?? '';
    for (const char of line) {
      if (char === openChar) {
        depth++;
        opened = true;
      } else if (char === closeChar) {
        depth--;
      }
    }

    if (opened && depth <= 0) {
      return i + 1;
    }
  }

  return lines.length;
}
