/**
 * Block Extractor
 *
 * Balanced-delimiter scanning used to isolate type bodies, enum bodies,
 * property accessor blocks and method parameter lists.
 *
 * @module blockExtractor
 */

/**
 * Half-open character range [start, end)
 */
export interface TextRange {
  start: number;
  end: number;
}

/**
 * Extract the balanced block that opens at `openOffset`.
 *
 * Depth is tracked one character at a time. The returned text starts at
 * `openOffset` and ends with the delimiter that brings the depth back to
 * zero. When the text ends before the block is closed, the remainder of the
 * text from `openOffset` is returned so callers can still produce partial
 * output.
 *
 * @example
 * ```typescript
 * extractBlock('class A { void F() { } } rest', 8)
 * // => '{ void F() { } }'
 * ```
 */
export function extractBlock(
  text: string,
  openOffset: number,
  open: string = '{',
  close: string = '}'
): string {
  let depth = 0;
  for (let i = openOffset; i < text.length; i++) {
    const ch = text[i];
    if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) {
        return text.slice(openOffset, i + 1);
      }
    }
  }
  return text.slice(openOffset);
}

/**
 * Strip the outer delimiters of a block returned by {@link extractBlock}.
 * An unterminated block only loses its opening delimiter.
 */
export function blockInner(block: string, open: string = '{', close: string = '}'): string {
  if (!block.startsWith(open)) return block;
  if (block.length >= 2 && block.endsWith(close)) {
    return block.slice(1, -1);
  }
  return block.slice(1);
}

/**
 * Blank out the given ranges, keeping newlines so line positions survive.
 * Ranges may overlap or nest.
 */
export function maskRanges(text: string, ranges: readonly TextRange[]): string {
  if (ranges.length === 0) return text;

  const chars = text.split('');
  for (const { start, end } of ranges) {
    const from = Math.max(0, start);
    const to = Math.min(chars.length, end);
    for (let i = from; i < to; i++) {
      if (chars[i] !== '\n') {
        chars[i] = ' ';
      }
    }
  }
  return chars.join('');
}
