/**
 * Lexical Normalizer
 *
 * Produces the "clean" view of a source file that the declaration and member
 * scanners match against:
 * - Comments are blanked out (replaced by spaces, newlines kept) so offsets and
 *   line numbers stay aligned with the original text
 * - Source bytes are decoded with byte-order-mark detection
 *
 * Known limitation: string and character literals are not tokenized, so a
 * comment marker inside a literal (e.g. "http://...") is treated as a comment.
 *
 * @module lexicalNormalizer
 */

/**
 * Matches whichever comment opens first: a block comment or a line comment.
 * A single alternation keeps a `//` inside a block comment (and vice versa)
 * from being matched twice.
 */
const COMMENT_PATTERN = /\/\*[\s\S]*?\*\/|\/\/[^\n]*/g;

const UTF8_BOM = [0xef, 0xbb, 0xbf] as const;
const UTF16LE_BOM = [0xff, 0xfe] as const;
const UTF16BE_BOM = [0xfe, 0xff] as const;

/**
 * Remove single-line and block comments, preserving layout.
 *
 * The result has exactly the same length as the input; every character of a
 * comment except newlines becomes a space.
 *
 * @example
 * ```typescript
 * stripComments('int a; // note\nint b;')
 * // => 'int a;        \nint b;'
 * ```
 */
export function stripComments(source: string): string {
  return source.replace(COMMENT_PATTERN, (comment) => comment.replace(/[^\n]/g, ' '));
}

function startsWith(bytes: Uint8Array, prefix: readonly number[]): boolean {
  if (bytes.length < prefix.length) return false;
  return prefix.every((b, i) => bytes[i] === b);
}

/**
 * Decode source content into text.
 *
 * Strings only lose a leading U+FEFF. Byte input is decoded as UTF-8 or
 * UTF-16 depending on its byte-order mark; without a mark it must be valid
 * UTF-8, otherwise a TypeError is thrown.
 */
export function decodeSource(content: string | Uint8Array): string {
  if (typeof content === 'string') {
    return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  }

  if (startsWith(content, UTF8_BOM)) {
    return new TextDecoder('utf-8', { fatal: true }).decode(content.subarray(UTF8_BOM.length));
  }
  if (startsWith(content, UTF16LE_BOM)) {
    return new TextDecoder('utf-16le').decode(content.subarray(UTF16LE_BOM.length));
  }
  if (startsWith(content, UTF16BE_BOM)) {
    return new TextDecoder('utf-16be').decode(content.subarray(UTF16BE_BOM.length));
  }
  return new TextDecoder('utf-8', { fatal: true }).decode(content);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Check whether the source contains a `#if` guard on one of the given
 * symbols (for example `#if UNITY_EDITOR`).
 */
export function hasRestrictedBuildGuard(source: string, symbols: readonly string[]): boolean {
  if (symbols.length === 0) return false;
  const alternatives = symbols.map(escapeRegExp).join('|');
  const pattern = new RegExp(`^[ \\t]*#\\s*if\\b[^\\n]*\\b(?:${alternatives})\\b`, 'm');
  return pattern.test(source);
}

/**
 * Split text into lines, accepting both LF and CRLF endings.
 */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}
