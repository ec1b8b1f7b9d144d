/**
 * Documentation Resolver
 *
 * Attaches free-floating documentation comments to declarations by walking
 * upward from the declaration line of the original (unstripped) source.
 *
 * The walk is a small state machine:
 *
 * ```
 *   seeking ──/// line──────────▶ collecting-lines ──blank / code──▶ done
 *      │                               │ (annotations skipped)
 *      └──line ending in *\/──▶ collecting-block ──line with /*──▶ done
 * ```
 *
 * While seeking, blank lines and attribute-only lines are skipped. Any other
 * line ends the walk; if nothing was collected there is no documentation.
 *
 * @module docResolver
 */

import { splitLines } from './lexicalNormalizer.js';
import { ACCESS_PATTERN, ATTRIBUTE_PATTERN, GENERIC_LIST_PATTERN } from './declarationScanner.js';

// ============================================================================
// Types
// ============================================================================

/**
 * What kind of declaration the name belongs to. Narrows the line search so
 * that a type is not confused with a member that merely uses it.
 */
export type DocTarget = 'type' | 'method' | 'member';

export type ScanState = 'seeking' | 'collecting-lines' | 'collecting-block' | 'done';

type LineKind = 'blank' | 'annotation' | 'line-doc' | 'block-end' | 'code';

// ============================================================================
// Constants
// ============================================================================

/**
 * Default minimum length for a file-level documentation block. Shorter
 * headers (a copyright line, a file name) are ignored.
 */
export const DEFAULT_FILE_DOC_MIN_LENGTH = 40;

/**
 * XML documentation tags that only structure the text
 */
const STRUCTURAL_TAGS = [
  'summary',
  'remarks',
  'returns',
  'value',
  'para',
  'c',
  'code',
  'example',
  'exception',
  'param',
  'typeparam',
  'list',
  'item',
  'term',
  'description',
  'inheritdoc',
  'b',
  'i',
];

const STRUCTURAL_TAG = new RegExp(`</?(?:${STRUCTURAL_TAGS.join('|')})(?:\\s[^<>]*)?/?>`, 'g');
const SEE_TAG = /<see(?:also)?\s+(?:cref|href|langword)\s*=\s*"([^"]*)"\s*\/?>(?:<\/see(?:also)?>)?/g;
const NAME_REF_TAG = /<(?:paramref|typeparamref)\s+name\s*=\s*"([^"]*)"\s*\/?>/g;
const PARAM_TAG = /<(?:param|typeparam)\s+name\s*=\s*"([^"]*)"\s*>/g;

const ANNOTATION_LINE = new RegExp(`^\\s*(?:${ATTRIBUTE_PATTERN}\\s*)+$`);
const LINE_DOC = /^\s*\/\/\/(?!\/)/;
const LINE_COMMENT = /^\s*\/\//;

// ============================================================================
// Helpers
// ============================================================================

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function classifyLine(line: string): LineKind {
  const trimmed = line.trim();
  if (!trimmed) return 'blank';
  if (LINE_DOC.test(line)) return 'line-doc';
  // `x = 1; /* note */` is code with a trailing comment, not a doc block
  if (trimmed.endsWith('*/') && trimmed.indexOf('/*') <= 0) return 'block-end';
  if (ANNOTATION_LINE.test(line)) return 'annotation';
  return 'code';
}

/**
 * Remove documentation tags, keeping the text that cross-references name
 */
export function stripDocTags(text: string): string {
  return text
    .replace(SEE_TAG, '$1')
    .replace(NAME_REF_TAG, '$1')
    .replace(PARAM_TAG, '$1: ')
    .replace(STRUCTURAL_TAG, ' ');
}

function stripLineMarker(line: string): string {
  return line.replace(/^\s*\/\/+\s?/, '');
}

function stripBlockMarkers(line: string): string {
  return line
    .replace(/^\s*\/\*+/, '')
    .replace(/\*+\/\s*$/, '')
    .replace(/^\s*\*(?!\/)\s?/, '');
}

/**
 * Join documentation lines into one summary string
 */
function normalizeDoc(lines: readonly string[]): string | undefined {
  const text = lines
    .map((line) => stripDocTags(line).trim())
    .filter(Boolean)
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim();
  return text || undefined;
}

function declarationPattern(name: string, target: DocTarget): RegExp {
  const escaped = escapeRegExp(name);
  const lead = `^[ \\t]*(?:${ATTRIBUTE_PATTERN}\\s*)*(?:${ACCESS_PATTERN})\\b`;

  switch (target) {
    case 'type':
      return new RegExp(`${lead}[^\\n]*?\\b(?:class|struct|interface|enum)\\s+${escaped}\\b`);
    case 'method':
      return new RegExp(`${lead}[^\\n]*?\\b${escaped}\\s*(?:${GENERIC_LIST_PATTERN})?\\s*\\(`);
    case 'member':
      return new RegExp(`${lead}[^\\n]*?\\b${escaped}\\b`);
  }
}

/**
 * Index of the first line declaring `name` behind a visibility keyword, or -1
 */
export function findDeclarationLine(
  lines: readonly string[],
  name: string,
  target: DocTarget = 'member'
): number {
  const pattern = declarationPattern(name, target);
  return lines.findIndex((line) => pattern.test(line));
}

// ============================================================================
// Backward Scan
// ============================================================================

/**
 * Collect the documentation directly above `declarationLine`.
 *
 * @returns Collected raw lines in reading order (markers removed)
 */
export function collectDocLines(lines: readonly string[], declarationLine: number): string[] {
  const collected: string[] = [];
  let state: ScanState = 'seeking';

  for (let i = declarationLine - 1; i >= 0 && state !== 'done'; i--) {
    const line = lines[i];
    const kind = classifyLine(line);

    switch (state) {
      case 'seeking':
        if (kind === 'blank' || kind === 'annotation') break;
        if (kind === 'line-doc') {
          collected.push(stripLineMarker(line));
          state = 'collecting-lines';
        } else if (kind === 'block-end') {
          collected.push(stripBlockMarkers(line));
          state = line.includes('/*') ? 'done' : 'collecting-block';
        } else {
          state = 'done';
        }
        break;

      case 'collecting-lines':
        if (kind === 'annotation') break;
        if (kind === 'line-doc') {
          collected.push(stripLineMarker(line));
        } else {
          state = 'done';
        }
        break;

      case 'collecting-block':
        collected.push(stripBlockMarkers(line));
        if (line.includes('/*')) state = 'done';
        break;
    }
  }

  return collected.reverse();
}

/**
 * Zero-based line of a character offset
 */
export function lineAtOffset(text: string, offset: number): number {
  let line = 0;
  const end = Math.min(offset, text.length);
  for (let i = 0; i < end; i++) {
    if (text.charCodeAt(i) === 10) line++;
  }
  return line;
}

/**
 * Normalized documentation directly above a known declaration line
 */
export function documentationAbove(
  lines: readonly string[],
  declarationLine: number
): string | undefined {
  return normalizeDoc(collectDocLines(lines, declarationLine));
}

/**
 * Resolve the documentation attached to the first declaration of `name`.
 *
 * The declaration is found by name; the assembler uses
 * {@link documentationAbove} with the exact declaration line instead.
 *
 * @param source - Original source text, comments intact
 * @returns One normalized summary string, or undefined when the declaration
 *   has no documentation directly above it
 *
 * @example
 * ```typescript
 * resolveDocumentation(
 *   '/// <summary>Moves the player.</summary>\npublic void Move() {}',
 *   'Move',
 *   'method'
 * ) // => 'Moves the player.'
 * ```
 */
export function resolveDocumentation(
  source: string,
  name: string,
  target: DocTarget = 'member'
): string | undefined {
  const lines = splitLines(source);
  const declarationLine = findDeclarationLine(lines, name, target);
  if (declarationLine < 0) return undefined;
  return documentationAbove(lines, declarationLine);
}

/**
 * Extract the file-level documentation block.
 *
 * Only comment blocks before the first non-comment line (using, namespace or
 * anything else) are considered. The first block whose normalized text is at
 * least `minLength` characters long is returned.
 */
export function resolveFileDocumentation(
  source: string,
  minLength: number = DEFAULT_FILE_DOC_MIN_LENGTH
): string | undefined {
  const lines = splitLines(source);
  const blocks: string[][] = [];
  let current: string[] = [];
  let inBlock = false;

  const closeBlock = (): void => {
    if (current.length > 0) blocks.push(current);
    current = [];
  };

  for (const line of lines) {
    if (inBlock) {
      current.push(stripBlockMarkers(line));
      if (line.includes('*/')) {
        inBlock = false;
        closeBlock();
      }
      continue;
    }

    const trimmed = line.trim();
    if (!trimmed) {
      closeBlock();
    } else if (LINE_COMMENT.test(line)) {
      current.push(stripLineMarker(line));
    } else if (trimmed.startsWith('/*')) {
      closeBlock();
      current.push(stripBlockMarkers(line));
      if (trimmed.endsWith('*/') && trimmed.length > 2) {
        closeBlock();
      } else {
        inBlock = true;
      }
    } else {
      break;
    }
  }
  closeBlock();

  for (const block of blocks) {
    const text = normalizeDoc(block);
    if (text && text.length >= minLength) return text;
  }
  return undefined;
}
