/**
 * Declaration Scanner
 *
 * Ordered pattern matchers over the comment-free view of a C# file:
 * - using directives
 * - the namespace (block or file-scoped)
 * - top-level enum declarations
 * - class / struct / interface declarations with visibility, modifiers and
 *   base list
 *
 * No tokenizer is involved. Declarations the patterns do not recognise are
 * simply absent from the result.
 *
 * @module declarationScanner
 */

import { blockInner, extractBlock } from './blockExtractor.js';
import type {
  EnumDeclaration,
  TypeKind,
  TypeModifier,
  Visibility,
} from './model.js';

// ============================================================================
// Shared Pattern Fragments
// ============================================================================

/**
 * Access modifiers, compound forms first so they win the alternation
 */
export const ACCESS_PATTERN =
  'public|protected\\s+internal|internal\\s+protected|private\\s+protected|protected|internal|private';

/**
 * One attribute section, e.g. `[Header("Movement")]` or `[SerializeField, Range(0, 1)]`.
 * Quoted arguments may contain brackets.
 */
export const ATTRIBUTE_PATTERN = '\\[(?:[^\\[\\]"\\n]|"[^"\\n]*")*\\]';

/**
 * Generic parameter or argument list with up to two levels of nesting
 */
export const GENERIC_LIST_PATTERN = '<(?:[^<>{};]|<(?:[^<>{};]|<[^<>{};]*>)*>)*>';

const USING_PATTERN =
  /^[ \t]*(?:global\s+)?using\s+(?:static\s+)?(?:\w+\s*=\s*)?([\w.]+)\s*;/gm;

const NAMESPACE_PATTERN = /^[ \t]*namespace\s+([\w.]+)/m;

const TYPE_DECLARATION_PATTERN = new RegExp(
  `(?:\\b(?<access>${ACCESS_PATTERN})\\s+)?` +
    '(?<modifiers>(?:(?:abstract|static|partial|sealed|new|unsafe|readonly)\\s+)*)' +
    '\\b(?<kind>class|struct|interface)\\s+' +
    '(?<name>\\w+)' +
    `(?:\\s*${GENERIC_LIST_PATTERN})?` +
    '(?:\\s*:\\s*(?<bases>[^{};]+?))?' +
    '(?:\\s+where\\s+[^{};]+?)?' +
    '\\s*\\{',
  'g'
);

const ENUM_DECLARATION_PATTERN = new RegExp(
  `(?:\\b(?<access>${ACCESS_PATTERN})\\s+)?` +
    '(?:new\\s+)?' +
    '\\benum\\s+(?<name>\\w+)\\s*' +
    '(?::\\s*[\\w.]+\\s*)?' +
    '\\{',
  'g'
);

const ATTRIBUTE_SECTION = new RegExp(ATTRIBUTE_PATTERN, 'g');

const TYPE_MODIFIERS: ReadonlySet<string> = new Set<TypeModifier>([
  'abstract',
  'static',
  'partial',
  'sealed',
]);

// ============================================================================
// Types
// ============================================================================

/**
 * A type declaration located in the clean source, before member extraction
 */
export interface TypeHeader {
  name: string;
  visibility: Visibility;
  kind: TypeKind;
  modifiers: TypeModifier[];
  bases: string[];
  /** Offset where the declaration text begins */
  offset: number;
  /** Offset of the opening brace of the body */
  bodyOffset: number;
  /** Balanced body, braces included */
  body: string;
  /** Innermost enclosing type, when nested */
  containingType?: string;
}

/**
 * An enum declaration with its position in the scanned text
 */
export interface EnumHeader extends EnumDeclaration {
  offset: number;
  bodyOffset: number;
}

export interface DeclarationScan {
  imports: string[];
  namespace?: string;
  types: TypeHeader[];
  /** Enums that start before the first type body */
  enums: EnumDeclaration[];
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Map a matched access-modifier text to a visibility, or the fallback when
 * no modifier was written.
 */
export function normalizeVisibility(raw: string | undefined, fallback: Visibility): Visibility {
  if (!raw) return fallback;

  const words = raw.trim().split(/\s+/);
  if (words.length === 2) {
    return words.includes('private') ? 'private protected' : 'protected internal';
  }

  switch (words[0]) {
    case 'public':
      return 'public';
    case 'protected':
      return 'protected';
    case 'internal':
      return 'internal';
    case 'private':
      return 'private';
    default:
      return fallback;
  }
}

function isTypeModifier(word: string): word is TypeModifier {
  return TYPE_MODIFIERS.has(word);
}

/**
 * Split a raw base list into individual base type names.
 *
 * Commas inside generic argument lists do not split, and a trailing
 * `where` constraint clause ends the list.
 *
 * @example
 * ```typescript
 * splitBaseList('Singleton<Dictionary<string, int>>, IDisposable where T : class')
 * // => ['Singleton<Dictionary<string, int>>', 'IDisposable']
 * ```
 */
export function splitBaseList(raw: string): string[] {
  const bases: string[] = [];
  let depth = 0;
  let current = '';

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];

    if (depth === 0 && /\s/.test(raw[i - 1] ?? ' ') && /^where\b/.test(raw.slice(i))) {
      break;
    }

    if (ch === '<') {
      depth++;
    } else if (ch === '>') {
      depth--;
    } else if (ch === ',' && depth === 0) {
      const name = current.trim();
      if (name) bases.push(name);
      current = '';
      continue;
    }
    current += ch;
  }

  const last = current.trim();
  if (last) bases.push(last);
  return bases;
}

/**
 * Extract symbolic enum member names from an enum body's inner text.
 * Attributes and explicit values are discarded.
 */
export function parseEnumValues(inner: string): string[] {
  return inner
    .split(',')
    .map((entry) => entry.replace(ATTRIBUTE_SECTION, '').split('=')[0].trim())
    .filter((value) => /^@?\w+$/.test(value));
}

// ============================================================================
// Scanners
// ============================================================================

/**
 * Collect the namespaces / types imported by using directives
 */
export function scanImports(clean: string): string[] {
  return Array.from(clean.matchAll(USING_PATTERN), (m) => m[1]);
}

/**
 * First namespace declared in the file, if any
 */
export function scanNamespace(clean: string): string | undefined {
  return NAMESPACE_PATTERN.exec(clean)?.[1];
}

/**
 * Find enum declarations in the given text.
 *
 * @param text - Clean source or a type body
 * @param fallback - Visibility recorded when no access modifier is written
 */
export function scanEnums(text: string, fallback: Visibility = 'internal'): EnumHeader[] {
  const enums: EnumHeader[] = [];

  for (const match of text.matchAll(ENUM_DECLARATION_PATTERN)) {
    const groups = match.groups ?? {};
    const offset = match.index ?? 0;
    const bodyOffset = offset + match[0].length - 1;
    const block = extractBlock(text, bodyOffset);

    enums.push({
      name: groups.name,
      visibility: normalizeVisibility(groups.access, fallback),
      values: parseEnumValues(blockInner(block)),
      offset,
      bodyOffset,
    });
  }

  return enums;
}

/**
 * Find class / struct / interface declarations in document order.
 *
 * Nested declarations are reported as separate headers; each one names its
 * innermost enclosing type in `containingType`.
 */
export function scanTypeDeclarations(clean: string): TypeHeader[] {
  const headers: TypeHeader[] = [];

  for (const match of clean.matchAll(TYPE_DECLARATION_PATTERN)) {
    const groups = match.groups ?? {};
    const offset = match.index ?? 0;
    const bodyOffset = offset + match[0].length - 1;
    const kind: TypeKind =
      groups.kind === 'struct' ? 'struct' : groups.kind === 'interface' ? 'interface' : 'class';

    headers.push({
      name: groups.name,
      visibility: normalizeVisibility(groups.access, 'internal'),
      kind,
      modifiers: (groups.modifiers ?? '').split(/\s+/).filter(isTypeModifier),
      bases: groups.bases ? splitBaseList(groups.bases) : [],
      offset,
      bodyOffset,
      body: extractBlock(clean, bodyOffset),
    });
  }

  return headers.map((header) => {
    let container: TypeHeader | undefined;
    for (const candidate of headers) {
      if (candidate === header) continue;
      const end = candidate.bodyOffset + candidate.body.length;
      const encloses = candidate.bodyOffset < header.offset && header.offset < end;
      if (encloses && (!container || candidate.bodyOffset > container.bodyOffset)) {
        container = candidate;
      }
    }
    return container ? { ...header, containingType: container.name } : header;
  });
}

/**
 * Run all file-level scanners over the clean source.
 *
 * Enums are accepted as top-level only when they start before the opening
 * brace of the first type declaration; later ones are treated as nested and
 * left to member extraction.
 */
export function scanDeclarations(clean: string): DeclarationScan {
  const types = scanTypeDeclarations(clean);
  const boundary = types.length > 0 ? types[0].bodyOffset : clean.length;

  const enums: EnumDeclaration[] = scanEnums(clean)
    .filter((e) => e.offset < boundary)
    .map(({ name, visibility, values }) => ({ name, visibility, values }));

  return {
    imports: scanImports(clean),
    namespace: scanNamespace(clean),
    types,
    enums,
  };
}
