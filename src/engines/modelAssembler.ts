/**
 * Model Assembler
 *
 * Builds one {@link SourceUnit} per input file and reduces the parsed units
 * into an {@link InterfaceModel}. Each file is parsed on its own; a failure in
 * one file becomes a diagnostic and never affects the others.
 *
 * @module modelAssembler
 */

import { getLogger } from '../utils/logger.js';
import { isMapperError, unitParseFailed } from '../errors/index.js';
import { blockInner, maskRanges, type TextRange } from './blockExtractor.js';
import { scanDeclarations, type TypeHeader } from './declarationScanner.js';
import {
  DEFAULT_FILE_DOC_MIN_LENGTH,
  documentationAbove,
  lineAtOffset,
  resolveFileDocumentation,
} from './docResolver.js';
import { resolveDependencies } from './dependencyResolver.js';
import {
  decodeSource,
  hasRestrictedBuildGuard,
  splitLines,
  stripComments,
} from './lexicalNormalizer.js';
import {
  DEFAULT_MEMBER_OPTIONS,
  extractMembers,
  type MemberExtractionOptions,
} from './memberExtractor.js';
import type {
  InterfaceModel,
  SourceInput,
  SourceUnit,
  TypeDeclaration,
  UnitDiagnostic,
} from './model.js';

// ============================================================================
// Options
// ============================================================================

export interface ParseOptions {
  members: MemberExtractionOptions;
  /** Shortest header comment accepted as file documentation */
  fileDocMinLength: number;
  /** Symbols whose `#if` guard sets `restrictedBuild` */
  restrictedBuildSymbols: string[];
}

export const DEFAULT_PARSE_OPTIONS: ParseOptions = {
  members: DEFAULT_MEMBER_OPTIONS,
  fileDocMinLength: DEFAULT_FILE_DOC_MIN_LENGTH,
  restrictedBuildSymbols: ['UNITY_EDITOR'],
};

export type UnitParseResult =
  | { ok: true; unit: SourceUnit }
  | { ok: false; diagnostic: UnitDiagnostic };

// ============================================================================
// Per-unit Assembly
// ============================================================================

/**
 * Last path segment of a unit id, either separator accepted
 */
export function unitFileName(id: string): string {
  const segments = id.split(/[\\/]/);
  return segments[segments.length - 1] || id;
}

function bodyEnd(header: TypeHeader): number {
  return header.bodyOffset + header.body.length;
}

function isInside(inner: TypeHeader, outer: TypeHeader): boolean {
  return inner !== outer && outer.bodyOffset < inner.offset && inner.offset < bodyEnd(outer);
}

/**
 * Body of `header` with every nested declaration blanked out, so that the
 * members of a nested type are not attributed to its container
 */
function ownBody(header: TypeHeader, headers: readonly TypeHeader[]): string {
  const innerStart = header.bodyOffset + 1;
  const ranges: TextRange[] = headers
    .filter((candidate) => isInside(candidate, header))
    .map((nested) => ({ start: nested.offset - innerStart, end: bodyEnd(nested) - innerStart }));
  return maskRanges(blockInner(header.body), ranges);
}

/**
 * Comment-stripped text of one unit and the lines of its original source.
 * Stripping keeps every newline, so line numbers agree between the two.
 */
interface UnitText {
  clean: string;
  lines: string[];
}

function documentationAt(text: UnitText, offset: number): string | undefined {
  return documentationAbove(text.lines, lineAtOffset(text.clean, offset));
}

function assembleType(
  header: TypeHeader,
  headers: readonly TypeHeader[],
  text: UnitText,
  options: ParseOptions
): TypeDeclaration {
  const nestedTypeNames = headers
    .filter((candidate) => candidate.containingType === header.name && isInside(candidate, header))
    .map((nested) => nested.name);

  const bodyStart = header.bodyOffset + 1;
  const members = extractMembers(
    ownBody(header, headers),
    { kind: header.kind, nestedTypeNames },
    options.members
  );

  const type: TypeDeclaration = {
    name: header.name,
    visibility: header.visibility,
    kind: header.kind,
    modifiers: header.modifiers,
    bases: header.bases,
    fields: members.fields,
    properties: members.properties,
    methods: members.methods.map((method, index) => {
      const documentation = documentationAt(text, bodyStart + members.methodOffsets[index]);
      return documentation ? { ...method, documentation } : method;
    }),
    enums: members.enums,
  };

  const documentation = documentationAt(text, header.offset);
  if (documentation) type.documentation = documentation;
  if (header.containingType) type.containingType = header.containingType;
  return type;
}

/**
 * Parse one source file into a unit.
 *
 * `dependencies` is left empty; it is filled in by the corpus-wide pass.
 *
 * @throws MapperError with code UNIT_PARSE_FAILED when the content is binary
 *   or not decodable text, or when assembly fails for any other reason
 */
export function parseSourceUnit(
  input: SourceInput,
  options: ParseOptions = DEFAULT_PARSE_OPTIONS
): SourceUnit {
  let source: string;
  try {
    source = decodeSource(input.content);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw unitParseFailed(input.id, 'content is not valid text', cause);
  }

  if (source.includes('\0')) {
    throw unitParseFailed(input.id, 'content contains NUL characters (binary file)');
  }

  try {
    const clean = stripComments(source);
    const scan = scanDeclarations(clean);
    const text: UnitText = { clean, lines: splitLines(source) };

    const unit: SourceUnit = {
      id: input.id,
      fileName: unitFileName(input.id),
      imports: scan.imports,
      types: scan.types.map((header) => assembleType(header, scan.types, text, options)),
      enums: scan.enums,
      dependencies: [],
      restrictedBuild: hasRestrictedBuildGuard(source, options.restrictedBuildSymbols),
    };
    if (scan.namespace) unit.namespace = scan.namespace;

    const documentation = resolveFileDocumentation(source, options.fileDocMinLength);
    if (documentation) unit.documentation = documentation;

    return unit;
  } catch (error) {
    if (isMapperError(error)) throw error;
    const cause = error instanceof Error ? error : new Error(String(error));
    throw unitParseFailed(input.id, cause.message, cause);
  }
}

/**
 * {@link parseSourceUnit} behind the per-file failure boundary
 */
export function parseUnitSafely(
  input: SourceInput,
  options: ParseOptions = DEFAULT_PARSE_OPTIONS
): UnitParseResult {
  try {
    return { ok: true, unit: parseSourceUnit(input, options) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const code = isMapperError(error) ? error.code : 'UNIT_PARSE_FAILED';
    getLogger().warn('ModelAssembler', 'Skipping unparseable source unit', {
      file: input.id,
      error: message,
    });
    return { ok: false, diagnostic: { file: input.id, code, message } };
  }
}

// ============================================================================
// Corpus Reduce
// ============================================================================

/**
 * Resolve dependencies across parsed units and attach the diagnostics
 */
export function finalizeModel(
  units: readonly SourceUnit[],
  diagnostics: readonly UnitDiagnostic[]
): InterfaceModel {
  const resolved = resolveDependencies(units);
  return { units: resolved.units, edges: resolved.edges, diagnostics: [...diagnostics] };
}

/**
 * Parse every input and build the interface model.
 *
 * Units appear in input order. Inputs that fail to parse are reported in
 * `diagnostics` and take no part in dependency resolution.
 *
 * @example
 * ```typescript
 * const model = buildInterfaceModel([
 *   { id: 'Player.cs', content: 'public class Player { public Weapon weapon; }' },
 *   { id: 'Weapon.cs', content: 'public class Weapon { }' },
 * ]);
 * model.edges // => [{ from: 'Player.cs', to: 'Weapon' }]
 * ```
 */
export function buildInterfaceModel(
  inputs: readonly SourceInput[],
  options: ParseOptions = DEFAULT_PARSE_OPTIONS
): InterfaceModel {
  const units: SourceUnit[] = [];
  const diagnostics: UnitDiagnostic[] = [];

  for (const input of inputs) {
    const result = parseUnitSafely(input, options);
    if (result.ok) {
      units.push(result.unit);
    } else {
      diagnostics.push(result.diagnostic);
    }
  }

  return finalizeModel(units, diagnostics);
}
