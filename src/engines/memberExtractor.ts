/**
 * Member Extractor
 *
 * Finds the fields, properties, methods and nested enums of one type body and
 * applies the visibility-inclusion policy that decides what belongs in the
 * interface summary:
 *
 * | Member     | Included when                                                   |
 * |------------|-----------------------------------------------------------------|
 * | Field      | public; or inclusion-annotated; or const / static readonly and  |
 * |            | not private                                                     |
 * | Property   | public                                                          |
 * | Method     | public; or non-private and virtual / override / abstract        |
 * | Enum       | public, internal, or no modifier                                |
 *
 * Each non-public rule can be switched off through {@link MemberExtractionOptions}.
 * Constructs the patterns cannot classify are left out silently.
 *
 * @module memberExtractor
 */

import { blockInner, extractBlock } from './blockExtractor.js';
import {
  ACCESS_PATTERN,
  ATTRIBUTE_PATTERN,
  GENERIC_LIST_PATTERN,
  normalizeVisibility,
  scanEnums,
} from './declarationScanner.js';
import { splitParameters } from './parameterSplitter.js';
import type {
  EnumDeclaration,
  FieldSpec,
  MethodSpec,
  PropertySpec,
  TypeKind,
  Visibility,
} from './model.js';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Toggles for the non-public inclusion rules
 */
export interface MemberExtractionOptions {
  /** Include fields carrying an inclusion annotation regardless of visibility */
  includeSerializedFields: boolean;
  /** Include const and static readonly fields that are not private */
  includeConstants: boolean;
  /** Include non-public virtual / override / abstract methods */
  includeOverridableMethods: boolean;
  /** Attribute names that mark a field for inclusion */
  inclusionAnnotations: string[];
  /** Return types that mark a method as a coroutine */
  iteratorMarkers: string[];
}

/**
 * Information about the type whose body is being scanned
 */
export interface MemberContext {
  kind: TypeKind;
  /** Names of types declared directly inside this one */
  nestedTypeNames?: readonly string[];
}

export interface ExtractedMembers {
  fields: FieldSpec[];
  properties: PropertySpec[];
  methods: MethodSpec[];
  /** Offset of each entry of `methods` within the scanned body */
  methodOffsets: number[];
  enums: EnumDeclaration[];
}

/**
 * A method together with the offset where its declaration starts
 */
export interface LocatedMethod {
  method: MethodSpec;
  offset: number;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_MEMBER_OPTIONS: MemberExtractionOptions = {
  includeSerializedFields: true,
  includeConstants: true,
  includeOverridableMethods: true,
  inclusionAnnotations: ['SerializeField', 'SerializeReference'],
  iteratorMarkers: ['IEnumerator'],
};

/**
 * Words that can never be a member's declared type. A match on one of these
 * means a statement was misread as a declaration.
 */
const RESERVED_TYPE_TOKENS: ReadonlySet<string> = new Set([
  'return',
  'yield',
  'var',
  'throw',
  'new',
  'await',
  'goto',
  'case',
  'else',
  'using',
  'namespace',
  'class',
  'struct',
  'interface',
  'enum',
  'record',
  'event',
  'delegate',
  'partial',
  'operator',
  'const',
]);

/**
 * A member starts at a line start or right after `;`, `{` or `}`
 */
const MEMBER_START = '(?:^|(?<=[;{}]))[ \\t]*';

const ATTRIBUTES = `(?<attrs>(?:${ATTRIBUTE_PATTERN}\\s*)*)`;

/**
 * A type reference: tuple or (qualified) name with optional generic
 * arguments, nullable marker and array ranks
 */
const TYPE_REFERENCE =
  '(?:\\((?:[^()]|\\([^()]*\\))*\\)' +
  `|(?:global::)?[A-Za-z_@][\\w.]*(?:\\s*${GENERIC_LIST_PATTERN})?)` +
  '\\??(?:\\s*\\[[\\s,]*\\]\\??)*';

function accessGroup(optional: boolean): string {
  return optional ? `(?:(?<access>${ACCESS_PATTERN})\\s+)?` : `(?<access>${ACCESS_PATTERN})\\s+`;
}

function modifierGroup(words: readonly string[]): string {
  return `(?<mods>(?:(?:${words.join('|')})\\s+)*)`;
}

const FIELD_PATTERN = new RegExp(
  MEMBER_START +
    ATTRIBUTES +
    accessGroup(true) +
    modifierGroup(['static', 'readonly', 'const', 'volatile', 'new', 'unsafe', 'required']) +
    `(?<type>${TYPE_REFERENCE})\\s+` +
    '(?<name>\\w+)\\s*' +
    '(?:=(?![>=])\\s*(?<default>[^;]+?))?\\s*;',
  'gm'
);

function propertyPattern(accessOptional: boolean): RegExp {
  return new RegExp(
    MEMBER_START +
      ATTRIBUTES +
      accessGroup(accessOptional) +
      modifierGroup(['static', 'virtual', 'override', 'abstract', 'sealed', 'new', 'readonly', 'unsafe', 'extern', 'required']) +
      `(?<type>${TYPE_REFERENCE})\\s+` +
      '(?<name>\\w+)\\s*' +
      '(?<open>\\{|=>)',
    'gm'
  );
}

function methodPattern(accessOptional: boolean): RegExp {
  return new RegExp(
    MEMBER_START +
      ATTRIBUTES +
      accessGroup(accessOptional) +
      modifierGroup(['static', 'virtual', 'override', 'abstract', 'async', 'sealed', 'new', 'extern', 'unsafe', 'partial']) +
      `(?<type>${TYPE_REFERENCE})\\s+` +
      '(?<name>\\w+)\\s*' +
      `(?:${GENERIC_LIST_PATTERN}\\s*)?` +
      '\\(',
    'gm'
  );
}

const CLASS_PROPERTY_PATTERN = propertyPattern(false);
const INTERFACE_PROPERTY_PATTERN = propertyPattern(true);
const CLASS_METHOD_PATTERN = methodPattern(false);
const INTERFACE_METHOD_PATTERN = methodPattern(true);

const HEADER_ATTRIBUTE = /\bHeader\s*\(\s*"([^"]*)"/;
const TOOLTIP_ATTRIBUTE = /\bTooltip\s*\(\s*"([^"]*)"/;

const RESTRICTED_GETTER = /\b(?:private|protected|internal)(?:\s+(?:protected|internal))?\s+get\b/;
const RESTRICTED_SETTER = /\b(?:private|protected|internal)(?:\s+(?:protected|internal))?\s+set\b/;

// ============================================================================
// Helpers
// ============================================================================

function modifierSet(raw: string | undefined): Set<string> {
  return new Set((raw ?? '').split(/\s+/).filter(Boolean));
}

/**
 * True when the declared type contains a reserved word
 */
export function isReservedTypeToken(type: string): boolean {
  return type.split(/\s+/).some((token) => RESERVED_TYPE_TOKENS.has(token));
}

function memberFallback(kind: TypeKind): Visibility {
  return kind === 'interface' ? 'public' : 'private';
}

function hasInclusionAnnotation(attrs: string, names: readonly string[]): boolean {
  if (!attrs || names.length === 0) return false;
  return names.some((name) => new RegExp(`[\\[,]\\s*${name}\\s*(?:\\(|\\]|,)`).test(attrs));
}

function normalizeType(type: string): string {
  return type.trim().replace(/\s+/g, ' ');
}

// ============================================================================
// Extractors
// ============================================================================

/**
 * Extract fields that pass the inclusion policy
 */
export function extractFields(
  inner: string,
  context: MemberContext,
  options: MemberExtractionOptions = DEFAULT_MEMBER_OPTIONS
): FieldSpec[] {
  const fields: FieldSpec[] = [];

  for (const match of inner.matchAll(FIELD_PATTERN)) {
    const groups = match.groups ?? {};
    const type = normalizeType(groups.type);
    if (isReservedTypeToken(type)) continue;

    const attrs = groups.attrs ?? '';
    const mods = modifierSet(groups.mods);
    const visibility = normalizeVisibility(groups.access, memberFallback(context.kind));
    const isSerialized = hasInclusionAnnotation(attrs, options.inclusionAnnotations);
    const isStatic = mods.has('static');
    const isReadonly = mods.has('readonly');
    const isConstant = mods.has('const');

    const included =
      visibility === 'public' ||
      (options.includeSerializedFields && isSerialized) ||
      (options.includeConstants && (isConstant || (isStatic && isReadonly)) && visibility !== 'private');
    if (!included) continue;

    const field: FieldSpec = {
      name: groups.name,
      type,
      visibility,
      isStatic,
      isReadonly,
      isConstant,
      isSerialized,
    };
    const defaultValue = groups.default?.trim();
    if (defaultValue) field.defaultValue = defaultValue;
    const header = HEADER_ATTRIBUTE.exec(attrs)?.[1];
    if (header) field.header = header;
    const tooltip = TOOLTIP_ATTRIBUTE.exec(attrs)?.[1];
    if (tooltip) field.tooltip = tooltip;

    fields.push(field);
  }

  return fields;
}

/**
 * Extract public properties.
 *
 * Accessor presence is read from the accessor block; an accessor with its
 * own restrictive modifier (e.g. `private set`) does not count. Expression
 * bodied properties only have a getter.
 */
export function extractProperties(inner: string, context: MemberContext): PropertySpec[] {
  const properties: PropertySpec[] = [];
  const pattern = context.kind === 'interface' ? INTERFACE_PROPERTY_PATTERN : CLASS_PROPERTY_PATTERN;
  const siblingNames = new Set([
    ...scanEnums(inner).map((e) => e.name),
    ...(context.nestedTypeNames ?? []),
  ]);

  for (const match of inner.matchAll(pattern)) {
    const groups = match.groups ?? {};
    const visibility = normalizeVisibility(groups.access, memberFallback(context.kind));
    if (visibility !== 'public') continue;

    const type = normalizeType(groups.type);
    if (isReservedTypeToken(type)) continue;
    if (siblingNames.has(groups.name)) continue;

    let hasGetter = true;
    let hasSetter = false;

    if (groups.open === '{') {
      const openOffset = (match.index ?? 0) + match[0].length - 1;
      const accessors = blockInner(extractBlock(inner, openOffset));
      hasGetter = /\bget\b/.test(accessors) && !RESTRICTED_GETTER.test(accessors);
      hasSetter = /\bset\b/.test(accessors) && !RESTRICTED_SETTER.test(accessors);
    }

    properties.push({
      name: groups.name,
      type,
      visibility,
      hasGetter,
      hasSetter,
      isStatic: modifierSet(groups.mods).has('static'),
    });
  }

  return properties;
}

/**
 * Find public methods and, when enabled, non-private overridable ones.
 * Private methods are never reported.
 *
 * Offsets point at the start of the declaration, leading attributes included.
 */
export function locateMethods(
  inner: string,
  context: MemberContext,
  options: MemberExtractionOptions = DEFAULT_MEMBER_OPTIONS
): LocatedMethod[] {
  const methods: LocatedMethod[] = [];
  const pattern = context.kind === 'interface' ? INTERFACE_METHOD_PATTERN : CLASS_METHOD_PATTERN;

  for (const match of inner.matchAll(pattern)) {
    const groups = match.groups ?? {};
    const returnType = normalizeType(groups.type);
    if (isReservedTypeToken(returnType)) continue;

    const visibility = normalizeVisibility(groups.access, memberFallback(context.kind));
    const mods = modifierSet(groups.mods);
    const isVirtual = mods.has('virtual');
    const isOverride = mods.has('override');
    const isAbstract = mods.has('abstract');

    if (visibility === 'private') continue;
    if (visibility !== 'public') {
      const overridable = isVirtual || isOverride || isAbstract;
      if (!options.includeOverridableMethods || !overridable) continue;
    }

    const parenOffset = (match.index ?? 0) + match[0].length - 1;
    const parameterList = blockInner(extractBlock(inner, parenOffset, '(', ')'), '(', ')');

    methods.push({
      method: {
        name: groups.name,
        returnType,
        visibility,
        isStatic: mods.has('static'),
        isVirtual,
        isOverride,
        isAbstract,
        isAsync: mods.has('async'),
        isCoroutine: options.iteratorMarkers.includes(returnType),
        parameters: splitParameters(parameterList),
      },
      offset: match.index ?? 0,
    });
  }

  return methods;
}

/**
 * Extract the methods {@link locateMethods} finds, without their offsets
 */
export function extractMethods(
  inner: string,
  context: MemberContext,
  options: MemberExtractionOptions = DEFAULT_MEMBER_OPTIONS
): MethodSpec[] {
  return locateMethods(inner, context, options).map(({ method }) => method);
}

/**
 * Extract enums declared in the body that are public, internal or carry no
 * access modifier
 */
export function extractNestedEnums(inner: string): EnumDeclaration[] {
  return scanEnums(inner)
    .filter((e) => e.visibility === 'public' || e.visibility === 'internal')
    .map(({ name, visibility, values }) => ({ name, visibility, values }));
}

/**
 * Run every member extractor over one type body.
 *
 * @param inner - Body text without its outer braces, with nested type bodies masked
 */
export function extractMembers(
  inner: string,
  context: MemberContext,
  options: MemberExtractionOptions = DEFAULT_MEMBER_OPTIONS
): ExtractedMembers {
  const located = locateMethods(inner, context, options);
  return {
    fields: context.kind === 'interface' ? [] : extractFields(inner, context, options),
    properties: extractProperties(inner, context),
    methods: located.map(({ method }) => method),
    methodOffsets: located.map(({ offset }) => offset),
    enums: extractNestedEnums(inner),
  };
}
