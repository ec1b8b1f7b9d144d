/**
 * Interface Model
 *
 * Value types produced by the structural parser and consumed by the
 * dependency resolver and the report generator.
 *
 * Every entity is built once per source unit and treated as read-only
 * afterwards. The only field filled in later is `SourceUnit.dependencies`,
 * and the resolve pass produces new unit values rather than mutating the
 * parsed ones.
 *
 * @module model
 */

/**
 * Declared access level of a type or member
 */
export type Visibility =
  | 'public'
  | 'protected internal'
  | 'protected'
  | 'internal'
  | 'private protected'
  | 'private';

/**
 * Kind of type declaration recognised by the scanner
 */
export type TypeKind = 'class' | 'struct' | 'interface';

/**
 * Type-level modifiers retained in the model
 */
export type TypeModifier = 'abstract' | 'static' | 'partial' | 'sealed';

export interface EnumDeclaration {
  name: string;
  visibility: Visibility;
  /** Symbolic member names in declaration order (explicit values dropped) */
  values: string[];
}

export interface FieldSpec {
  name: string;
  /** Declared type exactly as written (generic brackets included) */
  type: string;
  visibility: Visibility;
  isStatic: boolean;
  isReadonly: boolean;
  isConstant: boolean;
  /** Carries an inclusion annotation such as [SerializeField] */
  isSerialized: boolean;
  defaultValue?: string;
  /** Text of a [Header("...")] attribute */
  header?: string;
  /** Text of a [Tooltip("...")] attribute */
  tooltip?: string;
}

export interface PropertySpec {
  name: string;
  type: string;
  visibility: Visibility;
  hasGetter: boolean;
  hasSetter: boolean;
  isStatic: boolean;
}

export interface ParameterSpec {
  name: string;
  /** Declared type, or '?' when it could not be separated from the name */
  type: string;
  defaultValue?: string;
}

export interface MethodSpec {
  name: string;
  returnType: string;
  visibility: Visibility;
  isStatic: boolean;
  isVirtual: boolean;
  isOverride: boolean;
  isAbstract: boolean;
  isAsync: boolean;
  /** Return type lexically equals an iterator marker (coroutine) */
  isCoroutine: boolean;
  parameters: ParameterSpec[];
  documentation?: string;
}

export interface TypeDeclaration {
  name: string;
  visibility: Visibility;
  kind: TypeKind;
  modifiers: TypeModifier[];
  /** Base class and implemented interfaces, not distinguished */
  bases: string[];
  fields: FieldSpec[];
  properties: PropertySpec[];
  methods: MethodSpec[];
  enums: EnumDeclaration[];
  documentation?: string;
  /** Name of the enclosing type for nested declarations */
  containingType?: string;
}

export interface SourceUnit {
  /** Caller-supplied identifier, usually a root-relative path */
  id: string;
  fileName: string;
  namespace?: string;
  imports: string[];
  types: TypeDeclaration[];
  /** Enums declared outside any type */
  enums: EnumDeclaration[];
  /** Type names of other units this one references (sorted) */
  dependencies: string[];
  documentation?: string;
  /** Source contains a conditional-compilation guard for an editor-only build */
  restrictedBuild: boolean;
}

/**
 * Directed reference from one unit to another unit's primary type
 */
export interface DependencyEdge {
  from: string;
  to: string;
}

/**
 * One record per source unit that could not be processed
 */
export interface UnitDiagnostic {
  file: string;
  code: string;
  message: string;
}

/**
 * Raw input handed to the core by a file-walking collaborator
 */
export interface SourceInput {
  id: string;
  content: string | Uint8Array;
}

export interface InterfaceModel {
  units: SourceUnit[];
  edges: DependencyEdge[];
  diagnostics: UnitDiagnostic[];
}
