/**
 * Public API
 *
 * `buildInterfaceModel` is the in-memory entry point; `mapProject` adds the
 * file walking and report writing used by the CLI.
 */

export type {
  DependencyEdge,
  EnumDeclaration,
  FieldSpec,
  InterfaceModel,
  MethodSpec,
  ParameterSpec,
  PropertySpec,
  SourceInput,
  SourceUnit,
  TypeDeclaration,
  TypeKind,
  TypeModifier,
  UnitDiagnostic,
  Visibility,
} from './model.js';

export {
  buildInterfaceModel,
  parseSourceUnit,
  DEFAULT_PARSE_OPTIONS,
  type ParseOptions,
} from './modelAssembler.js';
export { DEFAULT_MEMBER_OPTIONS, type MemberExtractionOptions } from './memberExtractor.js';
export { resolveDependencies, primaryTypeName } from './dependencyResolver.js';
export { resolveDocumentation, resolveFileDocumentation } from './docResolver.js';
export { splitParameters } from './parameterSplitter.js';
export { renderIndexReport, renderUnitReport, reportFileName } from './reportGenerator.js';
export {
  collectModel,
  mapProject,
  type MapOptions,
  type MapProgress,
  type MapResult,
} from './interfaceMapper.js';
export { MapperError, ErrorCode, isMapperError } from '../errors/index.js';
export { loadConfig, type Config } from '../storage/config.js';
