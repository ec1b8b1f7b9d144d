/**
 * Report Generator
 *
 * Renders the interface model as Markdown: one report per source unit and a
 * project index (`README.md`) linking them.
 *
 * Rendering is pure; writing the files is left to the pipeline.
 *
 * @module reportGenerator
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { getBaseName } from '../utils/paths.js';
import type {
  EnumDeclaration,
  FieldSpec,
  InterfaceModel,
  MethodSpec,
  ParameterSpec,
  SourceUnit,
  TypeDeclaration,
} from './model.js';

// ============================================================================
// Unity Lifecycle Catalog
// ============================================================================

const LifecycleCatalogSchema = z.object({
  /** A type deriving from one of these gets a lifecycle section */
  baseTypes: z.array(z.string()),
  /** Engine callbacks listed in that section */
  callbacks: z.array(z.string()),
});

export type LifecycleCatalog = z.infer<typeof LifecycleCatalogSchema>;

const LIFECYCLE_CATALOG_URL = new URL('../../data/unity-lifecycle.json', import.meta.url);

let catalogCache: LifecycleCatalog | null = null;

/**
 * Load the lifecycle catalog shipped in `data/unity-lifecycle.json`
 */
export function loadLifecycleCatalog(): LifecycleCatalog {
  if (!catalogCache) {
    const raw: unknown = JSON.parse(fs.readFileSync(LIFECYCLE_CATALOG_URL, 'utf-8'));
    catalogCache = LifecycleCatalogSchema.parse(raw);
  }
  return catalogCache;
}

// ============================================================================
// Formatting Helpers
// ============================================================================

const NONE = '—';

function code(text: string): string {
  return `\`${text}\``;
}

function codeList(items: readonly string[]): string {
  return items.map(code).join(', ');
}

/**
 * Escape text placed in a table cell
 */
function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function tags(items: readonly string[]): string {
  return items.length > 0 ? ` *[${items.join(', ')}]*` : '';
}

export function formatParameter(parameter: ParameterSpec): string {
  const text = `${parameter.type} ${parameter.name}`;
  return parameter.defaultValue ? `${text} = ${parameter.defaultValue}` : text;
}

export function formatSignature(method: MethodSpec): string {
  return `${method.returnType} ${method.name}(${method.parameters.map(formatParameter).join(', ')})`;
}

function qualifiedName(type: TypeDeclaration): string {
  return type.containingType ? `${type.containingType}.${type.name}` : type.name;
}

/**
 * Base name without generic arguments or namespace qualifier
 */
function bareBaseName(base: string): string {
  const withoutGenerics = base.replace(/<[\s\S]*$/, '').trim();
  const lastDot = withoutGenerics.lastIndexOf('.');
  return lastDot >= 0 ? withoutGenerics.slice(lastDot + 1) : withoutGenerics;
}

/**
 * Report path for a unit id, keeping its directory
 *
 * @example
 * ```typescript
 * reportFileName('Enemies/Boss.cs') // => 'Enemies/Boss.md'
 * ```
 */
export function reportFileName(unitId: string): string {
  const normalized = unitId.replace(/\\/g, '/');
  return /\.cs$/i.test(normalized) ? normalized.replace(/\.cs$/i, '.md') : `${normalized}.md`;
}

// ============================================================================
// Unit Report
// ============================================================================

function renderEnum(e: EnumDeclaration, heading: string): string[] {
  const values = e.values.length > 0 ? codeList(e.values) : NONE;
  return [`${heading} enum ${code(e.name)}`, `Values: ${values}`, ''];
}

function fieldNotes(field: FieldSpec, withHeader: boolean): string {
  const notes: string[] = [];
  if (withHeader && field.header) notes.push(`header: ${field.header}`);
  if (field.tooltip) notes.push(field.tooltip);
  if (field.isConstant) notes.push('const');
  if (field.isStatic) notes.push('static');
  if (field.isReadonly) notes.push('readonly');
  if (field.defaultValue) notes.push(`= ${field.defaultValue}`);
  return cell(notes.join(', '));
}

function renderFieldTable(title: string, fields: readonly FieldSpec[], withHeader: boolean): string[] {
  if (fields.length === 0) return [];
  return [
    `### ${title}`,
    '| Type | Name | Notes |',
    '|------|------|-------|',
    ...fields.map(
      (f) => `| ${code(cell(f.type))} | ${code(f.name)} | ${fieldNotes(f, withHeader)} |`
    ),
    '',
  ];
}

function renderProperties(type: TypeDeclaration): string[] {
  if (type.properties.length === 0) return [];
  return [
    '### Properties',
    '| Type | Name | get | set | Notes |',
    '|------|------|-----|-----|-------|',
    ...type.properties.map(
      (p) =>
        `| ${code(cell(p.type))} | ${code(p.name)} | ${p.hasGetter ? '✓' : NONE} | ` +
        `${p.hasSetter ? '✓' : NONE} | ${p.isStatic ? 'static' : ''} |`
    ),
    '',
  ];
}

function publicMethodTags(method: MethodSpec): string[] {
  const result: string[] = [];
  if (method.isStatic) result.push('static');
  if (method.isAsync) result.push('async');
  if (method.isCoroutine) result.push('coroutine');
  if (method.isAbstract) result.push('abstract');
  if (method.isVirtual) result.push('virtual');
  if (method.isOverride) result.push('override');
  return result;
}

function overridableTags(method: MethodSpec): string[] {
  const result: string[] = [method.visibility];
  if (method.isAbstract) result.push('abstract');
  if (method.isVirtual) result.push('virtual');
  if (method.isOverride) result.push('override');
  return result;
}

function renderMethodList(
  title: string,
  methods: readonly MethodSpec[],
  tagger: (method: MethodSpec) => string[]
): string[] {
  if (methods.length === 0) return [];
  const lines = [`### ${title}`];
  for (const method of methods) {
    lines.push(`- ${code(formatSignature(method))}${tags(tagger(method))}`);
    if (method.documentation) lines.push(`  ${method.documentation}`);
  }
  lines.push('');
  return lines;
}

/**
 * Whether the type derives directly from one of the catalog's engine bases
 */
export function isLifecycleType(type: TypeDeclaration, catalog: LifecycleCatalog): boolean {
  return type.bases.some((base) => catalog.baseTypes.includes(bareBaseName(base)));
}

function renderType(type: TypeDeclaration, catalog: LifecycleCatalog): string[] {
  const header = [type.visibility, ...type.modifiers, type.kind, code(qualifiedName(type))].join(' ');
  const lines = [type.bases.length > 0 ? `## ${header} : ${codeList(type.bases)}` : `## ${header}`, ''];

  if (type.documentation) lines.push(type.documentation, '');

  for (const e of type.enums) lines.push(...renderEnum(e, '###'));

  const publicFields = type.fields.filter((f) => f.visibility === 'public');
  const serialized = type.fields.filter((f) => f.visibility !== 'public' && f.isSerialized);
  const constants = type.fields.filter((f) => f.visibility !== 'public' && !f.isSerialized);

  lines.push(...renderFieldTable('Public Fields', publicFields, false));
  lines.push(...renderFieldTable('Serialized Fields (Inspector)', serialized, true));
  lines.push(...renderFieldTable('Constants (non-public)', constants, false));
  lines.push(...renderProperties(type));

  const lifecycleType = isLifecycleType(type, catalog);
  const isCallback = (m: MethodSpec): boolean => lifecycleType && catalog.callbacks.includes(m.name);

  const lifecycle = type.methods.filter(isCallback);
  if (lifecycle.length > 0) {
    lines.push('### Unity Lifecycle', codeList(lifecycle.map((m) => m.name)), '');
  }

  lines.push(
    ...renderMethodList(
      'Public Methods',
      type.methods.filter((m) => m.visibility === 'public' && !isCallback(m)),
      publicMethodTags
    )
  );
  lines.push(
    ...renderMethodList(
      'Overridable (protected/internal)',
      type.methods.filter((m) => m.visibility !== 'public'),
      overridableTags
    )
  );

  return lines;
}

/**
 * Render the Markdown report of one unit
 */
export function renderUnitReport(
  unit: SourceUnit,
  catalog: LifecycleCatalog = loadLifecycleCatalog()
): string {
  const lines = [`# ${unit.fileName}`, ''];

  if (unit.namespace) lines.push(`**Namespace:** ${code(unit.namespace)}`, '');
  if (unit.documentation) lines.push(`> ${unit.documentation}`, '');
  if (unit.restrictedBuild) {
    lines.push('> **Editor only:** parts of this file are compiled only in editor builds.', '');
  }
  if (unit.dependencies.length > 0) {
    lines.push(`**Depends on:** ${codeList(unit.dependencies)}`, '');
  }

  for (const e of unit.enums) lines.push(...renderEnum(e, '##'));
  for (const type of unit.types) lines.push(...renderType(type, catalog));

  return lines.join('\n');
}

// ============================================================================
// Index Report
// ============================================================================

function byIdIgnoringCase(a: SourceUnit, b: SourceUnit): number {
  const left = a.id.toLowerCase();
  const right = b.id.toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
}

interface EnumEntry {
  file: string;
  scope?: string;
  declaration: EnumDeclaration;
}

function collectEnums(units: readonly SourceUnit[]): EnumEntry[] {
  const entries: EnumEntry[] = [];
  for (const unit of units) {
    for (const declaration of unit.enums) {
      entries.push({ file: unit.fileName, declaration });
    }
    for (const type of unit.types) {
      for (const declaration of type.enums) {
        entries.push({ file: unit.fileName, scope: qualifiedName(type), declaration });
      }
    }
  }
  return entries.sort((a, b) =>
    a.declaration.name < b.declaration.name ? -1 : a.declaration.name > b.declaration.name ? 1 : 0
  );
}

/**
 * Render the project index linking every unit report
 */
export function renderIndexReport(
  model: InterfaceModel,
  catalog: LifecycleCatalog = loadLifecycleCatalog()
): string {
  const units = [...model.units].sort(byIdIgnoringCase);
  const lines = [
    '# Project Interface Map',
    '',
    `Generated API surface for **${units.length}** C# scripts.`,
    'Each linked report lists the public API, inspector fields, dependencies',
    'and engine lifecycle hooks of one script.',
    '',
    '## Script Index',
    '',
    '| Script | Types | Base | Depends On |',
    '|--------|-------|------|------------|',
  ];

  for (const unit of units) {
    const types = unit.types.length > 0 ? codeList(unit.types.map(qualifiedName)) : NONE;
    const bases = [...new Set(unit.types.flatMap((t) => t.bases))].sort();
    const baseText = bases.length > 0 ? codeList(bases) : NONE;
    const deps = unit.dependencies.length > 0 ? codeList(unit.dependencies) : NONE;
    lines.push(
      `| [${unit.id}](${reportFileName(unit.id)}) | ${cell(types)} | ${cell(baseText)} | ${deps} |`
    );
  }
  lines.push('');

  lines.push('## Dependency Graph (Adjacency)', '```');
  for (const unit of units) {
    for (const dependency of unit.dependencies) {
      lines.push(`${getBaseName(unit.fileName)} -> ${dependency}`);
    }
  }
  lines.push('```', '');

  lines.push('## All Public Methods (Quick Reference)', '');
  for (const unit of units) {
    for (const type of unit.types) {
      const lifecycleType = isLifecycleType(type, catalog);
      const methods = type.methods.filter(
        (m) => m.visibility === 'public' && !(lifecycleType && catalog.callbacks.includes(m.name))
      );
      if (methods.length === 0) continue;
      lines.push(`### ${code(qualifiedName(type))}`);
      for (const method of methods) lines.push(`- ${code(formatSignature(method))}`);
      lines.push('');
    }
  }

  const enums = collectEnums(units);
  if (enums.length > 0) {
    lines.push('## All Enums', '');
    for (const entry of enums) {
      const scope = entry.scope ? `${entry.scope}.` : '';
      const values = entry.declaration.values.length > 0 ? codeList(entry.declaration.values) : NONE;
      lines.push(`- **${scope}${entry.declaration.name}**: ${values}  *(in ${entry.file})*`);
    }
    lines.push('');
  }

  if (model.diagnostics.length > 0) {
    lines.push('## Skipped Files', '');
    for (const diagnostic of model.diagnostics) {
      lines.push(`- ${code(diagnostic.file)} (${diagnostic.code}): ${diagnostic.message}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
