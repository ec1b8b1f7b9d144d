/**
 * Dependency Resolver
 *
 * Second pass over the fully parsed corpus. Every unit is reduced to its
 * primary type name; any type reference in another unit that matches that
 * name becomes a directed edge.
 *
 * Matching is purely textual on bare identifiers. Two units whose primary
 * types share a short name in different namespaces are indistinguishable, and
 * a reference to that name produces a single edge.
 *
 * @module dependencyResolver
 */

import { getBaseName } from '../utils/paths.js';
import type { DependencyEdge, SourceUnit, TypeDeclaration } from './model.js';

/**
 * Punctuation that separates type names inside a type expression
 */
const TYPE_PUNCTUATION = /[[\]<>,?()\s]+/g;

/**
 * Name under which a unit can be referenced by other units.
 *
 * This is the top-level type named after the file (Unity's one-script-one-type
 * convention), or the first top-level type when none matches.
 */
export function primaryTypeName(unit: SourceUnit): string | undefined {
  const topLevel = unit.types.filter((t) => !t.containingType);
  const stem = getBaseName(unit.fileName);
  const named = topLevel.find((t) => t.name === stem);
  return (named ?? topLevel[0])?.name;
}

/**
 * Map each primary type name to the ids of the units that declare it
 */
export function buildTypeNameTable(units: readonly SourceUnit[]): Map<string, string[]> {
  const table = new Map<string, string[]>();
  for (const unit of units) {
    const name = primaryTypeName(unit);
    if (!name) continue;
    const owners = table.get(name);
    if (owners) {
      owners.push(unit.id);
    } else {
      table.set(name, [unit.id]);
    }
  }
  return table;
}

/**
 * Break a type expression into candidate identifiers.
 *
 * Generic, array, tuple and nullable punctuation separate tokens. A dotted
 * name also yields its last segment.
 *
 * @example
 * ```typescript
 * typeTokens('Dictionary<Game.Item, List<Enemy>>[]')
 * // => ['Dictionary', 'Game.Item', 'Item', 'List', 'Enemy']
 * ```
 */
export function typeTokens(type: string): string[] {
  const tokens: string[] = [];
  for (const token of type.replace(TYPE_PUNCTUATION, ' ').split(' ')) {
    if (!token) continue;
    tokens.push(token);
    const lastDot = token.lastIndexOf('.');
    if (lastDot >= 0 && lastDot < token.length - 1) {
      tokens.push(token.slice(lastDot + 1));
    }
  }
  return tokens;
}

function typeReferences(type: TypeDeclaration): string[] {
  return [
    ...type.bases,
    ...type.fields.map((f) => f.type),
    ...type.properties.map((p) => p.type),
    ...type.methods.flatMap((m) => [m.returnType, ...m.parameters.map((p) => p.type)]),
  ];
}

/**
 * Every identifier referenced from the unit's base lists and member types
 */
export function collectTypeReferences(unit: SourceUnit): Set<string> {
  const references = new Set<string>();
  for (const type of unit.types) {
    for (const expression of typeReferences(type)) {
      for (const token of typeTokens(expression)) {
        references.add(token);
      }
    }
  }
  return references;
}

/**
 * Sorted names of other units' primary types referenced by `unit`
 */
export function resolveUnitDependencies(
  unit: SourceUnit,
  table: ReadonlyMap<string, readonly string[]>
): string[] {
  const dependencies: string[] = [];
  for (const name of collectTypeReferences(unit)) {
    const owners = table.get(name);
    if (owners && owners.some((owner) => owner !== unit.id)) {
      dependencies.push(name);
    }
  }
  return dependencies.sort();
}

export interface ResolvedDependencies {
  /** Units with `dependencies` filled in, in input order */
  units: SourceUnit[];
  edges: DependencyEdge[];
}

/**
 * Resolve the dependency graph of a parsed corpus.
 *
 * Self references are skipped. Cycles are kept as they are; the result is a
 * set of edges, not an ordering.
 */
export function resolveDependencies(units: readonly SourceUnit[]): ResolvedDependencies {
  const table = buildTypeNameTable(units);
  const resolved: SourceUnit[] = [];
  const edges: DependencyEdge[] = [];

  for (const unit of units) {
    const dependencies = resolveUnitDependencies(unit, table);
    resolved.push({ ...unit, dependencies });
    for (const to of dependencies) {
      edges.push({ from: unit.id, to });
    }
  }

  return { units: resolved, edges };
}
