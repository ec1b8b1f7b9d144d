import { describe, it, expect } from 'vitest';
import {
  normalizeVisibility,
  splitBaseList,
  parseEnumValues,
  scanImports,
  scanNamespace,
  scanEnums,
  scanTypeDeclarations,
  scanDeclarations,
} from '../../../src/engines/declarationScanner.js';

const SOURCE = [
  'using System;',
  'using UnityEngine;',
  'using static System.Math;',
  'using Col = System.Collections.Generic;',
  '',
  'namespace Game.Core',
  '{',
  '    public enum Team { Red, Blue = 2, [Obsolete] Green }',
  '',
  '    [Serializable]',
  '    public abstract partial class Unit<T> : MonoBehaviour, IDamageable where T : Component',
  '    {',
  '        public enum State { Idle, Moving }',
  '',
  '        private sealed class Cache',
  '        {',
  '        }',
  '    }',
  '',
  '    struct Point { }',
  '}',
].join('\n');

describe('Declaration Scanner', () => {
  describe('normalizeVisibility', () => {
    it('should map single keywords', () => {
      expect(normalizeVisibility('public', 'private')).toBe('public');
      expect(normalizeVisibility('internal', 'private')).toBe('internal');
    });

    it('should map compound modifiers in either order', () => {
      expect(normalizeVisibility('protected internal', 'private')).toBe('protected internal');
      expect(normalizeVisibility('internal  protected', 'private')).toBe('protected internal');
      expect(normalizeVisibility('private protected', 'public')).toBe('private protected');
    });

    it('should use the fallback when nothing was written', () => {
      expect(normalizeVisibility(undefined, 'internal')).toBe('internal');
      expect(normalizeVisibility('', 'public')).toBe('public');
    });
  });

  describe('splitBaseList', () => {
    it('should not split inside generic arguments', () => {
      expect(splitBaseList('Singleton<Dictionary<string, int>>, IDisposable')).toEqual([
        'Singleton<Dictionary<string, int>>',
        'IDisposable',
      ]);
    });

    it('should stop at a where clause', () => {
      expect(splitBaseList('Base<T> where T : class')).toEqual(['Base<T>']);
    });

    it('should keep names that merely contain "where"', () => {
      expect(splitBaseList('Somewhere, IElsewhere')).toEqual(['Somewhere', 'IElsewhere']);
    });
  });

  describe('parseEnumValues', () => {
    it('should drop explicit values and attributes', () => {
      expect(parseEnumValues(' Red, Blue = 2, [Obsolete] Green ')).toEqual(['Red', 'Blue', 'Green']);
    });

    it('should ignore a trailing comma', () => {
      expect(parseEnumValues('A,\n B,\n')).toEqual(['A', 'B']);
    });
  });

  describe('scanImports / scanNamespace', () => {
    it('should collect every using directive target', () => {
      expect(scanImports(SOURCE)).toEqual([
        'System',
        'UnityEngine',
        'System.Math',
        'System.Collections.Generic',
      ]);
    });

    it('should find a block namespace', () => {
      expect(scanNamespace(SOURCE)).toBe('Game.Core');
    });

    it('should find a file-scoped namespace', () => {
      expect(scanNamespace('namespace Game.UI;\npublic class Hud { }')).toBe('Game.UI');
    });

    it('should return undefined without a namespace', () => {
      expect(scanNamespace('public class Hud { }')).toBeUndefined();
    });
  });

  describe('scanEnums', () => {
    it('should default to internal without an access modifier', () => {
      const [header] = scanEnums('enum Mode : byte { On, Off }');
      expect(header.name).toBe('Mode');
      expect(header.visibility).toBe('internal');
      expect(header.values).toEqual(['On', 'Off']);
    });
  });

  describe('scanTypeDeclarations', () => {
    it('should read visibility, modifiers, kind and bases', () => {
      const [unit] = scanTypeDeclarations(SOURCE);
      expect(unit.name).toBe('Unit');
      expect(unit.visibility).toBe('public');
      expect(unit.kind).toBe('class');
      expect(unit.modifiers).toEqual(['abstract', 'partial']);
      expect(unit.bases).toEqual(['MonoBehaviour', 'IDamageable']);
      expect(unit.containingType).toBeUndefined();
    });

    it('should report nested types with their container', () => {
      const cache = scanTypeDeclarations(SOURCE).find((t) => t.name === 'Cache');
      expect(cache?.visibility).toBe('private');
      expect(cache?.modifiers).toEqual(['sealed']);
      expect(cache?.containingType).toBe('Unit');
    });

    it('should default a type without access modifier to internal', () => {
      const point = scanTypeDeclarations(SOURCE).find((t) => t.name === 'Point');
      expect(point?.kind).toBe('struct');
      expect(point?.visibility).toBe('internal');
      expect(point?.body).toBe('{ }');
      expect(point?.containingType).toBeUndefined();
    });

    it('should find types in document order', () => {
      expect(scanTypeDeclarations(SOURCE).map((t) => t.name)).toEqual(['Unit', 'Cache', 'Point']);
    });

    it('should read an interface with a generic base', () => {
      const [header] = scanTypeDeclarations('public interface IPool<T> : IEnumerable<T> { }');
      expect(header.kind).toBe('interface');
      expect(header.name).toBe('IPool');
      expect(header.bases).toEqual(['IEnumerable<T>']);
    });
  });

  describe('scanDeclarations', () => {
    it('should only keep enums declared before the first type body', () => {
      const scan = scanDeclarations(SOURCE);
      expect(scan.enums).toEqual([
        { name: 'Team', visibility: 'public', values: ['Red', 'Blue', 'Green'] },
      ]);
    });

    it('should keep every enum in a file without types', () => {
      const scan = scanDeclarations('public enum A { X }\ninternal enum B { Y }');
      expect(scan.types).toEqual([]);
      expect(scan.enums.map((e) => e.name)).toEqual(['A', 'B']);
    });
  });
});
