import { describe, it, expect } from 'vitest';
import {
  unitFileName,
  parseSourceUnit,
  parseUnitSafely,
  buildInterfaceModel,
} from '../../../src/engines/modelAssembler.js';
import { isMapperError } from '../../../src/errors/index.js';

const PLAYER_SOURCE = [
  '// Player controller that reads input and moves the character around.',
  'using UnityEngine;',
  '#if UNITY_EDITOR',
  'using UnityEditor;',
  '#endif',
  '',
  'namespace Game',
  '{',
  '    public enum Faction { Neutral, Hostile }',
  '',
  '    /// <summary>Moves the player.</summary>',
  '    public class PlayerController : MonoBehaviour',
  '    {',
  '        [SerializeField] private float speed = 5f;',
  '',
  '        /// Applies damage.',
  '        public void TakeDamage(int amount) { }',
  '',
  '        private void Update() { }',
  '',
  '        public class Stats',
  '        {',
  '            public int level;',
  '        }',
  '    }',
  '}',
].join('\n');

describe('Model Assembler', () => {
  describe('unitFileName', () => {
    it('should take the last segment with either separator', () => {
      expect(unitFileName('Assets/Scripts/Player.cs')).toBe('Player.cs');
      expect(unitFileName('Assets\\Scripts\\Enemy.cs')).toBe('Enemy.cs');
      expect(unitFileName('Solo.cs')).toBe('Solo.cs');
    });
  });

  describe('parseSourceUnit', () => {
    const unit = parseSourceUnit({ id: 'Scripts/PlayerController.cs', content: PLAYER_SOURCE });

    it('should read file-level information', () => {
      expect(unit.fileName).toBe('PlayerController.cs');
      expect(unit.namespace).toBe('Game');
      expect(unit.imports).toEqual(['UnityEngine', 'UnityEditor']);
      expect(unit.restrictedBuild).toBe(true);
      expect(unit.documentation).toBe('Player controller that reads input and moves the character around.');
      expect(unit.dependencies).toEqual([]);
    });

    it('should keep enums declared before the first type at file level', () => {
      expect(unit.enums).toEqual([{ name: 'Faction', visibility: 'public', values: ['Neutral', 'Hostile'] }]);
    });

    it('should assemble the primary type with documentation', () => {
      const [controller] = unit.types;
      expect(controller.name).toBe('PlayerController');
      expect(controller.bases).toEqual(['MonoBehaviour']);
      expect(controller.documentation).toBe('Moves the player.');
      expect(controller.fields.map((f) => f.name)).toEqual(['speed']);
      expect(controller.methods.map((m) => [m.name, m.documentation])).toEqual([['TakeDamage', 'Applies damage.']]);
    });

    it('should attribute nested members to the nested type only', () => {
      const stats = unit.types[1];
      expect(stats.name).toBe('Stats');
      expect(stats.containingType).toBe('PlayerController');
      expect(stats.fields.map((f) => f.name)).toEqual(['level']);
      expect(stats.documentation).toBeUndefined();
    });

    it('should parse a simple class with one public and one private field', () => {
      const simple = parseSourceUnit({
        id: 'Foo.cs',
        content: 'public class Foo : Bar { public int X; private int y; }',
      });
      expect(simple.types).toHaveLength(1);
      expect(simple.types[0].name).toBe('Foo');
      expect(simple.types[0].bases).toEqual(['Bar']);
      expect(simple.types[0].fields.map((f) => [f.name, f.visibility])).toEqual([['X', 'public']]);
    });

    it('should attach only the documentation lines adjacent to an annotated method', () => {
      const source = [
        'public class Foo',
        '{',
        '    /// Stale note.',
        '',
        '    /// Runs the thing.',
        '    /// Twice if needed.',
        '    [ContextMenu("Run")]',
        '    [Obsolete]',
        '    [Conditional("DEBUG")]',
        '    public void Run() { }',
        '}',
      ].join('\n');
      const [foo] = parseSourceUnit({ id: 'Foo.cs', content: source }).types;
      expect(foo.methods[0].documentation).toBe('Runs the thing. Twice if needed.');
    });

    it('should not take the doc of an earlier member that calls the method', () => {
      const source = [
        'public class Calc',
        '{',
        '    /// Sum of everything.',
        '    public int Total => Compute();',
        '',
        '    /// Computes the value.',
        '    public int Compute() { return 1; }',
        '}',
      ].join('\n');
      const [calc] = parseSourceUnit({ id: 'Calc.cs', content: source }).types;
      expect(calc.methods.map((m) => [m.name, m.documentation])).toEqual([['Compute', 'Computes the value.']]);
    });

    it('should give each overload its own doc', () => {
      const source = [
        'public class Gun',
        '{',
        '    /// Fires once.',
        '    public void Fire() { }',
        '',
        '    /// Fires in bursts.',
        '    public void Fire(int count) { }',
        '}',
      ].join('\n');
      const [gun] = parseSourceUnit({ id: 'Gun.cs', content: source }).types;
      expect(gun.methods.map((m) => m.documentation)).toEqual(['Fires once.', 'Fires in bursts.']);
    });

    it('should resolve docs of a nested type and its members by position', () => {
      const source = [
        '/// Outer type.',
        'public class Outer',
        '{',
        '    /// Outer reset.',
        '    public void Reset() { }',
        '',
        '    /// Inner type.',
        '    public class Inner',
        '    {',
        '        /// Inner reset.',
        '        public void Reset() { }',
        '    }',
        '}',
      ].join('\n');
      const [outer, inner] = parseSourceUnit({ id: 'Outer.cs', content: source }).types;
      expect(outer.documentation).toBe('Outer type.');
      expect(outer.methods.map((m) => m.documentation)).toEqual(['Outer reset.']);
      expect(inner.documentation).toBe('Inner type.');
      expect(inner.methods.map((m) => m.documentation)).toEqual(['Inner reset.']);
    });

    it('should decode byte content', () => {
      const bytes = new TextEncoder().encode('public class Bytes { }');
      expect(parseSourceUnit({ id: 'Bytes.cs', content: bytes }).types[0].name).toBe('Bytes');
    });

    it('should reject binary content', () => {
      expect(() => parseSourceUnit({ id: 'Blob.cs', content: 'ab\0cd' })).toThrow(
        'Failed to parse Blob.cs: content contains NUL characters (binary file)'
      );
    });

    it('should reject undecodable bytes with a mapper error', () => {
      try {
        parseSourceUnit({ id: 'Bad.cs', content: new Uint8Array([0xc3, 0x28]) });
        expect.unreachable('parse should fail');
      } catch (error) {
        expect(isMapperError(error)).toBe(true);
        if (isMapperError(error)) {
          expect(error.code).toBe('UNIT_PARSE_FAILED');
          expect(error.developerMessage).toBe('Failed to parse Bad.cs: content is not valid text');
        }
      }
    });
  });

  describe('parseUnitSafely', () => {
    it('should turn a failure into a diagnostic', () => {
      expect(parseUnitSafely({ id: 'Blob.cs', content: 'ab\0cd' })).toEqual({
        ok: false,
        diagnostic: {
          file: 'Blob.cs',
          code: 'UNIT_PARSE_FAILED',
          message: 'Failed to parse Blob.cs: content contains NUL characters (binary file)',
        },
      });
    });
  });

  describe('buildInterfaceModel', () => {
    it('should link a method return type to another unit', () => {
      const model = buildInterfaceModel([
        { id: 'A.cs', content: 'class A { public B MakeB(); }' },
        { id: 'B.cs', content: 'class B {}' },
      ]);
      expect(model.edges).toEqual([{ from: 'A.cs', to: 'B' }]);
      expect(model.units[1].dependencies).toEqual([]);
    });

    it('should keep going past files that fail', () => {
      const model = buildInterfaceModel([
        { id: 'Scripts/Player.cs', content: 'public class Player { public Weapon weapon; }' },
        { id: 'Broken.cs', content: '\0' },
        { id: 'Scripts/Weapon.cs', content: 'public class Weapon { public Player owner; }' },
      ]);
      expect(model.units.map((u) => u.id)).toEqual(['Scripts/Player.cs', 'Scripts/Weapon.cs']);
      expect(model.edges).toEqual([
        { from: 'Scripts/Player.cs', to: 'Weapon' },
        { from: 'Scripts/Weapon.cs', to: 'Player' },
      ]);
      expect(model.diagnostics.map((d) => d.file)).toEqual(['Broken.cs']);
    });
  });
});
