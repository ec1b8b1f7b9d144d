import { describe, it, expect } from 'vitest';
import {
  loadLifecycleCatalog,
  formatParameter,
  formatSignature,
  reportFileName,
  isLifecycleType,
  renderUnitReport,
  renderIndexReport,
  type LifecycleCatalog,
} from '../../../src/engines/reportGenerator.js';
import { buildInterfaceModel } from '../../../src/engines/modelAssembler.js';
import type { MethodSpec, TypeDeclaration } from '../../../src/engines/model.js';

const CATALOG: LifecycleCatalog = {
  baseTypes: ['MonoBehaviour'],
  callbacks: ['Awake', 'Update'],
};

const PLAYER_SOURCE = [
  'namespace Game',
  '{',
  '    public class Player : MonoBehaviour',
  '    {',
  '        public int health = 100;',
  '        [Header("Combat")] [SerializeField] private Weapon weapon;',
  '        public bool Alive { get; private set; }',
  '        private void Awake() { }',
  '        public void Update() { }',
  '        public void Heal(int amount = 10) { }',
  '        protected virtual IEnumerator Respawn() { yield break; }',
  '    }',
  '}',
].join('\n');

function buildModel() {
  return buildInterfaceModel([
    { id: 'Scripts/Player.cs', content: PLAYER_SOURCE },
    { id: 'Scripts/Weapon.cs', content: 'public class Weapon { }' },
  ]);
}

function typeWithBases(bases: string[]): TypeDeclaration {
  return {
    name: 'T',
    visibility: 'public',
    kind: 'class',
    modifiers: [],
    bases,
    fields: [],
    properties: [],
    methods: [],
    enums: [],
  };
}

describe('Report Generator', () => {
  describe('loadLifecycleCatalog', () => {
    it('should load the bundled catalog', () => {
      const catalog = loadLifecycleCatalog();
      expect(catalog.baseTypes).toContain('MonoBehaviour');
      expect(catalog.callbacks).toContain('Update');
    });
  });

  describe('formatting helpers', () => {
    it('should format parameters with and without defaults', () => {
      expect(formatParameter({ name: 'amount', type: 'int', defaultValue: '10' })).toBe('int amount = 10');
      expect(formatParameter({ name: 'target', type: 'Transform' })).toBe('Transform target');
    });

    it('should format a method signature', () => {
      const method: MethodSpec = {
        name: 'Find',
        returnType: 'List<Enemy>',
        visibility: 'public',
        isStatic: false,
        isVirtual: false,
        isOverride: false,
        isAbstract: false,
        isAsync: false,
        isCoroutine: false,
        parameters: [
          { name: 'radius', type: 'float' },
          { name: 'max', type: 'int', defaultValue: '5' },
        ],
      };
      expect(formatSignature(method)).toBe('List<Enemy> Find(float radius, int max = 5)');
    });

    it('should map unit ids to report paths', () => {
      expect(reportFileName('Enemies/Boss.cs')).toBe('Enemies/Boss.md');
      expect(reportFileName('Enemies\\Boss.CS')).toBe('Enemies/Boss.md');
      expect(reportFileName('Notes')).toBe('Notes.md');
    });

    it('should detect lifecycle bases through qualifiers and generics', () => {
      expect(isLifecycleType(typeWithBases(['UnityEngine.MonoBehaviour']), CATALOG)).toBe(true);
      expect(isLifecycleType(typeWithBases(['MonoBehaviour<Player>']), CATALOG)).toBe(true);
      expect(isLifecycleType(typeWithBases(['IDisposable']), CATALOG)).toBe(false);
    });
  });

  describe('renderUnitReport', () => {
    it('should render every section of a behaviour script', () => {
      const player = buildModel().units[0];
      expect(renderUnitReport(player, CATALOG).split('\n')).toEqual([
        '# Player.cs',
        '',
        '**Namespace:** `Game`',
        '',
        '**Depends on:** `Weapon`',
        '',
        '## public class `Player` : `MonoBehaviour`',
        '',
        '### Public Fields',
        '| Type | Name | Notes |',
        '|------|------|-------|',
        '| `int` | `health` | = 100 |',
        '',
        '### Serialized Fields (Inspector)',
        '| Type | Name | Notes |',
        '|------|------|-------|',
        '| `Weapon` | `weapon` | header: Combat |',
        '',
        '### Properties',
        '| Type | Name | get | set | Notes |',
        '|------|------|-----|-----|-------|',
        '| `bool` | `Alive` | ✓ | — |  |',
        '',
        '### Unity Lifecycle',
        '`Update`',
        '',
        '### Public Methods',
        '- `void Heal(int amount = 10)`',
        '',
        '### Overridable (protected/internal)',
        '- `IEnumerator Respawn()` *[protected, virtual]*',
        '',
      ]);
    });

    it('should list callbacks as public methods on non-lifecycle types', () => {
      const model = buildInterfaceModel([{ id: 'Tick.cs', content: 'public class Tick { public void Update() { } }' }]);
      const lines = renderUnitReport(model.units[0], CATALOG).split('\n');
      expect(lines).not.toContain('### Unity Lifecycle');
      expect(lines).toContain('- `void Update()`');
    });

    it('should render documentation, editor notes and method tags', () => {
      const source = [
        '// Utility helpers shared by every gameplay system in the project.',
        '#if UNITY_EDITOR',
        'using UnityEditor;',
        '#endif',
        '',
        '/// Math helpers.',
        'public static class MathUtil',
        '{',
        '    /// Clamps a value.',
        '    public static async Task<int> Clamp(int value) { return value; }',
        '}',
      ].join('\n');
      const unit = buildInterfaceModel([{ id: 'MathUtil.cs', content: source }]).units[0];
      expect(renderUnitReport(unit, CATALOG).split('\n')).toEqual([
        '# MathUtil.cs',
        '',
        '> Utility helpers shared by every gameplay system in the project.',
        '',
        '> **Editor only:** parts of this file are compiled only in editor builds.',
        '',
        '## public static class `MathUtil`',
        '',
        'Math helpers.',
        '',
        '### Public Methods',
        '- `Task<int> Clamp(int value)` *[static, async]*',
        '  Clamps a value.',
        '',
      ]);
    });
  });

  describe('renderIndexReport', () => {
    it('should render the script index, graph and quick reference', () => {
      const lines = renderIndexReport(buildModel(), CATALOG).split('\n');
      expect(lines.slice(0, 12)).toEqual([
        '# Project Interface Map',
        '',
        'Generated API surface for **2** C# scripts.',
        'Each linked report lists the public API, inspector fields, dependencies',
        'and engine lifecycle hooks of one script.',
        '',
        '## Script Index',
        '',
        '| Script | Types | Base | Depends On |',
        '|--------|-------|------|------------|',
        '| [Scripts/Player.cs](Scripts/Player.md) | `Player` | `MonoBehaviour` | `Weapon` |',
        '| [Scripts/Weapon.cs](Scripts/Weapon.md) | `Weapon` | — | — |',
      ]);
      expect(lines.slice(12)).toEqual([
        '',
        '## Dependency Graph (Adjacency)',
        '```',
        'Player -> Weapon',
        '```',
        '',
        '## All Public Methods (Quick Reference)',
        '',
        '### `Player`',
        '- `void Heal(int amount = 10)`',
        '',
      ]);
    });

    it('should list enums and skipped files', () => {
      const model = buildInterfaceModel([
        { id: 'Types.cs', content: 'public enum Mode { On, Off }\npublic class Holder { public enum Kind { A } }' },
        { id: 'Bin.cs', content: '\0' },
      ]);
      const lines = renderIndexReport(model, CATALOG).split('\n');
      expect(lines).toContain('| [Types.cs](Types.md) | `Holder` | — | — |');
      const enumsAt = lines.indexOf('## All Enums');
      expect(lines.slice(enumsAt, enumsAt + 5)).toEqual([
        '## All Enums',
        '',
        '- **Holder.Kind**: `A`  *(in Types.cs)*',
        '- **Mode**: `On`, `Off`  *(in Types.cs)*',
        '',
      ]);
      expect(lines).toContain(
        '- `Bin.cs` (UNIT_PARSE_FAILED): Failed to parse Bin.cs: content contains NUL characters (binary file)'
      );
    });
  });
});
