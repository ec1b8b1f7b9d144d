/**
 * Parameter Splitter
 *
 * Turns the raw text between a method's parentheses into parameter specs.
 *
 * @module parameterSplitter
 */

import { ATTRIBUTE_PATTERN } from './declarationScanner.js';
import type { ParameterSpec } from './model.js';

/**
 * Placeholder type for a fragment that has no separable type token
 */
export const UNKNOWN_TYPE = '?';

const OPENERS = new Set(['<', '(', '[']);
const CLOSERS = new Set(['>', ')', ']']);

const LEADING_ATTRIBUTES = new RegExp(`^(?:\\s*${ATTRIBUTE_PATTERN})+\\s*`);

const PASSING_MODIFIERS = /^(?:ref|out|in|params|this|scoped|readonly)\s+/;

function isShiftOperator(text: string, index: number): boolean {
  return text[index] === '<' && text[index + 1] === '<';
}

/**
 * Split on commas that are not nested inside `<>`, `()` or `[]`.
 * Empty fragments are dropped.
 *
 * @example
 * ```typescript
 * splitTopLevel('Dictionary<string, int> map, int[,] grid, Func<(int, int)> f')
 * // => ['Dictionary<string, int> map', 'int[,] grid', 'Func<(int, int)> f']
 * ```
 */
export function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (isShiftOperator(text, i)) {
      // `<<` in a default value opens nothing
      current += '<<';
      i++;
      continue;
    }
    if (OPENERS.has(ch)) {
      depth++;
    } else if (CLOSERS.has(ch)) {
      depth = Math.max(0, depth - 1);
    } else if (ch === ',' && depth === 0) {
      const part = current.trim();
      if (part) parts.push(part);
      current = '';
      continue;
    }
    current += ch;
  }

  const last = current.trim();
  if (last) parts.push(last);
  return parts;
}

/**
 * Index of the first `=` outside any bracket pair that is not part of `=>`
 * or `==`, or -1
 */
function findDefaultSeparator(fragment: string): number {
  let depth = 0;
  for (let i = 0; i < fragment.length; i++) {
    const ch = fragment[i];
    if (isShiftOperator(fragment, i)) {
      i++;
    } else if (OPENERS.has(ch)) {
      depth++;
    } else if (CLOSERS.has(ch)) {
      depth = Math.max(0, depth - 1);
    } else if (ch === '=' && depth === 0) {
      const next = fragment[i + 1];
      if (next !== '>' && next !== '=') return i;
      i++;
    }
  }
  return -1;
}

/**
 * Parse a single parameter fragment such as `ref Vector3 position` or
 * `[CallerMemberName] string caller = ""`.
 *
 * The rightmost whitespace-separated token is the name and everything before
 * it the type. A fragment without whitespace yields the token as the name and
 * {@link UNKNOWN_TYPE} as the type.
 */
export function parseParameter(fragment: string): ParameterSpec | null {
  let text = fragment.replace(LEADING_ATTRIBUTES, '').trim();

  let previous: string;
  do {
    previous = text;
    text = text.replace(PASSING_MODIFIERS, '');
  } while (text !== previous);

  let defaultValue: string | undefined;
  const separator = findDefaultSeparator(text);
  if (separator >= 0) {
    defaultValue = text.slice(separator + 1).trim();
    text = text.slice(0, separator).trim();
  }
  if (!text) return null;

  const split = /^([\s\S]*\S)\s+(\S+)$/.exec(text);
  const parameter: ParameterSpec = split
    ? { name: split[2], type: split[1].trim() }
    : { name: text, type: UNKNOWN_TYPE };

  if (defaultValue) parameter.defaultValue = defaultValue;
  return parameter;
}

/**
 * Split a raw parameter list into parameter specs
 *
 * @example
 * ```typescript
 * splitParameters('int count = 0, Widget')
 * // => [{ name: 'count', type: 'int', defaultValue: '0' }, { name: 'Widget', type: '?' }]
 * ```
 */
export function splitParameters(raw: string): ParameterSpec[] {
  const parameters: ParameterSpec[] = [];
  for (const fragment of splitTopLevel(raw)) {
    const parameter = parseParameter(fragment);
    if (parameter) parameters.push(parameter);
  }
  return parameters;
}
