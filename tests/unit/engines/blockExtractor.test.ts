import { describe, it, expect } from 'vitest';
import { extractBlock, blockInner, maskRanges } from '../../../src/engines/blockExtractor.js';

describe('Block Extractor', () => {
  describe('extractBlock', () => {
    it('should return the balanced block including nested braces', () => {
      expect(extractBlock('class A { void F() { } } rest', 8)).toBe('{ void F() { } }');
    });

    it('should support other delimiter pairs', () => {
      const text = 'Move(Func<(int, int)> f, int x) {';
      expect(extractBlock(text, 4, '(', ')')).toBe('(Func<(int, int)> f, int x)');
    });

    it('should return the remainder when the block is unterminated', () => {
      expect(extractBlock('class A { int x;', 8)).toBe('{ int x;');
    });
  });

  describe('blockInner', () => {
    it('should strip both delimiters', () => {
      expect(blockInner('{ int x; }')).toBe(' int x; ');
    });

    it('should strip only the opening delimiter of an unterminated block', () => {
      expect(blockInner('{ int x;')).toBe(' int x;');
    });

    it('should strip parentheses', () => {
      expect(blockInner('(int a)', '(', ')')).toBe('int a');
    });

    it('should return text that does not start with the delimiter unchanged', () => {
      expect(blockInner('int x;')).toBe('int x;');
    });
  });

  describe('maskRanges', () => {
    it('should blank the ranges and keep newlines', () => {
      expect(maskRanges('ab\ncd ef', [{ start: 1, end: 5 }])).toBe('a \n   ef');
    });

    it('should accept overlapping ranges', () => {
      expect(
        maskRanges('abcdef', [
          { start: 0, end: 3 },
          { start: 2, end: 4 },
        ])
      ).toBe('    ef');
    });

    it('should clamp ranges to the text', () => {
      expect(maskRanges('abc', [{ start: -2, end: 10 }])).toBe('   ');
    });

    it('should return the text unchanged without ranges', () => {
      expect(maskRanges('abc', [])).toBe('abc');
    });
  });
});
