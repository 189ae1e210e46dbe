import { describe, it, expect } from 'vitest';
import { parseWordValue, stripComments, tokenizeLine } from './tokenize.js';

describe('tokenize', () => {
  describe('stripComments', () => {
    it('should drop semicolon comments', () => {
      expect(stripComments('G1 X10 ; move right')).toBe('G1 X10');
    });

    it('should drop parenthesised comments', () => {
      expect(stripComments('G1 (outer wall) X10')).toBe('G1   X10');
    });

    it('should drop checksums and upper-case the rest', () => {
      expect(stripComments('n3 g1 x5*57')).toBe('N3 G1 X5');
    });

    it('should treat comment-only lines as empty', () => {
      expect(stripComments('; LAYER:0')).toBe('');
      expect(stripComments('   ')).toBe('');
    });
  });

  describe('parseWordValue', () => {
    it('should parse plain decimals', () => {
      expect(parseWordValue('10')).toBe(10);
      expect(parseWordValue('-1.5')).toBe(-1.5);
      expect(parseWordValue('+.25')).toBe(0.25);
      expect(parseWordValue('3.')).toBe(3);
    });

    it('should reject malformed numbers', () => {
      expect(parseWordValue('')).toBeNaN();
      expect(parseWordValue('1.2.3')).toBeNaN();
      expect(parseWordValue('1e3')).toBeNaN();
      expect(parseWordValue('-')).toBeNaN();
    });

    it('should reject values too large for a double', () => {
      expect(parseWordValue('9'.repeat(400))).toBeNaN();
      expect(parseWordValue('-' + '9'.repeat(400))).toBeNaN();
      expect(parseWordValue('9'.repeat(308))).toBe(Number.parseFloat('9'.repeat(308)));
    });
  });

  describe('tokenizeLine', () => {
    it('should split a move into words', () => {
      expect(tokenizeLine('G1 X10 Y-2.5 E0.4')).toEqual([
        { letter: 'G', raw: '1', value: 1 },
        { letter: 'X', raw: '10', value: 10 },
        { letter: 'Y', raw: '-2.5', value: -2.5 },
        { letter: 'E', raw: '0.4', value: 0.4 },
      ]);
    });

    it('should accept words without spaces', () => {
      expect(tokenizeLine('G1X5Y6').map((w) => w.letter)).toEqual(['G', 'X', 'Y']);
    });

    it('should drop line numbers', () => {
      expect(tokenizeLine('N10 G90').map((w) => w.letter)).toEqual(['G']);
    });

    it('should keep malformed values as NaN', () => {
      const [, x] = tokenizeLine('G1 X1.2.3');
      expect(x.raw).toBe('1.2.3');
      expect(x.value).toBeNaN();
    });

    it('should return no words for blank and comment lines', () => {
      expect(tokenizeLine('')).toEqual([]);
      expect(tokenizeLine('; just a comment')).toEqual([]);
    });
  });
});
