import { describe, it, expect } from 'vitest';
import { normalizeText, scanWords, tokenize } from '../src/services/textNormalizer.js';

describe('Text normalizer', () => {
  describe('normalizeText', () => {
    it('trims and lowercases', () => {
      expect(normalizeText('  Mpa ')).toBe('mpa');
    });

    it('strips accents', () => {
      expect(normalizeText('Kgomó')).toBe('kgomo');
      expect(normalizeText('ÑANDÚ')).toBe('nandu');
      expect(normalizeText('café')).toBe(normalizeText('cafe'));
    });

    it('is idempotent', () => {
      for (const input of ['Gapa Godimo', ' Kgomó ', 'ke\'ng', 'ÉÜ-ñ', '']) {
        const once = normalizeText(input);
        expect(normalizeText(once)).toBe(once);
      }
    });

    it('maps blank input to an empty string', () => {
      expect(normalizeText('')).toBe('');
      expect(normalizeText('   ')).toBe('');
    });
  });

  describe('tokenize', () => {
    it('splits on whitespace and punctuation', () => {
      expect(tokenize('Abdomen is sore!')).toEqual(['abdomen', 'is', 'sore']);
    });

    it('treats digits as separators', () => {
      expect(tokenize('ke na le dikgomo 3, 2 dipodi.')).toEqual(['ke', 'na', 'le', 'dikgomo', 'dipodi']);
      expect(tokenize('mpa2kotsi')).toEqual(['mpa', 'kotsi']);
    });

    it('keeps apostrophes and hyphens inside words', () => {
      expect(tokenize("go-jwala ke'ng")).toEqual(['go-jwala', "ke'ng"]);
    });

    it('keeps duplicates in source order', () => {
      expect(tokenize('mpa kotsi mpa')).toEqual(['mpa', 'kotsi', 'mpa']);
    });

    it('returns nothing for text without words', () => {
      expect(tokenize('')).toEqual([]);
      expect(tokenize('123 ?! ...')).toEqual([]);
    });
  });

  describe('scanWords', () => {
    it('keeps the original spelling beside the key', () => {
      expect([...scanWords('Mpá, Kotsi')]).toEqual([
        { raw: 'Mpá', normalized: 'mpa' },
        { raw: 'Kotsi', normalized: 'kotsi' },
      ]);
    });
  });
});
