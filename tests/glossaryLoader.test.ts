import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  loadGlossaryEntries,
  parseCsv,
  parseGlossaryCsv,
  parseGlossaryRecord,
  toRecords,
} from '../src/services/glossaryLoader.js';
import { SAMPLE_CSV } from './fakes.js';

describe('Glossary loader', () => {
  describe('parseCsv', () => {
    it('splits rows and cells', () => {
      expect(parseCsv('a,b,c\n1,2,3\n')).toEqual([
        ['a', 'b', 'c'],
        ['1', '2', '3'],
      ]);
    });

    it('keeps the last row without a trailing newline', () => {
      expect(parseCsv('a,b\n1,2')).toEqual([['a', 'b'], ['1', '2']]);
    });

    it('handles CRLF line endings', () => {
      expect(parseCsv('a,b\r\n1,2\r\n')).toEqual([['a', 'b'], ['1', '2']]);
    });

    it('handles quoted cells with commas, quotes and newlines', () => {
      expect(parseCsv('"x, y","say ""hi""","two\nlines"\n')).toEqual([
        ['x, y', 'say "hi"', 'two\nlines'],
      ]);
    });

    it('strips a leading byte order mark', () => {
      expect(parseCsv('\uFEFFenglish_label\nabdomen\n')).toEqual([['english_label'], ['abdomen']]);
    });

    it('keeps empty cells', () => {
      expect(parseCsv('abdomen,noun,mpa,,noun\n')).toEqual([['abdomen', 'noun', 'mpa', '', 'noun']]);
    });
  });

  describe('toRecords', () => {
    it('maps cells by header name, ignoring case and column order', () => {
      const rows = parseCsv('SETSWANA_PREFERRED,English_Label,notes\nmpa,abdomen,ignored\n');
      expect(toRecords(rows)).toEqual([{ setswana_preferred: 'mpa', english_label: 'abdomen' }]);
    });

    it('skips blank lines', () => {
      const rows = parseCsv('english_label,setswana_preferred\n\nabdomen,mpa\n,\n');
      expect(toRecords(rows)).toEqual([{ english_label: 'abdomen', setswana_preferred: 'mpa' }]);
    });

    it('returns nothing for empty content', () => {
      expect(toRecords(parseCsv(''))).toEqual([]);
    });
  });

  describe('parseGlossaryRecord', () => {
    it('splits and trims variants', () => {
      const entry = parseGlossaryRecord({
        english_label: ' absorb ',
        english_pos: 'verb',
        setswana_preferred: 'gapa',
        setswana_variants: ' gabisa | | gapa godimo ',
        setswana_pos: 'verb',
      });

      expect(entry).toEqual({
        englishLabel: 'absorb',
        englishPos: 'verb',
        setswanaPreferred: 'gapa',
        setswanaVariants: ['gabisa', 'gapa godimo'],
        setswanaPos: 'verb',
      });
    });

    it('uses null for blank part-of-speech cells', () => {
      const entry = parseGlossaryRecord({ english_label: 'abdomen', setswana_preferred: 'mpa', english_pos: '  ' });
      expect(entry?.englishPos).toBeNull();
      expect(entry?.setswanaPos).toBeNull();
      expect(entry?.setswanaVariants).toEqual([]);
    });

    it('rejects rows without an English label or preferred form', () => {
      expect(parseGlossaryRecord({ english_label: '', setswana_preferred: 'mpa' })).toBeNull();
      expect(parseGlossaryRecord({ english_label: 'abdomen', setswana_preferred: '   ' })).toBeNull();
      expect(parseGlossaryRecord({ setswana_preferred: 'mpa' })).toBeNull();
    });

    it('returns a frozen entry', () => {
      const entry = parseGlossaryRecord({ english_label: 'abdomen', setswana_preferred: 'mpa' });
      expect(Object.isFrozen(entry)).toBe(true);
      expect(Object.isFrozen(entry?.setswanaVariants)).toBe(true);
    });
  });

  describe('parseGlossaryCsv', () => {
    it('parses every complete row in order', () => {
      const entries = parseGlossaryCsv(SAMPLE_CSV);
      expect(entries.map(e => e.englishLabel)).toEqual([
        'abdomen',
        'absorb',
        'absorption',
        'acacia',
        'accident',
        'account',
      ]);
      expect(entries[1].setswanaVariants).toEqual(['gabisa', 'gapa godimo']);
    });

    it('skips incomplete rows', () => {
      const content = [
        'english_label,english_pos,setswana_preferred,setswana_variants,setswana_pos',
        ',noun,mpa,,noun',
        'abdomen,noun,,,noun',
        'accident,noun,kotsi,,noun',
      ].join('\n');

      expect(parseGlossaryCsv(content).map(e => e.englishLabel)).toEqual(['accident']);
    });
  });

  describe('loadGlossaryEntries', () => {
    let dir: string;

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), 'glossary-loader-'));
      writeFileSync(join(dir, 'glossary.csv'), SAMPLE_CSV, 'utf-8');
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('reads entries from a file', () => {
      expect(loadGlossaryEntries(join(dir, 'glossary.csv'))).toHaveLength(6);
    });

    it('returns an empty list when no path is configured', () => {
      expect(loadGlossaryEntries(null)).toEqual([]);
      expect(loadGlossaryEntries('')).toEqual([]);
    });

    it('returns an empty list for a missing file', () => {
      expect(loadGlossaryEntries(join(dir, 'missing.csv'))).toEqual([]);
    });

    it('returns an empty list for a directory', () => {
      expect(loadGlossaryEntries(dir)).toEqual([]);
    });
  });
});
