import { describe, it, expect } from 'vitest';
import {
  createSimilarityScorer,
  EditDistanceScorer,
  ExactMatchScorer,
} from '../src/services/similarity.js';

describe('Similarity scorers', () => {
  describe('ExactMatchScorer', () => {
    const scorer = new ExactMatchScorer();

    it('scores identical strings 100 and anything else 0', () => {
      expect(scorer.score('mpa', 'mpa')).toBe(100);
      expect(scorer.score('mpaa', 'mpa')).toBe(0);
    });

    it('scores empty strings 0', () => {
      expect(scorer.score('', '')).toBe(0);
      expect(scorer.score('', 'mpa')).toBe(0);
    });
  });

  describe('EditDistanceScorer', () => {
    // fuzzball is installed with the optional dependencies
    const scorer = createSimilarityScorer();

    it('is selected when fuzzball is available', () => {
      expect(scorer).toBeInstanceOf(EditDistanceScorer);
      expect(scorer.name).toBe('edit-distance');
    });

    it('scores one inserted letter without rounding', () => {
      // 6 of 7 characters kept: 100 * 6 / 7
      expect(scorer.score('mpaa', 'mpa')).toBeCloseTo(85.714, 3);
    });

    it('scores identical strings 100', () => {
      expect(scorer.score('gapa godimo', 'gapa godimo')).toBe(100);
    });

    it('counts a substitution as two edits', () => {
      // distance 2 over 6 characters
      expect(scorer.score('mpa', 'mpo')).toBeCloseTo(66.667, 3);
    });

    it('does not strip apostrophes before scoring', () => {
      // 8 of 9 characters kept: 100 * 8 / 9
      expect(scorer.score("ke'ng", 'keng')).toBeCloseTo(88.889, 3);
    });

    it('keeps close scores apart', () => {
      const longer = scorer.score('abcdefghij', 'abcdefghijk');
      const shorter = scorer.score('abcdefghij', 'abcdefghi');

      expect(longer).toBeCloseTo(95.238, 3);
      expect(shorter).toBeCloseTo(94.737, 3);
      expect(longer).toBeGreaterThan(shorter);
    });

    it('scores empty strings 0', () => {
      expect(scorer.score('', 'mpa')).toBe(0);
      expect(scorer.score('mpa', '')).toBe(0);
    });

    it('asks the backend for an indel distance on the raw input', () => {
      const calls: Array<[string, string, unknown]> = [];
      const stub = new EditDistanceScorer({
        distance: (a: string, b: string, opts?: unknown) => {
          calls.push([a, b, opts]);
          return 1;
        },
      });

      expect(stub.score('mpa', 'mpaa')).toBeCloseTo(85.714, 3);
      expect(calls).toEqual([['mpa', 'mpaa', { subcost: 2, full_process: false }]]);
    });
  });
});
