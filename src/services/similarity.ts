import { createRequire } from 'module';

type FuzzballModule = typeof import('fuzzball');

/**
 * Scores how close two normalized strings are, from 0 (unrelated) to 100 (identical).
 */
export interface SimilarityScorer {
  readonly name: string;
  score(a: string, b: string): number;
}

/**
 * Indel-style edit-distance ratio, 100 * (1 - distance / (len(a) + len(b))),
 * with substitutions costing two edits. Not rounded: "mpaa" vs "mpa" scores
 * 85.71, and nearly equal candidates must not collapse into a tie.
 */
export class EditDistanceScorer implements SimilarityScorer {
  readonly name = 'edit-distance';

  constructor(private readonly fuzz: Pick<FuzzballModule, 'distance'>) {}

  score(a: string, b: string): number {
    if (!a || !b) return 0;

    const lensum = a.length + b.length;
    // Inputs are already normalized; fuzzball's own processing would strip
    // apostrophes and hyphens that are part of the glossary forms.
    const dist = this.fuzz.distance(a, b, { subcost: 2, full_process: false });
    return (100 * (lensum - dist)) / lensum;
  }
}

/**
 * Fallback when no edit-distance backend is installed:
 * identical strings score 100, everything else 0.
 */
export class ExactMatchScorer implements SimilarityScorer {
  readonly name = 'exact';

  score(a: string, b: string): number {
    if (!a || !b) return 0;
    return a === b ? 100 : 0;
  }
}

function isModuleNotFound(error: unknown): boolean {
  return error instanceof Error
    && 'code' in error
    && (error.code === 'MODULE_NOT_FOUND' || error.code === 'ERR_MODULE_NOT_FOUND');
}

/**
 * Pick the scoring strategy once at startup.
 * fuzzball is an optional dependency; without it fuzzy matching
 * degrades to exact equality.
 */
export function createSimilarityScorer(): SimilarityScorer {
  const require = createRequire(import.meta.url);

  try {
    const fuzz: FuzzballModule = require('fuzzball');
    return new EditDistanceScorer(fuzz);
  } catch (error) {
    if (!isModuleNotFound(error)) {
      throw error;
    }
    console.warn('[Glossary] fuzzball not installed - fuzzy glossary matching disabled');
    return new ExactMatchScorer();
  }
}
