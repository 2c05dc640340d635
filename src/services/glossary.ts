import { LRUCache } from 'lru-cache';
import { ConfigurationError } from './errors.js';
import { loadGlossaryEntries } from './glossaryLoader.js';
import { createSimilarityScorer, type SimilarityScorer } from './similarity.js';
import { normalizeText, scanWords, tokenize } from './textNormalizer.js';
import type { GlossaryEntry, GlossaryIndex, LangCode, TokenPreview } from '../types/index.js';

export const DEFAULT_MAX_TERMS = 30;
export const DEFAULT_MIN_SCORE = 80;

// Limit used for single-token lookups, effectively "no limit"
const SINGLE_TOKEN_MAX_TERMS = 999;

export interface MatchOptions {
  maxTerms?: number;
  minScore?: number;
}

type Lookup = ReadonlyMap<string, readonly GlossaryEntry[]>;

function register(lookup: Map<string, GlossaryEntry[]>, form: string, entry: GlossaryEntry): void {
  const key = normalizeText(form);
  if (!key) return;

  const bucket = lookup.get(key);
  if (bucket) {
    bucket.push(entry);
  } else {
    lookup.set(key, [entry]);
  }
}

/**
 * Build the read-only lookup index.
 * Every Setswana form (preferred + variants) and the English label of each
 * entry become keys; homonyms share a key, in input order.
 */
export function buildGlossaryIndex(entries: readonly GlossaryEntry[]): GlossaryIndex {
  const setswanaLookup = new Map<string, GlossaryEntry[]>();
  const englishLookup = new Map<string, GlossaryEntry[]>();

  for (const entry of entries) {
    for (const form of [entry.setswanaPreferred, ...entry.setswanaVariants]) {
      register(setswanaLookup, form, entry);
    }
    register(englishLookup, entry.englishLabel, entry);
  }

  return Object.freeze({
    entries: Object.freeze([...entries]),
    setswanaLookup,
    englishLookup,
    setswanaForms: Object.freeze([...setswanaLookup.keys()]),
    englishForms: Object.freeze([...englishLookup.keys()]),
  });
}

/**
 * Pick the lookup map and fuzzy-scan forms for a source language.
 * An unknown direction is a programming error.
 */
export function resolveDirection(
  index: GlossaryIndex,
  direction: string
): { lookup: Lookup; forms: readonly string[] } {
  switch (direction) {
    case 'tsn':
      return { lookup: index.setswanaLookup, forms: index.setswanaForms };
    case 'en':
      return { lookup: index.englishLookup, forms: index.englishForms };
    default:
      throw new ConfigurationError(`Unsupported source language: ${direction}`);
  }
}

export function isLangCode(value: unknown): value is LangCode {
  return value === 'tsn' || value === 'en';
}

/**
 * Remove repeated entries, identified by English label + preferred Setswana form.
 * First occurrence wins.
 */
export function uniqueEntries(entries: Iterable<GlossaryEntry>): GlossaryEntry[] {
  const seen = new Set<string>();
  const out: GlossaryEntry[] = [];

  for (const entry of entries) {
    const key = JSON.stringify([entry.englishLabel, entry.setswanaPreferred]);
    if (!seen.has(key)) {
      seen.add(key);
      out.push(entry);
    }
  }

  return out;
}

/**
 * All forms that reach the best score for a token, provided that score
 * clears the threshold. Ties are all returned.
 */
export function findBestForms(
  token: string,
  forms: readonly string[],
  scorer: SimilarityScorer,
  minScore: number
): string[] {
  let bestScore = 0;
  let bestForms: string[] = [];

  for (const form of forms) {
    const score = scorer.score(token, form);
    if (score < minScore) continue;

    if (score > bestScore) {
      bestScore = score;
      bestForms = [form];
    } else if (score === bestScore) {
      bestForms.push(form);
    }
  }

  return bestForms;
}

/**
 * Match normalized tokens against the index: exact keys first,
 * then fuzzy matches for tokens with no exact hit.
 * Results are deduplicated and capped at `maxTerms`.
 */
export function matchTokens(
  index: GlossaryIndex,
  tokens: readonly string[],
  direction: LangCode,
  scorer: SimilarityScorer,
  options: MatchOptions & { fuzzyCache?: LRUCache<string, string[]> } = {}
): GlossaryEntry[] {
  const { lookup, forms } = resolveDirection(index, direction);
  const maxTerms = options.maxTerms ?? DEFAULT_MAX_TERMS;
  const minScore = options.minScore ?? DEFAULT_MIN_SCORE;

  if (tokens.length === 0) {
    return [];
  }

  const matches: GlossaryEntry[] = [];

  // Exact pass
  for (const token of tokens) {
    const hits = lookup.get(token);
    if (hits) matches.push(...hits);
  }

  // Fuzzy pass
  const remaining = tokens.filter(token => !lookup.has(token));
  if (remaining.length > 0 && forms.length > 0) {
    for (const token of remaining) {
      const cacheKey = `${direction}:${minScore}:${token}`;
      let bestForms = options.fuzzyCache?.get(cacheKey);
      if (bestForms === undefined) {
        bestForms = findBestForms(token, forms, scorer, minScore);
        options.fuzzyCache?.set(cacheKey, bestForms);
      }

      for (const form of bestForms) {
        matches.push(...(lookup.get(form) ?? []));
      }
    }
  }

  return uniqueEntries(matches).slice(0, maxTerms);
}

export interface GlossaryServiceOptions {
  /** CSV source; empty or missing means "no glossary" */
  csvPath?: string | null;
  scorer?: SimilarityScorer;
  maxTerms?: number;
  minScore?: number;
  /** Maximum cached fuzzy lookups */
  cacheSize?: number;
  /** Entry source, replaceable in tests */
  loadEntries?: (csvPath: string | null | undefined) => GlossaryEntry[];
}

/**
 * Owns the glossary index for the lifetime of the process.
 *
 * Constructed once at startup and handed to the translator and routes.
 * The index is built on first use and reused until `clear()`.
 */
export class GlossaryService {
  readonly scorer: SimilarityScorer;
  private readonly csvPath: string | null;
  private readonly maxTerms: number;
  private readonly minScore: number;
  private readonly loadEntries: (csvPath: string | null | undefined) => GlossaryEntry[];
  private readonly fuzzyCache: LRUCache<string, string[]>;
  private index: GlossaryIndex | null = null;

  constructor(options: GlossaryServiceOptions = {}) {
    this.csvPath = options.csvPath || null;
    this.scorer = options.scorer ?? createSimilarityScorer();
    this.maxTerms = options.maxTerms ?? DEFAULT_MAX_TERMS;
    this.minScore = options.minScore ?? DEFAULT_MIN_SCORE;
    this.loadEntries = options.loadEntries ?? loadGlossaryEntries;
    this.fuzzyCache = new LRUCache<string, string[]>({ max: options.cacheSize ?? 5000 });
  }

  /**
   * The memoized index. The build is synchronous, so the first caller
   * publishes a complete index and nobody sees a partial one.
   */
  getIndex(): GlossaryIndex {
    if (!this.index) {
      const entries = this.loadEntries(this.csvPath);
      this.index = buildGlossaryIndex(entries);
      console.log(
        `[Glossary] Loaded ${entries.length} entries from ${this.csvPath ?? '(none)'} (scorer: ${this.scorer.name})`
      );
    }
    return this.index;
  }

  /**
   * Drop the cached index so the next call rebuilds it (tests only)
   */
  clear(): void {
    this.index = null;
    this.fuzzyCache.clear();
  }

  matchTokens(tokens: readonly string[], direction: LangCode, maxTerms = this.maxTerms): GlossaryEntry[] {
    // Nothing to look up: leave the index unbuilt
    if (tokens.length === 0) return [];

    return matchTokens(this.getIndex(), tokens, direction, this.scorer, {
      maxTerms,
      minScore: this.minScore,
      fuzzyCache: this.fuzzyCache,
    });
  }

  /**
   * Glossary entries relevant to Setswana source text
   */
  findTermsForSetswana(text: string, maxTerms = this.maxTerms): GlossaryEntry[] {
    return this.findTerms(text, 'tsn', maxTerms);
  }

  /**
   * Glossary entries relevant to English source text
   */
  findTermsForEnglish(text: string, maxTerms = this.maxTerms): GlossaryEntry[] {
    return this.findTerms(text, 'en', maxTerms);
  }

  findTerms(text: string, source: LangCode, maxTerms = this.maxTerms): GlossaryEntry[] {
    return this.matchTokens(tokenize(text), source, maxTerms);
  }

  /**
   * Entries for one already-normalized token, without the usual cap.
   */
  entriesForToken(token: string, source: string): GlossaryEntry[] {
    if (!isLangCode(source)) {
      throw new ConfigurationError(`Unsupported source language: ${source}`);
    }
    return this.matchTokens([token], source, SINGLE_TOKEN_MAX_TERMS);
  }

  /**
   * Per-token matches for manual inspection. Only tokens with at least
   * one entry are reported, keeping their original spelling.
   */
  previewMatches(text: string, source: string): TokenPreview[] {
    if (!isLangCode(source)) {
      throw new ConfigurationError(`Unsupported source language: ${source}`);
    }

    const results: TokenPreview[] = [];
    for (const word of scanWords(text)) {
      const entries = this.entriesForToken(word.normalized, source);
      if (entries.length === 0) continue;

      results.push({
        token: word.raw,
        normalizedToken: word.normalized,
        entries,
      });
    }
    return results;
  }
}
