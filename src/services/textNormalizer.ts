// Word-like runs: ASCII letters, the accented Latin letters that show up in
// Setswana and loanword spellings, apostrophes (straight and modifier) and hyphens.
// Everything else, digits and punctuation included, separates words.
const WORD_REGEX = /[A-Za-zÁÉÍÓÚÜÑáéíóúüñʼ'-]+/g;

// Any Unicode combining mark left behind by NFKD decomposition
const COMBINING_MARK_REGEX = /\p{M}/gu;

/**
 * A word as it appears in the text, plus its lookup key
 */
export interface ScannedWord {
  raw: string;
  normalized: string;
}

/**
 * Canonical comparison key for a surface form:
 * trim, lowercase, NFKD-decompose, then drop combining marks,
 * so "Kgomó" and "kgomo" compare equal.
 */
export function normalizeText(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .normalize('NFKD')
    .replace(COMBINING_MARK_REGEX, '');
}

/**
 * Lazily scan the words of a text in source order, keeping duplicates.
 */
export function* scanWords(text: string): Generator<ScannedWord> {
  for (const match of text.matchAll(WORD_REGEX)) {
    const raw = match[0];
    yield { raw, normalized: normalizeText(raw) };
  }
}

/**
 * Normalized tokens of a text, in source order.
 *
 * @example tokenize('Abdomen is sore!') // ['abdomen', 'is', 'sore']
 */
export function tokenize(text: string): string[] {
  return Array.from(scanWords(text), word => word.normalized);
}
