/** Terms shorter than this only match exactly. */
export const MIN_FUZZY_LENGTH = 3;
/** A candidate matches when at most this fraction of the term's characters differ. */
export const MAX_EDIT_RATIO = 0.4;

export interface FuzzyMatch {
  /** Candidate text that matched (original casing). */
  term: string;
  /** In (0, 1]; 1 means identical. */
  similarity: number;
}

/**
 * Optimal string alignment distance: Levenshtein plus adjacent
 * transpositions, each operation costing 1 ("tesitng" -> "testing" is 1).
 */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;

  // Three rolling rows: i-2, i-1, i.
  let prevPrev = new Array<number>(b.length + 1).fill(0);
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  let curr = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    curr[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      let d = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
      if (i > 1 && j > 1 && a[i - 1] === b[j - 2] && a[i - 2] === b[j - 1]) {
        d = Math.min(d, prevPrev[j - 2] + 1);
      }
      curr[j] = d;
    }
    [prevPrev, prev, curr] = [prev, curr, prevPrev];
  }
  return prev[b.length];
}

export function maxEditsFor(length: number): number {
  return Math.floor(length * MAX_EDIT_RATIO);
}

/** Word tokens in original casing. */
export function splitWords(text: string): string[] {
  return text.split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}

function similarity(term: string, candidate: string, distance: number): number {
  return 1 - distance / Math.max(term.length, candidate.length);
}

/**
 * Closest word to `term` (lower-case) among `words`, comparing both the full
 * word and its prefix of the term's length so "cache" reaches "Caching".
 */
export function bestWordMatch(term: string, words: readonly string[]): FuzzyMatch | undefined {
  const limit = maxEditsFor(term.length);
  let best: FuzzyMatch | undefined;
  for (const word of words) {
    const lower = word.toLowerCase();
    const candidates = lower.length > term.length ? [lower, lower.slice(0, term.length)] : [lower];
    for (const candidate of candidates) {
      const d = editDistance(term, candidate);
      if (d > limit) continue;
      const s = similarity(term, candidate, d);
      if (!best || s > best.similarity) best = { term: word, similarity: s };
    }
  }
  return best;
}

/**
 * Fuzzy similarity between a lower-case query and a title, at whole-title and
 * word granularity; the better of the two wins. Every query word of at least
 * {@link MIN_FUZZY_LENGTH} characters must find a partner for a word-level hit.
 */
export function fuzzyTitleMatch(query: string, title: string): FuzzyMatch | undefined {
  if (query.length < MIN_FUZZY_LENGTH) return undefined;
  let best: FuzzyMatch | undefined;

  const lowerTitle = title.toLowerCase();
  const whole = editDistance(query, lowerTitle);
  if (whole <= maxEditsFor(query.length)) {
    best = { term: title, similarity: similarity(query, lowerTitle, whole) };
  }

  const queryWords = splitWords(query).filter((w) => w.length >= MIN_FUZZY_LENGTH);
  if (!queryWords.length) return best;
  const titleWords = splitWords(title);
  const matched: FuzzyMatch[] = [];
  for (const word of queryWords) {
    const m = bestWordMatch(word, titleWords);
    if (!m) return best;
    matched.push(m);
  }
  const mean = matched.reduce((sum, m) => sum + m.similarity, 0) / matched.length;
  if (!best || mean > best.similarity) {
    best = { term: matched.map((m) => m.term).join(" "), similarity: mean };
  }
  return best;
}
