/**
 * Fuzzy Similarity Matching
 *
 * Tolerant lookup of a string against a known vocabulary (service names,
 * vendor names, catalog entries). Similarity is the Levenshtein distance
 * normalized by the longer string:
 *
 *   ratio = 1 - distance / max(|a|, |b|)
 *
 * computed over normalized, lower-cased text.
 */

import natural from 'natural';
import { normalizeText } from './normalizeText';
import type { BestMatch } from './types';

/**
 * Similarity of two strings in [0, 1]. Equal strings (after normalization
 * and lower-casing) score 1.
 *
 * @example
 * similarityRatio('ACME  Corp', 'acme corp') // Returns: 1
 * similarityRatio('abc', 'xyz')              // Returns: 0
 */
export function similarityRatio(a: string, b: string): number {
  const left = normalizeText(a).toLowerCase();
  const right = normalizeText(b).toLowerCase();

  if (left === right) {
    return 1;
  }

  const longest = Math.max(left.length, right.length);
  return 1 - natural.LevenshteinDistance(left, right) / longest;
}

/**
 * Returns the candidate most similar to the query. Only a strictly higher
 * score replaces the current best, so among equal scores the earliest
 * candidate wins. No candidates (or only zero scores) gives `{ best: null, score: 0 }`.
 *
 * @example
 * bestMatch('Acme Corp', ['Acme Corporation', 'Widgets Inc'])
 * // Returns: { best: 'Acme Corporation', score: 0.5625 }
 */
export function bestMatch(query: string, candidates: readonly string[]): BestMatch {
  let best: string | null = null;
  let score = 0;

  for (const candidate of candidates) {
    const ratio = similarityRatio(query, candidate);
    if (ratio > score) {
      best = candidate;
      score = ratio;
    }
  }

  return { best, score };
}

export default bestMatch;
