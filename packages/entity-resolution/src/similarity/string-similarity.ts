/**
 * String Similarity Functions
 *
 * Scores are normalized to 0-1. Edit distance comes from fastest-levenshtein.
 */

import { distance as levenshteinDistance } from 'fastest-levenshtein';
import type {
  SimilarityResult,
  SimilarityAlgorithm,
  SimilarityOptions,
} from '../types/similarity.js';

const MAX_PREFIX_SCALE = 0.25;

/**
 * Calculate normalized Levenshtein similarity
 *
 * @param a First string
 * @param b Second string
 * @returns Similarity score 0-1 (1 = identical)
 */
export function levenshtein(a: string, b: string): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'levenshtein' };
  }

  if (a.length === 0 || b.length === 0) {
    return { score: 0, algorithm: 'levenshtein' };
  }

  const dist = levenshteinDistance(a, b);
  const maxLen = Math.max(a.length, b.length);
  const score = 1 - dist / maxLen;

  return {
    score,
    algorithm: 'levenshtein',
    details: `Distance: ${dist}, Max length: ${maxLen}`,
  };
}

/**
 * Calculate Jaro similarity
 *
 * Based on the number of matching characters and transpositions.
 */
export function jaro(a: string, b: string): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'jaro' };
  }

  if (a.length === 0 || b.length === 0) {
    return { score: 0, algorithm: 'jaro' };
  }

  const matchWindow = Math.max(0, Math.floor(Math.max(a.length, b.length) / 2) - 1);
  const aMatches = new Array<boolean>(a.length).fill(false);
  const bMatches = new Array<boolean>(b.length).fill(false);

  let matches = 0;
  let transpositions = 0;

  for (let i = 0; i < a.length; i++) {
    const start = Math.max(0, i - matchWindow);
    const end = Math.min(i + matchWindow + 1, b.length);

    for (let j = start; j < end; j++) {
      if (bMatches[j] || a[i] !== b[j]) continue;
      aMatches[i] = true;
      bMatches[j] = true;
      matches++;
      break;
    }
  }

  if (matches === 0) {
    return { score: 0, algorithm: 'jaro' };
  }

  let k = 0;
  for (let i = 0; i < a.length; i++) {
    if (!aMatches[i]) continue;
    while (!bMatches[k]) k++;
    if (a[i] !== b[k]) transpositions++;
    k++;
  }

  const score =
    (matches / a.length +
      matches / b.length +
      (matches - transpositions / 2) / matches) /
    3;

  return {
    score,
    algorithm: 'jaro',
    details: `Matches: ${matches}, Transpositions: ${transpositions / 2}`,
  };
}

/**
 * Calculate Jaro-Winkler similarity
 *
 * Extension of Jaro that gives more weight to common prefixes, which suits
 * booking references sharing a provider-assigned lead.
 *
 * @param prefixScale Scaling factor for common prefix (default: 0.1, max: 0.25)
 */
export function jaroWinkler(
  a: string,
  b: string,
  prefixScale = 0.1
): SimilarityResult {
  const jaroResult = jaro(a, b);

  if (jaroResult.score === 1) {
    return { score: 1, algorithm: 'jaro_winkler' };
  }

  const scale = Math.min(Math.max(prefixScale, 0), MAX_PREFIX_SCALE);

  let prefixLength = 0;
  const maxPrefix = Math.min(4, a.length, b.length);

  for (let i = 0; i < maxPrefix; i++) {
    if (a[i] === b[i]) {
      prefixLength++;
    } else {
      break;
    }
  }

  const score = jaroResult.score + prefixLength * scale * (1 - jaroResult.score);

  return {
    score,
    algorithm: 'jaro_winkler',
    details: `Jaro: ${jaroResult.score.toFixed(3)}, Common prefix: ${prefixLength}`,
  };
}

/**
 * Calculate similarity using specified algorithm
 */
export function calculateSimilarity(
  a: string,
  b: string,
  algorithm: SimilarityAlgorithm,
  options?: SimilarityOptions
): SimilarityResult {
  switch (algorithm) {
    case 'levenshtein':
      return levenshtein(a, b);
    case 'jaro':
      return jaro(a, b);
    case 'jaro_winkler':
      return jaroWinkler(a, b, options?.prefixScale);
    default: {
      const exhaustive: never = algorithm;
      throw new Error(`Unknown algorithm: ${String(exhaustive)}`);
    }
  }
}
