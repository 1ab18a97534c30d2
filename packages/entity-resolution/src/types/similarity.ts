/**
 * String Similarity Types
 */

/** Result of a similarity comparison */
export interface SimilarityResult {
  /** Similarity score between 0 (no match) and 1 (exact match) */
  score: number;

  /** Which algorithm produced this result */
  algorithm: SimilarityAlgorithm;

  /** Optional details about the comparison */
  details?: string;
}

/** Available similarity algorithms */
export type SimilarityAlgorithm = 'levenshtein' | 'jaro' | 'jaro_winkler';

/** Options for algorithms that take parameters */
export interface SimilarityOptions {
  /** For jaro_winkler: prefix scale (default: 0.1, max: 0.25) */
  prefixScale?: number;
}
