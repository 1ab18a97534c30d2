export {
  levenshtein,
  jaro,
  jaroWinkler,
  calculateSimilarity,
} from './string-similarity.js';
