export {
  DiscrepancyClassifier,
  classifyMatchResult,
  isWithinTolerance,
  toleranceLimit,
} from './discrepancy-classifier.js';
