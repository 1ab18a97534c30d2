export {
  DEFAULT_ACCEPTANCE_THRESHOLD,
  DEFAULT_MATCHING_SETTINGS,
  matchingSettingsSchema,
  ruleSetSchema,
  ruleSetFileSchema,
  compileRuleSet,
  withRuleDefaults,
  lookupProvider,
  canonicalizeAffix,
} from './rule-set.js';
export type {
  MatchingSettings,
  MatchingSettingsInput,
  ToleranceSettings,
  FuzzyWeights,
  CodeSimilarityAlgorithm,
  ProviderRule,
  RuleSet,
  RuleSetInput,
  RuleSetFile,
} from './rule-set.js';
