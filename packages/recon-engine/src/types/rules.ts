/**
 * Compiled rule set, as consumed by the normalizer, matcher and classifier.
 */

import type { MatchingSettings } from '../rules/rule-set.js';

export interface CodeReplacement {
  readonly regex: RegExp;
  readonly replacement: string;
}

export interface TaxAdjustment {
  /** e.g. 0.19 for 19% */
  readonly rate: number;
  /** Whether the provider bills commission net or gross of tax */
  readonly billingBasis: 'net' | 'gross';
}

export interface CompiledProviderRule {
  readonly providerId: string;
  readonly replacements: readonly CodeReplacement[];
  /** Canonicalized (upper-case, alphanumeric only) */
  readonly stripPrefixes: readonly string[];
  readonly stripSuffixes: readonly string[];
  readonly taxAdjustment?: TaxAdjustment;
  /** Defaults merged with the provider's overrides */
  readonly settings: MatchingSettings;
}

export interface CompiledRuleSet {
  readonly providers: ReadonlyMap<string, CompiledProviderRule>;
  /** Lower-cased provider id or alias → provider id */
  readonly aliases: ReadonlyMap<string, string>;
  readonly defaults: MatchingSettings;
}
