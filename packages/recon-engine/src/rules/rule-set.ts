/**
 * Rule set schema and compilation.
 *
 * A rule set carries the matching defaults plus one entry per provider
 * (aliases, confirmation-code patterns, tax adjustment, setting overrides).
 * `compileRuleSet` validates it and resolves everything the matcher needs
 * per provider up front.
 */

import { z } from 'zod';
import { formatZodIssues } from '@commrecon/core';
import { ConfigurationError } from '../errors/index.js';
import type { CompiledProviderRule, CompiledRuleSet } from '../types/rules.js';

export const DEFAULT_ACCEPTANCE_THRESHOLD = 0.8;

const toleranceSchema = z
  .object({
    absolute: z.number().min(0).default(0),
    percentage: z.number().min(0).max(100).default(0),
  })
  .strict();

const fuzzyWeightsSchema = z
  .object({
    code: z.number().min(0),
    amount: z.number().min(0),
    date: z.number().min(0),
  })
  .strict()
  .refine((w) => w.code + w.amount + w.date > 0, {
    message: 'at least one weight must be greater than 0',
  });

export const matchingSettingsSchema = z
  .object({
    acceptanceThreshold: z.number().min(0).max(1),
    nearThresholdMargin: z.number().min(0).max(1),
    fuzzyWeights: fuzzyWeightsSchema,
    tolerance: toleranceSchema,
    codeSimilarity: z.enum(['levenshtein', 'jaro_winkler']),
    dateWindowDays: z.number().int().min(1),
    blockKeyLength: z.number().int().min(1).max(32),
    maxFuzzyCandidates: z.number().int().min(1).max(10_000),
  })
  .strict();

const affixSchema = z
  .string()
  .trim()
  .refine((value) => /[0-9A-Za-z]/.test(value), {
    message: 'must contain at least one letter or digit',
  });

const codeReplacementSchema = z
  .object({
    pattern: z.string().min(1),
    replacement: z.string().default(''),
    flags: z
      .string()
      .regex(/^[imsu]*$/, 'only i, m, s and u flags are allowed')
      .default(''),
  })
  .strict();

const providerRuleSchema = z
  .object({
    providerId: z.string().trim().min(1),
    aliases: z.array(z.string().trim().min(1)).default([]),
    codePatterns: z
      .object({
        replacements: z.array(codeReplacementSchema).default([]),
        stripPrefixes: z.array(affixSchema).default([]),
        stripSuffixes: z.array(affixSchema).default([]),
      })
      .strict()
      .default({}),
    taxAdjustment: z
      .object({
        rate: z.number().min(0).max(1),
        billingBasis: z.enum(['net', 'gross']),
      })
      .strict()
      .optional(),
    overrides: matchingSettingsSchema.partial().optional(),
  })
  .strict();

const ruleSetObjectSchema = z
  .object({
    defaults: matchingSettingsSchema,
    providers: z.array(providerRuleSchema).min(1, 'at least one provider is required'),
  })
  .strict();

function providerKey(name: string): string {
  return name.trim().toLowerCase();
}

export const ruleSetSchema = ruleSetObjectSchema.superRefine((ruleSet, ctx) => {
  const owners = new Map<string, string>();

  ruleSet.providers.forEach((provider, i) => {
    for (const [j, name] of [provider.providerId, ...provider.aliases].entries()) {
      const key = providerKey(name);
      const owner = owners.get(key);
      if (owner !== undefined && owner !== provider.providerId) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: j === 0 ? ['providers', i, 'providerId'] : ['providers', i, 'aliases', j - 1],
          message: `"${name}" is already used by provider "${owner}"`,
        });
      } else if (owner !== undefined && j === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['providers', i, 'providerId'],
          message: `duplicate provider "${name}"`,
        });
      }
      owners.set(key, provider.providerId);
    }

    provider.codePatterns.replacements.forEach((replacement, k) => {
      try {
        new RegExp(replacement.pattern, replacement.flags);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['providers', i, 'codePatterns', 'replacements', k, 'pattern'],
          message: `invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
        });
      }
    });
  });
});

/**
 * Rule set as read from a configuration file: every default is optional and
 * filled in by `withRuleDefaults`.
 */
export const ruleSetFileSchema = ruleSetObjectSchema.extend({
  defaults: matchingSettingsSchema.partial().default({}),
});

export type MatchingSettings = z.infer<typeof matchingSettingsSchema>;
export type MatchingSettingsInput = z.input<typeof matchingSettingsSchema>;
export type ToleranceSettings = MatchingSettings['tolerance'];
export type FuzzyWeights = MatchingSettings['fuzzyWeights'];
export type CodeSimilarityAlgorithm = MatchingSettings['codeSimilarity'];
export type ProviderRule = z.infer<typeof providerRuleSchema>;
export type RuleSet = z.infer<typeof ruleSetSchema>;
export type RuleSetInput = z.input<typeof ruleSetSchema>;
export type RuleSetFile = z.infer<typeof ruleSetFileSchema>;

export const DEFAULT_MATCHING_SETTINGS: MatchingSettings = {
  acceptanceThreshold: DEFAULT_ACCEPTANCE_THRESHOLD,
  nearThresholdMargin: 0.05,
  fuzzyWeights: { code: 0.6, amount: 0.3, date: 0.1 },
  tolerance: { absolute: 0.25, percentage: 0 },
  codeSimilarity: 'levenshtein',
  dateWindowDays: 31,
  blockKeyLength: 4,
  maxFuzzyCandidates: 50,
};

/**
 * Fill the defaults a configuration file left out.
 */
export function withRuleDefaults(rules: RuleSetFile): RuleSet {
  return { ...rules, defaults: { ...DEFAULT_MATCHING_SETTINGS, ...rules.defaults } };
}

function isMissingThreshold(issue: z.ZodIssue): boolean {
  if (issue.code !== z.ZodIssueCode.invalid_type || issue.received !== 'undefined') {
    return false;
  }
  const last = issue.path[issue.path.length - 1];
  return last === 'acceptanceThreshold' || (issue.path.length === 1 && last === 'defaults');
}

/**
 * Strip a prefix/suffix down to the alphabet normalized codes use.
 */
export function canonicalizeAffix(value: string): string {
  return value.toUpperCase().replace(/[^0-9A-Z]/g, '');
}

function resolveSettings(
  defaults: MatchingSettings,
  overrides: ProviderRule['overrides']
): MatchingSettings {
  if (!overrides) return defaults;
  return {
    acceptanceThreshold: overrides.acceptanceThreshold ?? defaults.acceptanceThreshold,
    nearThresholdMargin: overrides.nearThresholdMargin ?? defaults.nearThresholdMargin,
    fuzzyWeights: overrides.fuzzyWeights ?? defaults.fuzzyWeights,
    tolerance: overrides.tolerance ?? defaults.tolerance,
    codeSimilarity: overrides.codeSimilarity ?? defaults.codeSimilarity,
    dateWindowDays: overrides.dateWindowDays ?? defaults.dateWindowDays,
    blockKeyLength: overrides.blockKeyLength ?? defaults.blockKeyLength,
    maxFuzzyCandidates: overrides.maxFuzzyCandidates ?? defaults.maxFuzzyCandidates,
  };
}

/**
 * Validate a rule set and resolve it per provider.
 *
 * @throws ConfigurationError (MISSING_THRESHOLD or INVALID_RULE_SET)
 */
export function compileRuleSet(input: unknown): CompiledRuleSet {
  const parsed = ruleSetSchema.safeParse(input);
  if (!parsed.success) {
    const missingThreshold = parsed.error.issues.some(isMissingThreshold);
    throw new ConfigurationError({
      code: missingThreshold ? 'MISSING_THRESHOLD' : 'INVALID_RULE_SET',
      message: formatZodIssues('Invalid rule set', parsed.error),
      suggestion: missingThreshold
        ? `Set defaults.acceptanceThreshold (the configuration loader uses ${DEFAULT_ACCEPTANCE_THRESHOLD})`
        : 'Fix the listed rule set fields',
    });
  }

  const ruleSet = parsed.data;
  const providers = new Map<string, CompiledProviderRule>();
  const aliases = new Map<string, string>();

  for (const provider of ruleSet.providers) {
    providers.set(provider.providerId, {
      providerId: provider.providerId,
      replacements: provider.codePatterns.replacements.map((r) => ({
        regex: new RegExp(r.pattern, `${r.flags}g`),
        replacement: r.replacement,
      })),
      stripPrefixes: provider.codePatterns.stripPrefixes.map(canonicalizeAffix),
      stripSuffixes: provider.codePatterns.stripSuffixes.map(canonicalizeAffix),
      taxAdjustment: provider.taxAdjustment,
      settings: resolveSettings(ruleSet.defaults, provider.overrides),
    });

    for (const name of [provider.providerId, ...provider.aliases]) {
      aliases.set(providerKey(name), provider.providerId);
    }
  }

  return { providers, aliases, defaults: ruleSet.defaults };
}

/**
 * Look up a provider name (id or alias, case-insensitive).
 */
export function lookupProvider(ruleSet: CompiledRuleSet, name: string): string | undefined {
  return ruleSet.aliases.get(providerKey(name));
}
