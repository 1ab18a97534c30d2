import { describe, expect, it } from 'vitest';
import {
  DEFAULT_MATCHING_SETTINGS,
  compileRuleSet,
  lookupProvider,
  ruleSetFileSchema,
  withRuleDefaults,
} from '../src/rules/index.js';
import { ConfigurationError } from '../src/errors/index.js';
import { testRules } from './fixtures.js';

function compileError(input: unknown): ConfigurationError {
  try {
    compileRuleSet(input);
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('expected compileRuleSet to throw');
}

describe('compileRuleSet', () => {
  it('resolves provider settings from defaults and overrides', () => {
    const ruleSet = compileRuleSet(
      testRules([
        { providerId: 'ACME' },
        {
          providerId: 'GLOBEX',
          overrides: { acceptanceThreshold: 0.9, tolerance: { absolute: 1, percentage: 0 } },
        },
      ])
    );

    expect(ruleSet.providers.get('ACME')?.settings.acceptanceThreshold).toBe(0.8);
    expect(ruleSet.providers.get('ACME')?.settings.tolerance).toEqual({ absolute: 0, percentage: 5 });
    expect(ruleSet.providers.get('GLOBEX')?.settings.acceptanceThreshold).toBe(0.9);
    expect(ruleSet.providers.get('GLOBEX')?.settings.tolerance).toEqual({ absolute: 1, percentage: 0 });
    expect(ruleSet.providers.get('GLOBEX')?.settings.fuzzyWeights).toEqual({
      code: 0.6,
      amount: 0.3,
      date: 0.1,
    });
  });

  it('maps ids and aliases case-insensitively', () => {
    const ruleSet = compileRuleSet(testRules());
    expect(lookupProvider(ruleSet, 'acme')).toBe('ACME');
    expect(lookupProvider(ruleSet, '  ACME TRAVEL ')).toBe('ACME');
    expect(lookupProvider(ruleSet, 'Initech')).toBeUndefined();
  });

  it('canonicalizes strip affixes', () => {
    const ruleSet = compileRuleSet(
      testRules([{ providerId: 'ACME', codePatterns: { stripPrefixes: ['conf-'], stripSuffixes: ['/r'] } }])
    );
    expect(ruleSet.providers.get('ACME')?.stripPrefixes).toEqual(['CONF']);
    expect(ruleSet.providers.get('ACME')?.stripSuffixes).toEqual(['R']);
  });

  it('reports a missing acceptance threshold', () => {
    const error = compileError({
      defaults: { ...DEFAULT_MATCHING_SETTINGS, acceptanceThreshold: undefined },
      providers: [{ providerId: 'ACME' }],
    });
    expect(error.code).toBe('MISSING_THRESHOLD');
    expect(error.message).toContain('defaults.acceptanceThreshold');
  });

  it('reports missing defaults as a missing threshold', () => {
    expect(compileError({ providers: [{ providerId: 'ACME' }] }).code).toBe('MISSING_THRESHOLD');
  });

  it('rejects invalid regular expressions', () => {
    const error = compileError(
      testRules([{ providerId: 'ACME', codePatterns: { replacements: [{ pattern: '([A-Z' }] } }])
    );
    expect(error.code).toBe('INVALID_RULE_SET');
    expect(error.message).toContain('providers.0.codePatterns.replacements.0.pattern');
  });

  it('rejects an alias claimed by two providers', () => {
    const error = compileError(
      testRules([
        { providerId: 'ACME', aliases: ['Shared'] },
        { providerId: 'GLOBEX', aliases: ['shared'] },
      ])
    );
    expect(error.code).toBe('INVALID_RULE_SET');
    expect(error.message).toContain('providers.1.aliases.0: "shared" is already used by provider "ACME"');
  });

  it('rejects duplicate provider ids', () => {
    const error = compileError(testRules([{ providerId: 'ACME' }, { providerId: 'ACME' }]));
    expect(error.message).toContain('providers.1.providerId: duplicate provider "ACME"');
  });

  it('rejects all-zero fuzzy weights', () => {
    const error = compileError({
      defaults: { ...DEFAULT_MATCHING_SETTINGS, fuzzyWeights: { code: 0, amount: 0, date: 0 } },
      providers: [{ providerId: 'ACME' }],
    });
    expect(error.code).toBe('INVALID_RULE_SET');
    expect(error.message).toContain('defaults.fuzzyWeights: at least one weight must be greater than 0');
  });
});

describe('withRuleDefaults', () => {
  it('fills missing defaults and keeps configured ones', () => {
    const file = ruleSetFileSchema.parse({
      defaults: { dateWindowDays: 10 },
      providers: [{ providerId: 'ACME' }],
    });
    const rules = withRuleDefaults(file);

    expect(rules.defaults.acceptanceThreshold).toBe(0.8);
    expect(rules.defaults.dateWindowDays).toBe(10);
    expect(rules.defaults.tolerance).toEqual({ absolute: 0.25, percentage: 0 });
    expect(() => compileRuleSet(rules)).not.toThrow();
  });

  it('accepts a file without defaults', () => {
    const file = ruleSetFileSchema.parse({ providers: [{ providerId: 'ACME' }] });
    expect(withRuleDefaults(file).defaults).toEqual(DEFAULT_MATCHING_SETTINGS);
  });
});
