/**
 * Key Normalizer
 *
 * Canonical confirmation codes, provider ids and tax-adjusted expected
 * commission. Everything here is a pure function of its inputs and the
 * compiled rule set.
 */

import { roundMoney } from '@commrecon/core';
import { ConfigurationError, DataQualityError } from '../errors/index.js';
import { lookupProvider } from '../rules/index.js';
import type {
  CompiledProviderRule,
  CompiledRuleSet,
  TaxTreatment,
} from '../types/index.js';

/** Passes allowed before a rule set is considered non-convergent */
const MAX_NORMALIZATION_PASSES = 8;

/**
 * Resolve a raw provider name through ids and aliases.
 *
 * @throws ConfigurationError when no provider rule covers the name
 */
export function normalizeProviderId(rawProvider: string, ruleSet: CompiledRuleSet): string {
  const providerId = lookupProvider(ruleSet, rawProvider);
  if (providerId === undefined) {
    throw new ConfigurationError({
      code: 'UNKNOWN_PROVIDER',
      message: `No provider rule for "${rawProvider}"`,
      suggestion: 'Add the provider (or an alias for it) to the rule set',
      context: { providers: [rawProvider] },
    });
  }
  return providerId;
}

function getProviderRule(providerId: string, ruleSet: CompiledRuleSet): CompiledProviderRule {
  const rule = ruleSet.providers.get(providerId);
  if (!rule) {
    throw new ConfigurationError({
      code: 'UNKNOWN_PROVIDER',
      message: `No provider rule for "${providerId}"`,
      suggestion: 'Resolve raw provider names with normalizeProviderId first',
      context: { providers: [providerId] },
    });
  }
  return rule;
}

function stripAffixes(code: string, rule: CompiledProviderRule): string {
  let out = code;
  let changed = true;
  while (changed) {
    changed = false;
    for (const prefix of rule.stripPrefixes) {
      if (prefix && out.length > prefix.length && out.startsWith(prefix)) {
        out = out.slice(prefix.length);
        changed = true;
      }
    }
    for (const suffix of rule.stripSuffixes) {
      if (suffix && out.length > suffix.length && out.endsWith(suffix)) {
        out = out.slice(0, out.length - suffix.length);
        changed = true;
      }
    }
  }
  return out;
}

function normalizationPass(code: string, rule: CompiledProviderRule): string {
  let out = code.trim().toUpperCase();
  for (const { regex, replacement } of rule.replacements) {
    out = out.replace(regex, replacement).toUpperCase();
  }
  out = out.replace(/[^0-9A-Z]/g, '');
  return stripAffixes(out, rule);
}

/**
 * Canonical form of a confirmation code for one provider.
 *
 * Passes are repeated until the output no longer changes, so
 * `normalize(normalize(x)) === normalize(x)` holds for every rule set that
 * is accepted.
 *
 * @throws ConfigurationError for an unknown provider or patterns that never settle
 * @throws DataQualityError when the code is empty before or after normalization
 */
export function normalizeConfirmationCode(
  rawCode: string,
  providerId: string,
  ruleSet: CompiledRuleSet
): string {
  const rule = getProviderRule(providerId, ruleSet);

  if (rawCode.trim() === '') {
    throw new DataQualityError({
      code: 'EMPTY_CONFIRMATION_CODE',
      message: 'Confirmation code is empty',
      issues: [{ field: 'confirmationCode', message: 'must not be empty', value: rawCode }],
    });
  }

  let current = rawCode;
  for (let pass = 0; pass < MAX_NORMALIZATION_PASSES; pass++) {
    const next = normalizationPass(current, rule);
    if (next === current) {
      if (next === '') {
        throw new DataQualityError({
          code: 'EMPTY_CONFIRMATION_CODE',
          message: `Confirmation code "${rawCode}" is empty after normalization`,
          suggestion: 'Check the code patterns configured for this provider',
          issues: [
            {
              field: 'confirmationCode',
              message: 'is empty after normalization',
              value: rawCode,
            },
          ],
        });
      }
      return next;
    }
    current = next;
  }

  throw new ConfigurationError({
    code: 'NON_IDEMPOTENT_RULES',
    message: `Code patterns for provider "${providerId}" do not settle on "${rawCode}"`,
    suggestion: 'Make each replacement produce text it no longer matches',
    context: { providerId, rawCode },
  });
}

/**
 * Convert an order's expected commission to the provider's billing basis.
 *
 * Exempt orders, providers without a tax adjustment and orders already on
 * the billing basis are returned unchanged (rounded to cents).
 */
export function applyTaxAdjustment(
  amount: number,
  taxTreatment: TaxTreatment,
  providerId: string,
  ruleSet: CompiledRuleSet
): number {
  const adjustment = getProviderRule(providerId, ruleSet).taxAdjustment;
  if (!adjustment || taxTreatment === 'exempt' || taxTreatment === adjustment.billingBasis) {
    return roundMoney(amount);
  }

  return taxTreatment === 'gross'
    ? roundMoney(amount / (1 + adjustment.rate))
    : roundMoney(amount * (1 + adjustment.rate));
}
