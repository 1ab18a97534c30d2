/**
 * Candidate Index
 *
 * Exact-key buckets plus prefix/suffix blocks over the commission lines.
 * Built once per shard in a single pass; read-only afterwards.
 */

import { createBlockingKey } from '@commrecon/entity-resolution/blocking';
import { ConfigurationError } from '../errors/index.js';
import type { CommissionLine, CompiledRuleSet } from '../types/index.js';

const SEPARATOR = '\u001F';

export class CandidateIndex {
  private readonly exact = new Map<string, CommissionLine[]>();
  private readonly blocks = new Map<string, CommissionLine[]>();
  private lineCount = 0;

  constructor(lines: readonly CommissionLine[], private readonly ruleSet: CompiledRuleSet) {
    for (const line of lines) {
      this.add(this.exact, this.exactKey(line.providerId, line.confirmationCode), line);
      for (const key of this.blockKeys(line.providerId, line.confirmationCode)) {
        this.add(this.blocks, key, line);
      }
      this.lineCount++;
    }
  }

  get size(): number {
    return this.lineCount;
  }

  /**
   * Lines whose normalized code equals `code`, in feed order.
   */
  lookupExact(providerId: string, code: string): readonly CommissionLine[] {
    return this.exact.get(this.exactKey(providerId, code)) ?? [];
  }

  /**
   * Lines sharing a prefix or suffix block with `code`, nearest code length
   * first (then line id), capped at the provider's maxFuzzyCandidates.
   * May include lines that are also in the exact bucket.
   */
  lookupFuzzyBlock(providerId: string, code: string): readonly CommissionLine[] {
    const seen = new Set<CommissionLine>();
    for (const key of this.blockKeys(providerId, code)) {
      for (const line of this.blocks.get(key) ?? []) {
        seen.add(line);
      }
    }

    const { maxFuzzyCandidates } = this.settingsFor(providerId);
    return [...seen]
      .sort(
        (a, b) =>
          Math.abs(a.confirmationCode.length - code.length) -
            Math.abs(b.confirmationCode.length - code.length) ||
          compareIds(a.lineId, b.lineId)
      )
      .slice(0, maxFuzzyCandidates);
  }

  private add(map: Map<string, CommissionLine[]>, key: string, line: CommissionLine): void {
    const bucket = map.get(key);
    if (bucket) {
      bucket.push(line);
    } else {
      map.set(key, [line]);
    }
  }

  private exactKey(providerId: string, code: string): string {
    return `${providerId}${SEPARATOR}${code}`;
  }

  private blockKeys(providerId: string, code: string): string[] {
    const length = this.settingsFor(providerId).blockKeyLength;
    const keys: string[] = [];
    const prefix = createBlockingKey(code, 'prefix', { caseSensitive: true, length });
    const suffix = createBlockingKey(code, 'suffix', { caseSensitive: true, length });
    if (prefix) keys.push(`${providerId}${SEPARATOR}p${SEPARATOR}${prefix}`);
    if (suffix) keys.push(`${providerId}${SEPARATOR}s${SEPARATOR}${suffix}`);
    return keys;
  }

  private settingsFor(providerId: string) {
    const rule = this.ruleSet.providers.get(providerId);
    if (!rule) {
      throw new ConfigurationError({
        code: 'UNKNOWN_PROVIDER',
        message: `No provider rule for "${providerId}"`,
        context: { providers: [providerId] },
      });
    }
    return rule.settings;
  }
}

/**
 * Deterministic id ordering: plain code-unit comparison, independent of locale.
 */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
