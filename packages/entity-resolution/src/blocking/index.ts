/**
 * Blocking strategies (candidate generation).
 *
 * A blocking key groups records coarsely so that only records sharing a key
 * are compared pairwise.
 */

export type BlockingAlgorithm = 'exact' | 'prefix' | 'suffix';

export type BlockingKeyOptions = {
  caseSensitive?: boolean;
  /** Characters kept by prefix/suffix (default: 4) */
  length?: number;
  maxLength?: number;
};

function normalizeText(text: string, caseSensitive: boolean): string {
  const trimmed = text.replace(/\s+/g, ' ').trim();
  return caseSensitive ? trimmed : trimmed.toLowerCase();
}

export function createBlockingKey(
  value: unknown,
  algorithm: BlockingAlgorithm,
  options?: BlockingKeyOptions
): string | null {
  if (value === null || value === undefined) return null;
  const caseSensitive = options?.caseSensitive ?? false;

  let base: string;
  if (typeof value === 'string') {
    base = normalizeText(value, caseSensitive);
  } else if (typeof value === 'number' || typeof value === 'boolean') {
    base = String(value);
  } else if (value instanceof Date) {
    base = value.toISOString();
  } else {
    return null;
  }

  if (base.length === 0) return null;

  const maxLength = options?.maxLength;
  if (maxLength && maxLength > 0 && base.length > maxLength) {
    base = base.slice(0, maxLength);
  }

  const n = Math.max(1, options?.length ?? 4);
  switch (algorithm) {
    case 'exact':
      return base;
    case 'prefix':
      return base.slice(0, n);
    case 'suffix':
      return base.slice(-n);
    default: {
      const exhaustive: never = algorithm;
      throw new Error(`Unknown blocking algorithm: ${String(exhaustive)}`);
    }
  }
}
