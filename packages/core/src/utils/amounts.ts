/**
 * Monetary value helpers.
 *
 * Provider exports carry amounts as numbers or as loosely formatted text
 * ("$1,234.50", "(12.00)" for negatives). Everything inside the engine is a
 * plain number rounded to cents.
 */

/**
 * Round to 2 decimal places, symmetric around zero.
 */
export function roundMoney(value: number): number {
  const rounded = Math.round((Math.abs(value) + Number.EPSILON) * 100) / 100;
  return value < 0 && rounded !== 0 ? -rounded : rounded;
}

/**
 * Parse an amount cell.
 *
 * @returns The numeric value, or null when the cell is empty or not a number
 *
 * @example
 * parseAmount('$1,234.50') // 1234.5
 * parseAmount('(12.00)')   // -12
 * parseAmount('n/a')       // null
 */
export function parseAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value !== 'string') {
    return null;
  }

  let text = value.trim();
  if (text.length === 0) {
    return null;
  }

  const isNegative = text.startsWith('(') && text.endsWith(')');
  if (isNegative) {
    text = text.slice(1, -1);
  }

  const sanitized = text.replace(/[$,\s]/g, '');
  if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(sanitized)) {
    return null;
  }

  const result = Number(sanitized);
  if (!Number.isFinite(result)) {
    return null;
  }
  return isNegative ? -result : result;
}
