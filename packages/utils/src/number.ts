/**
 * Safe Numeric Parsing
 *
 * Lenient conversions for values read from config strings, where a bad
 * value falls back to a default instead of failing the job.
 */

import { isNumber, isString } from './guards.js';

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const SPECIAL_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Parse a float, returning `defaultValue` when the input is not a number literal
 *
 * Accepts decimal and exponent notation, `inf`, `infinity` and `nan`,
 * with optional sign and surrounding whitespace.
 */
export function safeFloat(value: unknown, defaultValue: number | null = null): number | null {
  if (isNumber(value)) {
    return value;
  }
  if (!isString(value)) {
    return defaultValue;
  }

  const trimmed = value.trim();
  if (DECIMAL_PATTERN.test(trimmed)) {
    return Number(trimmed);
  }

  const special = SPECIAL_PATTERN.exec(trimmed);
  if (special) {
    const [, sign, word] = special;
    if (word?.toLowerCase() === 'nan') {
      return Number.NaN;
    }
    return sign === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }

  return defaultValue;
}

/**
 * Parse an integer via {@link safeFloat}, truncating toward zero
 *
 * Infinite or NaN values cannot be truncated and yield `defaultValue`.
 */
export function safeInt(value: unknown, defaultValue: number | null = null): number | null {
  const parsed = safeFloat(value, defaultValue);
  if (parsed === null) {
    return null;
  }
  if (!Number.isFinite(parsed)) {
    return defaultValue;
  }
  return Math.trunc(parsed);
}
