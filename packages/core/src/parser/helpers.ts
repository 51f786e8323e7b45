/**
 * Parser Helpers
 * Numeric token conversion
 * @internal
 */

const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;
const INT_PATTERN = /^[+-]?\d+$/;

/**
 * Decimal or exponent notation, plus inf/infinity/nan in any case.
 * Returns undefined for anything else, including ''.
 * @internal
 */
export function parseFloatToken(text: string): number | undefined {
  if (FLOAT_PATTERN.test(text)) return Number(text);
  const special = SPECIAL_FLOAT_PATTERN.exec(text);
  if (special === null) return undefined;
  if ((special[2] ?? '').toLowerCase() === 'nan') return Number.NaN;
  return special[1] === '-' ? -Infinity : Infinity;
}

/** @internal */
export function parseIntToken(text: string): number | undefined {
  return INT_PATTERN.test(text) ? Number.parseInt(text, 10) : undefined;
}
