/**
 * Exact-decimal handling for recipe prices.
 *
 * Prices are kept as strings end to end so that values like "5.50" are never
 * routed through binary floating point.
 */

export const PRICE_MAX_DIGITS = 5;
export const PRICE_DECIMAL_PLACES = 2;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Normalize a price to a fixed two-decimal string ("5.5" -> "5.50").
 * Returns null when the value is not a non-negative decimal that fits in
 * PRICE_MAX_DIGITS digits with PRICE_DECIMAL_PLACES decimals.
 */
export function normalizePrice(value: string | number): string | null {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return null;
  }

  const text = typeof value === 'number' ? String(value) : value.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const whole = (match[1] ?? '0').replace(/^0+(?=\d)/, '');
  const fraction = match[2] ?? '';

  // Extra decimals are only acceptable when they are trailing zeros.
  if (/[^0]/.test(fraction.slice(PRICE_DECIMAL_PLACES))) {
    return null;
  }

  if (whole.length > PRICE_MAX_DIGITS - PRICE_DECIMAL_PLACES) {
    return null;
  }

  const cents = fraction.slice(0, PRICE_DECIMAL_PLACES).padEnd(PRICE_DECIMAL_PLACES, '0');
  return `${whole}.${cents}`;
}
