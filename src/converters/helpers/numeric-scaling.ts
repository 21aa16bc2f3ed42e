/**
 * Numeric Scaling
 *
 * Rounding policy for scaled fields: the result is rounded half away from
 * zero to P = max(decimals of the source token, rule precision) decimals,
 * then trailing zeros are trimmed back down to the source token's decimals.
 * Formatting works on the rounded integer mantissa, so no binary float
 * artefacts reach the output text.
 */

import { readScalar } from '../../core/markup-node';

/**
 * Largest number of decimals the policy produces
 */
export const MAX_DECIMALS = 15;

export type ScaleOperation = 'multiply' | 'divide';

/**
 * Number of decimals a numeric token is written with
 *
 * Exponent notation counts the decimals of its fixed-point equivalent:
 * `1.5e-3` has 4, `2e3` has 0.
 */
export function countDecimals(token: string): number {
  const match = /^[+-]?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/.exec(token.trim());
  if (!match) return 0;
  const fraction = match[2]?.length ?? 0;
  const exponent = match[3] ? parseInt(match[3], 10) : 0;
  return Math.max(0, fraction - exponent);
}

/**
 * Integer mantissa of |value| at the given decimals, rounded half away from zero
 */
function roundedMantissa(value: number, decimals: number): number {
  // toPrecision(15) removes representation noise such as 1.005 * 100 = 100.49999999999999
  const shifted = Number((Math.abs(value) * 10 ** decimals).toPrecision(15));
  return Math.round(shifted);
}

/**
 * Round half away from zero to a number of decimals
 */
export function roundHalfAwayFromZero(value: number, decimals: number): number {
  const places = Math.min(Math.max(decimals, 0), MAX_DECIMALS);
  const mantissa = roundedMantissa(value, places);
  const rounded = mantissa / 10 ** places;
  return value < 0 && mantissa !== 0 ? -rounded : rounded;
}

/**
 * Format a value rounded to `decimals`, trimming trailing zeros down to `minDecimals`
 */
export function formatRounded(value: number, decimals: number, minDecimals: number): string {
  const places = Math.min(Math.max(decimals, 0), MAX_DECIMALS);
  const keep = Math.min(Math.max(minDecimals, 0), places);
  const mantissa = roundedMantissa(value, places);

  if (!Number.isSafeInteger(mantissa)) {
    return String(roundHalfAwayFromZero(value, places));
  }

  const digits = mantissa.toString().padStart(places + 1, '0');
  const whole = digits.slice(0, digits.length - places);
  let fraction = digits.slice(digits.length - places);
  while (fraction.length > keep && fraction.endsWith('0')) {
    fraction = fraction.slice(0, -1);
  }

  const sign = value < 0 && mantissa !== 0 ? '-' : '';
  return fraction.length > 0 ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
}

/**
 * Scale a raw numeric token, keeping any whitespace around it
 *
 * @returns the new raw text, or undefined when the token is not numeric
 */
export function scaleNumericToken(
  raw: string,
  operation: ScaleOperation,
  factor: number,
  precision: number
): string | undefined {
  const scalar = readScalar(raw);
  if (scalar.type === 'string') return undefined;

  const match = /^(\s*)(.*?)(\s*)$/s.exec(raw);
  const leading = match?.[1] ?? '';
  const core = match?.[2] ?? raw;
  const trailing = match?.[3] ?? '';

  const sourceDecimals = countDecimals(core);
  const decimals = Math.max(sourceDecimals, precision);
  const scaled = operation === 'multiply' ? scalar.value * factor : scalar.value / factor;

  return `${leading}${formatRounded(scaled, decimals, sourceDecimals)}${trailing}`;
}
